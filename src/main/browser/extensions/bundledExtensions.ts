/**
 * Bundles shipped with the browser and written into the extensions root on
 * startup. Existing files are never overwritten, so user edits survive.
 */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getErrorMessage, isRecord } from '../../../shared/utils/errorHandling';
import { createLogger } from '../../logger';
import { MANIFEST_FILE, STYLE_SHEET_FILE } from './ExtensionRegistry';

const logger = createLogger('BundledExtensions');

export interface BundledExtension {
  directory: string;
  files: Record<string, string>;
}

export const DARK_MODE_EXTENSION: BundledExtension = {
  directory: 'darkmode',
  files: {
    [MANIFEST_FILE]:
      JSON.stringify(
        {
          name: 'Dark Mode',
          description: 'Forces dark mode on all sites',
          version: '1.0',
        },
        null,
        2
      ) + '\n',
    [STYLE_SHEET_FILE]: [
      'html, body {',
      '    background: #111 !important;',
      '    color: #eee !important;',
      '}',
      'img, video {',
      '    filter: brightness(0.8) contrast(1.2);',
      '}',
      'a {',
      '    color: #4aa3ff !important;',
      '}',
      '',
    ].join('\n'),
  },
};

export const BUNDLED_EXTENSIONS: readonly BundledExtension[] = [DARK_MODE_EXTENSION];

/**
 * Write any missing bundled files. Returns the paths that were created.
 */
export async function ensureBundledExtensions(
  rootDirectory: string,
  bundles: readonly BundledExtension[] = BUNDLED_EXTENSIONS
): Promise<string[]> {
  const written: string[] = [];

  for (const bundle of bundles) {
    const bundleDir = path.join(rootDirectory, bundle.directory);
    try {
      await fs.mkdir(bundleDir, { recursive: true });
    } catch (error) {
      logger.warn('Could not create bundled extension directory', { bundleDir, error: getErrorMessage(error) });
      continue;
    }

    for (const [fileName, content] of Object.entries(bundle.files)) {
      const filePath = path.join(bundleDir, fileName);
      try {
        // 'wx' fails when the file exists, which is the no-overwrite guarantee
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
        written.push(filePath);
      } catch (error) {
        if (isRecord(error) && error.code === 'EEXIST') continue;
        logger.warn('Could not write bundled extension file', { filePath, error: getErrorMessage(error) });
      }
    }
  }

  if (written.length > 0) {
    logger.info('Bundled extensions written', { files: written.length, rootDirectory });
  }
  return written;
}
