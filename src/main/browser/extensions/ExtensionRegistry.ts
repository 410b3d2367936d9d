/**
 * Extension Registry
 *
 * Discovers local extension bundles. Every immediate subdirectory of the
 * extensions root is a bundle that may contain:
 *
 *   manifest.json  optional, { name?, description?, version? }
 *   content.js     optional, raw script text
 *   styles.css     optional, raw stylesheet text
 *
 * Bundles are visited in lexicographic order so the catalog (and therefore
 * injection order) does not depend on how the filesystem lists entries.
 * Every failure inside a bundle is recovered locally.
 */
import { EventEmitter } from 'node:events';
import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import type { Extension, ExtensionCatalog, ExtensionManifest } from '../../../shared/types';
import { getErrorMessage, isRecord, withErrorHandling, withErrorHandlingSync } from '../../../shared/utils/errorHandling';
import { createLogger } from '../../logger';

const logger = createLogger('ExtensionRegistry');

export const MANIFEST_FILE = 'manifest.json';
export const CONTENT_SCRIPT_FILE = 'content.js';
export const STYLE_SHEET_FILE = 'styles.css';

export interface ScanReport {
  rootDirectory: string;
  /** Directory names of every bundle found, in scan order */
  discovered: string[];
  /** Catalog keys of the bundles that were kept */
  loaded: string[];
  /** Directory names of bundles with neither script nor stylesheet */
  skipped: string[];
  /** Catalog keys claimed by more than one bundle (last one wins) */
  collisions: string[];
  durationMs: number;
}

export interface ScanOptions {
  /** Create the root when it does not exist (default: true) */
  createIfMissing?: boolean;
}

/**
 * Parse manifest text. Anything that is not a JSON object yields an empty
 * manifest; only string-valued known fields are kept.
 */
export function parseManifest(text: string, source = MANIFEST_FILE): ExtensionManifest {
  const parsed = withErrorHandlingSync<unknown>(
    () => JSON.parse(text),
    { operation: 'parseManifest', component: 'ExtensionRegistry', additionalInfo: { source } },
    { fallback: null, logger: (message, meta) => logger.warn(message, meta) }
  );

  if (!isRecord(parsed)) {
    if (parsed !== null) {
      logger.warn('Manifest is not an object, ignoring it', { source });
    }
    return {};
  }

  const manifest: ExtensionManifest = {};
  if (typeof parsed.name === 'string') manifest.name = parsed.name;
  if (typeof parsed.description === 'string') manifest.description = parsed.description;
  if (typeof parsed.version === 'string') manifest.version = parsed.version;
  return manifest;
}

/**
 * Catalog key for a bundle: a non-empty manifest name, else the directory name.
 */
export function resolveExtensionName(directoryName: string, manifest: ExtensionManifest): string {
  const manifestName = manifest.name?.trim();
  return manifestName ? manifestName : directoryName;
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function isMissing(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Read a bundle file. Returns null when the file is absent or unreadable, so
 * one bad file never blocks its siblings.
 */
async function readOptionalFile(filePath: string): Promise<string | null> {
  return withErrorHandling<string | null>(
    async () => {
      try {
        return stripBom(await fs.readFile(filePath, 'utf-8'));
      } catch (error) {
        if (isMissing(error)) return null;
        throw error;
      }
    },
    { operation: 'readBundleFile', component: 'ExtensionRegistry', additionalInfo: { filePath } },
    { fallback: null, logger: (message, meta) => logger.warn(message, meta) }
  );
}

async function isBundleDirectory(rootDirectory: string, entry: Dirent): Promise<boolean> {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  // Symlinked bundles count when they resolve to a directory
  try {
    return (await fs.stat(path.join(rootDirectory, entry.name))).isDirectory();
  } catch (error) {
    logger.debug('Skipping dangling symlink', { name: entry.name, error: getErrorMessage(error) });
    return false;
  }
}

/**
 * Load one bundle directory. Returns null for bundles without payloads.
 */
export async function loadBundle(directory: string): Promise<Extension | null> {
  const directoryName = path.basename(directory);

  const [manifestText, contentScript, styleSheet] = await Promise.all([
    readOptionalFile(path.join(directory, MANIFEST_FILE)),
    readOptionalFile(path.join(directory, CONTENT_SCRIPT_FILE)),
    readOptionalFile(path.join(directory, STYLE_SHEET_FILE)),
  ]);

  if (contentScript === null && styleSheet === null) {
    return null;
  }

  const manifest = manifestText === null ? {} : parseManifest(manifestText, path.join(directoryName, MANIFEST_FILE));
  const extension: Extension = {
    name: resolveExtensionName(directoryName, manifest),
    directory,
    manifest,
  };
  if (styleSheet !== null) extension.styleSheet = styleSheet;
  if (contentScript !== null) extension.contentScript = contentScript;
  return extension;
}

export class ExtensionRegistry extends EventEmitter {
  private catalog = new Map<string, Extension>();
  private lastReport: ScanReport | null = null;

  /**
   * Scan the root and rebuild the catalog from scratch.
   */
  async scan(rootDirectory: string, options: ScanOptions = {}): Promise<ExtensionCatalog> {
    const { createIfMissing = true } = options;
    const stopTimer = logger.startTimer('extension scan');
    const root = path.resolve(rootDirectory);

    const report: ScanReport = {
      rootDirectory: root,
      discovered: [],
      loaded: [],
      skipped: [],
      collisions: [],
      durationMs: 0,
    };
    const catalog = new Map<string, Extension>();

    const entries = await this.listRoot(root, createIfMissing);
    const bundleNames: string[] = [];
    for (const entry of entries) {
      if (await isBundleDirectory(root, entry)) {
        bundleNames.push(entry.name);
      }
    }
    bundleNames.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    for (const bundleName of bundleNames) {
      report.discovered.push(bundleName);
      const extension = await loadBundle(path.join(root, bundleName));

      if (!extension) {
        logger.debug('Bundle has no script or stylesheet, skipping', { bundle: bundleName });
        report.skipped.push(bundleName);
        continue;
      }

      if (catalog.has(extension.name)) {
        // TODO: decide whether colliding names should be disambiguated instead of replaced
        logger.warn('Extension name collision, later bundle replaces earlier one', {
          name: extension.name,
          replacedDirectory: catalog.get(extension.name)?.directory,
          directory: extension.directory,
        });
        if (!report.collisions.includes(extension.name)) {
          report.collisions.push(extension.name);
        }
      } else {
        report.loaded.push(extension.name);
      }

      // Replacing an existing key keeps its original catalog position
      catalog.set(extension.name, extension);
    }

    this.catalog = catalog;
    report.durationMs = stopTimer();
    this.lastReport = report;

    logger.info('Extensions scanned', {
      root,
      discovered: report.discovered.length,
      loaded: report.loaded.length,
      skipped: report.skipped.length,
    });
    this.emit('scanned', report);

    return this.getCatalog();
  }

  private async listRoot(root: string, createIfMissing: boolean): Promise<Dirent[]> {
    try {
      if (createIfMissing) {
        await fs.mkdir(root, { recursive: true });
      }
      return await fs.readdir(root, { withFileTypes: true });
    } catch (error) {
      logger.warn('Extensions directory unavailable, no extensions loaded', {
        root,
        error: getErrorMessage(error),
      });
      return [];
    }
  }

  getCatalog(): ExtensionCatalog {
    return this.catalog;
  }

  get(name: string): Extension | undefined {
    return this.catalog.get(name);
  }

  has(name: string): boolean {
    return this.catalog.has(name);
  }

  list(): Extension[] {
    return Array.from(this.catalog.values());
  }

  get size(): number {
    return this.catalog.size;
  }

  getLastReport(): ScanReport | null {
    return this.lastReport;
  }

  /**
   * Text for the "Manage Extensions" dialog
   */
  describe(): string {
    if (this.catalog.size === 0) {
      return 'No extensions loaded.';
    }
    return ['Loaded extensions:', ...this.catalog.keys()].join('\n');
  }
}
