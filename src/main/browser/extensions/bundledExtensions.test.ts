import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createTempDir, removeDir } from '../../../test/helpers/testUtils';
import { DARK_MODE_EXTENSION, ensureBundledExtensions } from './bundledExtensions';
import { ExtensionRegistry } from './ExtensionRegistry';

describe('ensureBundledExtensions', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('writes the dark mode bundle into an empty root', async () => {
    const written = await ensureBundledExtensions(root);

    expect(written.sort()).toEqual([
      path.join(root, 'darkmode', 'manifest.json'),
      path.join(root, 'darkmode', 'styles.css'),
    ]);
    const manifest: unknown = JSON.parse(await fs.readFile(path.join(root, 'darkmode', 'manifest.json'), 'utf-8'));
    expect(manifest).toEqual({ name: 'Dark Mode', description: 'Forces dark mode on all sites', version: '1.0' });
  });

  it('produces a bundle the registry loads as a stylesheet', async () => {
    await ensureBundledExtensions(root);
    const registry = new ExtensionRegistry();

    await registry.scan(root);

    const darkMode = registry.get('Dark Mode');
    expect(darkMode?.contentScript).toBeUndefined();
    expect(darkMode?.styleSheet).toContain('background: #111 !important;');
  });

  it('never overwrites existing files', async () => {
    const stylesPath = path.join(root, 'darkmode', 'styles.css');
    await fs.mkdir(path.dirname(stylesPath), { recursive: true });
    await fs.writeFile(stylesPath, 'body { background: navy; }', 'utf-8');

    const written = await ensureBundledExtensions(root);

    expect(written).toEqual([path.join(root, 'darkmode', 'manifest.json')]);
    expect(await fs.readFile(stylesPath, 'utf-8')).toBe('body { background: navy; }');
  });

  it('writes nothing on a second run', async () => {
    await ensureBundledExtensions(root);
    expect(await ensureBundledExtensions(root)).toEqual([]);
  });

  it('accepts a custom bundle list', async () => {
    const written = await ensureBundledExtensions(root, [
      { directory: 'hello', files: { 'content.js': 'console.log("hello");' } },
    ]);

    expect(written).toEqual([path.join(root, 'hello', 'content.js')]);
    expect(DARK_MODE_EXTENSION.directory).toBe('darkmode');
  });
});
