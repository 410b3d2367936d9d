import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createTempDir, removeDir, writeBundle } from '../../../test/helpers/testUtils';
import { ExtensionRegistry, loadBundle, parseManifest, resolveExtensionName, type ScanReport } from './ExtensionRegistry';

describe('parseManifest', () => {
  it('keeps known string fields', () => {
    expect(parseManifest('{"name":"Reader","description":"Cleaner pages","version":"2.1","extra":true}')).toEqual({
      name: 'Reader',
      description: 'Cleaner pages',
      version: '2.1',
    });
  });

  it('drops fields of the wrong type', () => {
    expect(parseManifest('{"name":42,"version":"1.0"}')).toEqual({ version: '1.0' });
  });

  it('returns an empty manifest for malformed JSON', () => {
    expect(parseManifest('{ name: ')).toEqual({});
  });

  it('returns an empty manifest for JSON that is not an object', () => {
    expect(parseManifest('["name"]')).toEqual({});
    expect(parseManifest('"Reader"')).toEqual({});
    expect(parseManifest('null')).toEqual({});
  });
});

describe('resolveExtensionName', () => {
  it('prefers the manifest name', () => {
    expect(resolveExtensionName('reader', { name: 'Reader Mode' })).toBe('Reader Mode');
  });

  it('trims the manifest name and falls back when it is blank', () => {
    expect(resolveExtensionName('reader', { name: '  Reader  ' })).toBe('Reader');
    expect(resolveExtensionName('reader', { name: '   ' })).toBe('reader');
    expect(resolveExtensionName('reader', {})).toBe('reader');
  });
});

describe('ExtensionRegistry', () => {
  let root: string;
  let registry: ExtensionRegistry;

  beforeEach(async () => {
    root = await createTempDir();
    registry = new ExtensionRegistry();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('includes a styles-only bundle under its directory name', async () => {
    await writeBundle(root, 'tint', { 'styles.css': 'body { color: red; }' });

    const catalog = await registry.scan(root);

    expect(Array.from(catalog.keys())).toEqual(['tint']);
    const extension = catalog.get('tint');
    expect(extension?.styleSheet).toBe('body { color: red; }');
    expect(extension?.contentScript).toBeUndefined();
    expect(extension?.manifest).toEqual({});
    expect(extension?.directory).toBe(path.join(root, 'tint'));
  });

  it('keeps the script of a bundle whose manifest is malformed', async () => {
    await writeBundle(root, 'broken', { 'manifest.json': '{ not json', 'content.js': 'console.log(1);' });

    const catalog = await registry.scan(root);

    expect(catalog.get('broken')).toEqual({
      name: 'broken',
      directory: path.join(root, 'broken'),
      manifest: {},
      contentScript: 'console.log(1);',
    });
  });

  it('discovers an empty bundle but leaves it out of the catalog', async () => {
    await fs.mkdir(path.join(root, 'empty'));
    await writeBundle(root, 'manifest-only', { 'manifest.json': '{"name":"Nothing"}' });

    const catalog = await registry.scan(root);

    expect(catalog.size).toBe(0);
    expect(registry.getLastReport()).toMatchObject({
      discovered: ['empty', 'manifest-only'],
      loaded: [],
      skipped: ['empty', 'manifest-only'],
    });
  });

  it('names bundles after their manifest', async () => {
    await writeBundle(root, 'dm', {
      'manifest.json': '{"name":"Dark Mode","version":"1.0"}',
      'styles.css': 'html { background: #000; }',
    });

    const catalog = await registry.scan(root);

    expect(registry.has('Dark Mode')).toBe(true);
    expect(registry.has('dm')).toBe(false);
    expect(catalog.get('Dark Mode')?.manifest).toEqual({ name: 'Dark Mode', version: '1.0' });
  });

  it('orders the catalog by directory name', async () => {
    await writeBundle(root, 'charlie', { 'content.js': 'c' });
    await writeBundle(root, 'alpha', { 'content.js': 'a' });
    await writeBundle(root, 'Bravo', { 'content.js': 'b' });

    await registry.scan(root);

    expect(registry.list().map((extension) => extension.name)).toEqual(['Bravo', 'alpha', 'charlie']);
  });

  it('ignores plain files in the root', async () => {
    await fs.writeFile(path.join(root, 'README.txt'), 'not a bundle');
    await writeBundle(root, 'real', { 'content.js': 'x' });

    await registry.scan(root);

    expect(registry.getLastReport()?.discovered).toEqual(['real']);
  });

  it('lets the later bundle win a name collision and keeps the first position', async () => {
    await writeBundle(root, 'a-first', { 'manifest.json': '{"name":"Shared"}', 'content.js': 'first' });
    await writeBundle(root, 'b-other', { 'content.js': 'other' });
    await writeBundle(root, 'c-second', { 'manifest.json': '{"name":"Shared"}', 'content.js': 'second' });

    const catalog = await registry.scan(root);

    expect(Array.from(catalog.keys())).toEqual(['Shared', 'b-other']);
    expect(catalog.get('Shared')?.contentScript).toBe('second');
    expect(registry.getLastReport()).toMatchObject({
      loaded: ['Shared', 'b-other'],
      collisions: ['Shared'],
    });
  });

  it('strips a byte order mark from bundle files', async () => {
    await writeBundle(root, 'bom', { 'content.js': '\uFEFFrun();' });

    await registry.scan(root);

    expect(registry.get('bom')?.contentScript).toBe('run();');
  });

  it('keeps an empty file as present', async () => {
    await writeBundle(root, 'blank', { 'content.js': '' });

    await registry.scan(root);

    expect(registry.get('blank')?.contentScript).toBe('');
  });

  it('loads the remaining files when one cannot be read', async () => {
    await writeBundle(root, 'partial', { 'styles.css': 'p { margin: 0; }' });
    await fs.mkdir(path.join(root, 'partial', 'content.js'));

    await registry.scan(root);

    const partial = registry.get('partial');
    expect(partial?.styleSheet).toBe('p { margin: 0; }');
    expect(partial?.contentScript).toBeUndefined();
  });

  it('creates a missing root and returns an empty catalog', async () => {
    const missing = path.join(root, 'nested', 'extensions');

    const catalog = await registry.scan(missing);

    expect(catalog.size).toBe(0);
    expect((await fs.stat(missing)).isDirectory()).toBe(true);
  });

  it('returns an empty catalog for a missing root when creation is off', async () => {
    const catalog = await registry.scan(path.join(root, 'absent'), { createIfMissing: false });
    expect(catalog.size).toBe(0);
  });

  it('rebuilds the catalog on every scan', async () => {
    await writeBundle(root, 'one', { 'content.js': '1' });
    await registry.scan(root);
    await fs.rm(path.join(root, 'one'), { recursive: true });
    await writeBundle(root, 'two', { 'content.js': '2' });

    await registry.scan(root);

    expect(registry.list().map((extension) => extension.name)).toEqual(['two']);
  });

  it('emits the scan report', async () => {
    await writeBundle(root, 'one', { 'content.js': '1' });
    const listener = vi.fn();
    registry.on('scanned', listener);

    await registry.scan(root);

    expect(listener).toHaveBeenCalledTimes(1);
    const report: ScanReport = listener.mock.calls[0][0];
    expect(report.rootDirectory).toBe(path.resolve(root));
    expect(report.loaded).toEqual(['one']);
  });

  it('describes the loaded extensions', async () => {
    expect(registry.describe()).toBe('No extensions loaded.');

    await writeBundle(root, 'alpha', { 'content.js': 'a' });
    await writeBundle(root, 'beta', { 'manifest.json': '{"name":"Beta Tools"}', 'styles.css': 'b' });
    await registry.scan(root);

    expect(registry.describe()).toBe('Loaded extensions:\nalpha\nBeta Tools');
  });
});

describe('loadBundle', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('loads both payloads', async () => {
    const dir = await writeBundle(root, 'both', { 'content.js': 'go();', 'styles.css': 'p {}' });

    expect(await loadBundle(dir)).toEqual({
      name: 'both',
      directory: dir,
      manifest: {},
      styleSheet: 'p {}',
      contentScript: 'go();',
    });
  });

  it('returns null for a directory without payloads', async () => {
    const dir = await writeBundle(root, 'none', {});
    expect(await loadBundle(dir)).toBeNull();
  });
});
