import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createTempDir, removeDir } from '../test/helpers/testUtils';
import { ShellLogger, isLogLevel } from './logger';

describe('ShellLogger', () => {
  let root: ShellLogger;

  beforeEach(() => {
    root = new ShellLogger('Test');
  });

  it('records structured entries', () => {
    root.info('Opened', { tabs: 2 });

    const [entry] = root.getRecentLogs();
    expect(entry).toMatchObject({ level: 'info', scope: 'Test', message: 'Opened', meta: { tabs: 2 } });
    expect(typeof entry.id).toBe('string');
  });

  it('gives children a nested scope over the same buffer', () => {
    const child = root.createChildLogger('Registry');
    child.warn('Collision');

    expect(root.getRecentLogs(10, { scope: 'Registry' })).toHaveLength(1);
    expect(root.getRecentLogs()[0].scope).toBe('Test:Registry');
  });

  it('drops entries below the minimum level', () => {
    root.configure({ minLevel: 'warn' });
    root.debug('hidden');
    root.info('hidden');
    root.error('shown');

    expect(root.getRecentLogs().map((entry) => entry.message)).toEqual(['shown']);
  });

  it('filters by level and searches messages and meta', () => {
    root.info('Tab opened', { url: 'https://example.com/' });
    root.error('Save failed', { key: 'session/urls' });

    expect(root.getRecentLogs(10, { level: 'error' }).map((entry) => entry.message)).toEqual(['Save failed']);
    expect(root.searchLogs('SESSION/URLS').map((entry) => entry.message)).toEqual(['Save failed']);
    expect(root.searchLogs('example.com')).toHaveLength(1);
  });

  it('serializes errors passed in meta', () => {
    root.error('Save failed', { error: new Error('disk full'), key: 'session/urls' });

    const [entry] = root.getRecentLogs();
    expect(entry.meta).toMatchObject({ error: { name: 'Error', message: 'disk full' }, key: 'session/urls' });
    expect(JSON.parse(root.exportLogs()).logs[0].meta.error.message).toBe('disk full');
  });

  it('limits recent logs to the requested count', () => {
    for (let i = 0; i < 5; i++) root.info(`entry ${i}`);
    expect(root.getRecentLogs(2).map((entry) => entry.message)).toEqual(['entry 3', 'entry 4']);
  });

  it('trims the oldest fifth when the buffer overflows', () => {
    for (let i = 0; i < 5001; i++) root.debug(`entry ${i}`);

    const logs = root.getRecentLogs(10000);
    expect(logs).toHaveLength(4001);
    expect(logs[0].message).toBe('entry 1000');
  });

  it('exports a summary by level', () => {
    root.info('a');
    root.warn('b');
    root.warn('c');

    const exported: unknown = JSON.parse(root.exportLogs({ levels: ['warn'] }));
    expect(exported).toMatchObject({ summary: { totalLogs: 2, byLevel: { debug: 0, info: 0, warn: 2, error: 0 } } });
  });

  it('logs timer durations at debug level', () => {
    const stop = root.startTimer('scan');
    const duration = stop();

    expect(duration).toBeGreaterThanOrEqual(0);
    expect(root.getRecentLogs()[0]).toMatchObject({ level: 'debug', message: 'Timer [scan] completed' });
  });

  it('clears the buffer', () => {
    root.info('gone');
    root.clear();
    expect(root.getRecentLogs()).toEqual([]);
  });
});

describe('ShellLogger file output', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes JSON lines to a dated file', async () => {
    const logger = new ShellLogger('File');
    logger.configure({ logDirectory: path.join(dir, 'logs') });
    logger.info('first');
    logger.warn('second', { code: 7 });

    const expectedPath = path.join(dir, 'logs', `lantern-${new Date().toISOString().split('T')[0]}.log`);
    expect(logger.getLogFilePath()).toBe(expectedPath);

    const readLines = async (): Promise<string[]> => {
      const text = await fs.readFile(expectedPath, 'utf-8').catch(() => '');
      return text.split('\n').filter((line) => line.length > 0);
    };
    await expect.poll(async () => (await readLines()).length).toBe(2);

    const lines = await readLines();
    const second: unknown = JSON.parse(lines[1]);
    expect(second).toMatchObject({ level: 'warn', scope: 'File', message: 'second', meta: { code: 7 } });
  });

  it('has no file without a log directory', () => {
    expect(new ShellLogger('Memory').getLogFilePath()).toBeNull();
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('WARN')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
