/**
 * SQLite Settings Backend
 *
 * Persists settings as JSON text in a single table, scoped by an
 * organization/application identity so several applications can share one
 * database file. better-sqlite3 is synchronous, matching the store contract.
 */
import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { ContextualError, getErrorMessage, toError } from '../../shared/utils/errorHandling';
import { createLogger } from '../logger';
import type { SettingValue, SettingsBackend } from './SettingsBackend';

const logger = createLogger('SqliteSettingsBackend');

export interface SettingsIdentity {
  organization: string;
  application: string;
}

/** Database row type */
interface SettingRow {
  key: string;
  value: string;
}

export class SqliteSettingsBackend implements SettingsBackend {
  private db: Database.Database | null;
  private readonly scope: string;

  /**
   * @param dbPath - file path, or ':memory:' for a throwaway database
   */
  constructor(
    private readonly dbPath: string,
    identity: SettingsIdentity
  ) {
    this.scope = `${identity.organization}/${identity.application}`;

    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        scope TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (scope, key)
      );
    `);

    logger.info('Settings database opened', { dbPath, scope: this.scope });
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new Error('Settings database is closed');
    return this.db;
  }

  get(key: string): unknown {
    const row = this.requireDb()
      .prepare<[string, string], SettingRow>('SELECT key, value FROM settings WHERE scope = ? AND key = ?')
      .get(this.scope, key);
    if (!row) return undefined;

    try {
      const value: unknown = JSON.parse(row.value);
      return value;
    } catch (error) {
      // Corrupt rows read as absent so accessors fall back to defaults
      logger.warn('Ignoring unparseable setting', { key, error: getErrorMessage(error) });
      return undefined;
    }
  }

  set(key: string, value: SettingValue): void {
    try {
      this.requireDb()
        .prepare(
          `INSERT INTO settings (scope, key, value, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT (scope, key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
        )
        .run(this.scope, key, JSON.stringify(value), Date.now());
    } catch (error) {
      throw new ContextualError(
        `Failed to write setting '${key}'`,
        { operation: 'set', component: 'SqliteSettingsBackend', additionalInfo: { key } },
        toError(error)
      );
    }
  }

  remove(key: string): void {
    this.requireDb().prepare('DELETE FROM settings WHERE scope = ? AND key = ?').run(this.scope, key);
  }

  keys(): string[] {
    return this.requireDb()
      .prepare<[string], { key: string }>('SELECT key FROM settings WHERE scope = ? ORDER BY key')
      .all(this.scope)
      .map((row) => row.key);
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    logger.debug('Settings database closed', { dbPath: this.dbPath });
  }
}
