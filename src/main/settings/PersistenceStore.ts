/**
 * Persistence Store
 *
 * Typed accessors over the opaque settings backend. Reads never throw: an
 * absent key, a value of the wrong shape or a backend failure yields the
 * documented default. Writes throw ContextualError so callers can report
 * that a change was not saved.
 */
import type { Bookmark, FilterState } from '../../shared/types';
import { ContextualError, toError, withErrorHandlingSync } from '../../shared/utils/errorHandling';
import { createLogger } from '../logger';
import { decodeBookmarks, encodeBookmarks } from './bookmarkCodec';
import type { SettingValue, SettingsBackend } from './SettingsBackend';

const logger = createLogger('PersistenceStore');

export const SETTINGS_KEYS = {
  adblockEnabled: 'adblock/enabled',
  adblockPatterns: 'adblock/patterns',
  userAgent: 'browser/user_agent',
  bookmarks: 'bookmarks/list',
  sessionUrls: 'session/urls',
} as const;

export type SettingsKey = (typeof SETTINGS_KEYS)[keyof typeof SETTINGS_KEYS];

// =============================================================================
// Coercion
// =============================================================================

/**
 * Booleans may have been stored as strings or numbers by other writers.
 */
export function coerceBoolean(value: unknown, defaultValue: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return defaultValue;
}

/**
 * A lone string is read as a one-element list; non-string items are dropped.
 */
export function coerceStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value === 'string') {
    return [value];
  }
  return [];
}

export function coerceString(value: unknown, defaultValue = ''): string {
  return typeof value === 'string' ? value : defaultValue;
}

// =============================================================================
// Store
// =============================================================================

export class PersistenceStore {
  constructor(private readonly backend: SettingsBackend) {}

  private read<T>(key: SettingsKey, coerce: (value: unknown) => T, defaultValue: T): T {
    return withErrorHandlingSync(
      () => {
        const raw = this.backend.get(key);
        return raw === undefined || raw === null ? defaultValue : coerce(raw);
      },
      { operation: 'read', component: 'PersistenceStore', additionalInfo: { key } },
      { fallback: defaultValue, logger: (message, meta) => logger.warn(message, meta) }
    );
  }

  private write(key: SettingsKey, value: SettingValue): void {
    try {
      this.backend.set(key, value);
    } catch (error) {
      logger.error('Failed to save setting', { key, error: toError(error).message });
      throw new ContextualError(
        `Failed to save '${key}'`,
        { operation: 'write', component: 'PersistenceStore', additionalInfo: { key } },
        toError(error)
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Ad block
  // ---------------------------------------------------------------------------

  getFilterEnabled(): boolean {
    return this.read(SETTINGS_KEYS.adblockEnabled, (value) => coerceBoolean(value, true), true);
  }

  setFilterEnabled(enabled: boolean): void {
    this.write(SETTINGS_KEYS.adblockEnabled, enabled);
  }

  /** Empty means "use the built-in rule set" */
  getFilterPatterns(): string[] {
    return this.read(SETTINGS_KEYS.adblockPatterns, coerceStringList, []);
  }

  setFilterPatterns(patterns: readonly string[]): void {
    this.write(SETTINGS_KEYS.adblockPatterns, [...patterns]);
  }

  getFilterState(): FilterState {
    return { enabled: this.getFilterEnabled(), patterns: this.getFilterPatterns() };
  }

  setFilterState(state: FilterState): void {
    this.setFilterEnabled(state.enabled);
    this.setFilterPatterns(state.patterns);
  }

  // ---------------------------------------------------------------------------
  // User agent
  // ---------------------------------------------------------------------------

  /** Undefined means "use the engine default" */
  getUserAgentOverride(): string | undefined {
    const value = this.read(SETTINGS_KEYS.userAgent, (raw) => coerceString(raw), '');
    return value ? value : undefined;
  }

  setUserAgentOverride(userAgent: string | undefined): void {
    this.write(SETTINGS_KEYS.userAgent, userAgent ?? '');
  }

  // ---------------------------------------------------------------------------
  // Bookmarks
  // ---------------------------------------------------------------------------

  getBookmarks(): Bookmark[] {
    return this.read(SETTINGS_KEYS.bookmarks, (value) => decodeBookmarks(coerceStringList(value)), []);
  }

  setBookmarks(bookmarks: readonly Bookmark[]): void {
    this.write(SETTINGS_KEYS.bookmarks, encodeBookmarks(bookmarks));
  }

  // ---------------------------------------------------------------------------
  // Session
  // ---------------------------------------------------------------------------

  getSessionUrls(): string[] {
    return this.read(SETTINGS_KEYS.sessionUrls, coerceStringList, []);
  }

  setSessionUrls(urls: readonly string[]): void {
    this.write(SETTINGS_KEYS.sessionUrls, [...urls]);
  }

  close(): void {
    this.backend.close();
  }
}
