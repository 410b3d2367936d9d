import { describe, it, expect, beforeEach } from 'vitest';
import { PersistenceStore, SETTINGS_KEYS, coerceBoolean, coerceStringList } from './PersistenceStore';
import { MemorySettingsBackend, type SettingValue, type SettingsBackend } from './SettingsBackend';

class FailingBackend implements SettingsBackend {
  get(): unknown {
    throw new Error('disk unavailable');
  }
  set(): void {
    throw new Error('disk full');
  }
  remove(): void {}
  keys(): string[] {
    return [];
  }
  close(): void {}
}

describe('coercion', () => {
  it('reads booleans written as strings or numbers', () => {
    expect(coerceBoolean('true', false)).toBe(true);
    expect(coerceBoolean(' FALSE ', true)).toBe(false);
    expect(coerceBoolean('1', false)).toBe(true);
    expect(coerceBoolean(0, true)).toBe(false);
    expect(coerceBoolean('maybe', true)).toBe(true);
    expect(coerceBoolean(['true'], false)).toBe(false);
  });

  it('reads a lone string as a one-element list', () => {
    expect(coerceStringList('ads.')).toEqual(['ads.']);
    expect(coerceStringList(['a', 1, 'b'])).toEqual(['a', 'b']);
    expect(coerceStringList(42)).toEqual([]);
  });
});

describe('PersistenceStore', () => {
  let backend: MemorySettingsBackend;
  let store: PersistenceStore;

  beforeEach(() => {
    backend = new MemorySettingsBackend();
    store = new PersistenceStore(backend);
  });

  describe('defaults', () => {
    it('returns documented defaults for an empty backend', () => {
      expect(store.getFilterEnabled()).toBe(true);
      expect(store.getFilterPatterns()).toEqual([]);
      expect(store.getUserAgentOverride()).toBeUndefined();
      expect(store.getBookmarks()).toEqual([]);
      expect(store.getSessionUrls()).toEqual([]);
    });

    it('returns defaults when the backend throws on read', () => {
      const failing = new PersistenceStore(new FailingBackend());
      expect(failing.getFilterEnabled()).toBe(true);
      expect(failing.getFilterPatterns()).toEqual([]);
      expect(failing.getBookmarks()).toEqual([]);
    });

    it('returns defaults for values of the wrong shape', () => {
      const seeded: Record<string, SettingValue> = {
        [SETTINGS_KEYS.adblockEnabled]: 'garbage',
        [SETTINGS_KEYS.userAgent]: 12,
        [SETTINGS_KEYS.sessionUrls]: false,
      };
      const odd = new PersistenceStore(new MemorySettingsBackend(seeded));
      expect(odd.getFilterEnabled()).toBe(true);
      expect(odd.getUserAgentOverride()).toBeUndefined();
      expect(odd.getSessionUrls()).toEqual([]);
    });
  });

  it('stores the filter state under its keys', () => {
    store.setFilterState({ enabled: false, patterns: ['ads.', 'tracker'] });

    expect(backend.get('adblock/enabled')).toBe(false);
    expect(backend.get('adblock/patterns')).toEqual(['ads.', 'tracker']);
    expect(store.getFilterState()).toEqual({ enabled: false, patterns: ['ads.', 'tracker'] });
  });

  it('reads the enabled flag written as a string', () => {
    backend.set('adblock/enabled', 'false');
    expect(store.getFilterEnabled()).toBe(false);
  });

  it('clears the user agent override with an empty string', () => {
    store.setUserAgentOverride('Agent/2.0');
    expect(store.getUserAgentOverride()).toBe('Agent/2.0');

    store.setUserAgentOverride(undefined);
    expect(backend.get('browser/user_agent')).toBe('');
    expect(store.getUserAgentOverride()).toBeUndefined();
  });

  it('encodes bookmarks as Title|URL strings', () => {
    store.setBookmarks([
      { title: 'Home', url: 'https://example.com/' },
      { title: '', url: 'https://untitled.example/' },
    ]);

    expect(backend.get('bookmarks/list')).toEqual([
      'Home|https://example.com/',
      'https://untitled.example/|https://untitled.example/',
    ]);
  });

  it('decodes legacy bookmark entries', () => {
    backend.set('bookmarks/list', ['https://old.example/', 'New|https://new.example/']);

    expect(store.getBookmarks()).toEqual([
      { title: 'https://old.example/', url: 'https://old.example/' },
      { title: 'New', url: 'https://new.example/' },
    ]);
  });

  it('reads a single stored bookmark string as a list', () => {
    backend.set('bookmarks/list', 'Solo|https://solo.example/');
    expect(store.getBookmarks()).toEqual([{ title: 'Solo', url: 'https://solo.example/' }]);
  });

  it('keeps session URLs in order', () => {
    store.setSessionUrls(['https://b.example/', 'https://a.example/']);
    expect(store.getSessionUrls()).toEqual(['https://b.example/', 'https://a.example/']);
  });

  it('wraps write failures in a contextual error', () => {
    const failing = new PersistenceStore(new FailingBackend());
    expect(() => failing.setSessionUrls([])).toThrow("Failed to save 'session/urls'");
  });
});
