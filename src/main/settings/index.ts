/**
 * Settings Module
 */
export {
  PersistenceStore,
  SETTINGS_KEYS,
  coerceBoolean,
  coerceString,
  coerceStringList,
  type SettingsKey,
} from './PersistenceStore';
export { MemorySettingsBackend, type SettingValue, type SettingsBackend } from './SettingsBackend';
export { SqliteSettingsBackend, type SettingsIdentity } from './SqliteSettingsBackend';
export {
  BOOKMARK_SEPARATOR,
  createBookmark,
  decodeBookmark,
  decodeBookmarks,
  encodeBookmark,
  encodeBookmarks,
} from './bookmarkCodec';
