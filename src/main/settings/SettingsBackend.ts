/**
 * Opaque key-value settings backend. Keys are slash-separated strings;
 * values are primitives or lists of strings.
 */
export type SettingValue = string | number | boolean | string[];

export interface SettingsBackend {
  /** Returns undefined for absent keys */
  get(key: string): unknown;
  set(key: string, value: SettingValue): void;
  remove(key: string): void;
  keys(): string[];
  close(): void;
}

/**
 * In-process backend. Used for tests and for hosts that persist settings
 * themselves.
 */
export class MemorySettingsBackend implements SettingsBackend {
  private readonly values = new Map<string, SettingValue>();

  constructor(initial: Record<string, SettingValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.set(key, value);
    }
  }

  get(key: string): unknown {
    const value = this.values.get(key);
    return Array.isArray(value) ? [...value] : value;
  }

  set(key: string, value: SettingValue): void {
    this.values.set(key, Array.isArray(value) ? [...value] : value);
  }

  remove(key: string): void {
    this.values.delete(key);
  }

  keys(): string[] {
    return Array.from(this.values.keys()).sort();
  }

  close(): void {
    this.values.clear();
  }
}
