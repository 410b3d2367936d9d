/**
 * Shared types for the browser core: filter state, extension bundles,
 * bookmarks and the outcome/status shapes used to report best-effort work.
 */

// =============================================================================
// Request Filtering
// =============================================================================

/** A lowercase substring matched against lowercased request URLs */
export type FilterRule = string;

export interface FilterState {
  enabled: boolean;
  /** Configured rules; kept while the filter is disabled */
  patterns: FilterRule[];
}

export interface FilterStats {
  enabled: boolean;
  patternCount: number;
  activePatternCount: number;
  checked: number;
  blocked: number;
}

// =============================================================================
// Extensions
// =============================================================================

export interface ExtensionManifest {
  name?: string;
  description?: string;
  version?: string;
}

export interface Extension {
  /** Catalog key: manifest name when present, otherwise the directory name */
  name: string;
  /** Absolute path of the bundle directory */
  directory: string;
  manifest: ExtensionManifest;
  styleSheet?: string;
  contentScript?: string;
}

export type ExtensionCatalog = ReadonlyMap<string, Extension>;

// =============================================================================
// Persistence
// =============================================================================

export interface Bookmark {
  title: string;
  url: string;
}

// =============================================================================
// Outcomes & Status
// =============================================================================

/** Result of asking the engine to enforce something */
export type OperationOutcome =
  | { status: 'succeeded' }
  | { status: 'unsupported'; reason: string }
  | { status: 'failed'; error: Error };

export type StatusLevel = 'info' | 'warning' | 'error';

/** Transient, non-blocking notification for the window chrome */
export interface StatusMessage {
  text: string;
  level: StatusLevel;
  /** How long the chrome should keep the message visible */
  timeoutMs: number;
}
