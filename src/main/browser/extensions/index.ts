/**
 * Extensions Module
 *
 * Bundle discovery and per-page injection.
 */
export {
  ExtensionRegistry,
  loadBundle,
  parseManifest,
  resolveExtensionName,
  MANIFEST_FILE,
  CONTENT_SCRIPT_FILE,
  STYLE_SHEET_FILE,
  type ScanOptions,
  type ScanReport,
} from './ExtensionRegistry';
export {
  InjectionDriver,
  buildStyleInjectionScript,
  planInjection,
  type InjectionDispatch,
  type InjectionFailure,
  type InjectionKind,
  type InjectionStep,
  type InjectionSummary,
} from './InjectionDriver';
export {
  ensureBundledExtensions,
  BUNDLED_EXTENSIONS,
  DARK_MODE_EXTENSION,
  type BundledExtension,
} from './bundledExtensions';
