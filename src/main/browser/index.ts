/**
 * Browser Module Index
 *
 * Central export point for the browser core.
 */
export { BrowserShell, type BrowserShellOptions, type TabState } from './BrowserShell';
export { normalizeUrl, isSecureUrl, type NormalizeUrlOptions } from './urlUtils';
export type {
  BeforeRequestDetails,
  BeforeRequestListener,
  BeforeRequestResponse,
  BrowsingEngine,
  EnginePage,
  EngineSession,
  LoadFinishedListener,
} from './engine';
export * from './adblock';
export * from './extensions';
