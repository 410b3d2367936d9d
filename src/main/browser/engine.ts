/**
 * Embedding Engine Contracts
 *
 * The rendering/navigation engine is supplied by the host application. These
 * interfaces describe the small surface the browser core consumes: a
 * per-request hook, a per-page load-finished event and a script primitive.
 * Capabilities that some engine builds lack are optional members.
 */

export interface BeforeRequestDetails {
  id: number;
  url: string;
  method: string;
  resourceType: string;
}

export interface BeforeRequestResponse {
  cancel?: boolean;
}

export type BeforeRequestListener = (
  details: BeforeRequestDetails,
  callback: (response: BeforeRequestResponse) => void
) => void;

export type LoadFinishedListener = (success: boolean) => void;

export interface EnginePage {
  readonly id: string;
  getURL(): string;
  getTitle(): string;
  loadURL(url: string): void;
  /** Runs script text in the page; settles when the page reports back */
  executeJavaScript(code: string): Promise<unknown>;
  on(event: 'did-finish-load', listener: LoadFinishedListener): unknown;
  removeListener(event: 'did-finish-load', listener: LoadFinishedListener): unknown;
  close(): void;
}

export interface EngineSession {
  readonly isOffTheRecord: boolean;
  getUserAgent(): string;
  setUserAgent?(userAgent: string): void;
  /** Only one listener is kept per session; installing replaces the previous one */
  onBeforeRequest?(listener: BeforeRequestListener | null): void;
  createPage(url: string): EnginePage;
}

export interface BrowsingEngine {
  defaultSession(): EngineSession;
  createOffTheRecordSession(): EngineSession;
}
