/**
 * Browser Shell
 *
 * Per-profile controller that sits between the window chrome and the core:
 * it owns the profile's request filter and injection driver, keeps the tab
 * list and bookmarks, and synchronizes them with the persistence store.
 * Every user-visible outcome is emitted as a transient `status` message.
 */
import { EventEmitter } from 'node:events';
import type { Bookmark, OperationOutcome, StatusLevel, StatusMessage } from '../../shared/types';
import { attemptEngineOperation, describeOutcome, getErrorMessage, isSucceeded } from '../../shared/utils/errorHandling';
import type { ShellConfig } from '../config';
import { createLogger } from '../logger';
import type { PersistenceStore } from '../settings/PersistenceStore';
import { createBookmark } from '../settings/bookmarkCodec';
import { RequestFilter } from './adblock/RequestFilter';
import { attachRequestFilter, detachRequestFilter } from './adblock/requestInterceptor';
import type { EnginePage, EngineSession } from './engine';
import type { ExtensionRegistry } from './extensions/ExtensionRegistry';
import { InjectionDriver } from './extensions/InjectionDriver';
import { isSecureUrl, normalizeUrl } from './urlUtils';

const logger = createLogger('BrowserShell');

// =============================================================================
// Types
// =============================================================================

export interface BrowserShellOptions {
  session: EngineSession;
  store: PersistenceStore;
  registry: ExtensionRegistry;
  config: Pick<ShellConfig, 'homeUrl' | 'searchUrl'>;
}

export interface TabState {
  id: string;
  url: string;
  title: string;
  secure: boolean;
  active: boolean;
}

interface TabRecord {
  page: EnginePage;
  detachInjection: () => void;
}

// =============================================================================
// Browser Shell Class
// =============================================================================

export class BrowserShell extends EventEmitter {
  readonly filter: RequestFilter;
  readonly injector: InjectionDriver;

  private readonly session: EngineSession;
  private readonly store: PersistenceStore;
  private readonly registry: ExtensionRegistry;
  private readonly config: Pick<ShellConfig, 'homeUrl' | 'searchUrl'>;

  private tabs: TabRecord[] = [];
  private activeTabId: string | null = null;
  private bookmarks: Bookmark[] = [];
  // Set when a save failed; the store is canonical otherwise
  private bookmarksDirty = false;
  private patternsDirty = false;
  private started = false;
  private closed = false;

  constructor(options: BrowserShellOptions) {
    super();
    this.session = options.session;
    this.store = options.store;
    this.registry = options.registry;
    this.config = options.config;
    this.filter = new RequestFilter(this.store.getFilterState());
    this.injector = new InjectionDriver(() => this.registry.getCatalog());
  }

  get isPrivate(): boolean {
    return this.session.isOffTheRecord;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Restore persisted state and open the initial tabs.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    const savedUserAgent = this.store.getUserAgentOverride();
    if (savedUserAgent) {
      const outcome = this.applyUserAgent(savedUserAgent);
      if (outcome.status !== 'succeeded') {
        this.reportStatus('Saved User-Agent could not be applied', 3000, 'warning');
      }
    }

    const interceptor = attachRequestFilter(this.session, this.filter, {
      onEnforcementError: (details) => {
        logger.debug('Block decision not enforced', { url: details.url.slice(0, 200) });
      },
    });
    if (interceptor.status !== 'succeeded') {
      this.reportStatus('AdBlock unavailable in this engine build', 3000, 'warning');
    }

    this.bookmarks = this.store.getBookmarks();

    if (!this.isPrivate) {
      this.restoreSession();
    }
    if (this.tabs.length === 0) {
      this.openTab(this.config.homeUrl);
    }

    logger.info('Browser shell started', {
      private: this.isPrivate,
      tabs: this.tabs.length,
      bookmarks: this.bookmarks.length,
      extensions: this.registry.size,
      interceptor: describeOutcome(interceptor),
    });
    this.reportStatus(`AdBlock: ${this.filter.isEnabled() ? 'ON' : 'OFF'}`, 1500);
  }

  /**
   * Persist everything and release pages. The shell is unusable afterwards.
   */
  shutdown(): void {
    if (this.closed) return;

    this.saveSession();
    // Other windows share the store, so only retry saves that failed here
    if (!this.isPrivate) {
      if (this.bookmarksDirty) this.saveBookmarks();
      if (this.patternsDirty) this.savePatterns();
    }

    for (const tab of this.tabs) {
      tab.detachInjection();
      this.closePage(tab.page);
    }
    this.tabs = [];
    this.activeTabId = null;
    detachRequestFilter(this.session);

    this.closed = true;
    logger.info('Browser shell shut down', { private: this.isPrivate });
    this.emit('closed');
  }

  // ===========================================================================
  // Tabs
  // ===========================================================================

  openTab(input: string = this.config.homeUrl): EnginePage {
    const url = normalizeUrl(input, this.config);
    const page = this.session.createPage(url);
    const detachInjection = this.injector.attach(page);

    this.tabs.push({ page, detachInjection });
    this.activeTabId = page.id;

    logger.debug('Tab opened', { pageId: page.id, url });
    this.emit('tabs-changed', this.getTabs());
    return page;
  }

  /**
   * Close a tab. The last tab is replaced by a home tab first so a window
   * is never left empty.
   */
  closeTab(pageId: string): boolean {
    const index = this.tabs.findIndex((tab) => tab.page.id === pageId);
    if (index === -1) return false;

    if (this.tabs.length <= 1) {
      this.openTab(this.config.homeUrl);
    }

    const [tab] = this.tabs.splice(index, 1);
    tab.detachInjection();
    this.closePage(tab.page);

    if (this.activeTabId === pageId) {
      const fallback = this.tabs[Math.min(index, this.tabs.length - 1)];
      this.activeTabId = fallback ? fallback.page.id : null;
    }

    this.emit('tabs-changed', this.getTabs());
    this.saveSession();
    return true;
  }

  activateTab(pageId: string): boolean {
    if (!this.tabs.some((tab) => tab.page.id === pageId)) return false;
    this.activeTabId = pageId;
    this.emit('tabs-changed', this.getTabs());
    return true;
  }

  /**
   * Load address bar input in the active tab, opening one if needed.
   */
  navigate(input: string): EnginePage {
    const page = this.getActivePage();
    if (!page) {
      return this.openTab(input);
    }
    page.loadURL(normalizeUrl(input, this.config));
    return page;
  }

  getActivePage(): EnginePage | null {
    return this.tabs.find((tab) => tab.page.id === this.activeTabId)?.page ?? null;
  }

  getActiveTab(): TabState | null {
    return this.getTabs().find((tab) => tab.active) ?? null;
  }

  getTabs(): TabState[] {
    return this.tabs.map(({ page }) => {
      const url = page.getURL();
      return {
        id: page.id,
        url,
        title: page.getTitle() || 'New Tab',
        secure: isSecureUrl(url),
        active: page.id === this.activeTabId,
      };
    });
  }

  private closePage(page: EnginePage): void {
    try {
      page.close();
    } catch (error) {
      logger.warn('Engine failed to close page', { pageId: page.id, error: getErrorMessage(error) });
    }
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  /**
   * Save the open tab URLs in tab order. Private profiles never save.
   */
  saveSession(): void {
    if (this.isPrivate) return;
    const urls = this.tabs.map((tab) => tab.page.getURL());
    this.persist('session', () => this.store.setSessionUrls(urls));
  }

  private restoreSession(): void {
    const urls = this.store.getSessionUrls();
    for (const url of urls) {
      this.openTab(url);
    }
    if (urls.length > 0) {
      logger.info('Session restored', { tabs: urls.length });
    }
  }

  // ===========================================================================
  // Ad Block
  // ===========================================================================

  toggleAdblock(): boolean {
    const enabled = !this.filter.isEnabled();
    this.persist('AdBlock state', () => this.store.setFilterEnabled(enabled));

    if (enabled) {
      const saved = this.store.getFilterPatterns();
      if (saved.length > 0) {
        this.filter.setPatterns(saved);
      }
    }
    this.filter.setEnabled(enabled);

    this.reportStatus(`AdBlock ${enabled ? 'enabled' : 'disabled'}`, 2000);
    return enabled;
  }

  setFilterPatterns(patterns: readonly string[]): void {
    this.filter.setPatterns(patterns);
    this.savePatterns();
  }

  private savePatterns(): void {
    // Configured list, saved even while the filter is disabled
    this.patternsDirty = !this.persist('filter patterns', () =>
      this.store.setFilterPatterns(this.filter.getPatterns())
    );
  }

  // ===========================================================================
  // User Agent
  // ===========================================================================

  getUserAgent(): string {
    return this.session.getUserAgent();
  }

  /**
   * A non-empty value is applied and saved. An empty value clears the saved
   * override and asks the engine to fall back to its default, which not
   * every engine supports.
   */
  setUserAgent(userAgent: string): OperationOutcome {
    const value = userAgent.trim();

    if (value) {
      const outcome = this.applyUserAgent(value);
      if (outcome.status === 'succeeded') {
        this.persist('User-Agent', () => this.store.setUserAgentOverride(value));
        this.reportStatus('Custom User-Agent saved', 2000);
      } else {
        this.reportStatus('Failed to set User-Agent (engine limitation)', 3000, 'error');
      }
      return outcome;
    }

    this.persist('User-Agent', () => this.store.setUserAgentOverride(undefined));
    const outcome = this.applyUserAgent('');
    this.reportStatus(
      outcome.status === 'succeeded'
        ? 'User-Agent reset to default'
        : 'User-Agent reset saved; restart to apply',
      2000
    );
    return outcome;
  }

  private applyUserAgent(userAgent: string): OperationOutcome {
    const setUserAgent = this.session.setUserAgent?.bind(this.session);
    const outcome = attemptEngineOperation(
      setUserAgent && (() => setUserAgent(userAgent)),
      'engine cannot change the user agent'
    );
    if (!isSucceeded(outcome)) {
      logger.warn('User-Agent not applied', { outcome: describeOutcome(outcome) });
    }
    return outcome;
  }

  // ===========================================================================
  // Bookmarks
  // ===========================================================================

  getBookmarks(): Bookmark[] {
    return this.bookmarks.map((bookmark) => ({ ...bookmark }));
  }

  addBookmark(url: string, title?: string): Bookmark {
    const bookmark = createBookmark(url, title);
    this.bookmarks.push(bookmark);
    this.saveBookmarks();
    this.emit('bookmarks-changed', this.getBookmarks());
    this.reportStatus('Bookmark added', 2000);
    return bookmark;
  }

  addBookmarkForActiveTab(): Bookmark | null {
    const page = this.getActivePage();
    if (!page) return null;
    const url = page.getURL();
    return this.addBookmark(url, page.getTitle() || url);
  }

  removeBookmark(index: number): Bookmark | null {
    if (index < 0 || index >= this.bookmarks.length) return null;
    const [removed] = this.bookmarks.splice(index, 1);
    this.saveBookmarks();
    this.emit('bookmarks-changed', this.getBookmarks());
    return removed;
  }

  private saveBookmarks(): void {
    this.bookmarksDirty = !this.persist('bookmarks', () => this.store.setBookmarks(this.bookmarks));
  }

  openBookmark(index: number): EnginePage | null {
    const bookmark = this.bookmarks[index];
    return bookmark?.url ? this.openTab(bookmark.url) : null;
  }

  // ===========================================================================
  // Extensions
  // ===========================================================================

  describeExtensions(): string {
    return this.registry.describe();
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private persist(what: string, write: () => void): boolean {
    try {
      write();
      return true;
    } catch (error) {
      logger.error('Failed to persist', { what, error: getErrorMessage(error) });
      this.reportStatus(`Could not save ${what}`, 3000, 'error');
      return false;
    }
  }

  private reportStatus(text: string, timeoutMs: number, level: StatusLevel = 'info'): void {
    const message: StatusMessage = { text, level, timeoutMs };
    this.emit('status', message);
  }
}
