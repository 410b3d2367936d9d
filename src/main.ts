/**
 * Lantern entry point.
 *
 * Assembles configuration, logging, settings, the extension catalog and a
 * browser shell around an engine supplied by the host application.
 */
import { BrowserShell, ExtensionRegistry, ensureBundledExtensions, type BrowsingEngine } from './main/browser';
import {
  getLogDirectory,
  getSettingsDatabasePath,
  resolveShellConfig,
  type ShellConfig,
} from './main/config';
import { configureLogging, createLogger } from './main/logger';
import { PersistenceStore, SqliteSettingsBackend, type SettingsBackend } from './main/settings';
import { getErrorMessage } from './shared/utils/errorHandling';

const logger = createLogger('Main');

export interface BootstrapOptions {
  config?: Partial<ShellConfig>;
  /** Settings backend to use instead of the SQLite database in the data directory */
  backend?: SettingsBackend;
  env?: NodeJS.ProcessEnv;
}

export interface BrowserApp {
  config: ShellConfig;
  shell: BrowserShell;
  registry: ExtensionRegistry;
  store: PersistenceStore;
  /** Open a window on a fresh off-the-record session */
  openPrivateWindow(): BrowserShell;
  shutdown(): void;
}

export async function bootstrapBrowser(engine: BrowsingEngine, options: BootstrapOptions = {}): Promise<BrowserApp> {
  const config = resolveShellConfig(options.config, options.env);
  configureLogging({
    minLevel: config.logLevel,
    logDirectory: config.logToFile ? getLogDirectory(config) : undefined,
  });

  const backend =
    options.backend ??
    new SqliteSettingsBackend(getSettingsDatabasePath(config), {
      organization: config.organization,
      application: config.application,
    });
  const store = new PersistenceStore(backend);

  if (config.seedBundledExtensions) {
    await ensureBundledExtensions(config.extensionsDirectory);
  }

  const registry = new ExtensionRegistry();
  await registry.scan(config.extensionsDirectory);

  const privateShells = new Set<BrowserShell>();
  const shell = new BrowserShell({ session: engine.defaultSession(), store, registry, config });
  shell.start();

  let closed = false;

  const openPrivateWindow = (): BrowserShell => {
    const privateShell = new BrowserShell({
      session: engine.createOffTheRecordSession(),
      store,
      registry,
      config,
    });
    privateShells.add(privateShell);
    privateShell.once('closed', () => privateShells.delete(privateShell));
    privateShell.start();
    logger.info('Private window opened', { privateWindows: privateShells.size });
    return privateShell;
  };

  const shutdown = (): void => {
    if (closed) return;
    closed = true;

    for (const privateShell of [...privateShells]) {
      privateShell.shutdown();
    }
    shell.shutdown();

    try {
      store.close();
    } catch (error) {
      logger.error('Error closing settings store', { error: getErrorMessage(error) });
    }
    logger.info('Lantern shut down');
  };

  logger.info('Lantern started', {
    dataDirectory: config.dataDirectory,
    extensionsDirectory: config.extensionsDirectory,
    extensions: registry.size,
  });

  return { config, shell, registry, store, openPrivateWindow, shutdown };
}

export { resolveShellConfig, type ShellConfig } from './main/config';
export * from './main/browser';
export * from './main/settings';
