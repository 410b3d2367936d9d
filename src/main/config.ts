/**
 * Shell configuration: built-in defaults, then environment variables, then
 * explicit overrides from the embedding host.
 */
import os from 'node:os';
import path from 'node:path';
import { isLogLevel, type LogLevel } from './logger';

export interface ShellConfig {
  /** Settings namespace, first half */
  organization: string;
  /** Settings namespace, second half */
  application: string;
  homeUrl: string;
  /** Prefix for search queries typed into the address bar */
  searchUrl: string;
  /** Settings database and log files live here */
  dataDirectory: string;
  extensionsDirectory: string;
  logLevel: LogLevel;
  /** Write the shipped bundles into the extensions directory when missing */
  seedBundledExtensions: boolean;
  /** Keep a JSON-lines log file under `<dataDirectory>/logs` */
  logToFile: boolean;
}

export const APP_ORGANIZATION = 'lantern';
export const APP_NAME = 'Lantern';

export const DEFAULT_SHELL_CONFIG: ShellConfig = {
  organization: APP_ORGANIZATION,
  application: APP_NAME,
  homeUrl: 'https://duckduckgo.com/',
  searchUrl: 'https://duckduckgo.com/?q=',
  dataDirectory: path.join(os.homedir(), '.lantern'),
  extensionsDirectory: path.join(process.cwd(), 'extensions'),
  logLevel: 'info',
  seedBundledExtensions: true,
  logToFile: true,
};

export const CONFIG_ENV_VARS = {
  dataDirectory: 'LANTERN_DATA_DIR',
  extensionsDirectory: 'LANTERN_EXTENSIONS_DIR',
  logLevel: 'LANTERN_LOG_LEVEL',
  homeUrl: 'LANTERN_HOME_URL',
} as const;

function readEnvConfig(env: NodeJS.ProcessEnv): Partial<ShellConfig> {
  const fromEnv: Partial<ShellConfig> = {};

  const dataDirectory = env[CONFIG_ENV_VARS.dataDirectory]?.trim();
  if (dataDirectory) fromEnv.dataDirectory = path.resolve(dataDirectory);

  const extensionsDirectory = env[CONFIG_ENV_VARS.extensionsDirectory]?.trim();
  if (extensionsDirectory) fromEnv.extensionsDirectory = path.resolve(extensionsDirectory);

  const logLevel = env[CONFIG_ENV_VARS.logLevel]?.trim().toLowerCase();
  if (isLogLevel(logLevel)) fromEnv.logLevel = logLevel;

  const homeUrl = env[CONFIG_ENV_VARS.homeUrl]?.trim();
  if (homeUrl) fromEnv.homeUrl = homeUrl;

  return fromEnv;
}

export function resolveShellConfig(
  overrides: Partial<ShellConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ShellConfig {
  return { ...DEFAULT_SHELL_CONFIG, ...readEnvConfig(env), ...overrides };
}

export function getSettingsDatabasePath(config: ShellConfig): string {
  return path.join(config.dataDirectory, 'settings.db');
}

export function getLogDirectory(config: ShellConfig): string {
  return path.join(config.dataDirectory, 'logs');
}
