import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getErrorMessage, serializeError } from '../shared/utils/errorHandling';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  scope: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface LogFilter {
  level?: LogLevel;
  scope?: string;
  startTime?: number;
  endTime?: number;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  startTimer(label: string): () => number;
  getRecentLogs(count?: number, filter?: LogFilter): LogEntry[];
  searchLogs(query: string): LogEntry[];
  exportLogs(filter?: { startTime?: number; endTime?: number; levels?: LogLevel[] }): string;
}

export interface LoggingOptions {
  /** Lowest level that is recorded */
  minLevel?: LogLevel;
  /** Directory for the JSON-lines log file; omit to keep logs in memory only */
  logDirectory?: string;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

class LogBuffer {
  private entries: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 5000) {
    this.maxSize = maxSize;
  }

  push(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxSize) {
      const removeCount = Math.floor(this.maxSize * 0.2);
      this.entries = this.entries.slice(removeCount);
    }
  }

  getAll(): LogEntry[] {
    return [...this.entries];
  }

  getRecent(count: number): LogEntry[] {
    return this.entries.slice(-count);
  }

  search(query: string): LogEntry[] {
    const lowerQuery = query.toLowerCase();
    return this.entries.filter(
      (entry) =>
        entry.message.toLowerCase().includes(lowerQuery) ||
        entry.scope.toLowerCase().includes(lowerQuery) ||
        JSON.stringify(entry.meta ?? {}).toLowerCase().includes(lowerQuery)
    );
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Appends entries to a dated JSON-lines file. Writes are batched and never
 * awaited by the caller; the first failed write turns the sink off.
 */
class FileSink {
  private writeQueue: LogEntry[] = [];
  private isWriting = false;
  private disabled = false;
  private readonly ready: Promise<void>;

  constructor(private readonly filePath: string) {
    this.ready = fs.mkdir(path.dirname(filePath), { recursive: true }).then(() => undefined);
  }

  get path(): string {
    return this.filePath;
  }

  get isDisabled(): boolean {
    return this.disabled;
  }

  enqueue(entry: LogEntry): void {
    if (this.disabled) return;
    this.writeQueue.push(entry);
    if (this.isWriting) return;
    void this.drain();
  }

  private async drain(): Promise<void> {
    this.isWriting = true;
    try {
      await this.ready;
      while (this.writeQueue.length > 0) {
        const batch = this.writeQueue.splice(0, 100);
        const lines = batch.map((e) => JSON.stringify(e)).join('\n') + '\n';
        await fs.appendFile(this.filePath, lines, 'utf-8');
      }
    } catch (error) {
      this.disabled = true;
      this.writeQueue = [];
      process.emitWarning(`Log file disabled: ${getErrorMessage(error)}`, { code: 'LANTERN_LOG_SINK' });
    } finally {
      this.isWriting = false;
    }
  }
}

/**
 * Error objects have no enumerable fields and would export as `{}`
 */
function serializeMetaErrors(meta: Record<string, unknown>): Record<string, unknown> {
  let result = meta;
  for (const [key, value] of Object.entries(meta)) {
    if (value instanceof Error) {
      if (result === meta) result = { ...meta };
      result[key] = serializeError(value);
    }
  }
  return result;
}

interface SharedLogState {
  buffer: LogBuffer;
  minLevel: LogLevel;
  sink: FileSink | null;
}

function createSharedState(): SharedLogState {
  return { buffer: new LogBuffer(5000), minLevel: 'debug', sink: null };
}

export class ShellLogger implements Logger {
  private readonly scope: string;
  private readonly state: SharedLogState;

  constructor(scope: string, state: SharedLogState = createSharedState()) {
    this.scope = scope;
    this.state = state;
  }

  private generateId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.state.minLevel];
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      id: this.generateId(),
      timestamp: Date.now(),
      level,
      scope: this.scope,
      message,
      meta: meta ? serializeMetaErrors(meta) : undefined,
    };

    this.state.buffer.push(entry);
    this.state.sink?.enqueue(entry);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  startTimer(label: string): () => number {
    const start = performance.now();
    return () => {
      const duration = Math.round(performance.now() - start);
      this.debug(`Timer [${label}] completed`, { duration, label });
      return duration;
    };
  }

  getRecentLogs(count = 100, filter?: LogFilter): LogEntry[] {
    let logs = this.state.buffer.getAll();

    if (filter?.level) {
      const level = filter.level;
      logs = logs.filter((entry) => entry.level === level);
    }
    if (filter?.scope) {
      const scope = filter.scope;
      logs = logs.filter((entry) => entry.scope.includes(scope));
    }
    if (filter?.startTime !== undefined) {
      const startTime = filter.startTime;
      logs = logs.filter((entry) => entry.timestamp >= startTime);
    }
    if (filter?.endTime !== undefined) {
      const endTime = filter.endTime;
      logs = logs.filter((entry) => entry.timestamp <= endTime);
    }

    return logs.slice(-count);
  }

  searchLogs(query: string): LogEntry[] {
    return this.state.buffer.search(query);
  }

  exportLogs(filter?: { startTime?: number; endTime?: number; levels?: LogLevel[] }): string {
    let logs = this.state.buffer.getAll();

    if (filter?.startTime !== undefined) {
      const startTime = filter.startTime;
      logs = logs.filter(l => l.timestamp >= startTime);
    }
    if (filter?.endTime !== undefined) {
      const endTime = filter.endTime;
      logs = logs.filter(l => l.timestamp <= endTime);
    }
    if (filter?.levels && filter.levels.length > 0) {
      const levels = filter.levels;
      logs = logs.filter(l => levels.includes(l.level));
    }

    const exportData = {
      exportedAt: new Date().toISOString(),
      summary: {
        totalLogs: logs.length,
        byLevel: {
          debug: logs.filter(l => l.level === 'debug').length,
          info: logs.filter(l => l.level === 'info').length,
          warn: logs.filter(l => l.level === 'warn').length,
          error: logs.filter(l => l.level === 'error').length,
        },
      },
      logs,
    };

    return JSON.stringify(exportData, null, 2);
  }

  /** Clears the shared buffer; mostly useful between tests */
  clear(): void {
    this.state.buffer.clear();
  }

  configure(options: LoggingOptions): void {
    if (options.minLevel) {
      this.state.minLevel = options.minLevel;
    }
    if (options.logDirectory !== undefined) {
      const dateStr = new Date().toISOString().split('T')[0];
      this.state.sink = new FileSink(path.join(options.logDirectory, `lantern-${dateStr}.log`));
    }
  }

  getLogFilePath(): string | null {
    const sink = this.state.sink;
    return sink && !sink.isDisabled ? sink.path : null;
  }

  createChildLogger(childScope: string): ShellLogger {
    // Children share buffer, level and sink with the parent
    return new ShellLogger(`${this.scope}:${childScope}`, this.state);
  }
}

let globalLogger: ShellLogger | null = null;

export function getGlobalLogger(): ShellLogger {
  if (!globalLogger) {
    globalLogger = new ShellLogger('Lantern');
  }
  return globalLogger;
}

export function configureLogging(options: LoggingOptions): void {
  getGlobalLogger().configure(options);
}

export function createLogger(scope: string): ShellLogger {
  return getGlobalLogger().createChildLogger(scope);
}
