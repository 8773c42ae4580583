// File-based logging for toad
// Provides structured logging with multiple output formats

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { Env } from './env.js';
import { getCacheDir } from './xdg.js';
import { ensureError } from './utils/error.js';

/**
 * Get default log file path (~/.cache/toad/logs/toad.log)
 */
function getDefaultLogFile(): string {
  return join(getCacheDir(), 'logs', 'toad.log');
}

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
}

export interface LoggerOptions {
  // Path to log file; empty string disables file output
  logFile?: string;

  level?: LogLevel;

  format?: 'json' | 'text' | 'structured';
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;

  bufferSize?: number;
  flushInterval?: number; // in milliseconds

  consoleOutput?: boolean;
  consoleLevel?: LogLevel;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  bytesWritten: number;
  bufferSize: number;
  lastFlush: Date;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class Logger {
  private _options: Required<LoggerOptions>;
  private _buffer: LogEntry[] = [];
  private _stats: LoggerStats;
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _initialized = false;
  private _disabled = false;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? getDefaultLogFile(),
      level: options.level ?? 'INFO',
      format: options.format ?? 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize ?? 100,
      flushInterval: options.flushInterval ?? 1000,
      consoleOutput: options.consoleOutput ?? false,
      consoleLevel: options.consoleLevel ?? 'WARN',
    };

    this._stats = {
      totalEntries: 0,
      entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
      bytesWritten: 0,
      bufferSize: 0,
      lastFlush: new Date(),
    };
  }

  get logFile(): string | undefined {
    return this._disabled ? undefined : this._options.logFile;
  }

  initializeSync(): void {
    if (this._initialized) return;
    this._initialized = true;

    if (this._options.logFile.trim() === '') {
      this._disabled = true;
      return;
    }

    try {
      mkdirSync(dirname(this._options.logFile), { recursive: true });
    } catch (error) {
      // A terminal UI cannot report on stderr while running; fall back to no file
      this._disabled = true;
      console.error(`toad: cannot create log directory for ${this._options.logFile}: ${ensureError(error).message}`);
      return;
    }

    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => this._flushSync(), this._options.flushInterval);
      this._flushTimer.unref();
    }

    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: { pid: process.pid, logFile: this._options.logFile },
      source: 'Logger',
    });
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this._options.level];
  }

  private _shouldConsole(level: LogLevel): boolean {
    return this._options.consoleOutput &&
           LOG_LEVELS[level] >= LOG_LEVELS[this._options.consoleLevel];
  }

  formatEntry(entry: LogEntry): string {
    switch (this._options.format) {
      case 'json':
        return JSON.stringify({
          ...entry,
          timestamp: entry.timestamp.toISOString(),
          error: entry.error ? {
            message: entry.error.message,
            stack: entry.error.stack,
            name: entry.error.name,
          } : undefined,
        }) + '\n';

      case 'text': {
        let text = '';
        if (this._options.includeTimestamp) {
          text += `[${entry.timestamp.toISOString()}] `;
        }
        if (this._options.includeLevel) {
          text += `${entry.level.padEnd(5)} `;
        }
        if (this._options.includeSource && entry.source) {
          text += `[${entry.source}] `;
        }
        text += entry.message;
        if (entry.context && Object.keys(entry.context).length > 0) {
          text += ` | ${JSON.stringify(entry.context)}`;
        }
        if (entry.error) {
          text += ` | ERROR: ${entry.error.message}`;
        }
        return text + '\n';
      }

      case 'structured':
      default: {
        let structured = '';
        if (this._options.includeTimestamp) {
          structured += `${entry.timestamp.toISOString()} `;
        }
        if (this._options.includeLevel) {
          structured += `[${entry.level}] `;
        }
        if (this._options.includeSource && entry.source) {
          structured += `${entry.source}: `;
        }
        structured += entry.message;

        if (entry.context && Object.keys(entry.context).length > 0) {
          structured += ' | ' + Object.entries(entry.context)
            .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
            .join(', ');
        }
        if (entry.error) {
          structured += `\n  Error: ${entry.error.message}`;
          if (entry.error.stack) {
            structured += `\n  Stack: ${entry.error.stack}`;
          }
        }
        return structured + '\n';
      }
    }
  }

  private _writeEntry(entry: LogEntry): void {
    if (!this._initialized) {
      this.initializeSync();
    }

    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;

    if (this._shouldConsole(entry.level)) {
      const formatted = this.formatEntry(entry).trim();
      if (entry.level === 'ERROR' || entry.level === 'FATAL') {
        console.error(formatted);
      } else if (entry.level === 'WARN') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this._disabled) return;

    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    if (this._buffer.length >= this._options.bufferSize || entry.level === 'FATAL') {
      this._flushSync();
    }
  }

  private _flushSync(): void {
    if (this._buffer.length === 0 || this._disabled) return;

    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      appendFileSync(this._options.logFile, content);
      this._stats.bytesWritten += Buffer.byteLength(content);
      this._stats.lastFlush = new Date();
      this._stats.bufferSize = 0;
    } catch (error) {
      this._disabled = true;
      console.error(`toad: failed to write log file ${this._options.logFile}: ${ensureError(error).message}`);
    }
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    if (!this._shouldLog(level)) return;
    this._writeEntry({ timestamp: new Date(), level, message, context, source, error });
  }

  trace(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('TRACE', message, context, source);
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  warn(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('FATAL', message, context, source, error);
  }

  flush(): void {
    this._flushSync();
  }

  setLevel(level: LogLevel): void {
    this._options.level = level;
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  close(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
    if (this._disabled || !this._initialized) return;

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: { totalEntries: this._stats.totalEntries },
      source: 'Logger',
    });
    this._flushSync();
  }
}

// Environment variable configuration helpers
function getLogLevelFromEnv(): LogLevel | undefined {
  const envLevel = Env.get('TOAD_LOG_LEVEL')?.toUpperCase();
  return envLevel !== undefined && isLogLevel(envLevel) ? envLevel : undefined;
}

function createDefaultLoggerOptions(): LoggerOptions {
  return {
    level: getLogLevelFromEnv() ?? 'INFO',
    // An empty TOAD_LOG_FILE disables file logging
    logFile: Env.get('TOAD_LOG_FILE') ?? getDefaultLogFile(),
    format: 'structured',
    bufferSize: 100,
    flushInterval: 1000,
    consoleOutput: false, // the terminal belongs to the page
    consoleLevel: 'ERROR',
  };
}

let globalLogger: Logger | undefined;

export function createLogger(options?: LoggerOptions): Logger {
  const logger = new Logger({ ...createDefaultLoggerOptions(), ...options });
  logger.initializeSync();
  return logger;
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(createDefaultLoggerOptions());
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger?.close();
  globalLogger = logger;
}

// Component-specific logger interface that automatically includes source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

/**
 * Logger bound to a component name. The global logger is looked up on every
 * call, so modules can create their loggers at load time before the CLI has
 * configured logging.
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
  };
}
