/**
 * Logger - leveled logging for bitforge
 *
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Structured context appended as JSON
 * - Console and file output (or both via MultiLogger)
 *
 * Usage:
 *   const logger = createLogger('info', { logFile: '.bitforge/configure.log' });
 *   logger.info('Configuring stage', { stage: 'ise' });
 */

import { createWriteStream, writeFileSync, mkdirSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@bitforge/types';

export type { Logger, LogLevel };

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type Method = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const METHOD_PRIORITY: Record<Method, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const LABEL: Record<Method, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON.stringify that survives circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared threshold handling. Subclasses only decide where a line goes.
 */
abstract class LeveledLogger implements Logger {
  private readonly priority: number;

  constructor(level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract emit(method: Method, message: string, context?: Record<string, unknown>): void;

  private log(method: Method, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_PRIORITY[method]) return;
    this.emit(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

/**
 * Console Logger. Errors and warnings go to stderr.
 */
export class ConsoleLogger extends LeveledLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected emit(method: Method, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`[${LABEL[method]}] ${message}`, context);
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      default:
        console.debug(line);
    }
  }
}

/**
 * File Logger. ISO timestamp on every line; the file is truncated when the
 * logger is created, so each configure run gets its own log.
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    // Synchronous truncate surfaces permission problems here, not on first write
    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      console.error(`[WARN] Log file ${resolvedPath} unavailable: ${err.message}`);
    });
  }

  protected emit(method: Method, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${LABEL[method]}] ${message}`, context) + '\n');
  }

  /** Stop accepting lines; buffered lines are still flushed */
  end(): void {
    this.stream.end();
  }

  /** Flush and close the stream */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Fans every call out to several loggers, each applying its own threshold.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: readonly Logger[]) {}

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  /** End every file logger without waiting for the flush */
  end(): void {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        logger.end();
      }
    }
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger for the given console level.
 *
 * With logFile, console and file both receive every call; the file always
 * records at debug level for post-mortem reading.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): ConsoleLogger | MultiLogger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
