/**
 * Logger - leveled logging for recordc
 *
 * Levels: silent, errors, warnings, info, debug (trace shares debug's threshold).
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Compiling parser', { schema: 'Person' });
 *
 *   // Also keep a full debug log on disk:
 *   const logger = createLogger('warnings', { logFile: '.recordc/recordc.log' });
 */

import { createWriteStream, mkdirSync, writeFileSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import { LOG_LEVELS, type Logger, type LogLevel } from '@recordc/types';

export type { Logger, LogLevel };

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type LogMethod = keyof Logger;

const METHOD_PRIORITY: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_LABEL: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON.stringify that survives cycles and bigint values
 */
function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === 'bigint') return v.toString();
    if (typeof v === 'object' && v !== null) {
      if (seen.has(v)) return '[Circular]';
      seen.add(v);
    }
    return v;
  });
}

export function formatLogLine(label: string, message: string, context?: Record<string, unknown>): string {
  const line = `[${label}] ${message}`;
  if (!context || Object.keys(context).length === 0) {
    return line;
  }
  try {
    return `${line} ${safeStringify(context)}`;
  } catch {
    return `${line} [context serialization failed]`;
  }
}

/**
 * Shared threshold handling; subclasses only decide where a line goes.
 */
abstract class LeveledLogger implements Logger {
  private readonly priority: number;

  constructor(level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: LogMethod, line: string): void;

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_PRIORITY[method]) return;
    this.write(method, formatLogLine(METHOD_LABEL[method], message, context));
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
 * Console logger. Every level goes to stderr; stdout is reserved for command output.
 */
export class ConsoleLogger extends LeveledLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(_method: LogMethod, line: string): void {
    console.error(line);
  }
}

/**
 * File logger. The file is truncated on construction and every line is
 * prefixed with an ISO timestamp.
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;
  readonly filePath: string;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    this.filePath = resolve(filePath);
    mkdirSync(dirname(this.filePath), { recursive: true });

    let isDirectory = false;
    try {
      isDirectory = statSync(this.filePath).isDirectory();
    } catch {
      // not created yet
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${this.filePath}' is a directory`);
    }

    writeFileSync(this.filePath, '');
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      console.error(formatLogLine('ERROR', `Log file write failed: ${err.message}`, { filePath: this.filePath }));
    });
  }

  protected write(_method: LogMethod, line: string): void {
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  /** Resolves once everything written so far is flushed. */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}

/**
 * Fans every call out to several loggers; each applies its own threshold.
 */
export class MultiLogger implements Logger {
  private readonly loggers: readonly Logger[];

  constructor(loggers: readonly Logger[]) {
    this.loggers = loggers;
  }

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

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a logger for the given console level.
 *
 * With `logFile`, a FileLogger at 'debug' is added next to the console one.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/**
 * Close any file outputs behind a logger made by createLogger.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
