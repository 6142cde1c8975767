import { resolve } from 'path';
import { createLogger, isLogLevel, type Logger, type LogLevel } from '@recordc/core';

export interface LogOptions {
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

/**
 * Priority: --log-level > --quiet > --verbose > fallback (config logLevel)
 */
export function getLogLevel(options: LogOptions, fallback: LogLevel): LogLevel {
  if (options.logLevel && isLogLevel(options.logLevel)) {
    return options.logLevel;
  }
  if (options.quiet) return 'silent';
  if (options.verbose) return 'info';
  return fallback;
}

export function createCliLogger(options: LogOptions, fallback: LogLevel, configLogFile?: string): Logger {
  const logFile = options.logFile ?? configLogFile;
  return createLogger(getLogLevel(options, fallback), logFile ? { logFile: resolve(logFile) } : undefined);
}
