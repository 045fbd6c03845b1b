/**
 * Logger utilities
 *
 * `log` is the console logger used before a run is set up (CLI parsing,
 * startup failures). Everything that runs inside a pass receives a Logger
 * explicitly, built with createLogger() for the lifetime of the run.
 */

import type { SyncLog } from './syncLog.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Simple logger wrapping console.error for structured logging
 */
export const log: Logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (process.env.DEBUG) {
      console.error(`[DEBUG] ${message}`, ...args);
    }
  },

  info: (message: string, ...args: unknown[]) => {
    console.error(`[INFO] ${message}`, ...args);
  },

  warn: (message: string, ...args: unknown[]) => {
    console.error(`[WARN] ${message}`, ...args);
  },

  error: (message: string, ...args: unknown[]) => {
    console.error(`[ERROR] ${message}`, ...args);
  }
};

/**
 * Logger that drops everything (tests, library use without output)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export interface LoggerOptions {
  /** Echo to the console logger (default: true) */
  console?: boolean;
  /** Append to the run's log file */
  logFile?: SyncLog;
  /** Emit debug lines; defaults to the DEBUG environment variable */
  debug?: boolean;
}

/**
 * Build the logging context for one run of the mirror process
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const echo = options.console ?? true;
  const debugEnabled = options.debug ?? Boolean(process.env.DEBUG);
  const logFile = options.logFile;

  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (level === 'debug' && !debugEnabled) {
      return;
    }
    if (echo) {
      console.error(`[${level.toUpperCase()}] ${message}`, ...args);
    }
    logFile?.append(level, message);
  };

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args)
  };
}
