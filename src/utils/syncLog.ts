/**
 * SyncLog - append-only, human-readable log file of every pass
 *
 * Line format: `[YYYY-MM-DD HH:MM:SS] message` (local time). Warnings and
 * errors are prefixed with `WARNING:` / `ERROR:`. The file is never read back.
 */

import fs from 'fs';
import path from 'path';
import { LogSetupError, describeError } from '../errors/mirrorErrors.js';
import { isSubdirectory } from './pathValidation.js';
import { expandTilde } from './pathExpansion.js';
import { log, type Logger, type LogLevel } from './logger.js';

export const LOG_FILE_NAME = 'sync_log.txt';

export interface SyncLogOptions {
  /** Fallback directory when the requested one is unusable (default: process.cwd()) */
  cwd?: string;
  /** The log must not live inside the replica, which each pass rewrites */
  replicaDir?: string;
  /** Where fallback warnings and append failures are reported */
  console?: Logger;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Check that a directory can hold the log file
 *
 * @throws LogSetupError when it cannot
 */
export function resolveLogDir(logDir: string, replicaDir?: string): string {
  const resolved = path.resolve(expandTilde(logDir));

  let stat: fs.Stats;
  try {
    stat = fs.statSync(resolved);
  } catch (error) {
    throw new LogSetupError(resolved, describeError(error));
  }
  if (!stat.isDirectory()) {
    throw new LogSetupError(resolved, 'not a directory');
  }

  try {
    fs.accessSync(resolved, fs.constants.W_OK);
  } catch {
    throw new LogSetupError(resolved, 'directory is not writable');
  }

  if (replicaDir) {
    const replica = path.resolve(replicaDir);
    if (resolved === replica || isSubdirectory(replica, resolved)) {
      throw new LogSetupError(resolved, 'directory is inside the replica directory');
    }
  }

  return resolved;
}

export class SyncLog {
  private appendFailed = false;

  private constructor(
    readonly filePath: string,
    private readonly console: Logger
  ) {}

  /**
   * Open (or create) the log file in logDir, falling back to the current
   * working directory when logDir cannot be used.
   *
   * @throws LogSetupError when the fallback cannot be used either
   */
  static open(logDir: string, options: SyncLogOptions = {}): SyncLog {
    const consoleLogger = options.console ?? log;
    const cwd = options.cwd ?? process.cwd();

    let dir: string;
    try {
      dir = resolveLogDir(logDir, options.replicaDir);
    } catch (error) {
      if (!(error instanceof LogSetupError)) {
        throw error;
      }
      dir = resolveLogDir(cwd, options.replicaDir);
      consoleLogger.warn(`[LOG] ${error.message}; using ${dir} instead`);
    }

    const filePath = path.join(dir, LOG_FILE_NAME);
    const syncLog = new SyncLog(filePath, consoleLogger);
    if (!fs.existsSync(filePath)) {
      syncLog.append('info', 'Log created.');
    }
    return syncLog;
  }

  /**
   * Append one timestamped line
   */
  append(level: LogLevel, message: string, at: Date = new Date()): void {
    const prefix = level === 'warn' ? 'WARNING: ' : level === 'error' ? 'ERROR: ' : '';
    const line = `[${formatTimestamp(at)}] ${prefix}${message}\n`;

    try {
      fs.appendFileSync(this.filePath, line, 'utf-8');
      this.appendFailed = false;
    } catch (error) {
      // Report once per outage so a full disk does not flood the console
      if (!this.appendFailed) {
        this.console.error(`[LOG] Failed to write ${this.filePath}: ${describeError(error)}`);
      }
      this.appendFailed = true;
    }
  }
}
