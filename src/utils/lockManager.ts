/**
 * LockManager - Filesystem-based per-replica locks
 *
 * Two mirror processes writing into the same replica would delete each
 * other's copies, so a replica is claimed for the lifetime of a run.
 *
 * Architecture:
 * - Per-replica locks (keyed by the SHA-1 of the replica's real path)
 * - Filesystem-based - works across processes
 * - Fail fast - a live lock is a startup error, not something to wait for
 * - Stale lock detection - recovers from process crashes
 *
 * Lock Storage:
 * - Directory: <os tmpdir>/tree-mirror/locks/ (overridable)
 * - Format: {sha1(replicaDir)}.lock
 * - Permissions: 0600 (owner-only)
 *
 * Lock File Content:
 * {
 *   "pid": 12345,
 *   "hostname": "mycomputer.local",
 *   "timestamp": 1704067200000,
 *   "replicaDir": "/backups/photos"
 * }
 */

import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { createHash } from 'crypto';
import { ReplicaLockedError, errnoOf, describeError } from '../errors/mirrorErrors.js';
import { log, type Logger } from './logger.js';

export const DEFAULT_LOCK_DIR = path.join(os.tmpdir(), 'tree-mirror', 'locks');

// Locks from another host cannot be probed; trust them for a day
const STALE_LOCK_MAX_AGE = 24 * 60 * 60 * 1000;

/**
 * Lock information stored in lock file
 */
export interface LockInfo {
  pid: number;
  hostname: string;
  timestamp: number;
  replicaDir: string;
}

export interface LockManagerOptions {
  lockDir?: string;
  logger?: Logger;
}

function isLockInfo(value: unknown): value is LockInfo {
  return typeof value === 'object' && value !== null &&
    'pid' in value && typeof value.pid === 'number' &&
    'hostname' in value && typeof value.hostname === 'string' &&
    'timestamp' in value && typeof value.timestamp === 'number' &&
    'replicaDir' in value && typeof value.replicaDir === 'string';
}

export class LockManager {
  private readonly lockDir: string;
  private readonly logger: Logger;
  private heldLocks: Set<string> = new Set(); // Replica paths locked by this process

  constructor(options: LockManagerOptions = {}) {
    this.lockDir = options.lockDir ?? DEFAULT_LOCK_DIR;
    this.logger = options.logger ?? log;
  }

  /**
   * Get lock file path for a replica directory
   */
  getLockPath(replicaDir: string): string {
    const key = createHash('sha1').update(path.resolve(replicaDir)).digest('hex');
    return path.join(this.lockDir, `${key}.lock`);
  }

  /**
   * Read lock info from file
   */
  private async readLockInfo(lockPath: string): Promise<LockInfo | null> {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(lockPath, 'utf-8'));
      return isLockInfo(parsed) ? parsed : null;
    } catch (error: unknown) {
      if (errnoOf(error) !== 'ENOENT') {
        this.logger.warn(`[LOCK] Unreadable lock file ${lockPath}: ${describeError(error)}`);
      }
      return null;
    }
  }

  /**
   * Write lock info to file
   */
  private async writeLockInfo(lockPath: string, lockInfo: LockInfo): Promise<void> {
    await fs.writeFile(lockPath, JSON.stringify(lockInfo, null, 2), {
      mode: 0o600, // Owner-only read/write
      flag: 'wx'  // Exclusive write (fails if file exists)
    });
  }

  /**
   * Check if a process is running using the signal 0 probe
   *
   * process.kill(pid, 0) sends nothing; it only reports whether the
   * process exists.
   */
  private isProcessRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error: unknown) {
      // EPERM: it exists but belongs to someone else
      return errnoOf(error) !== 'ESRCH';
    }
  }

  /**
   * Check if lock is stale (process died or very old)
   */
  isLockStale(lockInfo: LockInfo): boolean {
    // Different hostname = can't check process, rely on age
    if (lockInfo.hostname !== os.hostname()) {
      return Date.now() - lockInfo.timestamp > STALE_LOCK_MAX_AGE;
    }
    return !this.isProcessRunning(lockInfo.pid);
  }

  /**
   * Acquire the lock for a replica directory
   *
   * @throws ReplicaLockedError if a live process holds it
   */
  async acquire(replicaDir: string): Promise<void> {
    await fs.mkdir(this.lockDir, { recursive: true, mode: 0o700 });

    const lockPath = this.getLockPath(replicaDir);
    const lockInfo: LockInfo = {
      pid: process.pid,
      hostname: os.hostname(),
      timestamp: Date.now(),
      replicaDir
    };

    // Second attempt only after removing a stale lock
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await this.writeLockInfo(lockPath, lockInfo);
        this.heldLocks.add(replicaDir);
        this.logger.debug(`[LOCK] Acquired lock for ${replicaDir}`);
        return;
      } catch (error: unknown) {
        if (errnoOf(error) !== 'EEXIST') {
          throw error;
        }
      }

      const existing = await this.readLockInfo(lockPath);
      if (existing && !this.isLockStale(existing)) {
        throw new ReplicaLockedError(replicaDir, existing);
      }

      this.logger.warn(`[LOCK] Removing stale lock for ${replicaDir}${existing ? ` (PID ${existing.pid} on ${existing.hostname})` : ''}`);
      try {
        await fs.unlink(lockPath);
      } catch (error: unknown) {
        if (errnoOf(error) !== 'ENOENT') {
          throw error;
        }
      }
    }

    throw new ReplicaLockedError(replicaDir);
  }

  /**
   * Release the lock for a replica directory
   *
   * Safe to call even if the lock is not held. Errors are logged, not
   * thrown; a leftover file is detected as stale on the next start.
   */
  async release(replicaDir: string): Promise<void> {
    if (!this.heldLocks.has(replicaDir)) {
      return;
    }
    this.heldLocks.delete(replicaDir);

    const lockPath = this.getLockPath(replicaDir);
    try {
      await fs.unlink(lockPath);
      this.logger.debug(`[LOCK] Released lock for ${replicaDir}`);
    } catch (error: unknown) {
      if (errnoOf(error) !== 'ENOENT') {
        this.logger.warn(`[LOCK] Failed to release lock for ${replicaDir}: ${describeError(error)}`);
      }
    }
  }
}
