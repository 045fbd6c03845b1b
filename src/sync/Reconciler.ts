/**
 * Reconciler - Runs one synchronization pass from source to replica
 *
 * Walks both trees, computes a TreeDiff plan and applies it:
 * - Deletes first, descendants before parents
 * - Then mkdir/copy/update, parents before descendants
 *
 * Per-entry failure policy: an I/O error on one entry is logged with path,
 * operation and cause, recorded in the PassReport, and the pass continues.
 * Operations that depend on a failed one are skipped and recorded.
 *
 * Stateless across passes: every pass re-derives its plan, so anything that
 * failed is retried on the next tick.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { EntryOperationError, PathNotFoundError, errnoOf, describeError, type EntryOperation } from '../errors/mirrorErrors.js';
import { filesMatch, type CompareMode } from '../utils/hashUtils.js';
import { tempCopyName } from '../utils/fileFilter.patterns.js';
import type { FileFilter } from '../utils/fileFilter.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { collectTree, toAbsolute, type TreeEntry } from './TreeWalker.js';
import { TreeDiff, isWithin, type SyncOperation, type SyncPlan } from './TreeDiff.js';

export interface ReconcilerOptions {
  sourceDir: string;
  replicaDir: string;
  logger?: Logger;
  /** How files present on both sides are compared (default: content) */
  compare?: CompareMode;
  filter?: FileFilter;
  /** Log the plan without touching the replica */
  dryRun?: boolean;
}

/**
 * Failure of one entry during a pass
 */
export interface EntryFailure {
  path: string;
  operation: EntryOperation;
  code?: string;
  message: string;
}

/**
 * Operation not attempted because one it depends on failed
 */
export interface SkippedOperation {
  path: string;
  action: SyncOperation['action'];
  reason: string;
}

/**
 * Outcome of one pass
 */
export interface PassReport {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  dryRun: boolean;
  directoriesCreated: number;
  filesCopied: number;
  filesUpdated: number;
  entriesDeleted: number;
  unchanged: number;
  protectedCount: number;
  failures: EntryFailure[];
  skipped: SkippedOperation[];
}

/**
 * Source and replica state walked for one pass
 */
export interface PassSnapshot {
  source: Map<string, TreeEntry>;
  replica: Map<string, TreeEntry>;
  /** Source directories that could not be read */
  unreadable: string[];
}

const KIND_LABELS: Record<TreeEntry['kind'], string> = {
  file: 'file',
  directory: 'directory',
  special: 'special file'
};

export class Reconciler {
  readonly sourceDir: string;
  readonly replicaDir: string;
  private readonly logger: Logger;
  private readonly compare: CompareMode;
  private readonly filter?: FileFilter;
  private readonly dryRun: boolean;

  constructor(options: ReconcilerOptions) {
    this.sourceDir = options.sourceDir;
    this.replicaDir = options.replicaDir;
    this.logger = options.logger ?? silentLogger;
    this.compare = options.compare ?? 'content';
    this.filter = options.filter;
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Walk both trees
   *
   * @throws PathNotFoundError / PathValidationError when the source root is gone
   */
  async snapshot(): Promise<PassSnapshot> {
    if (this.filter) {
      const rules = await this.filter.loadIgnoreFile(this.sourceDir);
      if (rules > 0) {
        this.logger.debug(`[RECONCILE] Loaded ${rules} ignore rule(s) from the source root`);
      }
    }

    const unreadable: string[] = [];
    const source = await collectTree(this.sourceDir, {
      special: 'skip',
      filter: this.filter,
      logger: this.logger,
      onUnreadable: relPath => unreadable.push(relPath)
    });

    if (!this.dryRun) {
      const recreated = await fs.mkdir(this.replicaDir, { recursive: true });
      if (recreated) {
        this.logger.warn(`Replica directory "${this.replicaDir}" was missing and has been recreated.`);
      }
    }

    const replica = await collectTree(this.replicaDir, {
      special: 'include',
      filter: this.filter,
      logger: this.logger
    }).catch((error: unknown) => {
      // Dry run against a replica that does not exist yet
      if (this.dryRun && error instanceof PathNotFoundError) {
        return new Map<string, TreeEntry>();
      }
      throw error;
    });

    return { source, replica, unreadable };
  }

  /**
   * Compute the plan for the current state of both trees without applying it
   */
  async plan(snapshot?: PassSnapshot): Promise<SyncPlan> {
    const { source, replica, unreadable } = snapshot ?? await this.snapshot();

    return TreeDiff.compute(source, replica, {
      filesMatch: (relPath, sourceEntry, replicaEntry) => filesMatch(
        this.compare,
        toAbsolute(this.sourceDir, relPath),
        sourceEntry,
        toAbsolute(this.replicaDir, relPath),
        replicaEntry
      ),
      protectedPaths: unreadable,
      logger: this.logger
    });
  }

  /**
   * Run one full pass
   *
   * Rejects only when a root cannot be walked; per-entry failures are
   * reported in the result.
   */
  async runPass(): Promise<PassReport> {
    const startedAt = new Date();
    this.logger.debug(`[RECONCILE] Pass started: ${this.sourceDir} -> ${this.replicaDir}`);

    const snapshot = await this.snapshot();
    const plan = await this.plan(snapshot);

    const report: PassReport = {
      startedAt,
      finishedAt: startedAt,
      durationMs: 0,
      dryRun: this.dryRun,
      directoriesCreated: 0,
      filesCopied: 0,
      filesUpdated: 0,
      entriesDeleted: 0,
      unchanged: plan.unchanged,
      protectedCount: plan.protectedCount,
      failures: [],
      skipped: []
    };

    if (plan.protectedCount > 0) {
      this.logger.warn(`${plan.protectedCount} replica entr${plan.protectedCount === 1 ? 'y' : 'ies'} kept because their source directory could not be read.`);
    }

    if (this.dryRun) {
      this.logDryRun(plan, report);
    } else {
      const failedDeletes = await this.applyDeletes(plan.deletes, report);
      await this.applyCreates(plan.creates, failedDeletes, report);
    }

    report.finishedAt = new Date();
    report.durationMs = report.finishedAt.getTime() - startedAt.getTime();

    const created = report.directoriesCreated + report.filesCopied;
    this.logger.info(
      `Synchronization pass complete${this.dryRun ? ' (dry run)' : ''}: ` +
      `+${created} ~${report.filesUpdated} -${report.entriesDeleted}, ` +
      `${report.failures.length} failed (${report.durationMs}ms).`
    );

    return report;
  }

  private logDryRun(plan: SyncPlan, report: PassReport): void {
    for (const op of [...plan.deletes, ...plan.creates]) {
      this.logger.info(`[dry-run] would ${op.action} ${KIND_LABELS[op.kind]} "${op.path}" (${op.reason})`);
      this.count(op, report);
    }
  }

  private count(op: SyncOperation, report: PassReport): void {
    switch (op.action) {
      case 'mkdir':
        report.directoriesCreated++;
        break;
      case 'copy':
        report.filesCopied++;
        break;
      case 'update':
        report.filesUpdated++;
        break;
      case 'delete':
        report.entriesDeleted++;
        break;
    }
  }

  private recordFailure(op: SyncOperation, error: unknown, report: PassReport): void {
    const failure = error instanceof EntryOperationError
      ? error
      : new EntryOperationError(op.action, op.path, error);
    this.logger.error(failure.message);
    report.failures.push({
      path: op.path,
      operation: failure.operation,
      code: failure.errno,
      message: failure.message
    });
  }

  private recordSkip(op: SyncOperation, reason: string, report: PassReport): void {
    this.logger.warn(`Skipped ${op.action} of "${op.path}": ${reason}.`);
    report.skipped.push({ path: op.path, action: op.action, reason });
  }

  /**
   * @returns Paths that are still present in the replica
   */
  private async applyDeletes(deletes: SyncOperation[], report: PassReport): Promise<Set<string>> {
    const failed = new Set<string>();

    for (const op of deletes) {
      const blockedBy = Array.from(failed).some(p => p !== op.path && isWithin(p, op.path));
      if (blockedBy) {
        failed.add(op.path);
        this.recordSkip(op, 'it still contains entries that could not be removed', report);
        continue;
      }

      const target = toAbsolute(this.replicaDir, op.path);
      try {
        if (op.kind === 'directory') {
          await fs.rmdir(target);
        } else {
          await fs.unlink(target);
        }
      } catch (error: unknown) {
        if (errnoOf(error) === 'ENOENT') {
          this.logger.debug(`[RECONCILE] Already gone: ${op.path}`);
          continue;
        }
        failed.add(op.path);
        this.recordFailure(op, error, report);
        continue;
      }

      this.count(op, report);
      this.logger.info(`Removed ${KIND_LABELS[op.kind]} "${op.path}".`);
    }

    return failed;
  }

  private async applyCreates(creates: SyncOperation[], failedDeletes: Set<string>, report: PassReport): Promise<void> {
    const failed = new Set<string>();

    for (const op of creates) {
      if (Array.from(failed).some(p => p !== op.path && isWithin(op.path, p))) {
        failed.add(op.path);
        this.recordSkip(op, 'its parent directory could not be created', report);
        continue;
      }
      if (op.reason === 'kind_mismatch' && failedDeletes.has(op.path)) {
        failed.add(op.path);
        this.recordSkip(op, 'the existing replica entry could not be removed', report);
        continue;
      }

      try {
        if (op.action === 'mkdir') {
          await this.makeDirectory(op.path);
          this.logger.info(`Directory "${op.path}" created.`);
        } else {
          await this.copyFile(op.path);
          this.logger.info(`File "${op.path}" ${op.action === 'update' ? 'updated' : 'copied'}.`);
        }
        this.count(op, report);
      } catch (error: unknown) {
        failed.add(op.path);
        this.recordFailure(op, error, report);
      }
    }
  }

  private async makeDirectory(relPath: string): Promise<void> {
    try {
      await fs.mkdir(toAbsolute(this.replicaDir, relPath));
    } catch (error: unknown) {
      if (errnoOf(error) !== 'EEXIST') {
        throw error;
      }
      const stat = await fs.lstat(toAbsolute(this.replicaDir, relPath));
      if (!stat.isDirectory()) {
        throw error;
      }
    }
  }

  /**
   * Copy a source file over its replica path through a temporary sibling,
   * carrying over the source modification time
   */
  private async copyFile(relPath: string): Promise<void> {
    const sourcePath = toAbsolute(this.sourceDir, relPath);
    const targetPath = toAbsolute(this.replicaDir, relPath);
    const tempPath = path.join(path.dirname(targetPath), tempCopyName(path.basename(targetPath)));

    // Stat before copying: a source modified mid-copy then looks newer next pass
    const stat = await fs.stat(sourcePath);
    try {
      await fs.copyFile(sourcePath, tempPath);
      await fs.utimes(tempPath, stat.atime, stat.mtime);
      await fs.rename(tempPath, targetPath);
    } catch (error: unknown) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Could not remove temporary file "${tempPath}": ${describeError(cleanupError)}`);
      });
      throw error;
    }
  }
}
