/**
 * TreeDiff - Computes the operations that make a replica tree match a source tree
 *
 * Determines which directories to create, which files to copy or overwrite,
 * and which replica entries to delete.
 *
 * Key responsibilities:
 * - Compare source and replica entry sets by relative path
 * - Detect missing, stale, kind-mismatched and extraneous entries
 * - Protect replica paths under source directories that could not be read
 * - Order creates parents-first and deletes descendants-first
 */

import { describeError } from '../errors/mirrorErrors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { EntryKind, TreeEntry } from './TreeWalker.js';

export type SyncAction = 'mkdir' | 'copy' | 'update' | 'delete';

export type SyncReason = 'missing' | 'stale' | 'kind_mismatch' | 'extraneous';

/**
 * Single filesystem operation in the plan
 */
export interface SyncOperation {
  action: SyncAction;
  path: string;
  /** Kind of the entry acted on: the source kind for creates, the replica kind for deletes */
  kind: EntryKind;
  reason: SyncReason;
  size?: number;
}

/**
 * Complete plan for one pass
 */
export interface SyncPlan {
  /** Replica entries to remove, every descendant before its parent */
  deletes: SyncOperation[];
  /** mkdir/copy/update, every parent before its descendants */
  creates: SyncOperation[];
  /** Paths present on both sides that need nothing */
  unchanged: number;
  /** Replica paths left alone because their source directory was unreadable */
  protectedCount: number;

  // Summary stats
  totalOperations: number;
  hasChanges: boolean;
}

/**
 * Resolves to true when the replica file still matches the source file
 */
export type FileComparator = (relPath: string, source: TreeEntry, replica: TreeEntry) => Promise<boolean>;

export interface TreeDiffOptions {
  filesMatch: FileComparator;
  /** Source directories that could not be read this pass */
  protectedPaths?: Iterable<string>;
  logger?: Logger;
}

const byPath = (a: SyncOperation, b: SyncOperation): number =>
  a.path < b.path ? -1 : a.path > b.path ? 1 : 0;

/**
 * True when relPath equals ancestor or lies beneath it
 */
export function isWithin(relPath: string, ancestor: string): boolean {
  return relPath === ancestor || relPath.startsWith(`${ancestor}/`);
}

/**
 * TreeDiff class for computing reconciliation plans
 */
export class TreeDiff {
  /**
   * Compute the plan that turns replica into source
   *
   * @param source - Source entries keyed by relative path
   * @param replica - Replica entries keyed by relative path
   */
  static async compute(
    source: ReadonlyMap<string, TreeEntry>,
    replica: ReadonlyMap<string, TreeEntry>,
    options: TreeDiffOptions
  ): Promise<SyncPlan> {
    const { filesMatch, logger = silentLogger } = options;
    const protectedPaths = Array.from(options.protectedPaths ?? []);

    logger.debug(`[DIFF] Computing diff: ${source.size} source entries, ${replica.size} replica entries`);

    const deletes: SyncOperation[] = [];
    const creates: SyncOperation[] = [];
    let unchanged = 0;
    let protectedCount = 0;

    const createFor = (entry: TreeEntry, reason: SyncReason): SyncOperation =>
      entry.kind === 'directory'
        ? { action: 'mkdir', path: entry.path, kind: 'directory', reason }
        : { action: 'copy', path: entry.path, kind: entry.kind, reason, size: entry.size };

    // Adds, updates and replacements (entries in source)
    for (const [relPath, sourceEntry] of source) {
      const replicaEntry = replica.get(relPath);

      if (!replicaEntry) {
        creates.push(createFor(sourceEntry, 'missing'));
        continue;
      }

      if (replicaEntry.kind !== sourceEntry.kind) {
        // Replica descendants of a replaced directory have no source
        // counterpart, so the extraneous loop below deletes them first
        deletes.push({ action: 'delete', path: relPath, kind: replicaEntry.kind, reason: 'kind_mismatch' });
        creates.push(createFor(sourceEntry, 'kind_mismatch'));
        logger.debug(`[DIFF] REPLACE: ${relPath} (${replicaEntry.kind} -> ${sourceEntry.kind})`);
        continue;
      }

      if (sourceEntry.kind === 'file') {
        let matches: boolean;
        try {
          matches = await filesMatch(relPath, sourceEntry, replicaEntry);
        } catch (error) {
          // Overwriting surfaces the real I/O error as a per-entry failure
          logger.debug(`[DIFF] Cannot compare ${relPath}, planning update: ${describeError(error)}`);
          matches = false;
        }
        if (!matches) {
          creates.push({ action: 'update', path: relPath, kind: 'file', reason: 'stale', size: sourceEntry.size });
          logger.debug(`[DIFF] UPDATE: ${relPath}`);
          continue;
        }
      }

      unchanged++;
    }

    // Deletes (entries only in replica)
    for (const [relPath, replicaEntry] of replica) {
      if (source.has(relPath)) {
        continue;
      }
      if (protectedPaths.some(dir => isWithin(relPath, dir))) {
        protectedCount++;
        logger.debug(`[DIFF] Keeping ${relPath}: source directory was not readable`);
        continue;
      }
      deletes.push({ action: 'delete', path: relPath, kind: replicaEntry.kind, reason: 'extraneous' });
      logger.debug(`[DIFF] DELETE: ${relPath}`);
    }

    creates.sort(byPath);
    // Reverse path order puts `a/b` before `a`
    deletes.sort((a, b) => byPath(b, a));

    const totalOperations = creates.length + deletes.length;
    const plan: SyncPlan = {
      deletes,
      creates,
      unchanged,
      protectedCount,
      totalOperations,
      hasChanges: totalOperations > 0
    };

    logger.debug(`[DIFF] Result: ${TreeDiff.formatSummary(plan)}`);

    return plan;
  }

  /**
   * Create a summary string for display
   */
  static formatSummary(plan: SyncPlan): string {
    if (!plan.hasChanges) {
      return 'No changes detected';
    }

    const createCount = plan.creates.filter(op => op.action !== 'update').length;
    const updateCount = plan.creates.length - createCount;
    const parts: string[] = [];

    if (createCount > 0) {
      parts.push(`+${createCount} create`);
    }
    if (updateCount > 0) {
      parts.push(`~${updateCount} update`);
    }
    if (plan.deletes.length > 0) {
      parts.push(`-${plan.deletes.length} delete`);
    }

    return parts.join(', ') + ` (${plan.totalOperations} total)`;
  }
}
