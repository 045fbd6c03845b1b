/**
 * Startup sequence and main loop of the mirror process
 *
 * validate roots → open log → build filter → lock replica → schedule passes
 */

import path from 'path';
import type { MirrorConfig } from '../config/mirrorConfig.js';
import { Reconciler, type PassReport } from '../sync/Reconciler.js';
import { SyncScheduler, type SchedulerOptions } from '../sync/SyncScheduler.js';
import { FileFilter } from '../utils/fileFilter.js';
import { LockManager } from '../utils/lockManager.js';
import { createLogger, log, type Logger } from '../utils/logger.js';
import { isSubdirectory, validateSyncRoots } from '../utils/pathValidation.js';
import { SyncLog } from '../utils/syncLog.js';

export interface RunMirrorOptions {
  signal?: AbortSignal;
  /** Console logger for startup messages */
  console?: Logger;
  lockManager?: LockManager;
  cwd?: string;
  /** Scheduler clock overrides */
  now?: SchedulerOptions['now'];
  sleep?: SchedulerOptions['sleep'];
}

export const EXIT_OK = 0;
export const EXIT_PASS_FAILURES = 2;

/**
 * Relative POSIX path of file under root, or null when it lies outside
 */
function relativeInside(root: string, file: string): string | null {
  if (!isSubdirectory(root, file)) {
    return null;
  }
  return path.relative(root, file).split(path.sep).join('/');
}

/**
 * Run the mirror until aborted (or for one pass with `once`)
 *
 * @returns Process exit code
 * @throws PathValidationError / PathNotFoundError / LogSetupError / ReplicaLockedError before any pass
 */
export async function runMirror(config: MirrorConfig, options: RunMirrorOptions = {}): Promise<number> {
  const consoleLogger = options.console ?? log;
  const cwd = options.cwd ?? process.cwd();

  const roots = await validateSyncRoots(config.sourceDir, config.replicaDir, {
    cwd,
    logger: consoleLogger,
    createReplica: !config.dryRun
  });

  const syncLog = SyncLog.open(config.logDir, {
    cwd,
    replicaDir: roots.replicaDir,
    console: consoleLogger
  });
  const logger = createLogger({ logFile: syncLog, debug: config.debug });

  // A log file kept inside the source would otherwise be mirrored every pass
  const logInSource = relativeInside(roots.sourceDir, syncLog.filePath);
  const filter = new FileFilter({
    excludePatterns: config.exclude,
    ignoreFile: config.ignoreFile,
    alwaysExclude: logInSource ? [logInSource] : []
  });

  const lockManager = options.lockManager ?? new LockManager({ logger });
  if (!config.dryRun) {
    await lockManager.acquire(roots.replicaDir);
  }

  try {
    consoleLogger.info('One-way synchronization will be performed as follows:');
    consoleLogger.info(`- Source directory: ${roots.sourceDir}`);
    consoleLogger.info(`- Replica directory: ${roots.replicaDir}`);
    consoleLogger.info(`- Log file path: ${syncLog.filePath}`);
    consoleLogger.info(`- Synchronization frequency: ${config.frequencySeconds} second(s)`);
    const patterns = filter.getExcludePatterns();
    if (patterns.length > 0) {
      consoleLogger.info(`- Excluded patterns: ${patterns.join(', ')}`);
    }

    logger.info(
      `Synchronization begun with "${roots.sourceDir}" as the source directory, ` +
      `"${roots.replicaDir}" as the replica directory, ` +
      `and a ${config.frequencySeconds} second update frequency.`
    );

    const reconciler = new Reconciler({
      sourceDir: roots.sourceDir,
      replicaDir: roots.replicaDir,
      logger,
      compare: config.compare,
      filter,
      dryRun: config.dryRun
    });

    const reports: PassReport[] = [];
    const scheduler = new SyncScheduler(async () => {
      const report = await reconciler.runPass();
      reports.push(report);
      return report;
    }, {
      intervalMs: config.frequencySeconds * 1000,
      logger,
      maxPasses: config.once ? 1 : undefined,
      now: options.now,
      sleep: options.sleep
    });

    const summary = await scheduler.run(options.signal);
    logger.info('Synchronization terminated.');

    if (!config.once) {
      return EXIT_OK;
    }
    const clean = summary.failedPasses === 0 &&
      reports.length > 0 &&
      reports.every(report => report.failures.length === 0);
    return clean ? EXIT_OK : EXIT_PASS_FAILURES;
  } finally {
    await lockManager.release(roots.replicaDir);
  }
}
