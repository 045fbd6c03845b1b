/**
 * SyncScheduler - Explicit timer loop around a pass
 *
 * start → run pass to completion → wait until start + interval → repeat.
 * Passes never overlap and a slow pass does not queue a backlog: the next
 * one simply starts as soon as it finishes.
 */

import { describeError } from '../errors/mirrorErrors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  intervalMs: number;
  logger?: Logger;
  /** Stop after this many passes (1 for --once) */
  maxPasses?: number;
  now?: () => number;
  sleep?: SleepFn;
}

export interface SchedulerSummary {
  passes: number;
  failedPasses: number;
}

/**
 * setTimeout-based sleep that resolves early when the signal aborts
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class SyncScheduler<T> {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly maxPasses?: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private running = false;

  constructor(
    private readonly task: () => Promise<T>,
    options: SchedulerOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? silentLogger;
    this.maxPasses = options.maxPasses;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
  }

  /**
   * Run passes until maxPasses is reached or the signal aborts.
   * An abort during a pass takes effect once that pass finishes.
   */
  async run(signal?: AbortSignal): Promise<SchedulerSummary> {
    if (this.running) {
      throw new Error('SyncScheduler is already running');
    }
    this.running = true;

    const summary: SchedulerSummary = { passes: 0, failedPasses: 0 };

    try {
      while (!signal?.aborted) {
        const startedAt = this.now();

        try {
          await this.task();
        } catch (error) {
          summary.failedPasses++;
          this.logger.error(`Synchronization pass failed: ${describeError(error)}`);
        }
        summary.passes++;

        if (this.maxPasses !== undefined && summary.passes >= this.maxPasses) {
          break;
        }
        if (signal?.aborted) {
          break;
        }

        const deadline = startedAt + this.intervalMs;
        const waitMs = Math.max(0, deadline - this.now());
        if (waitMs === 0) {
          this.logger.debug(`[SCHEDULER] Pass overran the ${this.intervalMs}ms interval; starting the next one now`);
        } else {
          this.logger.debug(`[SCHEDULER] Waiting ${waitMs}ms for the next pass`);
        }
        await this.sleep(waitMs, signal);
      }
    } finally {
      this.running = false;
    }

    return summary;
  }
}
