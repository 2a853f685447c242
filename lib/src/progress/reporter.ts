/**
 * Progress Reporter
 *
 * Counts attempted items as the batch processor reports them and logs a
 * progress line with throughput and ETA at fixed percentage steps.
 */

import type { BatchProcessingEvents, ItemClassification } from '../batch/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import {
  ProgressReporterConfigSchema,
  calculateItemsPerSecond,
  calculatePercentage,
  createEmptyCounts,
  estimateRemainingTime,
  formatProgress,
  type ProgressCounts,
  type ProgressReporterConfig,
  type ProgressReporterOptions,
  type ProgressSnapshot,
} from './types.js';

export interface ProgressReporterDeps {
  logger?: Logger;
  /** Epoch milliseconds */
  now?: () => number;
}

export class ProgressReporter {
  private readonly config: ProgressReporterConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly startedAt: number;
  private counts: ProgressCounts = createEmptyCounts();
  private attemptedThisRun = 0;
  private lastLoggedStep = 0;

  constructor(options: ProgressReporterOptions, deps: ProgressReporterDeps = {}) {
    this.config = ProgressReporterConfigSchema.parse(options);
    this.logger = deps.logger ?? getComponentLogger('progress');
    this.now = deps.now ?? (() => Date.now());
    this.startedAt = this.now();
    this.lastLoggedStep = this.stepFor(this.config.alreadyProcessed);
  }

  /**
   * Record one attempted item
   */
  record(classification: ItemClassification): void {
    this.attemptedThisRun += 1;
    switch (classification) {
      case 'success':
        this.counts.success += 1;
        break;
      case 'skipped':
        this.counts.skipped += 1;
        break;
      case 'not_found':
        this.counts.notFound += 1;
        break;
      case 'multiple_matches':
        this.counts.multipleMatches += 1;
        break;
      case 'invalid':
        this.counts.invalid += 1;
        break;
      case 'error':
        this.counts.error += 1;
        break;
    }

    const step = this.stepFor(this.getCurrent());
    if (step > this.lastLoggedStep) {
      this.lastLoggedStep = step;
      this.logger.info(`${this.config.operationName}: ${formatProgress(this.getSnapshot())}`);
    }
  }

  getCurrent(): number {
    return Math.min(this.config.total, this.config.alreadyProcessed + this.attemptedThisRun);
  }

  getSnapshot(): ProgressSnapshot {
    const elapsedMs = this.now() - this.startedAt;
    const current = this.getCurrent();
    return {
      current,
      total: this.config.total,
      percentage: calculatePercentage(current, this.config.total),
      elapsedMs,
      estimatedRemainingMs: estimateRemainingTime(elapsedMs, this.attemptedThisRun, this.config.total - current),
      itemsPerSecond: calculateItemsPerSecond(this.attemptedThisRun, elapsedMs),
      counts: { ...this.counts },
    };
  }

  toString(): string {
    return formatProgress(this.getSnapshot());
  }

  /**
   * Processor events that feed this reporter
   */
  toEvents(): BatchProcessingEvents {
    return {
      onItemComplete: (_item, classification) => this.record(classification),
    };
  }

  private stepFor(current: number): number {
    if (this.config.total === 0) {
      return 0;
    }
    return Math.floor(calculatePercentage(current, this.config.total) / this.config.logIntervalPercent);
  }
}
