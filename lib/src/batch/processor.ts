/**
 * Resumable Batch Processor
 *
 * Drives items through an ItemOperation in fixed-size batches. After every
 * batch the checkpoint is updated and persisted, so an interrupted or crashed
 * run can be resumed without repeating attempted items.
 * Features:
 * - Cooperative shutdown through an AbortSignal, checked between items
 * - Per-item faults are recorded, never propagated
 * - Fatal faults (persistence, rate-limit exhaustion) leave a Failed checkpoint
 */

import {
  CheckpointStatus,
  createDefaultParams,
  getResumeBlocker,
  type Checkpoint,
  type CheckpointManager,
  type OperationConfig,
  type OperationParams,
  type ExtensionValue,
} from '../checkpoint/index.js';
import {
  BulkOpsError,
  CheckpointNotFoundError,
  CheckpointNotResumableError,
  ValidationError,
  isFatalError,
} from '../errors/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import { calculateSuccessRate, createEmptyBatchResults, mergeBatchResults } from './results.js';
import {
  BatchProcessorConfigSchema,
  type BatchProcessingEvents,
  type BatchProcessorConfig,
  type BatchProcessorConfigInput,
  type BatchResults,
  type ItemClassification,
  type ItemOperation,
  type ItemOutcome,
  type ItemValidation,
  type RunOptions,
  type RunResult,
} from './types.js';

export interface BatchProcessorOptions {
  operation: ItemOperation;
  checkpointManager: CheckpointManager;
  config?: BatchProcessorConfigInput;
  /** Operation params for new checkpoints (default: the type's defaults) */
  params?: OperationParams;
  extensions?: Record<string, ExtensionValue>;
  events?: BatchProcessingEvents;
  logger?: Logger;
  now?: () => Date;
}

interface BatchOutcome {
  results: BatchResults;
  interrupted: boolean;
  fatalError: BulkOpsError | null;
}

// ============================================================================
// Batch Processor
// ============================================================================

export class BatchProcessor {
  private readonly operation: ItemOperation;
  private readonly checkpointManager: CheckpointManager;
  private readonly config: BatchProcessorConfig;
  private readonly params: OperationParams;
  private readonly extensions: Record<string, ExtensionValue>;
  private readonly events: BatchProcessingEvents;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: BatchProcessorOptions) {
    this.operation = options.operation;
    this.checkpointManager = options.checkpointManager;
    this.config = BatchProcessorConfigSchema.parse(options.config ?? {});
    this.params = options.params ?? createDefaultParams(options.operation.operationType);
    this.extensions = options.extensions ?? {};
    this.events = options.events ?? {};
    this.logger = (options.logger ?? getComponentLogger('batch-processor')).with({
      operation: options.operation.operationType,
    });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Process `items`, or continue the checkpoint named by
   * `options.resumeCheckpointId`. Never rejects: failures are reported in the
   * result and recorded on the checkpoint.
   */
  async run(items: readonly string[], batchSize: number, options: RunOptions = {}): Promise<RunResult> {
    let results = createEmptyBatchResults();

    let checkpoint: Checkpoint;
    try {
      checkpoint = await this.resolveCheckpoint(items, batchSize, options.resumeCheckpointId);
    } catch (error) {
      const failure = BulkOpsError.fromError(error);
      this.logger.error('Could not start operation', failure);
      return {
        status: 'failed',
        checkpointId: options.resumeCheckpointId ?? null,
        resumeCheckpointId: null,
        results,
        error: failure,
      };
    }

    const logger = this.logger.with({ checkpointId: checkpoint.id });

    try {
      while (checkpoint.remainingItems.length > 0) {
        if (options.signal?.aborted) {
          return await this.interrupt(checkpoint, results, logger);
        }

        const batch = checkpoint.remainingItems.slice(0, checkpoint.progress.batchSize);
        const batchNumber = checkpoint.progress.currentBatch + 1;
        this.events.onBatchStart?.(batchNumber, batch);
        logger.debug('Starting batch', { batch: batchNumber, size: batch.length });

        const outcome = await this.processBatch(batch, options.signal);
        if (outcome.results.attemptedItems.length > 0) {
          this.checkpointManager.applyBatchUpdate(checkpoint, outcome.results.attemptedItems, outcome.results);
          results = mergeBatchResults(results, outcome.results);
        }

        if (outcome.interrupted) {
          this.checkpointManager.markCancelled(checkpoint);
        }
        await this.checkpointManager.save(checkpoint);
        this.events.onCheckpointSaved?.(checkpoint);
        this.events.onBatchComplete?.(batchNumber, outcome.results);

        logger.info(`Batch ${batchNumber}/${checkpoint.progress.totalBatches} complete`, {
          attempted: outcome.results.attemptedItems.length,
          processed: outcome.results.processedCount,
          errors: outcome.results.errorCount,
          remaining: checkpoint.remainingItems.length,
        });

        if (outcome.fatalError) {
          throw outcome.fatalError;
        }
        if (outcome.interrupted) {
          return this.interruptedResult(checkpoint, results, logger);
        }
      }

      await this.checkpointManager.finalize(checkpoint);
      this.events.onCheckpointSaved?.(checkpoint);
      logger.info('Operation completed', {
        totalItems: checkpoint.progress.totalItems,
        processed: checkpoint.results.processedCount,
        skipped: checkpoint.results.skippedCount,
        errors: checkpoint.results.errorCount,
        notFound: checkpoint.results.notFoundCount,
        multipleMatches: checkpoint.results.multipleMatchesCount,
        successRate: `${calculateSuccessRate(results).toFixed(1)}%`,
      });

      return {
        status: 'completed',
        checkpointId: checkpoint.id,
        resumeCheckpointId: null,
        results,
      };
    } catch (error) {
      const failure = BulkOpsError.fromError(error);
      logger.error('Operation failed', failure);

      if (checkpoint.status !== CheckpointStatus.COMPLETED) {
        this.checkpointManager.markFailed(checkpoint, failure);
      }
      try {
        await this.checkpointManager.save(checkpoint);
      } catch (saveError) {
        logger.error('Could not persist failed checkpoint', saveError);
      }

      return {
        status: 'failed',
        checkpointId: checkpoint.id,
        resumeCheckpointId: checkpoint.status === CheckpointStatus.COMPLETED ? null : checkpoint.id,
        results,
        error: failure,
      };
    }
  }

  /**
   * Continue a stored checkpoint with its own batch size
   */
  async resume(checkpointId: string, options: Omit<RunOptions, 'resumeCheckpointId'> = {}): Promise<RunResult> {
    return this.run([], 0, { ...options, resumeCheckpointId: checkpointId });
  }

  // ==========================================================================
  // Checkpoint Resolution
  // ==========================================================================

  private async resolveCheckpoint(
    items: readonly string[],
    batchSize: number,
    resumeCheckpointId: string | undefined
  ): Promise<Checkpoint> {
    if (resumeCheckpointId === undefined) {
      const checkpoint = this.checkpointManager.createCheckpoint(
        this.operation.operationType,
        this.buildOperationConfig(batchSize),
        items,
        batchSize
      );
      await this.checkpointManager.save(checkpoint);
      this.logger.info(`Starting ${this.operation.name}`, {
        checkpointId: checkpoint.id,
        totalItems: checkpoint.progress.totalItems,
        totalBatches: checkpoint.progress.totalBatches,
        batchSize,
      });
      return checkpoint;
    }

    const checkpoint = await this.checkpointManager.load(resumeCheckpointId);
    if (!checkpoint) {
      throw new CheckpointNotFoundError(resumeCheckpointId);
    }
    if (checkpoint.status === CheckpointStatus.COMPLETED) {
      throw new CheckpointNotResumableError(resumeCheckpointId, 'operation already completed');
    }
    if (checkpoint.operationType !== this.operation.operationType) {
      throw new CheckpointNotResumableError(
        resumeCheckpointId,
        `checkpoint is for ${checkpoint.operationType}, not ${this.operation.operationType}`
      );
    }
    if (checkpoint.remainingItems.length === 0) {
      this.logger.info('Checkpoint has no remaining items, finalizing', {
        checkpointId: checkpoint.id,
      });
      await this.checkpointManager.finalize(checkpoint);
      return checkpoint;
    }

    const blocker = getResumeBlocker(checkpoint);
    if (blocker !== null) {
      throw new CheckpointNotResumableError(resumeCheckpointId, blocker);
    }

    if (!(await this.checkpointManager.reactivate(checkpoint))) {
      await this.checkpointManager.save(checkpoint);
    }

    this.logger.info(`Resuming ${this.operation.name}`, {
      checkpointId: checkpoint.id,
      remaining: checkpoint.remainingItems.length,
      nextBatch: checkpoint.progress.currentBatch + 1,
      totalBatches: checkpoint.progress.totalBatches,
    });
    return checkpoint;
  }

  private buildOperationConfig(batchSize: number): OperationConfig {
    return {
      environment: this.config.environment,
      inputFile: this.config.inputFile,
      outputFile: this.config.outputFile,
      connectionFilter: this.config.connectionFilter,
      dryRun: this.config.dryRun,
      autoDelete: this.config.autoDelete,
      batchSize,
      operationName: this.operation.name,
      params: this.params,
      extensions: { ...this.extensions },
    };
  }

  // ==========================================================================
  // Batch Processing
  // ==========================================================================

  private async processBatch(batch: readonly string[], signal: AbortSignal | undefined): Promise<BatchOutcome> {
    const results = createEmptyBatchResults();

    for (const item of batch) {
      if (signal?.aborted) {
        return { results, interrupted: true, fatalError: null };
      }

      let classification: ItemClassification;
      try {
        const validation: ItemValidation = this.operation.validate?.(item) ?? { valid: true };
        if (!validation.valid) {
          this.recordInvalid(results, item, validation.reason);
          classification = 'invalid';
        } else {
          const outcome = await this.operation.execute(item);
          this.recordOutcome(results, item, outcome);
          classification = outcome.status;
        }
      } catch (error) {
        if (isFatalError(error)) {
          return { results, interrupted: false, fatalError: BulkOpsError.fromError(error) };
        }
        if (error instanceof ValidationError) {
          this.recordInvalid(results, item, error.message);
          classification = 'invalid';
        } else {
          this.recordError(results, item, error);
          classification = 'error';
        }
      }

      results.attemptedItems.push(item);
      this.events.onItemComplete?.(item, classification);
    }

    return { results, interrupted: false, fatalError: null };
  }

  private recordOutcome(results: BatchResults, item: string, outcome: ItemOutcome): void {
    switch (outcome.status) {
      case 'success':
        results.processedCount += 1;
        results.successItems.push(item);
        break;
      case 'skipped':
        results.skippedCount += 1;
        this.logger.debug('Item skipped', { item, reason: outcome.reason });
        break;
      case 'not_found':
        results.notFoundCount += 1;
        results.notFoundItems.push(item);
        this.logger.debug('Item not found', { item, reason: outcome.reason });
        break;
      case 'multiple_matches':
        results.multipleMatchesCount += 1;
        results.multipleMatches[item] = [...outcome.candidates];
        this.logger.warn('Item matched multiple users', { item, candidates: outcome.candidates.length });
        break;
    }
  }

  private recordInvalid(results: BatchResults, item: string, reason: string): void {
    results.skippedCount += 1;
    results.invalidItems.push(item);
    this.logger.debug('Invalid item', { item, reason });
  }

  private recordError(results: BatchResults, item: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    results.errorCount += 1;
    results.errors.push({
      item,
      error: message,
      timestamp: this.now().toISOString(),
      operation: this.operation.operationType,
    });
    this.logger.warn('Item failed', { item, error: message });
  }

  // ==========================================================================
  // Interruption
  // ==========================================================================

  private async interrupt(checkpoint: Checkpoint, results: BatchResults, logger: Logger): Promise<RunResult> {
    this.checkpointManager.markCancelled(checkpoint);
    await this.checkpointManager.save(checkpoint);
    this.events.onCheckpointSaved?.(checkpoint);
    return this.interruptedResult(checkpoint, results, logger);
  }

  private interruptedResult(checkpoint: Checkpoint, results: BatchResults, logger: Logger): RunResult {
    logger.warn('Operation interrupted, progress saved', {
      processed: checkpoint.processedItems.length,
      remaining: checkpoint.remainingItems.length,
    });
    return {
      status: 'interrupted',
      checkpointId: checkpoint.id,
      resumeCheckpointId: checkpoint.id,
      results,
    };
  }
}
