/**
 * Checkpoint Manager
 *
 * Lifecycle of checkpoints in one directory: create, persist, load, list,
 * per-batch progress updates, status transitions and pruning.
 */

import { randomBytes } from 'node:crypto';
import { readdir, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { CheckpointNotFoundError, ValidationError } from '../errors/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import { mergeProcessingResults } from './results.js';
import {
  BACKUP_SUFFIX,
  CHECKPOINT_FILE_EXTENSION,
  getCheckpointSummary,
  loadCheckpointFile,
  saveCheckpointFile,
} from './store.js';
import {
  CURRENT_SCHEMA_VERSION,
  CheckpointStatus,
  createEmptyResults,
  requiresOutputFile,
  type Checkpoint,
  type CheckpointFilters,
  type CheckpointSummary,
  type OperationConfig,
  type OperationType,
  type ProcessingResults,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckpointManagerOptions {
  /** Directory holding `<id>.json` documents */
  directory: string;
  logger?: Logger;
  /** Clock used for ids and timestamps */
  now?: () => Date;
}

export type PruneScope = 'all' | 'failed' | 'completed' | 'older_than';

export interface PruneCriteria {
  scope: PruneScope;
  /** Age threshold for `older_than` (default 30) */
  days?: number;
}

export interface PruneOptions {
  /** Report what would be deleted without deleting */
  dryRun?: boolean;
}

export interface PruneResult {
  count: number;
  ids: string[];
  dryRun: boolean;
}

export const DEFAULT_PRUNE_DAYS = 30;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const TERMINAL_OR_STOPPED: ReadonlySet<CheckpointStatus> = new Set<CheckpointStatus>([
  CheckpointStatus.COMPLETED,
  CheckpointStatus.FAILED,
  CheckpointStatus.CANCELLED,
]);

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatIdTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Checkpoint Manager
// ============================================================================

export class CheckpointManager {
  readonly directory: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CheckpointManagerOptions) {
    this.directory = options.directory;
    this.logger = options.logger ?? getComponentLogger('checkpoint-manager');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * `<operation>_<environment>_<YYYYMMDD_HHMMSS>_<8 hex chars>`
   */
  generateCheckpointId(operationType: OperationType, environment: string): string {
    const suffix = randomBytes(4).toString('hex');
    return `${operationType}_${environment}_${formatIdTimestamp(this.now())}_${suffix}`;
  }

  getCheckpointPath(checkpointId: string): string {
    return join(this.directory, `${checkpointId}${CHECKPOINT_FILE_EXTENSION}`);
  }

  /**
   * Build a new Active checkpoint over `items`. Not persisted until `save`.
   *
   * @throws {ValidationError} on a bad batch size, mismatched params or a
   * missing output file
   */
  createCheckpoint(
    operationType: OperationType,
    config: OperationConfig,
    items: readonly string[],
    batchSize: number
  ): Checkpoint {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationError(`Batch size must be a positive integer, got ${batchSize}`, {
        batchSize,
      });
    }
    if (config.params.operation !== operationType) {
      throw new ValidationError(
        `Operation params are for ${config.params.operation}, not ${operationType}`
      );
    }
    if (requiresOutputFile(operationType) && !config.outputFile) {
      throw new ValidationError(`${operationType} requires an output file`, { operationType });
    }

    const uniqueItems = [...new Set(items)];
    if (uniqueItems.length !== items.length) {
      this.logger.warn('Dropped duplicate identifiers from input', {
        operationType,
        duplicates: items.length - uniqueItems.length,
      });
    }

    const timestamp = this.now().toISOString();
    return {
      id: this.generateCheckpointId(operationType, config.environment),
      operationType,
      status: CheckpointStatus.ACTIVE,
      createdAt: timestamp,
      updatedAt: timestamp,
      config: { ...config, extensions: { ...config.extensions } },
      progress: {
        currentBatch: 0,
        totalBatches: Math.ceil(uniqueItems.length / batchSize),
        currentItem: 0,
        totalItems: uniqueItems.length,
        batchSize,
      },
      results: createEmptyResults(),
      remainingItems: uniqueItems,
      processedItems: [],
      version: CURRENT_SCHEMA_VERSION,
    };
  }

  /**
   * Create and persist a checkpoint; the operation type comes from the params
   */
  async create(items: readonly string[], config: OperationConfig, batchSize: number): Promise<string> {
    const checkpoint = this.createCheckpoint(config.params.operation, config, items, batchSize);
    await this.save(checkpoint);
    this.logger.info('Created checkpoint', {
      checkpointId: checkpoint.id,
      totalItems: checkpoint.progress.totalItems,
      totalBatches: checkpoint.progress.totalBatches,
    });
    return checkpoint.id;
  }

  /**
   * @throws {PersistenceError}
   */
  async save(checkpoint: Checkpoint): Promise<void> {
    checkpoint.updatedAt = this.now().toISOString();
    await saveCheckpointFile(this.getCheckpointPath(checkpoint.id), checkpoint, this.logger);
  }

  /**
   * @returns null when no checkpoint with this id exists
   * @throws {MalformedCheckpointError}
   */
  async load(checkpointId: string): Promise<Checkpoint | null> {
    try {
      return await loadCheckpointFile(this.getCheckpointPath(checkpointId));
    } catch (error) {
      if (error instanceof CheckpointNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Checkpoints matching all given filters, newest first. Unreadable files are
   * skipped with a warning.
   */
  async list(filters: CheckpointFilters = {}): Promise<Checkpoint[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const checkpoints: Checkpoint[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(CHECKPOINT_FILE_EXTENSION)) {
        continue;
      }
      try {
        const checkpoint = await loadCheckpointFile(join(this.directory, entry));
        if (matchesFilters(checkpoint, filters)) {
          checkpoints.push(checkpoint);
        }
      } catch (error) {
        this.logger.warn('Skipping unreadable checkpoint file', {
          file: entry,
          error: errorMessage(error),
        });
      }
    }

    return checkpoints.sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
  }

  async listSummaries(filters: CheckpointFilters = {}): Promise<CheckpointSummary[]> {
    const checkpoints = await this.list(filters);
    return checkpoints.map(getCheckpointSummary);
  }

  /**
   * Remove a checkpoint and its backup
   *
   * @returns false when the checkpoint did not exist
   */
  async delete(checkpointId: string): Promise<boolean> {
    const path = this.getCheckpointPath(checkpointId);
    const existed = await removeIfPresent(path);
    await removeIfPresent(`${path}${BACKUP_SUFFIX}`);

    if (existed) {
      this.logger.info('Deleted checkpoint', { checkpointId });
    }
    return existed;
  }

  /**
   * Fold one batch into the checkpoint: advance progress, merge results and
   * move the attempted items from remaining to processed.
   */
  applyBatchUpdate(checkpoint: Checkpoint, attempted: readonly string[], delta: ProcessingResults): void {
    checkpoint.progress.currentBatch += 1;
    checkpoint.progress.currentItem += attempted.length;
    checkpoint.results = mergeProcessingResults(checkpoint.results, delta);

    const attemptedSet = new Set(attempted);
    checkpoint.remainingItems = checkpoint.remainingItems.filter((item) => !attemptedSet.has(item));
    checkpoint.processedItems.push(...attempted);

    if (checkpoint.remainingItems.length === 0) {
      checkpoint.status = CheckpointStatus.COMPLETED;
    }
    checkpoint.updatedAt = this.now().toISOString();
  }

  markFailed(checkpoint: Checkpoint, error: unknown): void {
    checkpoint.status = CheckpointStatus.FAILED;
    checkpoint.results.errors.push({
      item: null,
      error: errorMessage(error),
      timestamp: this.now().toISOString(),
      operation: checkpoint.operationType,
    });
    checkpoint.results.errorCount += 1;
    checkpoint.updatedAt = this.now().toISOString();
  }

  markCancelled(checkpoint: Checkpoint, reason = 'Operation cancelled by user'): void {
    checkpoint.status = CheckpointStatus.CANCELLED;
    checkpoint.results.errors.push({
      item: null,
      error: reason,
      timestamp: this.now().toISOString(),
      operation: checkpoint.operationType,
    });
    checkpoint.updatedAt = this.now().toISOString();
  }

  /**
   * Failed or Cancelled → Active, persisted
   *
   * @returns false (and changes nothing) for any other status
   */
  async reactivate(checkpoint: Checkpoint): Promise<boolean> {
    if (
      checkpoint.status !== CheckpointStatus.FAILED &&
      checkpoint.status !== CheckpointStatus.CANCELLED
    ) {
      return false;
    }

    const previous = checkpoint.status;
    checkpoint.status = CheckpointStatus.ACTIVE;
    await this.save(checkpoint);
    this.logger.info('Reactivated checkpoint', { checkpointId: checkpoint.id, previous });
    return true;
  }

  async finalize(checkpoint: Checkpoint): Promise<void> {
    checkpoint.status = CheckpointStatus.COMPLETED;
    await this.save(checkpoint);
  }

  /**
   * Delete checkpoints by status or age
   */
  async prune(criteria: PruneCriteria, options: PruneOptions = {}): Promise<PruneResult> {
    const dryRun = options.dryRun ?? false;
    const days = criteria.days ?? DEFAULT_PRUNE_DAYS;
    const cutoff = this.now().getTime() - days * MS_PER_DAY;

    const candidates = (await this.list()).filter((checkpoint) => {
      switch (criteria.scope) {
        case 'all':
          return true;
        case 'failed':
          return checkpoint.status === CheckpointStatus.FAILED;
        case 'completed':
          return checkpoint.status === CheckpointStatus.COMPLETED;
        case 'older_than':
          return (
            TERMINAL_OR_STOPPED.has(checkpoint.status) && Date.parse(checkpoint.createdAt) < cutoff
          );
      }
    });

    const ids = candidates.map((checkpoint) => checkpoint.id);
    if (dryRun) {
      this.logger.info('Dry run: checkpoints that would be deleted', { scope: criteria.scope, ids });
      return { count: ids.length, ids, dryRun };
    }

    const deleted: string[] = [];
    for (const id of ids) {
      if (await this.delete(id)) {
        deleted.push(id);
      }
    }
    return { count: deleted.length, ids: deleted, dryRun };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function matchesFilters(checkpoint: Checkpoint, filters: CheckpointFilters): boolean {
  if (filters.operationType !== undefined && checkpoint.operationType !== filters.operationType) {
    return false;
  }
  if (filters.status !== undefined && checkpoint.status !== filters.status) {
    return false;
  }
  if (filters.environment !== undefined && checkpoint.config.environment !== filters.environment) {
    return false;
  }
  return true;
}

async function removeIfPresent(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
