/**
 * Checkpoint Store
 *
 * (De)serialization of checkpoint documents and crash-safe file persistence.
 * A file that already exists is copied to `<path>.backup` before it is
 * overwritten, and the copy is restored if the write fails.
 */

import { copyFile, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { CheckpointNotFoundError, MalformedCheckpointError, PersistenceError } from '../errors/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import {
  CURRENT_SCHEMA_VERSION,
  CheckpointDocumentSchema,
  CheckpointStatus,
  createDefaultParams,
  requiresOutputFile,
  type Checkpoint,
  type CheckpointDocument,
  type CheckpointSummary,
  type OperationParams,
  type OperationParamsDocument,
} from './types.js';

export const CHECKPOINT_FILE_EXTENSION = '.json';
export const BACKUP_SUFFIX = '.backup';

// ============================================================================
// Codec
// ============================================================================

function paramsToDocument(params: OperationParams): OperationParamsDocument {
  switch (params.operation) {
    case 'batch_delete':
    case 'batch_block':
      return { operation: params.operation, revoke_sessions: params.revokeSessions };
    case 'export_last_login':
      return { operation: params.operation, fields: [...params.fields] };
    case 'check_domains':
      return {
        operation: params.operation,
        allowed_domains: [...params.allowedDomains],
        blocked_domains: [...params.blockedDomains],
      };
    default:
      return { operation: params.operation };
  }
}

function paramsFromDocument(params: OperationParamsDocument): OperationParams {
  switch (params.operation) {
    case 'batch_delete':
    case 'batch_block':
      return { operation: params.operation, revokeSessions: params.revoke_sessions };
    case 'export_last_login':
      return { operation: params.operation, fields: [...params.fields] };
    case 'check_domains':
      return {
        operation: params.operation,
        allowedDomains: [...params.allowed_domains],
        blockedDomains: [...params.blocked_domains],
      };
    default:
      return { operation: params.operation };
  }
}

export function toDocument(checkpoint: Checkpoint): CheckpointDocument {
  const { config, progress, results } = checkpoint;
  return {
    id: checkpoint.id,
    operation_type: checkpoint.operationType,
    status: checkpoint.status,
    created_at: checkpoint.createdAt,
    updated_at: checkpoint.updatedAt,
    config: {
      environment: config.environment,
      input_file: config.inputFile,
      output_file: config.outputFile,
      connection_filter: config.connectionFilter,
      dry_run: config.dryRun,
      auto_delete: config.autoDelete,
      batch_size: config.batchSize,
      operation_name: config.operationName,
      params: paramsToDocument(config.params),
      extensions: { ...config.extensions },
    },
    progress: {
      current_batch: progress.currentBatch,
      total_batches: progress.totalBatches,
      current_item: progress.currentItem,
      total_items: progress.totalItems,
      batch_size: progress.batchSize,
    },
    results: {
      processed_count: results.processedCount,
      skipped_count: results.skippedCount,
      error_count: results.errorCount,
      not_found_count: results.notFoundCount,
      multiple_matches_count: results.multipleMatchesCount,
      not_found_items: [...results.notFoundItems],
      invalid_items: [...results.invalidItems],
      multiple_matches: Object.fromEntries(
        Object.entries(results.multipleMatches).map(([item, candidates]) => [item, [...candidates]])
      ),
      errors: results.errors.map((record) => ({ ...record })),
    },
    remaining_items: [...checkpoint.remainingItems],
    processed_items: [...checkpoint.processedItems],
    version: checkpoint.version,
  };
}

/**
 * @param fallbackId - used when the document carries no id
 * @throws {MalformedCheckpointError} when params disagree with the operation type
 */
export function fromDocument(doc: CheckpointDocument, fallbackId = ''): Checkpoint {
  const params = doc.config.params
    ? paramsFromDocument(doc.config.params)
    : createDefaultParams(doc.operation_type);

  if (params.operation !== doc.operation_type) {
    throw new MalformedCheckpointError(doc.id || fallbackId, [
      `config.params.operation "${params.operation}" does not match operation_type "${doc.operation_type}"`,
    ]);
  }

  return {
    id: doc.id || fallbackId,
    operationType: doc.operation_type,
    status: doc.status,
    createdAt: doc.created_at,
    updatedAt: doc.updated_at,
    config: {
      environment: doc.config.environment,
      inputFile: doc.config.input_file,
      outputFile: doc.config.output_file,
      connectionFilter: doc.config.connection_filter,
      dryRun: doc.config.dry_run,
      autoDelete: doc.config.auto_delete,
      batchSize: doc.config.batch_size,
      operationName: doc.config.operation_name,
      params,
      extensions: doc.config.extensions,
    },
    progress: {
      currentBatch: doc.progress.current_batch,
      totalBatches: doc.progress.total_batches,
      currentItem: doc.progress.current_item,
      totalItems: doc.progress.total_items,
      batchSize: doc.progress.batch_size,
    },
    results: {
      processedCount: doc.results.processed_count,
      skippedCount: doc.results.skipped_count,
      errorCount: doc.results.error_count,
      notFoundCount: doc.results.not_found_count,
      multipleMatchesCount: doc.results.multiple_matches_count,
      notFoundItems: doc.results.not_found_items,
      invalidItems: doc.results.invalid_items,
      multipleMatches: doc.results.multiple_matches,
      errors: doc.results.errors,
    },
    remainingItems: doc.remaining_items,
    processedItems: doc.processed_items,
    version: doc.version,
  };
}

export function serializeCheckpoint(checkpoint: Checkpoint): string {
  return JSON.stringify(toDocument(checkpoint), null, 2);
}

/**
 * Parse and validate a checkpoint document
 *
 * @param source - file path or label used in error messages
 * @throws {MalformedCheckpointError}
 */
export function deserializeCheckpoint(json: string, source = '<string>', fallbackId = ''): Checkpoint {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new MalformedCheckpointError(
      source,
      [`invalid JSON: ${error instanceof Error ? error.message : String(error)}`],
      error
    );
  }

  const result = CheckpointDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new MalformedCheckpointError(source, issues, result.error);
  }

  return fromDocument(result.data, fallbackId);
}

// ============================================================================
// File Operations
// ============================================================================

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check if a checkpoint file exists
 */
export async function checkpointFileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Persist a checkpoint, keeping the previous version as `<path>.backup`.
 *
 * @throws {PersistenceError} when the document cannot be written
 */
export async function saveCheckpointFile(
  filePath: string,
  checkpoint: Checkpoint,
  logger: Logger = getComponentLogger('checkpoint-store')
): Promise<void> {
  const backupPath = `${filePath}${BACKUP_SUFFIX}`;
  const content = serializeCheckpoint(checkpoint);

  try {
    await mkdir(dirname(filePath), { recursive: true });
  } catch (error) {
    throw new PersistenceError(
      `Failed to create checkpoint directory for ${filePath}: ${errorMessage(error)}`,
      filePath,
      error
    );
  }

  let backedUp = false;
  try {
    if (await checkpointFileExists(filePath)) {
      await copyFile(filePath, backupPath);
      backedUp = true;
    }
  } catch (error) {
    logger.warn('Could not back up checkpoint before overwrite', {
      filePath,
      error: errorMessage(error),
    });
  }

  try {
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    if (backedUp) {
      try {
        await copyFile(backupPath, filePath);
        logger.warn('Restored checkpoint from backup after failed write', { filePath });
      } catch (restoreError) {
        logger.error('Failed to restore checkpoint backup', restoreError, { filePath, backupPath });
      }
    }
    throw new PersistenceError(
      `Failed to write checkpoint ${filePath}: ${errorMessage(error)}`,
      filePath,
      error
    );
  }

  logger.debug('Checkpoint saved', { filePath, checkpointId: checkpoint.id });
}

/**
 * Load a checkpoint file. An empty persisted id is filled from the file name.
 *
 * @throws {CheckpointNotFoundError} when the file does not exist
 * @throws {MalformedCheckpointError} when the content is not a valid checkpoint
 */
export async function loadCheckpointFile(filePath: string): Promise<Checkpoint> {
  const fileId = basename(filePath, CHECKPOINT_FILE_EXTENSION);

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new CheckpointNotFoundError(fileId);
    }
    throw new MalformedCheckpointError(filePath, [`unreadable: ${errorMessage(error)}`], error);
  }

  return deserializeCheckpoint(content, filePath, fileId);
}

// ============================================================================
// Derived Values
// ============================================================================

export function getCompletionPercentage(checkpoint: Checkpoint): number {
  const { currentItem, totalItems } = checkpoint.progress;
  if (totalItems === 0) {
    return 0;
  }
  return (currentItem / totalItems) * 100;
}

/**
 * processed / (processed + skipped + error), as a percentage
 */
export function getSuccessRate(checkpoint: Checkpoint): number {
  const { processedCount, skippedCount, errorCount } = checkpoint.results;
  const attempted = processedCount + skippedCount + errorCount;
  if (attempted === 0) {
    return 0;
  }
  return (processedCount / attempted) * 100;
}

export function isVersionCompatible(checkpoint: Checkpoint): boolean {
  return checkpoint.version === CURRENT_SCHEMA_VERSION;
}

export function isResumable(checkpoint: Checkpoint): boolean {
  return (
    checkpoint.status !== CheckpointStatus.COMPLETED &&
    checkpoint.remainingItems.length > 0 &&
    isVersionCompatible(checkpoint)
  );
}

/**
 * Reason a checkpoint cannot be resumed, or null when it can
 */
export function getResumeBlocker(checkpoint: Checkpoint): string | null {
  if (checkpoint.status === CheckpointStatus.COMPLETED) {
    return 'operation already completed';
  }
  if (checkpoint.remainingItems.length === 0) {
    return 'no remaining items';
  }
  if (!isVersionCompatible(checkpoint)) {
    return `schema version ${checkpoint.version} is not compatible with ${CURRENT_SCHEMA_VERSION}`;
  }
  if (requiresOutputFile(checkpoint.operationType) && !checkpoint.config.outputFile) {
    return `${checkpoint.operationType} requires an output file`;
  }
  return null;
}

export function getCheckpointSummary(checkpoint: Checkpoint): CheckpointSummary {
  return {
    id: checkpoint.id,
    operationType: checkpoint.operationType,
    status: checkpoint.status,
    createdAt: checkpoint.createdAt,
    updatedAt: checkpoint.updatedAt,
    completionPercentage: getCompletionPercentage(checkpoint),
    successRate: getSuccessRate(checkpoint),
    totalItems: checkpoint.progress.totalItems,
    processedItems: checkpoint.processedItems.length,
    remainingItems: checkpoint.remainingItems.length,
    environment: checkpoint.config.environment,
    inputFile: checkpoint.config.inputFile,
    outputFile: checkpoint.config.outputFile,
    isResumable: isResumable(checkpoint) && getResumeBlocker(checkpoint) === null,
  };
}
