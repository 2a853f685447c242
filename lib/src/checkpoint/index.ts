/**
 * Checkpoint Module
 *
 * Durable, resumable record of one bulk operation.
 */

export * from './types.js';

export { mergeProcessingResults } from './results.js';

export {
  CHECKPOINT_FILE_EXTENSION,
  BACKUP_SUFFIX,
  toDocument,
  fromDocument,
  serializeCheckpoint,
  deserializeCheckpoint,
  checkpointFileExists,
  saveCheckpointFile,
  loadCheckpointFile,
  getCompletionPercentage,
  getSuccessRate,
  isVersionCompatible,
  isResumable,
  getResumeBlocker,
  getCheckpointSummary,
} from './store.js';

export {
  CheckpointManager,
  DEFAULT_PRUNE_DAYS,
  type CheckpointManagerOptions,
  type PruneScope,
  type PruneCriteria,
  type PruneOptions,
  type PruneResult,
} from './manager.js';

export {
  formatCheckpointSummary,
  formatCheckpointDetails,
  formatSummaryTable,
} from './format.js';
