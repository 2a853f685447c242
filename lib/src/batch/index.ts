/**
 * Batch Processing Module
 *
 * Resumable, checkpointed processing of bulk item operations.
 */

export {
  type ItemOutcome,
  type ItemValidation,
  type ItemOperation,
  type ItemClassification,
  type BatchResults,
  type RunStatus,
  type RunResult,
  BatchProcessorConfigSchema,
  type BatchProcessorConfig,
  type BatchProcessorConfigInput,
  type RunOptions,
  type BatchProcessingEvents,
} from './types.js';

export { createEmptyBatchResults, mergeBatchResults, calculateSuccessRate } from './results.js';

export { BatchProcessor, type BatchProcessorOptions } from './processor.js';
