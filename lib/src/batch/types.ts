/**
 * Batch Processing Types
 *
 * The per-item operation contract (a strategy the processor drives), item
 * outcomes and the shape of a run's result.
 */

import { z } from 'zod';
import type { BulkOpsError } from '../errors/index.js';
import type { Checkpoint, OperationType, ProcessingResults } from '../checkpoint/index.js';

// ============================================================================
// Item Operation
// ============================================================================

/**
 * Business outcome of one item. Technical failures are thrown instead.
 */
export type ItemOutcome =
  | { status: 'success' }
  | { status: 'skipped'; reason: string }
  | { status: 'not_found'; reason: string }
  | { status: 'multiple_matches'; reason: string; candidates: string[] };

export type ItemValidation = { valid: true } | { valid: false; reason: string };

/**
 * One bulk operation applied item by item. Implementations receive their
 * collaborators (API client, output file) through the constructor.
 */
export interface ItemOperation {
  /** Human-readable label, e.g. "Delete users" */
  readonly name: string;
  readonly operationType: OperationType;
  execute(item: string): Promise<ItemOutcome>;
  /** Checked before `execute`; failing items are recorded as invalid */
  validate?(item: string): ItemValidation;
}

/**
 * Classification of one attempted item, as reported to `onItemComplete`
 */
export type ItemClassification = ItemOutcome['status'] | 'invalid' | 'error';

// ============================================================================
// Results
// ============================================================================

/**
 * Aggregated outcome of one or more batches
 */
export interface BatchResults extends ProcessingResults {
  /** Items whose operation succeeded */
  successItems: string[];
  /** Every item attempted, in order, whatever its outcome */
  attemptedItems: string[];
}

export type RunStatus = 'completed' | 'interrupted' | 'failed';

export interface RunResult {
  status: RunStatus;
  /** Checkpoint used by the run; null when none could be resolved */
  checkpointId: string | null;
  /** Id to pass back to resume; null once the run has completed */
  resumeCheckpointId: string | null;
  /** Results of this invocation only */
  results: BatchResults;
  error?: BulkOpsError;
}

// ============================================================================
// Configuration
// ============================================================================

export const BatchProcessorConfigSchema = z.object({
  /** Stamped into newly created checkpoints */
  environment: z.string().min(1).default('dev'),
  inputFile: z.string().nullable().default(null),
  outputFile: z.string().nullable().default(null),
  connectionFilter: z.string().nullable().default(null),
  dryRun: z.boolean().default(false),
  autoDelete: z.boolean().default(false),
});

export type BatchProcessorConfig = z.infer<typeof BatchProcessorConfigSchema>;
export type BatchProcessorConfigInput = z.input<typeof BatchProcessorConfigSchema>;

export interface RunOptions {
  /** Cooperative shutdown: checked between items and between batches */
  signal?: AbortSignal;
  resumeCheckpointId?: string;
}

/**
 * Batch processing events
 */
export interface BatchProcessingEvents {
  onBatchStart?: (batchNumber: number, items: readonly string[]) => void;
  onBatchComplete?: (batchNumber: number, results: BatchResults) => void;
  onItemComplete?: (item: string, classification: ItemClassification) => void;
  onCheckpointSaved?: (checkpoint: Readonly<Checkpoint>) => void;
}
