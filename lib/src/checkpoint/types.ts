/**
 * Checkpoint Types
 *
 * The durable record of one bulk operation. Documents on disk use snake_case
 * field names and are validated with the `*DocumentSchema` schemas; the
 * engine works on the camelCase model below. `store.ts` converts between
 * the two.
 */

import { z } from 'zod';

// ============================================================================
// Enumerations
// ============================================================================

export const OperationType = {
  EXPORT_LAST_LOGIN: 'export_last_login',
  BATCH_DELETE: 'batch_delete',
  BATCH_BLOCK: 'batch_block',
  BATCH_REVOKE_GRANTS: 'batch_revoke_grants',
  SOCIAL_UNLINK: 'social_unlink',
  CHECK_UNBLOCKED: 'check_unblocked',
  CHECK_DOMAINS: 'check_domains',
} as const;

export type OperationType = (typeof OperationType)[keyof typeof OperationType];

export const OperationTypeSchema = z.enum([
  'export_last_login',
  'batch_delete',
  'batch_block',
  'batch_revoke_grants',
  'social_unlink',
  'check_unblocked',
  'check_domains',
]);

export const CheckpointStatus = {
  ACTIVE: 'active',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type CheckpointStatus = (typeof CheckpointStatus)[keyof typeof CheckpointStatus];

export const CheckpointStatusSchema = z.enum(['active', 'completed', 'failed', 'cancelled']);

/** Version written by this release; only exact matches are resumable */
export const CURRENT_SCHEMA_VERSION = '1.0.0';

/** Assigned to documents written before the version field existed */
export const LEGACY_SCHEMA_VERSION = '0.0.0';

export const DEFAULT_EXPORT_FIELDS = ['user_id', 'email', 'last_login', 'logins_count'] as const;

const OUTPUT_ARTIFACT_OPERATIONS: ReadonlySet<OperationType> = new Set<OperationType>([
  OperationType.EXPORT_LAST_LOGIN,
  OperationType.CHECK_UNBLOCKED,
  OperationType.CHECK_DOMAINS,
]);

const DESTRUCTIVE_OPERATIONS: ReadonlySet<OperationType> = new Set<OperationType>([
  OperationType.BATCH_DELETE,
  OperationType.BATCH_BLOCK,
  OperationType.BATCH_REVOKE_GRANTS,
  OperationType.SOCIAL_UNLINK,
]);

/**
 * Operations that write an output file need `outputFile` set
 */
export function requiresOutputFile(type: OperationType): boolean {
  return OUTPUT_ARTIFACT_OPERATIONS.has(type);
}

export function isDestructiveOperation(type: OperationType): boolean {
  return DESTRUCTIVE_OPERATIONS.has(type);
}

// ============================================================================
// Model
// ============================================================================

/**
 * Operation-specific knobs, one variant per operation type
 */
export type OperationParams =
  | { operation: 'batch_delete' | 'batch_block'; revokeSessions: boolean }
  | { operation: 'export_last_login'; fields: string[] }
  | {
      operation: 'check_domains';
      /** Lower-case; empty allows every domain not blocked */
      allowedDomains: string[];
      blockedDomains: string[];
    }
  | { operation: 'batch_revoke_grants' | 'social_unlink' | 'check_unblocked' };

export type ExtensionValue = string | number | boolean;

export interface OperationConfig {
  environment: string;
  inputFile: string | null;
  outputFile: string | null;
  connectionFilter: string | null;
  dryRun: boolean;
  autoDelete: boolean;
  batchSize: number | null;
  /** Human-readable label, e.g. "Delete users" */
  operationName: string | null;
  params: OperationParams;
  /** Operation-specific data with no dedicated field */
  extensions: Record<string, ExtensionValue>;
}

export interface BatchProgress {
  currentBatch: number;
  totalBatches: number;
  /** Items attempted so far, across all batches */
  currentItem: number;
  totalItems: number;
  batchSize: number;
}

export interface ErrorRecord {
  item: string | null;
  error: string;
  /** ISO-8601 */
  timestamp: string;
  operation: OperationType;
}

export interface ProcessingResults {
  processedCount: number;
  skippedCount: number;
  errorCount: number;
  notFoundCount: number;
  multipleMatchesCount: number;
  notFoundItems: string[];
  invalidItems: string[];
  /** Identifier → candidate ids that matched it */
  multipleMatches: Record<string, string[]>;
  errors: ErrorRecord[];
}

export interface Checkpoint {
  id: string;
  operationType: OperationType;
  status: CheckpointStatus;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601 */
  updatedAt: string;
  config: OperationConfig;
  progress: BatchProgress;
  results: ProcessingResults;
  /** Not yet attempted, in input order */
  remainingItems: string[];
  /** Attempted, in attempt order; append-only */
  processedItems: string[];
  version: string;
}

export interface CheckpointFilters {
  operationType?: OperationType | undefined;
  status?: CheckpointStatus | undefined;
  environment?: string | undefined;
}

export interface CheckpointSummary {
  id: string;
  operationType: OperationType;
  status: CheckpointStatus;
  createdAt: string;
  updatedAt: string;
  completionPercentage: number;
  successRate: number;
  totalItems: number;
  processedItems: number;
  remainingItems: number;
  environment: string;
  inputFile: string | null;
  outputFile: string | null;
  isResumable: boolean;
}

// ============================================================================
// Document Schemas (on-disk representation)
// ============================================================================

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO timestamp' });

const counter = z.number().int().nonnegative().default(0);

export const OperationParamsDocumentSchema = z.discriminatedUnion('operation', [
  z.object({
    operation: z.enum(['batch_delete', 'batch_block']),
    revoke_sessions: z.boolean().default(false),
  }),
  z.object({
    operation: z.literal('export_last_login'),
    fields: z.array(z.string()).min(1).default([...DEFAULT_EXPORT_FIELDS]),
  }),
  z.object({
    operation: z.literal('check_domains'),
    allowed_domains: z.array(z.string()).default([]),
    blocked_domains: z.array(z.string()).default([]),
  }),
  z.object({
    operation: z.enum(['batch_revoke_grants', 'social_unlink', 'check_unblocked']),
  }),
]);

export const OperationConfigDocumentSchema = z.object({
  environment: z.string().min(1).default('dev'),
  input_file: z.string().nullable().default(null),
  output_file: z.string().nullable().default(null),
  connection_filter: z.string().nullable().default(null),
  dry_run: z.boolean().default(false),
  auto_delete: z.boolean().default(false),
  batch_size: z.number().int().positive().nullable().default(null),
  operation_name: z.string().nullable().default(null),
  /** Absent in documents that predate per-operation params */
  params: OperationParamsDocumentSchema.optional(),
  extensions: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
});

export const BatchProgressDocumentSchema = z.object({
  current_batch: counter,
  total_batches: counter,
  current_item: counter,
  total_items: counter,
  batch_size: z.number().int().positive().default(50),
});

export const ErrorRecordDocumentSchema = z.object({
  item: z.string().nullable().default(null),
  error: z.string(),
  timestamp: isoTimestamp,
  operation: OperationTypeSchema,
});

export const ProcessingResultsDocumentSchema = z.object({
  processed_count: counter,
  skipped_count: counter,
  error_count: counter,
  not_found_count: counter,
  multiple_matches_count: counter,
  not_found_items: z.array(z.string()).default([]),
  invalid_items: z.array(z.string()).default([]),
  multiple_matches: z.record(z.array(z.string())).default({}),
  errors: z.array(ErrorRecordDocumentSchema).default([]),
});

export const CheckpointDocumentSchema = z.object({
  id: z.string().default(''),
  operation_type: OperationTypeSchema,
  status: CheckpointStatusSchema.default('active'),
  created_at: isoTimestamp,
  updated_at: isoTimestamp,
  config: OperationConfigDocumentSchema.default({}),
  progress: BatchProgressDocumentSchema.default({}),
  results: ProcessingResultsDocumentSchema.default({}),
  remaining_items: z.array(z.string()).default([]),
  processed_items: z.array(z.string()).default([]),
  version: z.string().default(LEGACY_SCHEMA_VERSION),
});

export type CheckpointDocument = z.infer<typeof CheckpointDocumentSchema>;
export type OperationConfigDocument = z.infer<typeof OperationConfigDocumentSchema>;
export type OperationParamsDocument = z.infer<typeof OperationParamsDocumentSchema>;
export type ProcessingResultsDocument = z.infer<typeof ProcessingResultsDocumentSchema>;

// ============================================================================
// Factories
// ============================================================================

export function createEmptyResults(): ProcessingResults {
  return {
    processedCount: 0,
    skippedCount: 0,
    errorCount: 0,
    notFoundCount: 0,
    multipleMatchesCount: 0,
    notFoundItems: [],
    invalidItems: [],
    multipleMatches: {},
    errors: [],
  };
}

export function createDefaultParams(type: OperationType): OperationParams {
  switch (type) {
    case 'batch_delete':
    case 'batch_block':
      return { operation: type, revokeSessions: false };
    case 'export_last_login':
      return { operation: type, fields: [...DEFAULT_EXPORT_FIELDS] };
    case 'check_domains':
      return { operation: type, allowedDomains: [], blockedDomains: [] };
    case 'batch_revoke_grants':
    case 'social_unlink':
    case 'check_unblocked':
      return { operation: type };
  }
}

/**
 * Operation config with defaults for everything but the environment and params
 */
export function createOperationConfig(
  params: OperationParams,
  overrides: Partial<Omit<OperationConfig, 'params'>> = {}
): OperationConfig {
  return {
    environment: 'dev',
    inputFile: null,
    outputFile: null,
    connectionFilter: null,
    dryRun: false,
    autoDelete: false,
    batchSize: null,
    operationName: null,
    extensions: {},
    ...overrides,
    params,
  };
}
