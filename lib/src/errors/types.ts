/**
 * Error Types
 *
 * Codes and structured payload shared by every error the engine raises.
 */

export const BulkOpsErrorCode = {
  /** An item failed pre-validation; the operation was never invoked */
  VALIDATION: 'VALIDATION',
  /** Network failure or 5xx from the remote API */
  TRANSIENT_API: 'TRANSIENT_API',
  /** Non-retryable 4xx from the remote API */
  API_REQUEST: 'API_REQUEST',
  /** Too many consecutive 429 responses */
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  /** Checkpoint could not be written */
  PERSISTENCE: 'PERSISTENCE',
  MALFORMED_CHECKPOINT: 'MALFORMED_CHECKPOINT',
  CHECKPOINT_NOT_FOUND: 'CHECKPOINT_NOT_FOUND',
  CHECKPOINT_NOT_RESUMABLE: 'CHECKPOINT_NOT_RESUMABLE',
  CONFIGURATION: 'CONFIGURATION',
  UNKNOWN: 'UNKNOWN',
} as const;

export type BulkOpsErrorCode = (typeof BulkOpsErrorCode)[keyof typeof BulkOpsErrorCode];

export interface BulkOpsErrorInfo {
  code: BulkOpsErrorCode;
  message: string;
  /**
   * Fatal errors abort the whole run instead of being recorded against one item
   */
  fatal: boolean;
  /** Whether repeating the same call could succeed */
  retryable: boolean;
  details?: Record<string, unknown> | undefined;
  cause?: unknown;
}
