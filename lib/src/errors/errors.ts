/**
 * Error Classes
 *
 * Every failure the engine knows about is a BulkOpsError subclass. Per-item
 * faults (validation, transient API errors) are recorded against the item and
 * the run continues; fatal ones (persistence, rate-limit exhaustion) abort the
 * run and leave the checkpoint in the Failed state.
 */

import { BulkOpsErrorCode, type BulkOpsErrorInfo } from './types.js';

// =============================================================================
// Base Error Class
// =============================================================================

export class BulkOpsError extends Error {
  readonly info: BulkOpsErrorInfo;

  constructor(info: BulkOpsErrorInfo) {
    super(info.message, info.cause !== undefined ? { cause: info.cause } : undefined);
    this.name = 'BulkOpsError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BulkOpsError);
    }
  }

  get code(): BulkOpsErrorCode {
    return this.info.code;
  }

  get fatal(): boolean {
    return this.info.fatal;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  get details(): Record<string, unknown> | undefined {
    return this.info.details;
  }

  /**
   * Wrap anything thrown into a BulkOpsError, keeping ours untouched
   */
  static fromError(error: unknown): BulkOpsError {
    if (error instanceof BulkOpsError) {
      return error;
    }

    return new BulkOpsError({
      code: BulkOpsErrorCode.UNKNOWN,
      message: error instanceof Error ? error.message : String(error),
      fatal: false,
      retryable: false,
      cause: error,
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * An item identifier failed validation. Recorded as "invalid".
 */
export class ValidationError extends BulkOpsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: BulkOpsErrorCode.VALIDATION,
      message,
      fatal: false,
      retryable: false,
      details,
    });
    this.name = 'ValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}

/**
 * Network failure, timeout or 5xx. The item is recorded as an error and is
 * not retried automatically on resume.
 */
export class TransientApiError extends BulkOpsError {
  constructor(message: string, status?: number, cause?: unknown) {
    super({
      code: BulkOpsErrorCode.TRANSIENT_API,
      message,
      fatal: false,
      retryable: true,
      details: status !== undefined ? { status } : undefined,
      cause,
    });
    this.name = 'TransientApiError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransientApiError);
    }
  }

  get status(): number | undefined {
    const status = this.info.details?.['status'];
    return typeof status === 'number' ? status : undefined;
  }
}

/**
 * The remote API rejected the request (4xx other than 404 and 429).
 */
export class ApiRequestError extends BulkOpsError {
  readonly status: number;

  constructor(message: string, status: number, body?: unknown) {
    super({
      code: BulkOpsErrorCode.API_REQUEST,
      message,
      fatal: false,
      retryable: false,
      details: { status, body },
    });
    this.name = 'ApiRequestError';
    this.status = status;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiRequestError);
    }
  }
}

/**
 * Raised by the rate governor after too many consecutive 429 responses.
 * Aborts the run.
 */
export class RateLimitExceededError extends BulkOpsError {
  readonly consecutive429s: number;

  constructor(consecutive429s: number) {
    super({
      code: BulkOpsErrorCode.RATE_LIMIT_EXCEEDED,
      message:
        `Aborting after ${consecutive429s} consecutive rate limit responses. ` +
        'Wait for the quota window to reset and resume from the checkpoint.',
      fatal: true,
      retryable: false,
      details: { consecutive429s },
    });
    this.name = 'RateLimitExceededError';
    this.consecutive429s = consecutive429s;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RateLimitExceededError);
    }
  }
}

/**
 * A checkpoint could not be written. Aborts the run.
 */
export class PersistenceError extends BulkOpsError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super({
      code: BulkOpsErrorCode.PERSISTENCE,
      message,
      fatal: true,
      retryable: false,
      details: { filePath },
      cause,
    });
    this.name = 'PersistenceError';
    this.filePath = filePath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PersistenceError);
    }
  }
}

export class MalformedCheckpointError extends BulkOpsError {
  readonly issues: string[];

  constructor(source: string, issues: string[], cause?: unknown) {
    super({
      code: BulkOpsErrorCode.MALFORMED_CHECKPOINT,
      message: `Malformed checkpoint ${source}: ${issues.join('; ')}`,
      fatal: false,
      retryable: false,
      details: { source, issues },
      cause,
    });
    this.name = 'MalformedCheckpointError';
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MalformedCheckpointError);
    }
  }
}

export class CheckpointNotFoundError extends BulkOpsError {
  readonly checkpointId: string;

  constructor(checkpointId: string) {
    super({
      code: BulkOpsErrorCode.CHECKPOINT_NOT_FOUND,
      message: `Checkpoint not found: ${checkpointId}`,
      fatal: false,
      retryable: false,
      details: { checkpointId },
    });
    this.name = 'CheckpointNotFoundError';
    this.checkpointId = checkpointId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CheckpointNotFoundError);
    }
  }
}

export class CheckpointNotResumableError extends BulkOpsError {
  readonly checkpointId: string;

  constructor(checkpointId: string, reason: string) {
    super({
      code: BulkOpsErrorCode.CHECKPOINT_NOT_RESUMABLE,
      message: `Checkpoint ${checkpointId} cannot be resumed: ${reason}`,
      fatal: false,
      retryable: false,
      details: { checkpointId, reason },
    });
    this.name = 'CheckpointNotResumableError';
    this.checkpointId = checkpointId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CheckpointNotResumableError);
    }
  }
}

export class ConfigurationError extends BulkOpsError {
  constructor(message: string, variable?: string) {
    super({
      code: BulkOpsErrorCode.CONFIGURATION,
      message,
      fatal: true,
      retryable: false,
      details: variable !== undefined ? { variable } : undefined,
    });
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isBulkOpsError(error: unknown): error is BulkOpsError {
  return error instanceof BulkOpsError;
}

/**
 * Errors that must stop the run rather than be recorded against an item
 */
export function isFatalError(error: unknown): boolean {
  return isBulkOpsError(error) && error.fatal;
}
