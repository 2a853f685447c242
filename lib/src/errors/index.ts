/**
 * Errors Module
 */

export { BulkOpsErrorCode, type BulkOpsErrorInfo } from './types.js';

export {
  BulkOpsError,
  ValidationError,
  TransientApiError,
  ApiRequestError,
  RateLimitExceededError,
  PersistenceError,
  MalformedCheckpointError,
  CheckpointNotFoundError,
  CheckpointNotResumableError,
  ConfigurationError,
  isBulkOpsError,
  isFatalError,
} from './errors.js';
