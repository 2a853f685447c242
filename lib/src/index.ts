/**
 * userbatch - Shared Library
 *
 * Resumable, rate-limited bulk operations against a user-management API.
 */

// Logging
export * from './logging/index.js';

// Errors
export * from './errors/index.js';

// Configuration
export * from './config/index.js';

// Rate Limiting
export * from './rate-limit/index.js';

// Checkpoints (Data Model, Persistence, Lifecycle)
export * from './checkpoint/index.js';

// Batch Processing (Resumable Engine)
export * from './batch/index.js';

// Progress Reporting
export * from './progress/index.js';

// Management API
export * from './api/index.js';

// Operations (Per-Item Strategies)
export * from './operations/index.js';
