/**
 * Progress Module
 */

export {
  ProgressReporterConfigSchema,
  type ProgressReporterConfig,
  type ProgressReporterOptions,
  type ProgressCounts,
  type ProgressSnapshot,
  createEmptyCounts,
  calculatePercentage,
  estimateRemainingTime,
  calculateItemsPerSecond,
  formatDuration,
  createProgressBar,
  formatProgress,
} from './types.js';

export { ProgressReporter, type ProgressReporterDeps } from './reporter.js';
