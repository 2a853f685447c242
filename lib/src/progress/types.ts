/**
 * Progress Types
 *
 * Snapshot shape and formatting helpers for run progress.
 */

import { z } from 'zod';

// =============================================================================
// Configuration
// =============================================================================

export const ProgressReporterConfigSchema = z.object({
  /** Items in the whole operation */
  total: z.number().int().nonnegative(),
  /** Items attempted by earlier runs of a resumed operation */
  alreadyProcessed: z.number().int().nonnegative().default(0),
  /** Log a progress line every time this many percent are crossed */
  logIntervalPercent: z.number().positive().max(100).default(10),
  operationName: z.string().default('Processing'),
});

export type ProgressReporterConfig = z.infer<typeof ProgressReporterConfigSchema>;
export type ProgressReporterOptions = z.input<typeof ProgressReporterConfigSchema>;

// =============================================================================
// Snapshot
// =============================================================================

export interface ProgressCounts {
  success: number;
  skipped: number;
  notFound: number;
  multipleMatches: number;
  invalid: number;
  error: number;
}

export interface ProgressSnapshot {
  current: number;
  total: number;
  percentage: number;
  elapsedMs: number;
  /** Undefined until an item has been attempted in this run */
  estimatedRemainingMs: number | undefined;
  itemsPerSecond: number;
  counts: ProgressCounts;
}

export function createEmptyCounts(): ProgressCounts {
  return { success: 0, skipped: 0, notFound: 0, multipleMatches: 0, invalid: 0, error: 0 };
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Calculate percentage with bounds
 */
export function calculatePercentage(current: number, total: number): number {
  if (total === 0) return 100;
  return Math.min(100, Math.max(0, (current / total) * 100));
}

/**
 * Remaining time from the pace of the items done so far
 */
export function estimateRemainingTime(elapsedMs: number, done: number, remaining: number): number | undefined {
  if (done === 0 || remaining <= 0) return undefined;
  return (elapsedMs / done) * remaining;
}

export function calculateItemsPerSecond(count: number, elapsedMs: number): number {
  if (elapsedMs === 0) return 0;
  return (count / elapsedMs) * 1000;
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  if (ms < 3600000) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(ms / 3600000);
  return `${hours}h ${minutes % 60}m`;
}

export function createProgressBar(percentage: number, width: number = 30): string {
  const filledCount = Math.round((Math.min(100, Math.max(0, percentage)) / 100) * width);
  return `[${'#'.repeat(filledCount)}${'-'.repeat(width - filledCount)}]`;
}

export function formatProgress(snapshot: ProgressSnapshot): string {
  let status = `${snapshot.current}/${snapshot.total} (${snapshot.percentage.toFixed(1)}%)`;

  if (snapshot.estimatedRemainingMs !== undefined) {
    status += ` - ETA: ${formatDuration(snapshot.estimatedRemainingMs)}`;
  }
  if (snapshot.itemsPerSecond > 0) {
    status += ` - ${snapshot.itemsPerSecond.toFixed(2)} items/s`;
  }

  return status;
}
