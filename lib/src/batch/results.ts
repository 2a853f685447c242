/**
 * Batch Results Aggregation
 */

import { createEmptyResults, mergeProcessingResults } from '../checkpoint/index.js';
import type { BatchResults } from './types.js';

export function createEmptyBatchResults(): BatchResults {
  return {
    ...createEmptyResults(),
    successItems: [],
    attemptedItems: [],
  };
}

/**
 * Merge two batch aggregates. Counters add, so totals are the same whatever
 * order batches are merged in.
 */
export function mergeBatchResults(a: BatchResults, b: BatchResults): BatchResults {
  return {
    ...mergeProcessingResults(a, b),
    successItems: [...a.successItems, ...b.successItems],
    attemptedItems: [...a.attemptedItems, ...b.attemptedItems],
  };
}

/**
 * processed / (processed + skipped + error), as a percentage
 */
export function calculateSuccessRate(results: BatchResults): number {
  const attempted = results.processedCount + results.skippedCount + results.errorCount;
  return attempted === 0 ? 0 : (results.processedCount / attempted) * 100;
}
