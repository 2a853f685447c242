/**
 * Processing Results Aggregation
 */

import type { ProcessingResults } from './types.js';

/**
 * Combine two result sets. Counters add, lists concatenate in argument order
 * and ambiguous-match maps are merged with `b` winning on a shared key.
 * Counter totals do not depend on the order batches are merged in.
 */
export function mergeProcessingResults(a: ProcessingResults, b: ProcessingResults): ProcessingResults {
  return {
    processedCount: a.processedCount + b.processedCount,
    skippedCount: a.skippedCount + b.skippedCount,
    errorCount: a.errorCount + b.errorCount,
    notFoundCount: a.notFoundCount + b.notFoundCount,
    multipleMatchesCount: a.multipleMatchesCount + b.multipleMatchesCount,
    notFoundItems: [...a.notFoundItems, ...b.notFoundItems],
    invalidItems: [...a.invalidItems, ...b.invalidItems],
    multipleMatches: { ...a.multipleMatches, ...b.multipleMatches },
    errors: [...a.errors, ...b.errors],
  };
}
