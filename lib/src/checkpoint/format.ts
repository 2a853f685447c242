/**
 * Checkpoint Formatting
 *
 * Plain-text renderings used by the command-line front end.
 */

import { getCheckpointSummary } from './store.js';
import type { Checkpoint, CheckpointSummary } from './types.js';

function percent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * One line per checkpoint: id, status, progress
 */
export function formatCheckpointSummary(summary: CheckpointSummary): string {
  const resumable = summary.isResumable ? ' (resumable)' : '';
  return (
    `${summary.id}  ${summary.status}${resumable}  ` +
    `${summary.processedItems}/${summary.totalItems} items (${percent(summary.completionPercentage)})`
  );
}

export function formatSummaryTable(summaries: readonly CheckpointSummary[]): string {
  if (summaries.length === 0) {
    return 'No checkpoints found.';
  }

  const header = ['ID', 'TYPE', 'STATUS', 'PROGRESS', 'CREATED'];
  const rows = summaries.map((summary) => [
    summary.id,
    summary.operationType,
    summary.isResumable ? `${summary.status}*` : summary.status,
    `${summary.processedItems}/${summary.totalItems}`,
    summary.createdAt,
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join('  ')
      .trimEnd();

  return [render(header), ...rows.map(render), '', '* resumable'].join('\n');
}

export function formatCheckpointDetails(checkpoint: Checkpoint): string {
  const summary = getCheckpointSummary(checkpoint);
  const { config, progress, results } = checkpoint;

  const lines = [
    `Checkpoint: ${checkpoint.id}`,
    `Operation: ${config.operationName ?? checkpoint.operationType} (${checkpoint.operationType})`,
    `Status: ${checkpoint.status}${summary.isResumable ? ' (resumable)' : ''}`,
    `Environment: ${config.environment}`,
    `Created: ${checkpoint.createdAt}`,
    `Updated: ${checkpoint.updatedAt}`,
    `Version: ${checkpoint.version}`,
  ];
  if (config.inputFile) {
    lines.push(`Input file: ${config.inputFile}`);
  }
  if (config.outputFile) {
    lines.push(`Output file: ${config.outputFile}`);
  }
  if (config.dryRun) {
    lines.push('Dry run: yes');
  }

  lines.push(
    '',
    'Progress:',
    `  Batch: ${progress.currentBatch}/${progress.totalBatches} (size ${progress.batchSize})`,
    `  Items: ${progress.currentItem}/${progress.totalItems} (${percent(summary.completionPercentage)})`,
    `  Remaining: ${checkpoint.remainingItems.length}`,
    '',
    'Results:',
    `  Processed: ${results.processedCount}`,
    `  Skipped: ${results.skippedCount}`,
    `  Errors: ${results.errorCount}`,
    `  Not found: ${results.notFoundCount}`,
    `  Multiple matches: ${results.multipleMatchesCount}`,
    `  Success rate: ${percent(summary.successRate)}`
  );

  const lastError = results.errors[results.errors.length - 1];
  if (lastError) {
    lines.push('', `Last error: ${lastError.error}${lastError.item ? ` (${lastError.item})` : ''}`);
  }

  return lines.join('\n');
}
