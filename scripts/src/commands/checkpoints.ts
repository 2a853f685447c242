/**
 * Checkpoint maintenance commands: list, details, delete, clean
 */

import { z } from 'zod';
import {
  CheckpointManager,
  CheckpointNotFoundError,
  CheckpointStatusSchema,
  OperationTypeSchema,
  ValidationError,
  formatCheckpointDetails,
  formatCheckpointSummary,
  formatSummaryTable,
  type PruneCriteria,
} from '@userbatch/lib';
import { EXIT_FAILED, EXIT_OK, type CommandContext } from './operations.js';

export const ListOptionsSchema = z.object({
  operationType: OperationTypeSchema.optional(),
  status: CheckpointStatusSchema.optional(),
  env: z.string().optional(),
  details: z.boolean().default(false),
});

export const CleanOptionsSchema = z.object({
  all: z.boolean().default(false),
  failed: z.boolean().default(false),
  completed: z.boolean().default(false),
  daysOld: z.coerce.number().int().positive().optional(),
  dryRun: z.boolean().default(false),
});

function createManager(context: CommandContext): CheckpointManager {
  return new CheckpointManager({
    directory: context.engineConfig.checkpointDir,
    logger: context.logger.child('checkpoints'),
  });
}

export async function listCheckpointsCommand(rawOptions: unknown, context: CommandContext): Promise<number> {
  const options = ListOptionsSchema.parse(rawOptions);
  const summaries = await createManager(context).listSummaries({
    operationType: options.operationType,
    status: options.status,
    environment: options.env,
  });

  if (options.details) {
    for (const summary of summaries) {
      context.print(formatCheckpointSummary(summary));
    }
    if (summaries.length === 0) {
      context.print('No checkpoints found.');
    }
  } else {
    context.print(formatSummaryTable(summaries));
  }
  return EXIT_OK;
}

export async function checkpointDetailsCommand(checkpointId: string, context: CommandContext): Promise<number> {
  const checkpoint = await createManager(context).load(checkpointId);
  if (!checkpoint) {
    throw new CheckpointNotFoundError(checkpointId);
  }
  context.print(formatCheckpointDetails(checkpoint));
  return EXIT_OK;
}

export async function deleteCheckpointCommand(checkpointId: string, context: CommandContext): Promise<number> {
  const deleted = await createManager(context).delete(checkpointId);
  if (!deleted) {
    context.print(`Checkpoint not found: ${checkpointId}`);
    return EXIT_FAILED;
  }
  context.print(`Deleted checkpoint ${checkpointId}`);
  return EXIT_OK;
}

/**
 * Exactly one of --all, --failed, --completed; otherwise prune by age
 * (--days-old, default 30)
 */
export function resolvePruneCriteria(rawOptions: unknown): PruneCriteria {
  const options = CleanOptionsSchema.parse(rawOptions);
  const scopes = [options.all, options.failed, options.completed].filter(Boolean).length;
  if (scopes > 1) {
    throw new ValidationError('Use only one of --all, --failed, --completed');
  }

  if (options.all) return { scope: 'all' };
  if (options.failed) return { scope: 'failed' };
  if (options.completed) return { scope: 'completed' };
  return options.daysOld !== undefined ? { scope: 'older_than', days: options.daysOld } : { scope: 'older_than' };
}

export async function cleanCheckpointsCommand(rawOptions: unknown, context: CommandContext): Promise<number> {
  const criteria = resolvePruneCriteria(rawOptions);
  const { dryRun } = CleanOptionsSchema.parse(rawOptions);
  const result = await createManager(context).prune(criteria, { dryRun });

  if (result.count === 0) {
    context.print('No checkpoints to clean.');
    return EXIT_OK;
  }

  context.print(dryRun ? `Would delete ${result.count} checkpoint(s):` : `Deleted ${result.count} checkpoint(s):`);
  for (const id of result.ids) {
    context.print(`  ${id}`);
  }
  return EXIT_OK;
}
