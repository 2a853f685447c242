#!/usr/bin/env tsx
/**
 * Bulk User Operations
 *
 * Runs resumable bulk operations against the user-management API. Progress is
 * checkpointed after every batch; Ctrl+C stops after the in-flight call and
 * prints the id to resume from.
 *
 * Usage:
 *   npx tsx scripts/src/bulk-users.ts <command> [options]
 *   # or via npm script:
 *   npm run bulk-users -w @userbatch/scripts -- <command> [options]
 *
 * Commands:
 *   delete <input>               Delete the users listed in <input>
 *   block <input>                Block the users listed in <input>
 *   revoke-grants <input>        Revoke the grants of the users listed in <input>
 *   export-last-login <input>    Export last-login data to CSV
 *   check-unblocked <input>      List the users that are not blocked to CSV
 *   check-domains <input>        Check email domains against allow/block lists
 *   unlink-social-ids <input>    Unlink social identity ids from their users
 *   checkpoint list              List checkpoints
 *   checkpoint details <id>      Show one checkpoint
 *   checkpoint resume <id>       Resume an interrupted or failed operation
 *   checkpoint delete <id>       Delete one checkpoint
 *   checkpoint clean             Delete checkpoints by status or age
 *
 * Environment variables:
 *   - USERBATCH_API_BASE_URL, USERBATCH_API_TOKEN: API access (DEV_ prefixed
 *     variants are read first for --env=dev)
 *   - USERBATCH_CHECKPOINT_DIR: checkpoint directory (default: .checkpoints)
 *   - USERBATCH_BATCH_SIZE: fixed batch size
 *   - USERBATCH_LOG_LEVEL, USERBATCH_LOG_FORMAT: logging
 *
 * Examples:
 *   npm run bulk-users -w @userbatch/scripts -- delete users.txt --env=dev --dry-run
 *   npm run bulk-users -w @userbatch/scripts -- export-last-login emails.txt --output=logins.csv
 *   npm run bulk-users -w @userbatch/scripts -- check-domains emails.txt --blocked-domains=spam.example
 *   npm run bulk-users -w @userbatch/scripts -- checkpoint clean --failed --dry-run
 */

import { Command } from 'commander';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevel,
  Logger,
  isBulkOpsError,
  loadEngineConfig,
  setGlobalLogger,
  type EngineConfig,
} from '@userbatch/lib';
import {
  checkpointDetailsCommand,
  cleanCheckpointsCommand,
  deleteCheckpointCommand,
  listCheckpointsCommand,
} from './commands/checkpoints.js';
import {
  EXIT_FAILED,
  EXIT_INTERRUPTED,
  resumeOperationCommand,
  runOperationCommand,
  type CommandContext,
  type OperationCommand,
} from './commands/operations.js';

const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  logFormat: LogFormatSchema.optional(),
});

// ============================================================================
// Setup
// ============================================================================

function createProcessLogger(engineConfig: EngineConfig, rawOptions: unknown): Logger {
  const options = GlobalOptionsSchema.parse(rawOptions);

  let level: LogLevel = engineConfig.logLevel;
  if (options.verbose) level = LogLevel.DEBUG;
  if (options.quiet) level = LogLevel.ERROR;

  const logger = new Logger({
    level,
    format: options.logFormat ?? engineConfig.logFormat,
    timestamps: true,
    colors: process.stdout.isTTY === true,
    source: 'bulk-users',
  });
  setGlobalLogger(logger);
  return logger;
}

/**
 * Ctrl+C requests a graceful stop; a second Ctrl+C exits immediately
 */
function createShutdownSignal(logger: Logger): AbortSignal {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.warn('Forced exit, progress since the last batch is lost');
      process.exit(EXIT_INTERRUPTED);
    }
    logger.warn(`Received ${signal}, stopping after the current item...`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return controller.signal;
}

function createContext(program: Command): CommandContext {
  const engineConfig = loadEngineConfig();
  const logger = createProcessLogger(engineConfig, program.opts());
  return {
    engineConfig,
    logger,
    signal: createShutdownSignal(logger),
    print: (line) => console.log(line),
  };
}

async function runAction(program: Command, action: (context: CommandContext) => Promise<number>): Promise<void> {
  let context: CommandContext | null = null;
  try {
    context = createContext(program);
    process.exitCode = await action(context);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (context && !isBulkOpsError(error)) {
      context.logger.error('Unexpected error', error);
    }
    console.error(`Error: ${message}`);
    process.exitCode = EXIT_FAILED;
  }
}

// ============================================================================
// Commands
// ============================================================================

const program = new Command();

program
  .name('bulk-users')
  .description('Resumable bulk operations against the user-management API')
  .option('--verbose', 'Show debug logging')
  .option('--quiet', 'Only log errors')
  .option('--log-format <format>', 'Log format: text, json, pretty');

function addOperationCommand(name: OperationCommand, description: string): Command {
  return program
    .command(`${name} <input>`)
    .description(description)
    .option('--env <env>', 'Environment: dev or prod', 'dev')
    .option('--batch-size <n>', 'Items per checkpointed batch (default: scaled to input size)')
    .option('--dry-run', 'Resolve users without changing anything')
    .option('--resume <id>', 'Resume from a checkpoint instead of reading <input>')
    .option('--yes', 'Confirm a destructive operation against prod')
    .action(async (input: string, options: unknown) => {
      await runAction(program, (context) => runOperationCommand(name, input, options, context));
    });
}

addOperationCommand('delete', 'Delete users').option('--revoke-sessions', 'Revoke sessions first');
addOperationCommand('block', 'Block users').option('--revoke-sessions', 'Also revoke sessions');
addOperationCommand('revoke-grants', 'Revoke all grants of users');
addOperationCommand('export-last-login', 'Export last-login data to CSV')
  .option('--output <path>', 'CSV file (default: <input>_last_login.csv)')
  .option('--fields <list>', 'Comma-separated columns');
addOperationCommand('check-unblocked', 'Report the users that are not blocked').option(
  '--output <path>',
  'CSV file (default: <input>_unblocked.csv)'
);
addOperationCommand('check-domains', 'Check email domains against allow and block lists')
  .option('--allowed-domains <list>', 'Comma-separated domains to allow')
  .option('--blocked-domains <list>', 'Comma-separated domains to block')
  .option('--output <path>', 'CSV file (default: <input>_domains.csv)');
addOperationCommand('unlink-social-ids', 'Unlink social identity ids from the users they belong to').option(
  '--no-auto-delete',
  'Keep users whose only identity is the social one'
);

const checkpoint = program.command('checkpoint').description('Manage checkpoints');

checkpoint
  .command('list')
  .description('List checkpoints, newest first')
  .option('--operation-type <type>', 'Filter by operation type')
  .option('--status <status>', 'Filter by status')
  .option('--env <env>', 'Filter by environment')
  .option('--details', 'One line per checkpoint with completion')
  .action(async (options: unknown) => {
    await runAction(program, (context) => listCheckpointsCommand(options, context));
  });

checkpoint
  .command('details <id>')
  .description('Show one checkpoint')
  .action(async (id: string) => {
    await runAction(program, (context) => checkpointDetailsCommand(id, context));
  });

checkpoint
  .command('resume <id>')
  .description('Resume an interrupted or failed operation')
  .action(async (id: string) => {
    await runAction(program, (context) => resumeOperationCommand(id, context));
  });

checkpoint
  .command('delete <id>')
  .description('Delete a checkpoint and its backup')
  .action(async (id: string) => {
    await runAction(program, (context) => deleteCheckpointCommand(id, context));
  });

checkpoint
  .command('clean')
  .description('Delete checkpoints by status or age (default: finished more than 30 days ago)')
  .option('--all', 'Delete every checkpoint')
  .option('--failed', 'Delete failed checkpoints')
  .option('--completed', 'Delete completed checkpoints')
  .option('--days-old <n>', 'Age threshold in days')
  .option('--dry-run', 'Show what would be deleted')
  .action(async (options: unknown) => {
    await runAction(program, (context) => cleanCheckpointsCommand(options, context));
  });

program.parseAsync().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(EXIT_FAILED);
});
