/**
 * Bulk operation commands: the destructive user actions, the CSV reports,
 * social identity unlinking and resuming any of them from a checkpoint.
 */

import { basename, dirname, extname, join } from 'node:path';
import { z } from 'zod';
import {
  BatchProcessor,
  CheckpointManager,
  CheckpointNotFoundError,
  ConfigurationError,
  EnvironmentSchema,
  ProgressReporter,
  ValidationError,
  createDefaultParams,
  createItemOperation,
  createUserDirectory,
  getOptimalBatchSize,
  getRateGovernorOptions,
  isDestructiveOperation,
  normalizeDomains,
  readIdentifierFile,
  requiresOutputFile,
  resolveApiConfig,
  type EngineConfig,
  type Environment,
  type Logger,
  type OperationConfig,
  type OperationParams,
  type OperationType,
  type RunResult,
  type UserDirectory,
} from '@userbatch/lib';

export const COMMAND_OPERATIONS = {
  delete: 'batch_delete',
  block: 'batch_block',
  'revoke-grants': 'batch_revoke_grants',
  'export-last-login': 'export_last_login',
  'check-unblocked': 'check_unblocked',
  'check-domains': 'check_domains',
  'unlink-social-ids': 'social_unlink',
} as const satisfies Record<string, OperationType>;

export type OperationCommand = keyof typeof COMMAND_OPERATIONS;

export const OperationCommandOptionsSchema = z.object({
  env: EnvironmentSchema.default('dev'),
  batchSize: z.coerce.number().int().positive().optional(),
  dryRun: z.boolean().default(false),
  output: z.string().optional(),
  fields: z.string().optional(),
  revokeSessions: z.boolean().default(false),
  allowedDomains: z.string().optional(),
  blockedDomains: z.string().optional(),
  autoDelete: z.boolean().default(true),
  resume: z.string().optional(),
  yes: z.boolean().default(false),
});

export type OperationCommandOptions = z.infer<typeof OperationCommandOptionsSchema>;

export type DirectoryFactory = (operationType: OperationType, environment: Environment) => UserDirectory;

export interface CommandContext {
  engineConfig: EngineConfig;
  logger: Logger;
  signal: AbortSignal;
  print: (line: string) => void;
  /** Builds the user directory; defaults to the HTTP-backed one */
  createDirectory?: DirectoryFactory;
  env?: Record<string, string | undefined>;
}

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 130;

function defaultDirectoryFactory(context: CommandContext): DirectoryFactory {
  return (operationType, environment) =>
    createUserDirectory(resolveApiConfig(environment, context.env ?? process.env), {
      operationType,
      rateLimit: getRateGovernorOptions(context.engineConfig),
      logger: context.logger.child('api'),
    });
}

const OUTPUT_SUFFIXES: Partial<Record<OperationType, string>> = {
  export_last_login: '_last_login.csv',
  check_unblocked: '_unblocked.csv',
  check_domains: '_domains.csv',
};

function defaultOutputFile(inputFile: string, operationType: OperationType): string {
  const suffix = OUTPUT_SUFFIXES[operationType] ?? '_report.csv';
  return join(dirname(inputFile), `${basename(inputFile, extname(inputFile))}${suffix}`);
}

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

function buildParams(operationType: OperationType, options: OperationCommandOptions): OperationParams {
  const params = createDefaultParams(operationType);
  switch (params.operation) {
    case 'batch_delete':
    case 'batch_block':
      return { ...params, revokeSessions: options.revokeSessions };
    case 'export_last_login':
      if (options.fields) {
        return { ...params, fields: splitList(options.fields) };
      }
      return params;
    case 'check_domains':
      return {
        ...params,
        allowedDomains: normalizeDomains(splitList(options.allowedDomains)),
        blockedDomains: normalizeDomains(splitList(options.blockedDomains)),
      };
    default:
      return params;
  }
}

export function reportRunResult(result: RunResult, print: (line: string) => void): number {
  const { results } = result;
  print('');
  print(`Status: ${result.status}`);
  print(`  Processed: ${results.processedCount}`);
  print(`  Skipped: ${results.skippedCount} (invalid: ${results.invalidItems.length})`);
  print(`  Not found: ${results.notFoundCount}`);
  print(`  Multiple matches: ${results.multipleMatchesCount}`);
  print(`  Errors: ${results.errorCount}`);

  if (result.error) {
    print(`Error: ${result.error.message}`);
  }
  if (result.resumeCheckpointId) {
    print(`Resume with: checkpoint resume ${result.resumeCheckpointId}`);
  }

  switch (result.status) {
    case 'completed':
      return EXIT_OK;
    case 'interrupted':
      return EXIT_INTERRUPTED;
    case 'failed':
      return EXIT_FAILED;
  }
}

async function execute(
  config: OperationConfig,
  environment: Environment,
  context: CommandContext,
  run: (processor: BatchProcessor) => Promise<RunResult>,
  progress: { total: number; alreadyProcessed: number }
): Promise<number> {
  const operationType = config.params.operation;
  const directory = (context.createDirectory ?? defaultDirectoryFactory(context))(operationType, environment);
  const operation = createItemOperation(config, directory, context.logger.child('operation'));
  const reporter = new ProgressReporter(
    { ...progress, operationName: operation.name },
    { logger: context.logger.child('progress') }
  );

  const processor = new BatchProcessor({
    operation,
    checkpointManager: new CheckpointManager({
      directory: context.engineConfig.checkpointDir,
      logger: context.logger.child('checkpoints'),
    }),
    config: {
      environment,
      inputFile: config.inputFile,
      outputFile: config.outputFile,
      connectionFilter: config.connectionFilter,
      dryRun: config.dryRun,
      autoDelete: config.autoDelete,
    },
    params: config.params,
    extensions: config.extensions,
    events: reporter.toEvents(),
    logger: context.logger.child('processor'),
  });

  const result = await run(processor);
  return reportRunResult(result, context.print);
}

/**
 * Start a new bulk operation over the identifiers in `inputFile`, or resume
 * one when `--resume` is given
 */
export async function runOperationCommand(
  command: OperationCommand,
  inputFile: string,
  rawOptions: unknown,
  context: CommandContext
): Promise<number> {
  const options = OperationCommandOptionsSchema.parse(rawOptions);
  const operationType = COMMAND_OPERATIONS[command];

  if (options.resume) {
    return resumeOperationCommand(options.resume, context, operationType);
  }

  if (
    options.env === 'prod' &&
    isDestructiveOperation(operationType) &&
    !options.dryRun &&
    !options.yes
  ) {
    throw new ValidationError(`Refusing to run ${command} against prod without --yes`);
  }

  const items = await readIdentifierFile(inputFile);
  const batchSize = options.batchSize ?? context.engineConfig.batchSize ?? getOptimalBatchSize(items.length);
  const outputFile = requiresOutputFile(operationType)
    ? (options.output ?? defaultOutputFile(inputFile, operationType))
    : null;
  const uniqueItems = new Set(items).size;

  const config: OperationConfig = {
    environment: options.env,
    inputFile,
    outputFile,
    connectionFilter: null,
    dryRun: options.dryRun,
    autoDelete: operationType === 'social_unlink' && options.autoDelete,
    batchSize,
    operationName: null,
    params: buildParams(operationType, options),
    extensions: {},
  };

  context.print(
    `${command}: ${items.length} identifiers from ${inputFile} (batch size ${batchSize}, env ${options.env}` +
      `${options.dryRun ? ', dry run' : ''})`
  );

  return execute(
    config,
    options.env,
    context,
    (processor) => processor.run(items, batchSize, { signal: context.signal }),
    { total: uniqueItems, alreadyProcessed: 0 }
  );
}

/**
 * Resume a stored checkpoint with the operation it was created for
 *
 * @param expected - when given, the checkpoint must be of this type
 */
export async function resumeOperationCommand(
  checkpointId: string,
  context: CommandContext,
  expected?: OperationType
): Promise<number> {
  const manager = new CheckpointManager({
    directory: context.engineConfig.checkpointDir,
    logger: context.logger.child('checkpoints'),
  });
  const checkpoint = await manager.load(checkpointId);
  if (!checkpoint) {
    throw new CheckpointNotFoundError(checkpointId);
  }
  if (expected !== undefined && checkpoint.operationType !== expected) {
    throw new ValidationError(
      `Checkpoint ${checkpointId} is for ${checkpoint.operationType}, not ${expected}`
    );
  }

  const environment = EnvironmentSchema.safeParse(checkpoint.config.environment);
  if (!environment.success) {
    throw new ConfigurationError(`Checkpoint environment "${checkpoint.config.environment}" is not supported`);
  }

  context.print(
    `Resuming ${checkpoint.id}: ${checkpoint.remainingItems.length} of ${checkpoint.progress.totalItems} items remaining`
  );

  return execute(
    checkpoint.config,
    environment.data,
    context,
    (processor) => processor.resume(checkpointId, { signal: context.signal }),
    { total: checkpoint.progress.totalItems, alreadyProcessed: checkpoint.processedItems.length }
  );
}
