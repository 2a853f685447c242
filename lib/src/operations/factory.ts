/**
 * Operation Factory
 *
 * Builds the ItemOperation for an operation type and config, and the user
 * directory it talks to.
 */

import type { AxiosAdapter } from 'axios';
import { HttpUserDirectory, ManagementApiClient, type UserDirectory } from '../api/index.js';
import type { ItemOperation } from '../batch/index.js';
import { isDestructiveOperation, type OperationConfig, type OperationType } from '../checkpoint/index.js';
import type { ApiConfig } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import { createRateGovernor, type RateGovernorDeps, type RateGovernorOptions } from '../rate-limit/index.js';
import { CheckDomainsOperation } from './check-domains.js';
import { CheckUnblockedOperation } from './check-unblocked.js';
import { ExportLastLoginOperation } from './export-last-login.js';
import { SocialUnlinkOperation } from './social-unlink.js';
import { UserActionOperation } from './user-action.js';

function requireOutputFile(config: OperationConfig): string {
  if (!config.outputFile) {
    throw new ConfigurationError(`${config.params.operation} requires an output file`);
  }
  return config.outputFile;
}

/**
 * @throws {ConfigurationError} for a report operation without an output
 * file, or a domain check without domain lists
 */
export function createItemOperation(
  config: OperationConfig,
  directory: UserDirectory,
  logger?: Logger
): ItemOperation {
  const { params } = config;

  switch (params.operation) {
    case 'batch_delete':
    case 'batch_block':
      return new UserActionOperation({
        operationType: params.operation,
        directory,
        revokeSessions: params.revokeSessions,
        dryRun: config.dryRun,
        ...(logger ? { logger } : {}),
      });
    case 'batch_revoke_grants':
      return new UserActionOperation({
        operationType: params.operation,
        directory,
        dryRun: config.dryRun,
        ...(logger ? { logger } : {}),
      });
    case 'export_last_login':
      return new ExportLastLoginOperation({
        directory,
        outputFile: requireOutputFile(config),
        fields: params.fields,
      });
    case 'check_unblocked':
      return new CheckUnblockedOperation({
        directory,
        outputFile: requireOutputFile(config),
        ...(logger ? { logger } : {}),
      });
    case 'check_domains':
      return new CheckDomainsOperation({
        directory,
        outputFile: requireOutputFile(config),
        allowedDomains: params.allowedDomains,
        blockedDomains: params.blockedDomains,
        ...(logger ? { logger } : {}),
      });
    case 'social_unlink':
      return new SocialUnlinkOperation({
        directory,
        autoDelete: config.autoDelete,
        dryRun: config.dryRun,
        ...(logger ? { logger } : {}),
      });
  }
}

export interface UserDirectoryOptions {
  operationType: OperationType;
  rateLimit?: RateGovernorOptions;
  governorDeps?: RateGovernorDeps;
  adapter?: AxiosAdapter;
  logger?: Logger;
}

/**
 * HTTP-backed directory with its own rate governor. Destructive operations
 * get a conservative governor.
 */
export function createUserDirectory(apiConfig: ApiConfig, options: UserDirectoryOptions): UserDirectory {
  const governor = createRateGovernor(
    isDestructiveOperation(options.operationType),
    options.rateLimit,
    options.governorDeps
  );
  const client = new ManagementApiClient(apiConfig, governor, {
    ...(options.logger ? { logger: options.logger } : {}),
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
  return new HttpUserDirectory(client);
}
