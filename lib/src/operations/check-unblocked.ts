/**
 * Check Unblocked Operation
 *
 * Finds users that are still unblocked and writes one CSV row per such user.
 * Blocked users count as processed but are not written.
 */

import type { UserDirectory } from '../api/index.js';
import type { ItemOperation, ItemOutcome, ItemValidation } from '../batch/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import { CsvReportWriter } from './csv.js';
import { resolveUserIdentifier, validateIdentifier } from './identifiers.js';

export const UNBLOCKED_REPORT_COLUMNS = ['identifier', 'user_id', 'email'] as const;

export interface CheckUnblockedOptions {
  directory: UserDirectory;
  outputFile: string;
  logger?: Logger;
}

export class CheckUnblockedOperation implements ItemOperation {
  readonly name = 'Check unblocked users';
  readonly operationType = 'check_unblocked';
  private readonly directory: UserDirectory;
  private readonly report: CsvReportWriter;
  private readonly logger: Logger;

  constructor(options: CheckUnblockedOptions) {
    this.directory = options.directory;
    this.report = new CsvReportWriter(options.outputFile, UNBLOCKED_REPORT_COLUMNS);
    this.logger = options.logger ?? getComponentLogger('check-unblocked');
  }

  validate(item: string): ItemValidation {
    return validateIdentifier(item);
  }

  async execute(item: string): Promise<ItemOutcome> {
    const resolution = await resolveUserIdentifier(this.directory, item);
    if (resolution.status === 'unresolved') {
      return resolution.outcome;
    }

    const user = await this.directory.getUser(resolution.userId);
    if (!user) {
      return { status: 'not_found', reason: `user ${resolution.userId} does not exist` };
    }
    if (user.blocked) {
      return { status: 'success' };
    }

    this.logger.info('User is not blocked', { item, userId: user.userId });
    await this.report.appendRow([item, user.userId, user.email ?? '']);
    return { status: 'success' };
  }
}
