/**
 * User Action Operation
 *
 * Delete, block or revoke the grants of one user per item. In dry-run mode
 * the user is resolved and looked up but nothing is changed.
 */

import type { UserDirectory } from '../api/index.js';
import type { ItemOperation, ItemOutcome, ItemValidation } from '../batch/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import { resolveUserIdentifier, validateIdentifier } from './identifiers.js';

export type UserActionType = 'batch_delete' | 'batch_block' | 'batch_revoke_grants';

export interface UserActionOptions {
  operationType: UserActionType;
  directory: UserDirectory;
  /** Also revoke sessions when deleting or blocking */
  revokeSessions?: boolean;
  dryRun?: boolean;
  logger?: Logger;
}

const ACTION_NAMES: Record<UserActionType, string> = {
  batch_delete: 'Delete users',
  batch_block: 'Block users',
  batch_revoke_grants: 'Revoke user grants',
};

export class UserActionOperation implements ItemOperation {
  readonly name: string;
  readonly operationType: UserActionType;
  private readonly directory: UserDirectory;
  private readonly revokeSessions: boolean;
  private readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(options: UserActionOptions) {
    this.operationType = options.operationType;
    this.name = ACTION_NAMES[options.operationType];
    this.directory = options.directory;
    this.revokeSessions = options.revokeSessions ?? false;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? getComponentLogger('user-action');
  }

  validate(item: string): ItemValidation {
    return validateIdentifier(item);
  }

  async execute(item: string): Promise<ItemOutcome> {
    const resolution = await resolveUserIdentifier(this.directory, item);
    if (resolution.status === 'unresolved') {
      return resolution.outcome;
    }
    const { userId } = resolution;

    if (this.dryRun) {
      const user = await this.directory.getUser(userId);
      if (!user) {
        return { status: 'not_found', reason: `user ${userId} does not exist` };
      }
      this.logger.info(`[dry run] would apply ${this.operationType}`, { item, userId });
      return { status: 'success' };
    }

    switch (this.operationType) {
      case 'batch_delete': {
        if (this.revokeSessions) {
          await this.directory.revokeSessions(userId);
        }
        const deleted = await this.directory.deleteUser(userId);
        return deleted ? { status: 'success' } : { status: 'not_found', reason: `user ${userId} does not exist` };
      }
      case 'batch_block': {
        const blocked = await this.directory.blockUser(userId);
        if (!blocked) {
          return { status: 'not_found', reason: `user ${userId} does not exist` };
        }
        if (this.revokeSessions) {
          await this.directory.revokeSessions(userId);
        }
        return { status: 'success' };
      }
      case 'batch_revoke_grants':
        await this.directory.revokeGrants(userId);
        return { status: 'success' };
    }
  }
}
