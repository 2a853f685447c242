/**
 * Social Unlink Operation
 *
 * Each item is the provider-side id of a social identity. For every user
 * the identity is linked to:
 *
 * - it is the user's only identity: the user is deleted when auto-delete is
 *   on, otherwise left alone
 * - the user also has an `auth0` database login: left alone
 * - otherwise the identity is unlinked, and the user deleted once no
 *   identity is left
 *
 * Unlinking leaves the identity behind as a user of its own; such detached
 * users are deleted afterwards.
 */

import type { UserDirectory, UserIdentity, UserRecord } from '../api/index.js';
import type { ItemOperation, ItemOutcome, ItemValidation } from '../batch/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';

export type SocialUserAction = 'delete' | 'unlink' | 'protected';

export interface SocialUserPlan {
  user: UserRecord;
  identity: UserIdentity;
  action: SocialUserAction;
}

export interface SocialUnlinkOptions {
  directory: UserDirectory;
  /** Delete users whose only identity is the social one */
  autoDelete?: boolean;
  dryRun?: boolean;
  logger?: Logger;
}

function hasDatabaseLogin(user: UserRecord): boolean {
  return user.identities.some((identity) => identity.provider === 'auth0' && !identity.isSocial);
}

/**
 * What to do with one user; null when the identity is not linked to it
 */
export function planSocialUserAction(
  user: UserRecord,
  identityId: string,
  autoDelete: boolean
): SocialUserPlan | null {
  const identity = user.identities.find((candidate) => candidate.userId === identityId);
  if (!identity) {
    return null;
  }
  if (user.identities.length === 1) {
    return { user, identity, action: autoDelete ? 'delete' : 'protected' };
  }
  if (hasDatabaseLogin(user)) {
    return { user, identity, action: 'protected' };
  }
  return { user, identity, action: 'unlink' };
}

export class SocialUnlinkOperation implements ItemOperation {
  readonly name = 'Unlink social identities';
  readonly operationType = 'social_unlink';
  private readonly directory: UserDirectory;
  private readonly autoDelete: boolean;
  private readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(options: SocialUnlinkOptions) {
    this.directory = options.directory;
    this.autoDelete = options.autoDelete ?? true;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? getComponentLogger('social-unlink');
  }

  validate(item: string): ItemValidation {
    if (item.trim() === '') {
      return { valid: false, reason: 'empty identifier' };
    }
    if (/\s/.test(item)) {
      return { valid: false, reason: 'identifier contains whitespace' };
    }
    if (item.includes('|')) {
      return { valid: false, reason: 'expected a social identity id without the provider| prefix' };
    }
    return { valid: true };
  }

  async execute(item: string): Promise<ItemOutcome> {
    const plans = (await this.directory.findUsersByIdentityId(item)).flatMap((user) => {
      const plan = planSocialUserAction(user, item, this.autoDelete);
      return plan ? [plan] : [];
    });

    if (plans.length === 0) {
      return { status: 'not_found', reason: `no user is linked to identity ${item}` };
    }
    if (plans.every((plan) => plan.action === 'protected')) {
      return { status: 'skipped', reason: `identity ${item} only belongs to protected users` };
    }

    if (this.dryRun) {
      for (const plan of plans) {
        this.logger.info(`[dry run] would ${plan.action === 'protected' ? 'keep' : plan.action} user`, {
          item,
          userId: plan.user.userId,
        });
      }
      return { status: 'success' };
    }

    const handled = new Set<string>();
    const unlinkedConnections = new Set<string>();

    for (const plan of plans) {
      const { user, identity } = plan;
      handled.add(user.userId);

      switch (plan.action) {
        case 'protected':
          this.logger.info('Keeping protected user', { item, userId: user.userId });
          break;
        case 'delete':
          await this.directory.deleteUser(user.userId);
          this.logger.info('Deleted user', { item, userId: user.userId });
          break;
        case 'unlink': {
          const unlinked = await this.directory.unlinkIdentity(user.userId, identity.provider, identity.userId);
          if (!unlinked) {
            this.logger.warn('Identity was already unlinked', { item, userId: user.userId });
            break;
          }
          unlinkedConnections.add(identity.connection);
          this.logger.info('Unlinked identity', { item, userId: user.userId, provider: identity.provider });

          const remaining = await this.directory.getUser(user.userId);
          if (remaining && remaining.identities.length === 0) {
            await this.directory.deleteUser(user.userId);
            this.logger.info('Deleted user with no identities left', { item, userId: user.userId });
          }
          break;
        }
      }
    }

    if (unlinkedConnections.size > 0) {
      await this.deleteDetachedUsers(item, unlinkedConnections, handled);
    }
    return { status: 'success' };
  }

  /**
   * Delete users whose primary identity is the one just unlinked
   */
  private async deleteDetachedUsers(
    identityId: string,
    connections: ReadonlySet<string>,
    handled: ReadonlySet<string>
  ): Promise<void> {
    const detached = (await this.directory.findUsersByIdentityId(identityId)).filter((user) => {
      const [primary] = user.identities;
      return (
        !handled.has(user.userId) &&
        primary !== undefined &&
        primary.userId === identityId &&
        connections.has(primary.connection)
      );
    });

    for (const user of detached) {
      await this.directory.deleteUser(user.userId);
      this.logger.info('Deleted detached social user', { item: identityId, userId: user.userId });
    }
  }
}
