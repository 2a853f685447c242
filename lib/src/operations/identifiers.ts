/**
 * Item Identifiers
 *
 * An item is either an email address or a `<provider>|<id>` user id.
 */

import type { UserDirectory } from '../api/index.js';
import type { ItemOutcome, ItemValidation } from '../batch/index.js';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
/** `<provider>|<id>`; the id part may itself contain `|`, `.` or `@` */
const USER_ID_PATTERN = /^[^|\s]+\|\S+$/;

export function isEmail(identifier: string): boolean {
  return EMAIL_PATTERN.test(identifier);
}

export function isUserId(identifier: string): boolean {
  return USER_ID_PATTERN.test(identifier);
}

export function validateIdentifier(identifier: string): ItemValidation {
  if (identifier.trim() === '') {
    return { valid: false, reason: 'empty identifier' };
  }
  if (/\s/.test(identifier)) {
    return { valid: false, reason: 'identifier contains whitespace' };
  }
  if (isEmail(identifier) || isUserId(identifier)) {
    return { valid: true };
  }
  if (identifier.includes('@')) {
    return { valid: false, reason: 'malformed email address' };
  }
  return { valid: false, reason: 'expected an email address or a provider|id user id' };
}

export type IdentifierResolution =
  | { status: 'resolved'; userId: string }
  | { status: 'unresolved'; outcome: Extract<ItemOutcome, { status: 'not_found' | 'multiple_matches' }> };

/**
 * Map an identifier to exactly one user id. Emails are looked up; anything
 * else is taken to be a user id already.
 */
export async function resolveUserIdentifier(
  directory: UserDirectory,
  identifier: string
): Promise<IdentifierResolution> {
  if (!isEmail(identifier)) {
    return { status: 'resolved', userId: identifier };
  }

  const userIds = await directory.findUserIdsByEmail(identifier);
  const [first] = userIds;
  if (first === undefined) {
    return {
      status: 'unresolved',
      outcome: { status: 'not_found', reason: `no user with email ${identifier}` },
    };
  }
  if (userIds.length > 1) {
    return {
      status: 'unresolved',
      outcome: {
        status: 'multiple_matches',
        reason: `${userIds.length} users share email ${identifier}`,
        candidates: userIds,
      },
    };
  }
  return { status: 'resolved', userId: first };
}
