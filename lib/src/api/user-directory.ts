/**
 * HTTP User Directory
 *
 * UserDirectory backed by the management API.
 */

import { z } from 'zod';
import { ApiRequestError } from '../errors/index.js';
import type { ManagementApiClient } from './client.js';
import { UserRecordSchema, toUserRecord, type UserDirectory, type UserRecord } from './types.js';

const UsersByEmailSchema = z.array(UserRecordSchema.pick({ user_id: true }));
const UserSearchSchema = z.array(UserRecordSchema);

/** Upper bound on users one identity id can be linked to */
const IDENTITY_SEARCH_PAGE_SIZE = '100';

function userPath(userId: string): string {
  return `/api/v2/users/${encodeURIComponent(userId)}`;
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0]?.message ?? 'invalid payload';
    throw new ApiRequestError(`Unexpected response from ${label}: ${issue}`, 200, data);
  }
  return result.data;
}

export class HttpUserDirectory implements UserDirectory {
  constructor(private readonly client: ManagementApiClient) {}

  async findUserIdsByEmail(email: string): Promise<string[]> {
    const data = await this.client.get('/api/v2/users-by-email', { email });
    if (data === null) {
      return [];
    }
    const users = parsePayload(UsersByEmailSchema, data, 'users-by-email');
    return [...new Set(users.map((user) => user.user_id))];
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    const data = await this.client.get(userPath(userId));
    if (data === null) {
      return null;
    }
    return toUserRecord(parsePayload(UserRecordSchema, data, 'users'));
  }

  async deleteUser(userId: string): Promise<boolean> {
    return this.client.delete(userPath(userId));
  }

  async blockUser(userId: string): Promise<boolean> {
    return this.client.patch(userPath(userId), { blocked: true });
  }

  async revokeSessions(userId: string): Promise<void> {
    await this.client.delete(`${userPath(userId)}/sessions`);
  }

  async revokeGrants(userId: string): Promise<void> {
    await this.client.delete('/api/v2/grants', { user_id: userId });
  }

  async findUsersByIdentityId(identityId: string): Promise<UserRecord[]> {
    const data = await this.client.get('/api/v2/users', {
      q: `identities.user_id:"${identityId.replace(/"/g, '\\"')}"`,
      search_engine: 'v3',
      per_page: IDENTITY_SEARCH_PAGE_SIZE,
    });
    if (data === null) {
      return [];
    }
    return parsePayload(UserSearchSchema, data, 'users search').map(toUserRecord);
  }

  async unlinkIdentity(userId: string, provider: string, identityId: string): Promise<boolean> {
    return this.client.delete(
      `${userPath(userId)}/identities/${encodeURIComponent(provider)}/${encodeURIComponent(identityId)}`
    );
  }
}
