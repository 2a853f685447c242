/**
 * Management API Types
 */

import { z } from 'zod';

/**
 * One linked login of a user. Social providers may report numeric ids.
 */
export const UserIdentitySchema = z.object({
  provider: z.string().min(1),
  user_id: z.union([z.string(), z.number()]).transform(String),
  connection: z.string().min(1),
  isSocial: z.boolean().optional(),
});

/**
 * User record as returned by the management API
 */
export const UserRecordSchema = z.object({
  user_id: z.string().min(1),
  email: z.string().nullable().optional(),
  last_login: z.string().nullable().optional(),
  logins_count: z.number().int().nonnegative().optional(),
  blocked: z.boolean().optional(),
  created_at: z.string().optional(),
  identities: z.array(UserIdentitySchema).optional(),
});

export type UserRecordPayload = z.infer<typeof UserRecordSchema>;

export interface UserIdentity {
  provider: string;
  /** Id within the provider, without the `provider|` prefix */
  userId: string;
  connection: string;
  isSocial: boolean;
}

export interface UserRecord {
  userId: string;
  email: string | null;
  lastLogin: string | null;
  loginsCount: number;
  blocked: boolean;
  createdAt: string | null;
  /** Primary identity first */
  identities: UserIdentity[];
}

export function toUserRecord(payload: UserRecordPayload): UserRecord {
  return {
    userId: payload.user_id,
    email: payload.email ?? null,
    lastLogin: payload.last_login ?? null,
    loginsCount: payload.logins_count ?? 0,
    blocked: payload.blocked ?? false,
    createdAt: payload.created_at ?? null,
    identities: (payload.identities ?? []).map((identity) => ({
      provider: identity.provider,
      userId: identity.user_id,
      connection: identity.connection,
      isSocial: identity.isSocial ?? false,
    })),
  };
}

/**
 * The user-management calls the bulk operations need
 */
export interface UserDirectory {
  /** Ids of every user with this email address */
  findUserIdsByEmail(email: string): Promise<string[]>;
  /** null when the user does not exist */
  getUser(userId: string): Promise<UserRecord | null>;
  /** false when the user does not exist */
  deleteUser(userId: string): Promise<boolean>;
  /** false when the user does not exist */
  blockUser(userId: string): Promise<boolean>;
  revokeSessions(userId: string): Promise<void>;
  revokeGrants(userId: string): Promise<void>;
  /** Users with a linked identity whose provider-side id is `identityId` */
  findUsersByIdentityId(identityId: string): Promise<UserRecord[]>;
  /** false when the user or the identity does not exist */
  unlinkIdentity(userId: string, provider: string, identityId: string): Promise<boolean>;
}

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface ApiRequest {
  method: HttpMethod;
  path: string;
  params?: Record<string, string>;
  body?: unknown;
}
