/**
 * Shared test fixtures
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AxiosAdapter } from 'axios';
import type { UserDirectory, UserRecord } from '../lib/src/api/index.js';
import { Logger } from '../lib/src/logging/logger.js';
import { LogLevel } from '../lib/src/logging/types.js';

export interface CapturingLogger {
  logger: Logger;
  lines: string[];
}

/**
 * Text-format logger without timestamps that records every line it writes
 */
export function createCapturingLogger(level: LogLevel = LogLevel.TRACE): CapturingLogger {
  const lines: string[] = [];
  const logger = new Logger({
    level,
    format: 'text',
    timestamps: false,
    colors: false,
    output: (line) => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

export function createSilentLogger(): Logger {
  return new Logger({ level: LogLevel.ERROR, output: () => undefined });
}

export async function createTempDir(prefix = 'userbatch-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface FakeResponse {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  data: unknown;
  authorization: unknown;
}

/**
 * In-process axios transport answering from `handler`
 */
export function createFakeTransport(handler: (request: RecordedRequest) => FakeResponse | Error): {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      data: config.data,
      authorization: config.headers.get('Authorization'),
    };
    requests.push(request);

    const answer = handler(request);
    if (answer instanceof Error) {
      throw answer;
    }
    return {
      data: answer.data ?? '',
      status: answer.status,
      statusText: String(answer.status),
      headers: answer.headers ?? {},
      config,
    };
  };
  return { adapter, requests };
}

/**
 * In-memory user directory recording every mutating call. Unlinking an
 * identity leaves it behind as a separate `<provider>|<id>` user, as the
 * management API does.
 */
export class FakeUserDirectory implements UserDirectory {
  readonly users = new Map<string, UserRecord>();
  readonly emails = new Map<string, string[]>();
  readonly calls: string[] = [];

  addUser(userId: string, fields: Partial<Omit<UserRecord, 'userId'>> = {}): this {
    const user: UserRecord = {
      userId,
      email: null,
      lastLogin: null,
      loginsCount: 0,
      blocked: false,
      createdAt: null,
      identities: [],
      ...fields,
    };
    this.users.set(userId, user);
    if (user.email) {
      this.emails.set(user.email, [...(this.emails.get(user.email) ?? []), userId]);
    }
    return this;
  }

  async findUserIdsByEmail(email: string): Promise<string[]> {
    return this.emails.get(email) ?? [];
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    return this.users.get(userId) ?? null;
  }

  async deleteUser(userId: string): Promise<boolean> {
    this.calls.push(`delete ${userId}`);
    return this.users.delete(userId);
  }

  async blockUser(userId: string): Promise<boolean> {
    this.calls.push(`block ${userId}`);
    const user = this.users.get(userId);
    if (!user) {
      return false;
    }
    user.blocked = true;
    return true;
  }

  async revokeSessions(userId: string): Promise<void> {
    this.calls.push(`revoke-sessions ${userId}`);
  }

  async revokeGrants(userId: string): Promise<void> {
    this.calls.push(`revoke-grants ${userId}`);
  }

  async findUsersByIdentityId(identityId: string): Promise<UserRecord[]> {
    return [...this.users.values()].filter((user) =>
      user.identities.some((identity) => identity.userId === identityId)
    );
  }

  async unlinkIdentity(userId: string, provider: string, identityId: string): Promise<boolean> {
    this.calls.push(`unlink ${userId} ${provider}/${identityId}`);
    const user = this.users.get(userId);
    const identity = user?.identities.find(
      (candidate) => candidate.provider === provider && candidate.userId === identityId
    );
    if (!user || !identity) {
      return false;
    }
    user.identities = user.identities.filter((candidate) => candidate !== identity);
    this.addUser(`${provider}|${identityId}`, { identities: [identity] });
    return true;
  }
}
