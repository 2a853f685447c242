/**
 * Tests for the delete, block and revoke-grants operations
 */

import { describe, it, expect } from 'vitest';
import { UserActionOperation, type UserActionType } from '../../lib/src/operations/index.js';
import { FakeUserDirectory, createCapturingLogger, createSilentLogger } from '../helpers.js';

function createOperation(
  operationType: UserActionType,
  options: { revokeSessions?: boolean; dryRun?: boolean } = {}
) {
  const directory = new FakeUserDirectory()
    .addUser('auth0|1', { email: 'one@example.com' })
    .addUser('auth0|2');
  const operation = new UserActionOperation({
    operationType,
    directory,
    logger: createSilentLogger(),
    ...options,
  });
  return { directory, operation };
}

describe('UserActionOperation', () => {
  it('should be named after its action', () => {
    expect(createOperation('batch_delete').operation.name).toBe('Delete users');
    expect(createOperation('batch_block').operation.name).toBe('Block users');
    expect(createOperation('batch_revoke_grants').operation.name).toBe('Revoke user grants');
  });

  it('should validate identifiers', () => {
    const { operation } = createOperation('batch_delete');

    expect(operation.validate('auth0|1')).toEqual({ valid: true });
    expect(operation.validate('not an id')).toEqual({ valid: false, reason: 'identifier contains whitespace' });
  });

  describe('batch_delete', () => {
    it('should delete a user resolved from an email', async () => {
      const { directory, operation } = createOperation('batch_delete');

      expect(await operation.execute('one@example.com')).toEqual({ status: 'success' });
      expect(directory.calls).toEqual(['delete auth0|1']);
      expect(directory.users.has('auth0|1')).toBe(false);
    });

    it('should revoke sessions before deleting when asked', async () => {
      const { directory, operation } = createOperation('batch_delete', { revokeSessions: true });
      await operation.execute('auth0|2');

      expect(directory.calls).toEqual(['revoke-sessions auth0|2', 'delete auth0|2']);
    });

    it('should report a user that does not exist', async () => {
      const { operation } = createOperation('batch_delete');

      expect(await operation.execute('auth0|404')).toEqual({
        status: 'not_found',
        reason: 'user auth0|404 does not exist',
      });
    });

    it('should not call the API for an unknown email', async () => {
      const { directory, operation } = createOperation('batch_delete');

      expect(await operation.execute('ghost@example.com')).toEqual({
        status: 'not_found',
        reason: 'no user with email ghost@example.com',
      });
      expect(directory.calls).toEqual([]);
    });
  });

  describe('batch_block', () => {
    it('should block and then revoke sessions', async () => {
      const { directory, operation } = createOperation('batch_block', { revokeSessions: true });

      expect(await operation.execute('auth0|1')).toEqual({ status: 'success' });
      expect(directory.calls).toEqual(['block auth0|1', 'revoke-sessions auth0|1']);
      expect(directory.users.get('auth0|1')?.blocked).toBe(true);
    });

    it('should not revoke sessions of a missing user', async () => {
      const { directory, operation } = createOperation('batch_block', { revokeSessions: true });

      expect((await operation.execute('auth0|404')).status).toBe('not_found');
      expect(directory.calls).toEqual(['block auth0|404']);
    });
  });

  describe('batch_revoke_grants', () => {
    it('should revoke grants', async () => {
      const { directory, operation } = createOperation('batch_revoke_grants');

      expect(await operation.execute('auth0|2')).toEqual({ status: 'success' });
      expect(directory.calls).toEqual(['revoke-grants auth0|2']);
    });
  });

  describe('dry run', () => {
    it('should look the user up without changing anything', async () => {
      const directory = new FakeUserDirectory().addUser('auth0|1');
      const { logger, lines } = createCapturingLogger();
      const operation = new UserActionOperation({ operationType: 'batch_delete', directory, dryRun: true, logger });

      expect(await operation.execute('auth0|1')).toEqual({ status: 'success' });
      expect(await operation.execute('auth0|2')).toEqual({ status: 'not_found', reason: 'user auth0|2 does not exist' });
      expect(directory.calls).toEqual([]);
      expect(lines).toEqual(['INFO  [dry run] would apply batch_delete {"item":"auth0|1","userId":"auth0|1"}']);
    });
  });
});
