/**
 * Tests for identifier validation and resolution
 */

import { describe, it, expect } from 'vitest';
import {
  isEmail,
  isUserId,
  resolveUserIdentifier,
  validateIdentifier,
} from '../../lib/src/operations/index.js';
import { FakeUserDirectory } from '../helpers.js';

describe('isEmail / isUserId', () => {
  it('should recognise email addresses', () => {
    expect(isEmail('jane.doe+ops@example.co.uk')).toBe(true);
    expect(isEmail('jane@localhost')).toBe(false);
    expect(isEmail('auth0|123')).toBe(false);
  });

  it('should recognise provider|id user ids', () => {
    expect(isUserId('auth0|5f7c8ec7c33c6c004bbafe82')).toBe(true);
    expect(isUserId('google-oauth2|1234')).toBe(true);
    expect(isUserId('auth0|')).toBe(false);
    expect(isUserId('plain-id')).toBe(false);
  });

  it('should accept ids whose id part holds dots, pipes or an address', () => {
    expect(isUserId('auth0|a.b')).toBe(true);
    expect(isUserId('samlp|corp-sso|abc')).toBe(true);
    expect(isUserId('|abc')).toBe(false);
  });
});

describe('validateIdentifier', () => {
  it('should accept emails and user ids', () => {
    expect(validateIdentifier('a@example.com')).toEqual({ valid: true });
    expect(validateIdentifier('auth0|1')).toEqual({ valid: true });
    expect(validateIdentifier('samlp|corp-sso|jane@corp.example.com')).toEqual({ valid: true });
  });

  it('should explain rejections', () => {
    expect(validateIdentifier('   ')).toEqual({ valid: false, reason: 'empty identifier' });
    expect(validateIdentifier('a b@example.com')).toEqual({ valid: false, reason: 'identifier contains whitespace' });
    expect(validateIdentifier('a@b')).toEqual({ valid: false, reason: 'malformed email address' });
    expect(validateIdentifier('12345')).toEqual({
      valid: false,
      reason: 'expected an email address or a provider|id user id',
    });
  });
});

describe('resolveUserIdentifier', () => {
  const directory = new FakeUserDirectory()
    .addUser('auth0|1', { email: 'one@example.com' })
    .addUser('auth0|2', { email: 'shared@example.com' })
    .addUser('google-oauth2|3', { email: 'shared@example.com' });

  it('should pass user ids through without a lookup', async () => {
    expect(await resolveUserIdentifier(directory, 'auth0|999')).toEqual({ status: 'resolved', userId: 'auth0|999' });
    expect(await resolveUserIdentifier(directory, 'samlp|corp-sso|jane@corp.example.com')).toEqual({
      status: 'resolved',
      userId: 'samlp|corp-sso|jane@corp.example.com',
    });
  });

  it('should resolve an email with one match', async () => {
    expect(await resolveUserIdentifier(directory, 'one@example.com')).toEqual({
      status: 'resolved',
      userId: 'auth0|1',
    });
  });

  it('should report an email with no match', async () => {
    expect(await resolveUserIdentifier(directory, 'nobody@example.com')).toEqual({
      status: 'unresolved',
      outcome: { status: 'not_found', reason: 'no user with email nobody@example.com' },
    });
  });

  it('should report an email shared by several users', async () => {
    expect(await resolveUserIdentifier(directory, 'shared@example.com')).toEqual({
      status: 'unresolved',
      outcome: {
        status: 'multiple_matches',
        reason: '2 users share email shared@example.com',
        candidates: ['auth0|2', 'google-oauth2|3'],
      },
    });
  });
});
