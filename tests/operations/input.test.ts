/**
 * Tests for identifier input files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseIdentifierList, readIdentifierFile } from '../../lib/src/operations/index.js';
import { ValidationError } from '../../lib/src/errors/index.js';
import { createTempDir, removeTempDir } from '../helpers.js';

describe('parseIdentifierList', () => {
  it('should trim lines and skip blanks and comments', () => {
    expect(parseIdentifierList('# users to remove\r\n auth0|1 \n\none@example.com\n  # done\n')).toEqual([
      'auth0|1',
      'one@example.com',
    ]);
  });

  it('should keep duplicates for the checkpoint to handle', () => {
    expect(parseIdentifierList('auth0|1\nauth0|1')).toEqual(['auth0|1', 'auth0|1']);
  });
});

describe('readIdentifierFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should read identifiers from a file', async () => {
    const file = join(dir, 'users.txt');
    await writeFile(file, 'auth0|1\nauth0|2\n');

    expect(await readIdentifierFile(file)).toEqual(['auth0|1', 'auth0|2']);
  });

  it('should fail with ValidationError for a missing file', async () => {
    await expect(readIdentifierFile(join(dir, 'missing.txt'))).rejects.toThrow(ValidationError);
  });
});
