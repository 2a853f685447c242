/**
 * Identifier Input
 *
 * Input files hold one identifier per line. Blank lines and lines starting
 * with `#` are ignored.
 */

import { readFile } from 'node:fs/promises';
import { ValidationError } from '../errors/index.js';

export function parseIdentifierList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * @throws {ValidationError} when the file cannot be read
 */
export async function readIdentifierFile(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ValidationError(
      `Cannot read input file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }
  return parseIdentifierList(content);
}
