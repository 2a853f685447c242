/**
 * Export Last Login Operation
 *
 * Looks up each user and appends a CSV row with the configured columns to
 * the output file.
 */

import type { UserDirectory, UserRecord } from '../api/index.js';
import type { ItemOperation, ItemOutcome, ItemValidation } from '../batch/index.js';
import { DEFAULT_EXPORT_FIELDS } from '../checkpoint/index.js';
import { ConfigurationError } from '../errors/index.js';
import { CsvReportWriter } from './csv.js';
import { resolveUserIdentifier, validateIdentifier } from './identifiers.js';

export const EXPORT_FIELDS = [
  'identifier',
  'user_id',
  'email',
  'last_login',
  'logins_count',
  'blocked',
  'created_at',
] as const;

export type ExportField = (typeof EXPORT_FIELDS)[number];

function isExportField(field: string): field is ExportField {
  return EXPORT_FIELDS.some((known) => known === field);
}

export interface ExportLastLoginOptions {
  directory: UserDirectory;
  outputFile: string;
  fields?: readonly string[];
}

function fieldValue(field: ExportField, identifier: string, user: UserRecord): string {
  switch (field) {
    case 'identifier':
      return identifier;
    case 'user_id':
      return user.userId;
    case 'email':
      return user.email ?? '';
    case 'last_login':
      return user.lastLogin ?? '';
    case 'logins_count':
      return String(user.loginsCount);
    case 'blocked':
      return String(user.blocked);
    case 'created_at':
      return user.createdAt ?? '';
  }
}

export class ExportLastLoginOperation implements ItemOperation {
  readonly name = 'Export last login';
  readonly operationType = 'export_last_login';
  readonly fields: readonly ExportField[];
  private readonly directory: UserDirectory;
  private readonly report: CsvReportWriter;

  /**
   * @throws {ConfigurationError} on an unknown column name
   */
  constructor(options: ExportLastLoginOptions) {
    const requested = options.fields ?? DEFAULT_EXPORT_FIELDS;
    const fields: ExportField[] = [];
    for (const field of requested) {
      if (!isExportField(field)) {
        throw new ConfigurationError(
          `Unknown export field "${field}"; expected one of ${EXPORT_FIELDS.join(', ')}`
        );
      }
      fields.push(field);
    }

    this.fields = fields;
    this.directory = options.directory;
    this.report = new CsvReportWriter(options.outputFile, fields);
  }

  validate(item: string): ItemValidation {
    return validateIdentifier(item);
  }

  async execute(item: string): Promise<ItemOutcome> {
    const resolution = await resolveUserIdentifier(this.directory, item);
    if (resolution.status === 'unresolved') {
      return resolution.outcome;
    }

    const user = await this.directory.getUser(resolution.userId);
    if (!user) {
      return { status: 'not_found', reason: `user ${resolution.userId} does not exist` };
    }

    await this.report.appendRow(this.fields.map((field) => fieldValue(field, item, user)));
    return { status: 'success' };
  }
}
