/**
 * CSV Report Files
 *
 * Operations that report per item append rows to a CSV file. The header is
 * written when the file is new or empty, so a resumed run keeps appending to
 * the same file.
 */

import { appendFile, stat } from 'node:fs/promises';

/**
 * Quote a CSV cell when it contains a delimiter, quote or line break
 */
export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export class CsvReportWriter {
  private headerChecked = false;

  constructor(
    readonly filePath: string,
    readonly columns: readonly string[]
  ) {}

  async appendRow(values: readonly string[]): Promise<void> {
    await this.ensureHeader();
    await appendFile(this.filePath, `${values.map(escapeCsvValue).join(',')}\n`, 'utf-8');
  }

  private async ensureHeader(): Promise<void> {
    if (this.headerChecked) {
      return;
    }

    let size = 0;
    try {
      size = (await stat(this.filePath)).size;
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
    if (size === 0) {
      await appendFile(this.filePath, `${this.columns.join(',')}\n`, 'utf-8');
    }
    this.headerChecked = true;
  }
}
