/**
 * Survey CSV writer
 */

import { createWriteStream, type WriteStream } from 'fs';
import { once } from 'events';
import { join } from 'path';
import { OUTPUT_HEADER, type OutputRow } from '../types/index.js';

/**
 * <prefix>-survey.csv, or survey.csv without a prefix
 */
export function outputFilename(prefix?: string, dir?: string): string {
  const name = prefix ? `${prefix}-survey.csv` : 'survey.csv';
  return dir ? join(dir, name) : name;
}

/**
 * Quote a field if it contains a comma, quote, or line break
 */
export function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(csvField).join(',');
}

export class SurveyWriter {
  private rows = 0;
  private closed = false;

  private constructor(
    private readonly stream: WriteStream,
    public readonly path: string
  ) {}

  /**
   * Create (or truncate) the file and write the header line
   */
  static async open(path: string): Promise<SurveyWriter> {
    const stream = createWriteStream(path, { encoding: 'utf-8' });
    await once(stream, 'open');
    const writer = new SurveyWriter(stream, path);
    await writer.writeLine(formatCsvRow(OUTPUT_HEADER));
    return writer;
  }

  /** Data rows written so far (header excluded) */
  get rowCount(): number {
    return this.rows;
  }

  async writeRows(rows: Iterable<OutputRow>): Promise<void> {
    for (const row of rows) {
      await this.writeLine(formatCsvRow(row));
      this.rows++;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.stream.end();
    await once(this.stream, 'finish');
  }

  private async writeLine(line: string): Promise<void> {
    if (this.closed) {
      throw new Error(`Survey output already closed: ${this.path}`);
    }
    if (!this.stream.write(line + '\n')) {
      await once(this.stream, 'drain');
    }
  }
}
