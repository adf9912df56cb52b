/**
 * Deduplicated set of process records
 */

import type { OutputRow, ProcessRecord } from '../types/index.js';

function recordKey(record: ProcessRecord): string {
  return JSON.stringify([record.endpoint, record.username, record.path, record.cmdline]);
}

/**
 * Records are identified by their four fields. Iteration follows first insertion.
 */
export class ResultSet implements Iterable<ProcessRecord> {
  private readonly records = new Map<string, ProcessRecord>();

  constructor(records: Iterable<ProcessRecord> = []) {
    for (const record of records) {
      this.add(record);
    }
  }

  get size(): number {
    return this.records.size;
  }

  add(record: ProcessRecord): void {
    const key = recordKey(record);
    if (!this.records.has(key)) {
      this.records.set(key, record);
    }
  }

  has(record: ProcessRecord): boolean {
    return this.records.has(recordKey(record));
  }

  /**
   * Merge another set into this one; returns this for chaining
   */
  union(other: Iterable<ProcessRecord>): this {
    for (const record of other) {
      this.add(record);
    }
    return this;
  }

  [Symbol.iterator](): Iterator<ProcessRecord> {
    return this.records.values();
  }
}

/**
 * One output row per record, tagged with its program (or indicator) and source
 */
export function toRows(results: Iterable<ProcessRecord>, program: string, source: string): OutputRow[] {
  const rows: OutputRow[] = [];
  for (const r of results) {
    rows.push([r.endpoint, r.username, r.path, r.cmdline, program, source]);
  }
  return rows;
}
