/**
 * Search backend contract
 */

import type { Dialect, ProcessRecord } from '../types/index.js';

/**
 * A process search endpoint. Implementations map their own field names to
 * ProcessRecord; callers never look at which backend they hold.
 */
export interface ProcessSearchBackend {
  readonly dialect: Dialect;

  /**
   * Lazily yield records matching `query`, paging internally.
   * Stops without error once `signal` is aborted.
   */
  select(query: string, signal?: AbortSignal): AsyncIterable<ProcessRecord>;

  /**
   * Translate a query written in the on-prem dialect into this backend's dialect.
   * Absent on backends that already speak the on-prem dialect.
   */
  translate?(query: string, signal?: AbortSignal): Promise<string>;
}

export class QueryTranslationError extends Error {
  constructor(
    message: string,
    public readonly query: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'QueryTranslationError';
  }
}
