/**
 * On-premises (Response) process search
 *
 * GET /api/v1/process?q=<query>&start=<n>&rows=<n>
 * Records carry hostname, username, path and cmdline as plain fields.
 */

import type { ProcessRecord } from '../types/index.js';
import type { ProcessSearchBackend } from './types.js';
import { BackendError, HttpClient, isRecord } from './http.js';

export const RESPONSE_PAGE_SIZE = 100;

export interface ResponseBackendOptions {
  pageSize?: number;
}

interface ResponsePage {
  results: Record<string, unknown>[];
  totalResults: number;
}

function parsePage(data: unknown): ResponsePage {
  if (!isRecord(data) || !Array.isArray(data.results)) {
    throw new BackendError('Unexpected process search response: missing results', 'PARSE');
  }
  const results = data.results.filter(isRecord);
  const totalResults = typeof data.total_results === 'number' ? data.total_results : results.length;
  return { results, totalResults };
}

function text(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  return value === undefined || value === null ? '' : String(value);
}

export function normalizeResponseRecord(raw: Record<string, unknown>): ProcessRecord {
  return {
    endpoint: text(raw, 'hostname').toLowerCase(),
    username: text(raw, 'username').toLowerCase(),
    path: text(raw, 'path'),
    cmdline: text(raw, 'cmdline'),
  };
}

export class ResponseBackend implements ProcessSearchBackend {
  readonly dialect = 'response' as const;
  private readonly pageSize: number;

  constructor(private readonly http: HttpClient, options: ResponseBackendOptions = {}) {
    this.pageSize = options.pageSize ?? RESPONSE_PAGE_SIZE;
  }

  async *select(query: string, signal?: AbortSignal): AsyncGenerator<ProcessRecord> {
    let start = 0;

    while (!signal?.aborted) {
      const params = new URLSearchParams({
        q: query,
        start: String(start),
        rows: String(this.pageSize),
      });
      const page = parsePage(await this.http.getJson(`/api/v1/process?${params}`, signal));

      for (const raw of page.results) {
        if (signal?.aborted) return;
        yield normalizeResponseRecord(raw);
      }

      start += page.results.length;
      if (page.results.length === 0 || start >= page.totalResults) return;
    }
  }
}
