/**
 * Cloud process search
 *
 * Searches run as asynchronous jobs:
 *   POST /api/investigate/v2/orgs/<org>/processes/search_jobs        → { job_id }
 *   GET  …/search_jobs/<job>/results?start=0&rows=0                   until contacted == completed
 *   GET  …/search_jobs/<job>/results?start=<n>&rows=<n>               pages of records
 *
 * Record fields may be missing or multi-valued; a missing field reads as "None".
 */

import type { ProcessRecord } from '../types/index.js';
import { QueryTranslationError, type ProcessSearchBackend } from './types.js';
import { BackendError, HttpClient, isRecord, sleep } from './http.js';

export const CLOUD_PAGE_SIZE = 500;
export const CLOUD_POLL_INTERVAL_MS = 1000;
export const CLOUD_JOB_TIMEOUT_MS = 5 * 60 * 1000;

/** Placeholder for a field the record does not carry */
export const MISSING_FIELD = 'None';

export interface CloudBackendOptions {
  orgKey: string;
  pageSize?: number;
  pollIntervalMs?: number;
  jobTimeoutMs?: number;
}

interface JobStatus {
  contacted: number;
  completed: number;
  numAvailable: number;
}

interface CloudPage {
  results: Record<string, unknown>[];
  numAvailable: number;
}

function count(data: Record<string, unknown>, field: string): number {
  const value = data[field];
  return typeof value === 'number' ? value : 0;
}

function parseResults(data: unknown): CloudPage {
  if (!isRecord(data)) {
    throw new BackendError('Unexpected search job response', 'PARSE');
  }
  const results = Array.isArray(data.results) ? data.results.filter(isRecord) : [];
  return { results, numAvailable: count(data, 'num_available') };
}

/**
 * Read a record field as text: missing → "None", lists joined with ","
 */
export function fieldText(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (value === undefined || value === null) {
    return MISSING_FIELD;
  }
  if (Array.isArray(value)) {
    return value.map(v => String(v)).join(',');
  }
  return String(value);
}

export function normalizeCloudRecord(raw: Record<string, unknown>): ProcessRecord {
  return {
    endpoint: fieldText(raw, 'device_name').toLowerCase(),
    username: fieldText(raw, 'process_username').toLowerCase(),
    path: fieldText(raw, 'process_name'),
    cmdline: fieldText(raw, 'process_cmdline'),
  };
}

export class CloudBackend implements ProcessSearchBackend {
  readonly dialect = 'cbc' as const;
  private readonly orgKey: string;
  private readonly pageSize: number;
  private readonly pollIntervalMs: number;
  private readonly jobTimeoutMs: number;

  constructor(private readonly http: HttpClient, options: CloudBackendOptions) {
    this.orgKey = options.orgKey;
    this.pageSize = options.pageSize ?? CLOUD_PAGE_SIZE;
    this.pollIntervalMs = options.pollIntervalMs ?? CLOUD_POLL_INTERVAL_MS;
    this.jobTimeoutMs = options.jobTimeoutMs ?? CLOUD_JOB_TIMEOUT_MS;
  }

  private get jobsPath(): string {
    return `/api/investigate/v2/orgs/${encodeURIComponent(this.orgKey)}/processes/search_jobs`;
  }

  async translate(query: string, signal?: AbortSignal): Promise<string> {
    let data: unknown;
    try {
      data = await this.http.postJson('/threathunter/feedmgr/v2/query/translate', { query }, signal);
    } catch (e) {
      if (e instanceof BackendError && e.code === 'HTTP') {
        throw new QueryTranslationError(`Can't convert query: ${query} (${e.message})`, query, { cause: e });
      }
      throw e;
    }

    if (!isRecord(data) || typeof data.query !== 'string') {
      throw new QueryTranslationError(`Can't convert query: ${query} (no query in response)`, query);
    }
    return data.query;
  }

  async *select(query: string, signal?: AbortSignal): AsyncGenerator<ProcessRecord> {
    const jobId = await this.startJob(query, signal);
    const status = await this.waitForJob(jobId, signal);
    if (!status) return;

    let start = 0;
    while (!signal?.aborted) {
      const page = parseResults(
        await this.http.getJson(`${this.jobsPath}/${encodeURIComponent(jobId)}/results?start=${start}&rows=${this.pageSize}`, signal)
      );

      for (const raw of page.results) {
        if (signal?.aborted) return;
        yield normalizeCloudRecord(raw);
      }

      start += page.results.length;
      const available = page.numAvailable || status.numAvailable;
      if (page.results.length === 0 || start >= available) return;
    }
  }

  private async startJob(query: string, signal?: AbortSignal): Promise<string> {
    const data = await this.http.postJson(this.jobsPath, { query, fields: ['*'], start: 0 }, signal);
    if (!isRecord(data) || typeof data.job_id !== 'string') {
      throw new BackendError('Unexpected search job response: missing job_id', 'PARSE');
    }
    return data.job_id;
  }

  /**
   * Poll until every contacted searcher has completed.
   * Returns null if cancelled while waiting.
   */
  private async waitForJob(jobId: string, signal?: AbortSignal): Promise<JobStatus | null> {
    const deadline = Date.now() + this.jobTimeoutMs;

    while (!signal?.aborted) {
      const data = await this.http.getJson(`${this.jobsPath}/${encodeURIComponent(jobId)}/results?start=0&rows=0`, signal);
      if (!isRecord(data)) {
        throw new BackendError('Unexpected search job status response', 'PARSE');
      }

      const status: JobStatus = {
        contacted: count(data, 'contacted'),
        completed: count(data, 'completed'),
        numAvailable: count(data, 'num_available'),
      };
      if (status.contacted > 0 && status.completed >= status.contacted) {
        return status;
      }

      if (Date.now() >= deadline) {
        throw new BackendError(`Search job ${jobId} did not complete within ${this.jobTimeoutMs}ms`, 'TIMEOUT');
      }
      await sleep(this.pollIntervalMs, signal);
    }
    return null;
  }
}
