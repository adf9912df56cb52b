/**
 * JSON-over-HTTP client shared by the search backends
 */

import { createRequire } from 'node:module';
const require = createRequire(import.meta.url);
const { version: PKG_VERSION } = require('../../package.json') as { version: string };

/** Request timeout in milliseconds */
export const REQUEST_TIMEOUT_MS = 30_000;

export type BackendErrorCode = 'NETWORK' | 'HTTP' | 'PARSE' | 'TIMEOUT' | 'CANCELLED';

export class BackendError extends Error {
  constructor(
    message: string,
    public readonly code: BackendErrorCode,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

export interface HttpClientOptions {
  /** Server base URL without trailing slash */
  baseUrl: string;
  /** Sent as X-Auth-Token */
  token: string;
  timeout?: number;
}

export class HttpClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeout: number;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeout = options.timeout ?? REQUEST_TIMEOUT_MS;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async getJson(path: string, signal?: AbortSignal): Promise<unknown> {
    return this.request('GET', path, undefined, signal);
  }

  async postJson(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.request('POST', path, body, signal);
  }

  /**
   * Issue one request. `signal` is the caller's cancellation; when it fires the
   * request is aborted and a CANCELLED BackendError is thrown.
   */
  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    if (signal?.aborted) {
      throw new BackendError('Request cancelled', 'CANCELLED');
    }

    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onCancel = () => controller.abort();
    signal?.addEventListener('abort', onCancel, { once: true });

    try {
      const headers: Record<string, string> = {
        Accept: 'application/json',
        'User-Agent': `procsurvey/${PKG_VERSION}`,
        'X-Auth-Token': this.token,
      };
      if (body !== undefined) {
        headers['Content-Type'] = 'application/json';
      }

      const response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new BackendError(
          `HTTP ${response.status}: ${response.statusText} (${method} ${path})`,
          'HTTP',
          response.status
        );
      }

      try {
        return await response.json();
      } catch (e) {
        // An abort while the body is still streaming surfaces here too
        if (signal?.aborted) {
          throw new BackendError('Request cancelled', 'CANCELLED');
        }
        if (controller.signal.aborted) {
          throw new BackendError(`Request timed out (${method} ${path})`, 'TIMEOUT');
        }
        throw new BackendError(
          `Failed to parse response from ${method} ${path}: ${e instanceof Error ? e.message : String(e)}`,
          'PARSE'
        );
      }
    } catch (e) {
      if (e instanceof BackendError) {
        throw e;
      }
      if (e instanceof Error && e.name === 'AbortError') {
        if (signal?.aborted) {
          throw new BackendError('Request cancelled', 'CANCELLED');
        }
        throw new BackendError(`Request timed out (${method} ${path})`, 'TIMEOUT');
      }
      // Network errors (DNS, connection refused, TLS, etc.)
      throw new BackendError(`Network error: ${e instanceof Error ? e.message : String(e)}`, 'NETWORK');
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCancel);
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Wait `ms`, resolving early if `signal` fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
