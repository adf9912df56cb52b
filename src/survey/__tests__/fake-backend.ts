/**
 * In-process stand-in for a search backend
 */

import type { Dialect, ProcessRecord } from '../../types/index.js';
import { QueryTranslationError, type ProcessSearchBackend } from '../../backends/types.js';

export function rec(endpoint: string, username: string, path: string, cmdline: string): ProcessRecord {
  return { endpoint, username, path, cmdline };
}

export interface FakeBackendOptions {
  dialect?: Dialect;
  /** Exact query string → records returned */
  results?: Record<string, ProcessRecord[]>;
  /** Query → translated query; queries missing here fail translation */
  translations?: Record<string, string>;
  /** Called after each record is yielded */
  onRecord?: (query: string, index: number) => void;
}

export class FakeBackend implements ProcessSearchBackend {
  readonly dialect: Dialect;
  readonly queries: string[] = [];
  readonly translated: string[] = [];
  translate?: (query: string) => Promise<string>;
  private readonly options: FakeBackendOptions;

  constructor(options: FakeBackendOptions = {}) {
    this.options = options;
    this.dialect = options.dialect ?? 'response';
    const translations = options.translations;
    if (translations) {
      this.translate = async (query: string) => {
        this.translated.push(query);
        if (!Object.hasOwn(translations, query)) {
          throw new QueryTranslationError(`Can't convert query: ${query}`, query);
        }
        return translations[query];
      };
    }
  }

  async *select(query: string, signal?: AbortSignal): AsyncGenerator<ProcessRecord> {
    this.queries.push(query);
    const records = this.options.results?.[query] ?? [];
    for (let i = 0; i < records.length; i++) {
      if (signal?.aborted) return;
      yield records[i];
      this.options.onRecord?.(query, i);
    }
  }
}
