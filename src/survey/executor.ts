/**
 * Query executor
 */

import type { SearchCriteria } from '../types/index.js';
import { QueryTranslationError, type ProcessSearchBackend } from '../backends/index.js';
import { BackendError } from '../backends/http.js';
import { buildFieldQueries } from '../query/builder.js';
import { logger } from '../utils/logger.js';
import { ResultSet } from './results.js';

export interface SearchOptions {
  /** Fragment appended to every query (time window, host, user) */
  base?: string;
  /** Translate the query into the backend's dialect first */
  translate?: boolean;
  /** Aborts collection; records gathered so far are returned */
  signal?: AbortSignal;
}

export type SearchOutcome = 'completed' | 'cancelled' | 'skipped';

export interface SearchResult {
  results: ResultSet;
  outcome: SearchOutcome;
  /** Final query string sent to the backend (absent when skipped) */
  query?: string;
}

/**
 * Run one query and collect the unique records it matches.
 *
 * - Translation failure: logged, empty result, outcome "skipped".
 * - Cancellation: whatever was collected is returned, outcome "cancelled".
 * - Any other backend error propagates.
 */
export async function processSearch(
  backend: ProcessSearchBackend,
  query: string,
  options: SearchOptions = {}
): Promise<SearchResult> {
  const results = new ResultSet();
  const { signal } = options;
  let finalQuery = query;

  if (options.translate && backend.translate) {
    try {
      finalQuery = await backend.translate(query, signal);
    } catch (e) {
      if (e instanceof QueryTranslationError) {
        logger.warn(`${e.message}. Skipping...`, 'query');
        return { results, outcome: 'skipped' };
      }
      if (signal?.aborted) {
        return { results, outcome: 'cancelled' };
      }
      throw e;
    }
  }

  finalQuery += options.base ?? '';
  logger.info(`query: ${finalQuery}`, 'query');

  try {
    for await (const record of backend.select(finalQuery, signal)) {
      results.add(record);
      if (signal?.aborted) break;
    }
  } catch (e) {
    if (!(signal?.aborted && e instanceof BackendError && e.code === 'CANCELLED')) {
      throw e;
    }
  }

  if (signal?.aborted) {
    logger.warn(`Interrupted. Keeping ${results.size} result(s) collected so far`, 'query');
    return { results, outcome: 'cancelled', query: finalQuery };
  }
  return { results, outcome: 'completed', query: finalQuery };
}

/**
 * Gives each query its own cancellation signal (see CancellationScope)
 */
export interface QueryScope {
  run<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T>;
  /** No further queries should start */
  readonly stopped: boolean;
}

/**
 * Run one query per field of a program's criteria, in field order.
 * With a scope, each field query can be interrupted on its own, and no
 * further field is searched once the scope is stopped.
 */
export async function nestedProcessSearch(
  backend: ProcessSearchBackend,
  criteria: SearchCriteria,
  options: SearchOptions = {},
  scope?: QueryScope
): Promise<SearchResult[]> {
  const searches: SearchResult[] = [];
  for (const query of buildFieldQueries(criteria)) {
    if (scope?.stopped) break;
    const search = scope
      ? await scope.run(signal => processSearch(backend, query, { ...options, signal }))
      : await processSearch(backend, query, options);
    searches.push(search);
  }
  return searches;
}

/**
 * Union of the result sets of several searches
 */
export function mergeResults(searches: readonly SearchResult[]): ResultSet {
  const merged = new ResultSet();
  for (const search of searches) {
    merged.union(search.results);
  }
  return merged;
}
