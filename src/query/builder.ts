/**
 * Query builder
 */

import type { Dialect, SearchCriteria } from '../types/index.js';
import { ArgumentError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getDialect } from './dialect.js';

export const MINUTES_PER_DAY = 1440;

/**
 * OR together every term of one field: (field:t1 OR field:t2)
 */
export function buildFieldQuery(field: string, terms: readonly string[]): string {
  return '(' + terms.map(term => `${field}:${term}`).join(' OR ') + ')';
}

/**
 * One query per field. Fields are searched independently, never combined.
 */
export function buildFieldQueries(criteria: SearchCriteria): string[] {
  return Object.entries(criteria).map(([field, terms]) => buildFieldQuery(field, terms));
}

export interface BaseQueryOptions {
  dialect: Dialect;
  days?: number;
  minutes?: number;
  hostname?: string;
  username?: string;
  /** Reference instant for the cloud time window (default: now) */
  now?: Date;
}

/**
 * Window length in minutes; days take precedence over minutes
 */
export function resolveWindowMinutes(days?: number, minutes?: number): number | undefined {
  for (const [name, value] of [['days', days], ['minutes', minutes]] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
      throw new ArgumentError(`--${name} must be a positive integer`);
    }
  }

  if (days !== undefined) {
    if (minutes !== undefined) {
      logger.warn(`Both --days and --minutes given; using --days ${days}`, 'query');
    }
    return days * MINUTES_PER_DAY;
  }
  return minutes;
}

/**
 * Fragment appended to every query: time window, then host, then user.
 * Each clause is preceded by a space; empty when nothing applies.
 */
export function buildBaseQuery(options: BaseQueryOptions): string {
  const dialect = getDialect(options.dialect);
  let base = '';

  const windowMinutes = resolveWindowMinutes(options.days, options.minutes);
  if (windowMinutes !== undefined) {
    base += ' ' + dialect.timeWindow(windowMinutes, options.now ?? new Date());
  }
  if (options.hostname) {
    base += ` ${dialect.hostField}:${options.hostname}`;
  }
  if (options.username) {
    base += ` ${dialect.userField}:${options.username}`;
  }

  return base;
}

export interface FilterOptions {
  hostname?: string;
  username?: string;
}

/**
 * --hostname/--username may not repeat a field the raw query already names
 */
export function assertNoFilterConflict(query: string, filters: FilterOptions, dialect: Dialect): void {
  const { hostField, userField } = getDialect(dialect);

  if (filters.hostname && query.includes(`${hostField}:`)) {
    throw new ArgumentError(`Cannot use --hostname with "${hostField}:" (in query)`);
  }
  if (filters.username && query.includes(`${userField}:`)) {
    throw new ArgumentError(`Cannot use --username with "${userField}:" (in query)`);
  }
}
