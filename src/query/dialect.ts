/**
 * Query dialects
 *
 * response: on-premises server (Lucene-like process search)
 * cbc:      cloud platform (process search jobs)
 */

import type { Dialect } from '../types/index.js';

export interface DialectSpec {
  hostField: string;
  userField: string;
  /** Time-window clause for processes started in the last `minutes` before `now` */
  timeWindow(minutes: number, now: Date): string;
}

export const DIALECTS: Record<Dialect, DialectSpec> = {
  response: {
    hostField: 'hostname',
    userField: 'username',
    timeWindow: (minutes) => `start:-${minutes}m`,
  },
  cbc: {
    hostField: 'device_name',
    userField: 'process_username',
    timeWindow: (minutes, now) => {
      const start = new Date(now.getTime() - minutes * 60_000);
      return `process_start_time:[${start.toISOString()} TO *]`;
    },
  },
};

export function getDialect(dialect: Dialect): DialectSpec {
  return DIALECTS[dialect];
}
