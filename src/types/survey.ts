/**
 * Survey types for procsurvey
 */

/** Query dialect of a search backend */
export type Dialect = 'response' | 'cbc';

/** Search field name → ordered list of terms OR-ed together */
export type SearchCriteria = Readonly<Record<string, readonly string[]>>;

/** Program name → criteria, as read from one definition document */
export type ProgramDefinitions = Readonly<Record<string, SearchCriteria>>;

/**
 * A raw query passed through verbatim (single-query mode, one IOC line)
 */
export interface RawSurveyUnit {
  kind: 'raw';
  /** Value written to the program column */
  name: string;
  source: string;
  query: string;
}

/**
 * One program from a definition document; one query per field
 */
export interface CriteriaSurveyUnit {
  kind: 'criteria';
  name: string;
  source: string;
  criteria: SearchCriteria;
}

export type SurveyUnit = RawSurveyUnit | CriteriaSurveyUnit;

/**
 * One loaded input: a definition file, the IOC file, or the literal query
 */
export interface CriteriaSource {
  label: string;
  /** File the units came from (absent for --query) */
  path?: string;
  units: SurveyUnit[];
}

/**
 * Normalized process record. endpoint and username are lowercase.
 */
export interface ProcessRecord {
  endpoint: string;
  username: string;
  path: string;
  cmdline: string;
}

/** Header of the survey CSV, in column order */
export const OUTPUT_HEADER = [
  'endpoint',
  'username',
  'process_path',
  'cmdline',
  'program',
  'source',
] as const;

export type OutputRow = [
  endpoint: string,
  username: string,
  processPath: string,
  cmdline: string,
  program: string,
  source: string,
];

/** Source label for --query runs */
export const QUERY_SOURCE = 'query';

/** Source label for --iocfile runs */
export const IOC_SOURCE = 'ioc';
