/**
 * procsurvey - EDR process survey
 * Programmatic API exports
 */

// Types
export type {
  Dialect,
  SearchCriteria,
  ProgramDefinitions,
  RawSurveyUnit,
  CriteriaSurveyUnit,
  SurveyUnit,
  CriteriaSource,
  ProcessRecord,
  OutputRow,
  CredentialProfile,
  CredentialsFile,
} from './types/index.js';
export { OUTPUT_HEADER, QUERY_SOURCE, IOC_SOURCE } from './types/index.js';

// Criteria
export { parseDefinitions, validateDefinitions, DefinitionError, DEFINITION_EXTENSIONS } from './criteria/definitions.js';
export { loadCriteria, loadQuery, loadDefinitionFile, loadDefinitionDir, loadIocFile, sourceLabel } from './criteria/loader.js';
export type { CriteriaSelector } from './criteria/loader.js';

// Queries
export {
  buildFieldQuery,
  buildFieldQueries,
  buildBaseQuery,
  resolveWindowMinutes,
  assertNoFilterConflict,
  DIALECTS,
  getDialect,
} from './query/index.js';
export type { BaseQueryOptions, DialectSpec } from './query/index.js';

// Backends
export {
  createBackend,
  ResponseBackend,
  CloudBackend,
  HttpClient,
  BackendError,
  QueryTranslationError,
} from './backends/index.js';
export type { ProcessSearchBackend } from './backends/index.js';

// Credentials
export { CredentialStore, CredentialError, parseCredentials } from './credentials/index.js';

// Survey
export {
  ResultSet,
  toRows,
  processSearch,
  nestedProcessSearch,
  mergeResults,
  CancellationScope,
  SurveyWriter,
  outputFilename,
  validateSurveyOptions,
  runSurvey,
} from './survey/index.js';
export type { SearchResult, SearchOptions, SurveyPlan, SurveySummary, SurveyCliOptions } from './survey/index.js';

export { ArgumentError } from './utils/errors.js';
