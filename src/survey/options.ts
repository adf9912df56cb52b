/**
 * Survey option validation
 *
 * Everything here runs before the output file is opened and before any
 * network call; problems surface as ArgumentError.
 */

import type { Dialect } from '../types/index.js';
import type { CriteriaSelector } from '../criteria/loader.js';
import { assertNoFilterConflict, buildBaseQuery } from '../query/builder.js';
import { ArgumentError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { outputFilename } from './writer.js';

/** Options as parsed from the command line */
export interface SurveyCliOptions {
  prefix?: string;
  outdir?: string;
  profile?: string;
  credentials?: string;
  cbc?: boolean;
  translate?: boolean;
  days?: number;
  minutes?: number;
  deffile?: string;
  defdir?: string;
  query?: string;
  iocfile?: string;
  hostname?: string;
  username?: string;
  ioctype?: string;
}

export interface SurveyPlan {
  selector: CriteriaSelector;
  dialect: Dialect;
  /** Appended to every query */
  base: string;
  translate: boolean;
  outputPath: string;
  profile: string;
  credentialsPath?: string;
}

export const DEFAULT_PROFILE = 'default';

function resolveSelector(options: SurveyCliOptions): CriteriaSelector {
  const given = (['deffile', 'defdir', 'query', 'iocfile'] as const).filter(
    key => options[key] !== undefined
  );
  if (given.length === 0) {
    throw new ArgumentError('One of --deffile, --defdir, --query or --iocfile is required');
  }
  if (given.length > 1) {
    throw new ArgumentError(`Options ${given.map(k => `--${k}`).join(', ')} are mutually exclusive`);
  }

  if (options.query !== undefined) {
    if (!options.query.trim()) {
      throw new ArgumentError('--query must not be empty');
    }
    return { mode: 'query', query: options.query };
  }
  if (options.iocfile !== undefined) {
    if (!options.ioctype) {
      throw new ArgumentError('--iocfile requires --ioctype');
    }
    return { mode: 'iocfile', path: options.iocfile, iocType: options.ioctype };
  }
  if (options.deffile !== undefined) {
    return { mode: 'deffile', path: options.deffile };
  }
  if (options.defdir !== undefined) {
    return { mode: 'defdir', path: options.defdir };
  }
  throw new ArgumentError('One of --deffile, --defdir, --query or --iocfile is required');
}

/**
 * Check command-line options and derive the survey plan
 */
export function validateSurveyOptions(options: SurveyCliOptions, now: Date = new Date()): SurveyPlan {
  const selector = resolveSelector(options);
  const dialect: Dialect = options.cbc ? 'cbc' : 'response';

  if (options.ioctype && selector.mode !== 'iocfile') {
    logger.warn('--ioctype only applies to --iocfile; ignored', 'options');
  }

  let translate = options.translate === true;
  if (translate && dialect !== 'cbc') {
    logger.warn('--translate only applies with --cbc; ignored', 'options');
    translate = false;
  }

  if (selector.mode === 'query') {
    assertNoFilterConflict(selector.query, options, dialect);
  }

  const base = buildBaseQuery({
    dialect,
    days: options.days,
    minutes: options.minutes,
    hostname: options.hostname,
    username: options.username,
    now,
  });

  return {
    selector,
    dialect,
    base,
    translate,
    outputPath: outputFilename(options.prefix, options.outdir),
    profile: options.profile || DEFAULT_PROFILE,
    credentialsPath: options.credentials,
  };
}
