/**
 * Survey runner
 *
 * Load criteria → open output (header) → for each unit: build queries,
 * execute, merge, write rows → close output. A stopped scope ends the loop
 * early; the output is still closed.
 */

import { IOC_SOURCE, type CriteriaSource, type SurveyUnit } from '../types/index.js';
import type { ProcessSearchBackend } from '../backends/index.js';
import { loadCriteria } from '../criteria/loader.js';
import { output } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import {
  mergeResults,
  nestedProcessSearch,
  processSearch,
  type QueryScope,
  type SearchOptions,
  type SearchResult,
} from './executor.js';
import type { SurveyPlan } from './options.js';
import { toRows } from './results.js';
import { SurveyWriter } from './writer.js';

export interface UnitSummary {
  program: string;
  source: string;
  /** Unique records written for the unit */
  results: number;
  queries: number;
  skipped: number;
  cancelled: number;
}

export interface SurveySummary {
  outputPath: string;
  sources: number;
  units: UnitSummary[];
  queries: number;
  skipped: number;
  cancelled: number;
  rows: number;
  /** The operator stopped the run before every unit was searched */
  stopped: boolean;
}

export interface SurveyDeps {
  backend: ProcessSearchBackend;
  /** Per-query cancellation; without it queries cannot be interrupted */
  scope?: QueryScope;
}

const unscoped: QueryScope = {
  run<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return fn(new AbortController().signal);
  },
  stopped: false,
};

function describeSource(source: CriteriaSource): string {
  if (!source.path) {
    return 'Processing query';
  }
  return source.label === IOC_SOURCE
    ? `Processing IOC file: ${source.path}`
    : `Processing definition file: ${source.path}`;
}

async function searchUnit(
  unit: SurveyUnit,
  backend: ProcessSearchBackend,
  options: SearchOptions,
  scope: QueryScope
): Promise<SearchResult[]> {
  if (unit.kind === 'raw') {
    return [await scope.run(signal => processSearch(backend, unit.query, { ...options, signal }))];
  }
  return nestedProcessSearch(backend, unit.criteria, options, scope);
}

/**
 * Run a validated survey plan. Criteria are loaded before the output file is
 * created, so a missing or malformed input leaves no file behind.
 */
export async function runSurvey(plan: SurveyPlan, deps: SurveyDeps): Promise<SurveySummary> {
  const sources = await loadCriteria(plan.selector);
  const scope = deps.scope ?? unscoped;
  const options: SearchOptions = { base: plan.base, translate: plan.translate };

  const summary: SurveySummary = {
    outputPath: plan.outputPath,
    sources: sources.length,
    units: [],
    queries: 0,
    skipped: 0,
    cancelled: 0,
    rows: 0,
    stopped: false,
  };

  const writer = await SurveyWriter.open(plan.outputPath);
  try {
    units: for (const source of sources) {
      if (scope.stopped) break;
      output(describeSource(source));

      for (const unit of source.units) {
        if (scope.stopped) break units;
        const searches = await withSpinner(`Searching ${unit.name}...`, () =>
          searchUnit(unit, deps.backend, options, scope)
        );
        const results = mergeResults(searches);
        await writer.writeRows(toRows(results, unit.name, unit.source));

        const unitSummary: UnitSummary = {
          program: unit.name,
          source: unit.source,
          results: results.size,
          queries: searches.length,
          skipped: searches.filter(s => s.outcome === 'skipped').length,
          cancelled: searches.filter(s => s.outcome === 'cancelled').length,
        };
        summary.units.push(unitSummary);
        summary.queries += unitSummary.queries;
        summary.skipped += unitSummary.skipped;
        summary.cancelled += unitSummary.cancelled;

        output(`--> ${unit.name}: ${results.size} results`);
      }
    }
  } finally {
    await writer.close();
  }

  summary.rows = writer.rowCount;
  summary.stopped = scope.stopped;
  return summary;
}
