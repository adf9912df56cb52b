/**
 * Survey command - search process records and export unique matches to CSV
 */

import { Command, InvalidArgumentError } from 'commander';
import type { CredentialProfile, Dialect } from '../types/index.js';
import { createBackend, type ProcessSearchBackend } from '../backends/index.js';
import { CredentialStore } from '../credentials/index.js';
import { CancellationScope, SIGINT_EXIT_CODE } from '../survey/cancellation.js';
import { validateSurveyOptions, DEFAULT_PROFILE, type SurveyCliOptions } from '../survey/options.js';
import { runSurvey, type SurveySummary } from '../survey/runner.js';
import { logger } from '../utils/logger.js';
import { getOutputOptions, maskSecret, output, outputError } from '../utils/output.js';

export interface SurveyCommandDeps {
  /** Builds the search backend once credentials are resolved */
  backendFactory?: (dialect: Dialect, profile: CredentialProfile) => ProcessSearchBackend;
  scope?: CancellationScope;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function printSummary(summary: SurveySummary): void {
  if (getOutputOptions().json) {
    output(summary);
    return;
  }

  output(`\nResults saved: ${summary.outputPath}`);
  const notes: string[] = [];
  if (summary.skipped > 0) notes.push(`${summary.skipped} skipped`);
  if (summary.cancelled > 0) notes.push(`${summary.cancelled} interrupted`);
  if (summary.stopped) notes.push('stopped early');
  output(
    `${summary.rows} row(s) from ${summary.queries} quer${summary.queries === 1 ? 'y' : 'ies'}` +
      (notes.length > 0 ? ` (${notes.join(', ')})` : '')
  );
}

/**
 * Validate, resolve credentials, run. Returns the process exit code.
 */
export async function executeSurvey(
  options: SurveyCliOptions,
  deps: SurveyCommandDeps = {}
): Promise<number> {
  const scope = deps.scope ?? new CancellationScope();

  try {
    const plan = validateSurveyOptions(options);

    const store = new CredentialStore(plan.credentialsPath);
    const profile = await store.getProfile(plan.profile);
    logger.info(
      `profile ${plan.profile}: ${profile.url} (token ${maskSecret(profile.token)})`,
      'credentials'
    );
    const backend = (deps.backendFactory ?? createBackend)(plan.dialect, profile);

    scope.install();
    const summary = await runSurvey(plan, { backend, scope });
    printSummary(summary);
    return summary.stopped ? SIGINT_EXIT_CODE : 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    outputError(msg, err instanceof Error ? err : undefined);
    return 1;
  } finally {
    scope.dispose();
  }
}

/**
 * Register the survey options and action on `cmd`
 */
export function configureSurveyCommand(cmd: Command, deps: SurveyCommandDeps = {}): Command {
  return cmd
    .option('--prefix <prefix>', 'Output filename prefix (<prefix>-survey.csv)')
    .option('--outdir <dir>', 'Directory for the output file')
    .option('--profile <name>', 'Credential profile to use', DEFAULT_PROFILE)
    .option('--credentials <path>', 'Path to credential file')
    .option('--cbc', 'Search the cloud platform instead of the on-premises server')
    .option('--translate', 'Translate queries from on-premises to cloud syntax (with --cbc)')
    .option('--days <n>', 'Number of days to search', parsePositiveInt)
    .option('--minutes <n>', 'Number of minutes to search', parsePositiveInt)
    .option('--deffile <file>', 'Definition file to process (.json, .yaml, .yml)')
    .option('--defdir <dir>', 'Directory containing definition files')
    .option('--query <query>', 'A single process search query to execute')
    .option('--iocfile <file>', 'IOC file to process, one IOC per line (requires --ioctype)')
    .option('--hostname <host>', 'Target a specific host by name')
    .option('--username <user>', 'Target a specific username')
    .option('--ioctype <type>', 'IOC search field, e.g. ipaddr, domain, md5')
    .action(async (options: SurveyCliOptions) => {
      const code = await executeSurvey(options, deps);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
