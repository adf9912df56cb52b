#!/usr/bin/env node
/**
 * procsurvey CLI
 *
 *   procsurvey --deffile browsers.json --days 7
 *   procsurvey --iocfile iocs.txt --ioctype ipaddr --cbc
 *   procsurvey profiles
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { configureSurveyCommand, createProfilesCommand } from './commands/index.js';
import { setVerbose } from './utils/logger.js';
import { setOutputOptions } from './utils/output.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json');
const VERSION = packageJson.version;

const HELP_HEADER = `
procsurvey - EDR process survey
Find unique host/user/path/command-line combinations matching search criteria
and save them to CSV.

Criteria (exactly one):
  --deffile <file>    Definition file: { program: { field: [terms] } }
  --defdir <dir>      Every definition file under a directory
  --query <query>     A single raw query
  --iocfile <file>    One indicator per line (with --ioctype)

Examples:
  procsurvey --deffile browsers.json --days 7
  procsurvey --query "process_name:psexec.exe" --hostname ws-001
  procsurvey --iocfile iocs.txt --ioctype ipaddr --cbc --prefix incident42
`;

const program = new Command();

program
  .name('procsurvey')
  .description('Survey EDR process records and export unique matches to CSV')
  .version(VERSION)
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
    setVerbose(opts.verbose === true);
  });

configureSurveyCommand(program);
program.addCommand(createProfilesCommand());

program.parse();
