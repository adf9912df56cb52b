/**
 * Profiles command - list credential profiles (tokens masked)
 */

import { Command } from 'commander';
import { CredentialStore } from '../credentials/index.js';
import { getOutputOptions, maskSecret, output, outputError } from '../utils/output.js';

export interface ProfilesOptions {
  credentials?: string;
}

/**
 * Print every profile of the credential file. Returns the process exit code.
 */
export async function executeProfiles(options: ProfilesOptions): Promise<number> {
  try {
    const store = new CredentialStore(options.credentials);
    const { profiles } = await store.load();
    const entries = Object.entries(profiles).map(([name, p]) => ({
      name,
      url: p.url,
      token: maskSecret(p.token),
      orgKey: p.orgKey ?? null,
    }));

    if (getOutputOptions().json) {
      output(entries);
      return 0;
    }

    output(`Credential file: ${store.getCredentialsPath()}\n`);
    if (entries.length === 0) {
      output('No profiles defined.');
      return 0;
    }
    for (const e of entries) {
      const org = e.orgKey ? `  org=${e.orgKey}` : '';
      output(`  ${e.name.padEnd(16)}  ${e.url}  token=${e.token}${org}`);
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    outputError(`Failed to list profiles: ${msg}`, err instanceof Error ? err : undefined);
    return 1;
  }
}

export function createProfilesCommand(): Command {
  return new Command('profiles')
    .description('List credential profiles')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      // --credentials is a root option; read it from the parent
      const { credentials } = command.optsWithGlobals<ProfilesOptions>();
      const code = await executeProfiles({ credentials });
      if (code !== 0) {
        process.exit(code);
      }
    });
}
