/**
 * Credential file path resolution
 * Priority:
 * 1) --credentials <path> (passed as argument)
 * 2) PROCSURVEY_CREDENTIALS environment variable
 * 3) OS standard config location
 */

import { homedir, platform } from 'os';
import { join } from 'path';

export const CREDENTIALS_ENV_VAR = 'PROCSURVEY_CREDENTIALS';

export function getDefaultConfigDir(): string {
  const home = homedir();
  const os = platform();

  switch (os) {
    case 'win32':
      // Windows: %APPDATA%\procsurvey
      return join(process.env.APPDATA || join(home, 'AppData', 'Roaming'), 'procsurvey');
    case 'darwin':
      // macOS: ~/Library/Application Support/procsurvey
      return join(home, 'Library', 'Application Support', 'procsurvey');
    default:
      // Linux and others: ~/.config/procsurvey
      return join(process.env.XDG_CONFIG_HOME || join(home, '.config'), 'procsurvey');
  }
}

export function getDefaultCredentialsPath(): string {
  return join(getDefaultConfigDir(), 'credentials.json');
}

export interface CredentialsPathOptions {
  credentialsPath?: string; // --credentials argument
}

export function resolveCredentialsPath(options: CredentialsPathOptions = {}): string {
  if (options.credentialsPath) {
    return options.credentialsPath;
  }

  const envPath = process.env[CREDENTIALS_ENV_VAR];
  if (envPath) {
    return envPath;
  }

  return getDefaultCredentialsPath();
}
