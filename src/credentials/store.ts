/**
 * Credential store - resolves a named profile from the credential file
 */

import type { CredentialProfile, CredentialsFile } from '../types/index.js';
import { resolveCredentialsPath } from '../utils/config-path.js';
import { readFileSafe } from '../utils/fs.js';
import { parseCredentials } from './schema.js';

export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
  }
}

export class CredentialStore {
  private readonly credentialsPath: string;
  private credentials: CredentialsFile | null = null;

  constructor(credentialsPath?: string) {
    this.credentialsPath = resolveCredentialsPath({ credentialsPath });
  }

  getCredentialsPath(): string {
    return this.credentialsPath;
  }

  async load(): Promise<CredentialsFile> {
    if (this.credentials) {
      return this.credentials;
    }

    const content = await readFileSafe(this.credentialsPath);
    if (content === null) {
      throw new CredentialError(`Credential file not found: ${this.credentialsPath}`);
    }

    const { credentials, errors } = parseCredentials(content);
    if (!credentials) {
      throw new CredentialError(
        `Invalid credential file ${this.credentialsPath}: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`
      );
    }

    this.credentials = credentials;
    return credentials;
  }

  async listProfiles(): Promise<string[]> {
    const credentials = await this.load();
    return Object.keys(credentials.profiles);
  }

  async getProfile(name: string): Promise<CredentialProfile> {
    const credentials = await this.load();
    if (!Object.hasOwn(credentials.profiles, name)) {
      const available = Object.keys(credentials.profiles);
      throw new CredentialError(
        `Profile not found: ${name} (available: ${available.length > 0 ? available.join(', ') : 'none'})`
      );
    }
    return credentials.profiles[name];
  }
}
