/**
 * Backend factory
 */

import type { CredentialProfile, Dialect } from '../types/index.js';
import { CredentialError } from '../credentials/index.js';
import { CloudBackend } from './cloud.js';
import { HttpClient } from './http.js';
import { ResponseBackend } from './response.js';
import type { ProcessSearchBackend } from './types.js';

export * from './types.js';
export * from './http.js';
export * from './response.js';
export * from './cloud.js';

export function createBackend(dialect: Dialect, profile: CredentialProfile): ProcessSearchBackend {
  const http = new HttpClient({ baseUrl: profile.url, token: profile.token });

  switch (dialect) {
    case 'response':
      return new ResponseBackend(http);
    case 'cbc':
      if (!profile.orgKey) {
        throw new CredentialError('orgKey is required in the credential profile for --cbc');
      }
      return new CloudBackend(http, { orgKey: profile.orgKey });
  }
}
