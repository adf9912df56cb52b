/**
 * Credential file validation
 */

import type { CredentialProfile, CredentialsFile } from '../types/index.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ParseCredentialsResult {
  credentials: CredentialsFile | null;
  errors: ValidationError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateProfile(
  raw: unknown,
  path: string,
  errors: ValidationError[]
): CredentialProfile | null {
  if (!isRecord(raw)) {
    errors.push({ path, message: 'profile must be an object' });
    return null;
  }

  const { url, token, orgKey } = raw;
  let valid = true;

  if (typeof url !== 'string' || !url.trim()) {
    errors.push({ path: `${path}.url`, message: 'url must be a non-empty string' });
    valid = false;
  } else if (!/^https?:\/\//i.test(url)) {
    errors.push({ path: `${path}.url`, message: 'url must start with http:// or https://' });
    valid = false;
  }

  if (typeof token !== 'string' || !token.trim()) {
    errors.push({ path: `${path}.token`, message: 'token must be a non-empty string' });
    valid = false;
  }

  if (orgKey !== undefined && typeof orgKey !== 'string') {
    errors.push({ path: `${path}.orgKey`, message: 'orgKey must be a string' });
    valid = false;
  }

  if (!valid || typeof url !== 'string' || typeof token !== 'string') {
    return null;
  }

  const profile: CredentialProfile = { url: url.replace(/\/+$/, ''), token };
  if (typeof orgKey === 'string' && orgKey) {
    profile.orgKey = orgKey;
  }
  return profile;
}

export function validateCredentials(raw: unknown): ParseCredentialsResult {
  if (!isRecord(raw)) {
    return { credentials: null, errors: [{ path: '', message: 'credentials must be an object' }] };
  }

  if (!isRecord(raw.profiles)) {
    return { credentials: null, errors: [{ path: 'profiles', message: 'profiles must be an object' }] };
  }

  const errors: ValidationError[] = [];
  const profiles: [string, CredentialProfile][] = [];

  for (const [name, value] of Object.entries(raw.profiles)) {
    const profile = validateProfile(value, `profiles.${name}`, errors);
    if (profile) {
      profiles.push([name, profile]);
    }
  }

  if (errors.length > 0) {
    return { credentials: null, errors };
  }
  return { credentials: { profiles: Object.fromEntries(profiles) }, errors: [] };
}

/**
 * Parse and validate credential file JSON
 */
export function parseCredentials(jsonString: string): ParseCredentialsResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      credentials: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  return validateCredentials(parsed);
}
