/**
 * Credential profile types
 */

export interface CredentialProfile {
  /** Base URL of the EDR server, e.g. https://edr.example.com */
  url: string;
  /** API token (cloud: "<secret>/<api id>") */
  token: string;
  /** Organization key, required by the cloud backend */
  orgKey?: string;
}

export interface CredentialsFile {
  profiles: Record<string, CredentialProfile>;
}
