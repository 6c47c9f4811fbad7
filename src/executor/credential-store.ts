import { CredentialUnavailableError } from '../types/index.js';
import type { ResolvedCredentials } from './provider.js';

/**
 * Resolves an opaque credential reference to usable secrets.
 */
export interface CredentialStore {
  resolve(credentialRef: string): Promise<ResolvedCredentials>;
}

/**
 * Environment variable name prefix for a credential reference.
 * `windows-admin` -> `PROVISIONKIT_CRED_WINDOWS_ADMIN`
 */
export function credentialEnvPrefix(credentialRef: string): string {
  const key = credentialRef.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
  return `PROVISIONKIT_CRED_${key}`;
}

/**
 * Reads `<prefix>_USERNAME` and `<prefix>_PASSWORD` from the environment.
 */
export class EnvCredentialStore implements CredentialStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  resolve(credentialRef: string): Promise<ResolvedCredentials> {
    const prefix = credentialEnvPrefix(credentialRef);
    const username = this.env[`${prefix}_USERNAME`];
    const password = this.env[`${prefix}_PASSWORD`];

    if (!username || password === undefined) {
      return Promise.reject(
        new CredentialUnavailableError(credentialRef, `${prefix}_USERNAME/_PASSWORD not set`)
      );
    }

    return Promise.resolve({ username, password });
  }
}

/**
 * In-memory store for simulated runs.
 */
export class StaticCredentialStore implements CredentialStore {
  private readonly entries: Map<string, ResolvedCredentials>;

  constructor(entries: Record<string, ResolvedCredentials> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  resolve(credentialRef: string): Promise<ResolvedCredentials> {
    const entry = this.entries.get(credentialRef);
    if (!entry) {
      return Promise.reject(new CredentialUnavailableError(credentialRef, 'not in store'));
    }
    return Promise.resolve({ ...entry });
  }
}
