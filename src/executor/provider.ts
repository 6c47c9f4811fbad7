import type { Action } from '../types/index.js';

/**
 * Connection details for one target, with credentials resolved.
 */
export interface ProviderTarget {
  name: string;
  address: string;
  vars: Readonly<Record<string, string>>;
  credentials: ResolvedCredentials;
}

export interface ResolvedCredentials {
  username: string;
  password: string;
}

export interface ProviderRequest {
  target: ProviderTarget;
  action: Action;
  signal?: AbortSignal | undefined;
}

/**
 * What the remote side reported for one action.
 */
export interface ProviderResponse {
  success: boolean;
  changed: boolean;
  rebootRequired: boolean;
  diagnostic: string;
}

/**
 * Executes one action out of process against a target.
 *
 * Implementations throw ProviderConnectionError when the target cannot be
 * contacted at all, and return `success: false` for remote operation errors.
 */
export interface RemoteActionProvider {
  readonly name: string;
  execute(request: ProviderRequest): Promise<ProviderResponse>;
}
