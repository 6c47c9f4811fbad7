import type { Role } from './target.js';

/**
 * Error thrown when a target name is registered twice.
 */
export class DuplicateTargetError extends Error {
  constructor(public readonly targetName: string) {
    super(`Target already registered: ${targetName}`);
    this.name = 'DuplicateTargetError';
  }
}

/**
 * Error thrown when a target name is not in the registry.
 */
export class UnknownTargetError extends Error {
  constructor(public readonly targetName: string) {
    super(`Unknown target: ${targetName}`);
    this.name = 'UnknownTargetError';
  }
}

/**
 * Error thrown when a credential reference cannot be resolved.
 * Never carries secret material.
 */
export class CredentialUnavailableError extends Error {
  constructor(
    public readonly credentialRef: string,
    reason: string
  ) {
    super(`Credential unavailable: ${credentialRef} (${reason})`);
    this.name = 'CredentialUnavailableError';
  }
}

/**
 * Error thrown when the role dependency graph contains a cycle.
 */
export class CyclicDependencyError extends Error {
  constructor(public readonly cycle: Role[]) {
    super(`Cyclic role dependency: ${cycle.join(' -> ')}`);
    this.name = 'CyclicDependencyError';
  }
}

/**
 * Error thrown when a dependency names a role or checkpoint that is not declared.
 */
export class UnknownCheckpointError extends Error {
  constructor(
    public readonly dependent: Role,
    public readonly upstream: Role,
    public readonly checkpoint: string | null
  ) {
    super(
      checkpoint === null
        ? `Role '${dependent}' depends on undeclared role '${upstream}'`
        : `Role '${dependent}' depends on unknown checkpoint '${checkpoint}' of role '${upstream}'`
    );
    this.name = 'UnknownCheckpointError';
  }
}

/**
 * Error thrown when the configured readiness probe could change a target.
 */
export class InvalidProbeError extends Error {
  constructor(public readonly actionName: string) {
    super(`Readiness probe '${actionName}' must be a catalog query action`);
    this.name = 'InvalidProbeError';
  }
}

/**
 * Error thrown by providers when the target cannot be contacted at all.
 */
export class ProviderConnectionError extends Error {
  constructor(
    public readonly targetName: string,
    message: string
  ) {
    super(message);
    this.name = 'ProviderConnectionError';
  }
}
