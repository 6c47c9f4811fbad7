/**
 * provisionkit Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Provisioner (main entry point)
export {
  Provisioner,
  createProvisioner,
  type ProvisionerOptions,
} from './orchestrator/provisioner.js';

// Building blocks
export { TargetRegistry } from './registry/target-registry.js';
export { ActionExecutor } from './executor/action-executor.js';
export { ACTION_CATALOG, REBOOT_ACTION, defineAction, isCatalogAction, isQueryAction } from './executor/catalog.js';
export type {
  ProviderRequest,
  ProviderResponse,
  ProviderTarget,
  RemoteActionProvider,
  ResolvedCredentials,
} from './executor/provider.js';
export {
  CommandActionProvider,
  execaRunner,
  type CommandOutput,
  type CommandRunner,
} from './executor/command-provider.js';
export { SimulatedActionProvider, type SimulatedProviderOptions } from './executor/simulated-provider.js';
export {
  EnvCredentialStore,
  StaticCredentialStore,
  type CredentialStore,
} from './executor/credential-store.js';
export { ReadinessPoller, PollStatus, type PollOutcome } from './readiness/poller.js';
export { WorkflowEngine, PipelineExecution, type WorkflowEngineOptions } from './workflow/engine.js';
export { PipelineStateMachine, InvalidTransitionError } from './workflow/state-machine.js';
export { PipelineComposer } from './pipeline/composer.js';
export { planExecution, type ExecutionPlan, type ResolvedDependency } from './pipeline/plan.js';
export { buildRunReport, succeeded, failedPipelines } from './pipeline/report.js';

// Manifest
export {
  loadManifest,
  parseManifest,
  ManifestNotFoundError,
  ManifestParseError,
  ManifestValidationError,
  type LoadedManifest,
} from './manifest/loader.js';

// Configuration
export { getConfig, loadConfig, resetConfig, type ProvisionConfig } from './config/index.js';

// Control Plane
export { createProgram, runCli } from './control-plane/cli.js';
