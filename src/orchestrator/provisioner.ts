/**
 * Provisioner.
 * Wires registry, executor, poller, engine and composer for one manifest.
 */

import { defineAction, isQueryAction, REBOOT_ACTION } from '../executor/catalog.js';
import { ActionExecutor } from '../executor/action-executor.js';
import type { CredentialStore } from '../executor/credential-store.js';
import type { RemoteActionProvider } from '../executor/provider.js';
import { ReadinessPoller } from '../readiness/poller.js';
import { TargetRegistry } from '../registry/target-registry.js';
import { WorkflowEngine } from '../workflow/engine.js';
import { PipelineComposer } from '../pipeline/composer.js';
import type { ExecutionPlan } from '../pipeline/plan.js';
import type { ProvisionConfig } from '../config/index.js';
import type { LoadedManifest } from '../manifest/loader.js';
import { createLogger } from '../utils/logger.js';
import { InvalidProbeError, type RolePipeline, type RunReport } from '../types/index.js';

const log = createLogger('provisioner');

export interface ProvisionerOptions {
  manifest: Pick<LoadedManifest, 'targets' | 'workflows'>;
  provider: RemoteActionProvider;
  credentials: CredentialStore;
  config: Pick<ProvisionConfig, 'reboot' | 'readiness' | 'probeAction'>;
}

/**
 * One provisioning run over a manifest.
 */
export class Provisioner {
  readonly registry: TargetRegistry;
  readonly executor: ActionExecutor;
  readonly poller: ReadinessPoller;
  readonly engine: WorkflowEngine;
  readonly composer: PipelineComposer;

  /**
   * @throws InvalidProbeError when the configured probe is not a catalog query
   */
  constructor(private readonly options: ProvisionerOptions) {
    if (!isQueryAction(options.config.probeAction)) {
      throw new InvalidProbeError(options.config.probeAction);
    }
    this.registry = new TargetRegistry(options.manifest.targets);
    this.executor = new ActionExecutor(this.registry, options.provider, options.credentials);
    this.poller = new ReadinessPoller(this.executor);
    this.engine = new WorkflowEngine(this.executor, this.poller, this.registry, {
      rebootBudget: options.config.reboot,
      readinessBudget: options.config.readiness,
      probe: defineAction(options.config.probeAction),
      rebootAction: defineAction(REBOOT_ACTION),
    });
    this.composer = new PipelineComposer(this.engine, this.registry);
  }

  /**
   * Validate the role graph and bind pipelines without running anything.
   */
  plan(): { plan: ExecutionPlan; pipelines: RolePipeline[] } {
    const plan = this.composer.plan(this.options.manifest.workflows);
    return { plan, pipelines: this.composer.bind(plan) };
  }

  async runAll(signal?: AbortSignal): Promise<RunReport> {
    log.info(
      { provider: this.options.provider.name, targets: this.registry.size },
      'Starting provisioning run'
    );
    return this.composer.runAll(this.options.manifest.workflows, signal);
  }
}

export function createProvisioner(options: ProvisionerOptions): Provisioner {
  return new Provisioner(options);
}
