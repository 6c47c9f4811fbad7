/**
 * Scripted provider and harness helpers for engine tests.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { ActionExecutor } from '../../src/executor/action-executor.js';
import { defineAction } from '../../src/executor/catalog.js';
import { StaticCredentialStore } from '../../src/executor/credential-store.js';
import type {
  ProviderRequest,
  ProviderResponse,
  RemoteActionProvider,
} from '../../src/executor/provider.js';
import { ReadinessPoller } from '../../src/readiness/poller.js';
import { TargetRegistry } from '../../src/registry/target-registry.js';
import { WorkflowEngine } from '../../src/workflow/engine.js';
import { PipelineComposer } from '../../src/pipeline/composer.js';
import {
  ProviderConnectionError,
  Role,
  TargetStatus,
  type PollBudget,
  type Stage,
  type Step,
  type Target,
} from '../../src/types/index.js';

export type ScriptedResponse = ProviderResponse | 'unreachable';

export function ok(changed = false, rebootRequired = false): ProviderResponse {
  return { success: true, changed, rebootRequired, diagnostic: changed ? 'changed' : 'ok' };
}

export function fail(diagnostic: string): ProviderResponse {
  return { success: false, changed: false, rebootRequired: false, diagnostic };
}

export interface ProviderCall {
  target: string;
  action: string;
  seq: number;
}

/**
 * Replays queued responses per (target, action). The last queued response
 * repeats once the queue is drained; unscripted calls succeed unchanged.
 */
export class ScriptedProvider implements RemoteActionProvider {
  readonly name = 'scripted';
  readonly calls: ProviderCall[] = [];
  private readonly scripts = new Map<string, ScriptedResponse[]>();
  private readonly latency = new Map<string, number>();
  private seq = 0;

  script(target: string, action: string, responses: ScriptedResponse[]): this {
    this.scripts.set(`${target}/${action}`, [...responses]);
    return this;
  }

  /** Delay every call against a target */
  slow(target: string, ms: number): this {
    this.latency.set(target, ms);
    return this;
  }

  callsFor(target: string): string[] {
    return this.calls.filter((call) => call.target === target).map((call) => call.action);
  }

  async execute(request: ProviderRequest): Promise<ProviderResponse> {
    const { target, action } = request;
    this.calls.push({ target: target.name, action: action.name, seq: this.seq++ });

    const latency = this.latency.get(target.name) ?? 0;
    if (latency > 0) {
      await delay(latency, undefined, request.signal ? { signal: request.signal } : {});
    }

    const queue = this.scripts.get(`${target.name}/${action.name}`);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (next === undefined) {
      return ok();
    }
    if (next === 'unreachable') {
      throw new ProviderConnectionError(target.name, `${target.address} timed out`);
    }
    return next;
  }
}

export function makeTarget(name: string, role: Role = Role.CONTROLLER): Target {
  return {
    name,
    role,
    address: `10.0.0.${name.length}`,
    credentialRef: 'test-cred',
    vars: {},
    status: TargetStatus.UNKNOWN,
  };
}

export function makeStep(label: string, action: string, overrides: Partial<Step> = {}): Step {
  const defined = defineAction(action, { label });
  return {
    label,
    action: defined,
    critical: defined.sideEffect === 'mutating',
    retry: null,
    when: null,
    ...overrides,
  };
}

export function makeStage(name: string, steps: Step[], overrides: Partial<Stage> = {}): Stage {
  return { name, steps, postCondition: null, ...overrides };
}

export const FAST_BUDGET: PollBudget = { maxAttempts: 3, delayMs: 1 };

export interface Harness {
  registry: TargetRegistry;
  executor: ActionExecutor;
  poller: ReadinessPoller;
  engine: WorkflowEngine;
  composer: PipelineComposer;
}

export function createHarness(
  provider: RemoteActionProvider,
  targets: Target[],
  budgets: { reboot?: PollBudget; readiness?: PollBudget } = {}
): Harness {
  const registry = new TargetRegistry(targets);
  const credentials = new StaticCredentialStore({
    'test-cred': { username: 'tester', password: 'test-secret' },
  });
  const executor = new ActionExecutor(registry, provider, credentials);
  const poller = new ReadinessPoller(executor);
  const engine = new WorkflowEngine(executor, poller, registry, {
    rebootBudget: budgets.reboot ?? FAST_BUDGET,
    readinessBudget: budgets.readiness ?? FAST_BUDGET,
    probe: defineAction('ping'),
    rebootAction: defineAction('reboot'),
  });
  const composer = new PipelineComposer(engine, registry);
  return { registry, executor, poller, engine, composer };
}
