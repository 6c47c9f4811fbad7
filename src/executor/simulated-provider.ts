import { setTimeout as delay } from 'node:timers/promises';
import { createLogger } from '../utils/logger.js';
import { ProviderConnectionError, SideEffect, type Action } from '../types/index.js';
import type { ProviderRequest, ProviderResponse, RemoteActionProvider } from './provider.js';

const log = createLogger('simulated-provider');

const DEFAULT_REBOOT_ACTIONS = ['create-domain', 'join-domain'];

export interface SimulatedProviderOptions {
  /** Delay per action, per target name or for all targets */
  latencyMs?: number | ((target: string, action: Action) => number);
  /** Actions whose first apply asks for a reboot */
  rebootActions?: string[];
  /** Return a diagnostic to make an action fail on a target */
  failWhen?: (target: string, action: Action) => string | null;
  /** Return true to make the target refuse connections for this call */
  unreachableWhen?: (target: string, action: Action) => boolean;
}

/**
 * In-process stand-in for a fleet of remote hosts.
 *
 * Each target keeps the set of applied mutating actions; applying the same
 * action with the same parameters again reports `unchanged`.
 */
export class SimulatedActionProvider implements RemoteActionProvider {
  readonly name = 'simulated';
  private readonly applied = new Map<string, Set<string>>();
  private readonly calls: Array<{ target: string; action: string }> = [];
  private readonly rebootActions: Set<string>;

  constructor(private readonly options: SimulatedProviderOptions = {}) {
    this.rebootActions = new Set(options.rebootActions ?? DEFAULT_REBOOT_ACTIONS);
  }

  /**
   * Every call received, in order.
   */
  get history(): ReadonlyArray<{ target: string; action: string }> {
    return this.calls;
  }

  callsFor(target: string): string[] {
    return this.calls.filter((call) => call.target === target).map((call) => call.action);
  }

  async execute(request: ProviderRequest): Promise<ProviderResponse> {
    const { target, action } = request;
    this.calls.push({ target: target.name, action: action.name });

    const latency =
      typeof this.options.latencyMs === 'function'
        ? this.options.latencyMs(target.name, action)
        : this.options.latencyMs ?? 0;
    if (latency > 0) {
      await delay(latency, undefined, request.signal ? { signal: request.signal } : {});
    }

    if (this.options.unreachableWhen?.(target.name, action) === true) {
      throw new ProviderConnectionError(target.name, `${target.address} refused the connection`);
    }

    const failure = this.options.failWhen?.(target.name, action) ?? null;
    if (failure !== null) {
      return { success: false, changed: false, rebootRequired: false, diagnostic: failure };
    }

    if (action.sideEffect === SideEffect.QUERY) {
      return { success: true, changed: false, rebootRequired: false, diagnostic: 'ok' };
    }

    // A reboot always happens; it never settles into a desired state
    if (action.name === 'reboot') {
      log.debug({ target: target.name }, 'Simulated reboot');
      return { success: true, changed: true, rebootRequired: false, diagnostic: 'rebooted' };
    }

    const state = this.stateFor(target.name);
    const key = stateKey(action);
    if (state.has(key)) {
      return { success: true, changed: false, rebootRequired: false, diagnostic: 'already in desired state' };
    }

    state.add(key);
    const rebootRequired = this.rebootActions.has(action.name) || action.params['restart'] === true;
    return { success: true, changed: true, rebootRequired, diagnostic: 'applied' };
  }

  private stateFor(target: string): Set<string> {
    let state = this.applied.get(target);
    if (!state) {
      state = new Set();
      this.applied.set(target, state);
    }
    return state;
  }
}

function stateKey(action: Action): string {
  const params = Object.keys(action.params)
    .sort()
    .map((key) => `${key}=${JSON.stringify(action.params[key])}`)
    .join('&');
  return `${action.name}?${params}`;
}
