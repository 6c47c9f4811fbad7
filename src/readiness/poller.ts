/**
 * Readiness Poller
 *
 * Repeats a probe until the target answers or the attempt budget runs out.
 * This is the only place where the engine waits on purpose, so the wait
 * honours the caller's AbortSignal.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import type { ActionExecutor } from '../executor/action-executor.js';
import {
  SideEffect,
  isSuccessOutcome,
  type Action,
  type ActionResult,
  type PollBudget,
  type Target,
} from '../types/index.js';

// Poll Status
export const PollStatus = {
  READY: 'ready',
  TIMED_OUT: 'timed_out',
  CANCELLED: 'cancelled',
} as const;

export type PollStatus = (typeof PollStatus)[keyof typeof PollStatus];

export interface PollOutcome {
  status: PollStatus;
  /** Number of invocations made */
  attempts: number;
  /** Result of the final invocation, null if none was made */
  lastResult: ActionResult | null;
  durationMs: number;
}

export interface PollAttempt {
  attempt: number;
  result: ActionResult;
  willRetry: boolean;
}

export interface PollOptions {
  signal?: AbortSignal | undefined;
  /** Called after each invocation */
  onAttempt?: (attempt: PollAttempt) => void;
}

export class ReadinessPoller {
  private readonly logger: Logger;

  constructor(private readonly executor: ActionExecutor) {
    this.logger = createLogger('readiness-poller');
  }

  /**
   * Invoke `probe` until it succeeds, at most `budget.maxAttempts` times,
   * sleeping `budget.delayMs` between attempts.
   */
  async waitUntilReady(
    target: Target,
    probe: Action,
    budget: PollBudget,
    options: PollOptions = {}
  ): Promise<PollOutcome> {
    if (probe.sideEffect !== SideEffect.QUERY) {
      throw new Error(`Readiness probe '${probe.name}' must be a query action`);
    }
    return this.poll(target, probe, budget, options);
  }

  /**
   * Re-invoke an action that is safe to repeat until it succeeds or the
   * budget runs out.
   */
  async retry(
    target: Target,
    action: Action,
    budget: PollBudget,
    options: PollOptions = {}
  ): Promise<PollOutcome> {
    if (!action.retrySafe) {
      throw new Error(`Action '${action.name}' is not marked retry-safe`);
    }
    return this.poll(target, action, budget, options);
  }

  private async poll(
    target: Target,
    action: Action,
    budget: PollBudget,
    options: PollOptions
  ): Promise<PollOutcome> {
    const { signal } = options;
    const startTime = Date.now();
    let lastResult: ActionResult | null = null;
    let attempts = 0;

    const done = (status: PollStatus): PollOutcome => ({
      status,
      attempts,
      lastResult,
      durationMs: Date.now() - startTime,
    });

    for (let attempt = 1; attempt <= budget.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return done(PollStatus.CANCELLED);
      }

      attempts = attempt;
      lastResult = await this.executor.invoke(target, action, signal);

      if (signal?.aborted) {
        return done(PollStatus.CANCELLED);
      }

      const succeeded = isSuccessOutcome(lastResult.outcome);
      const willRetry = !succeeded && attempt < budget.maxAttempts;
      options.onAttempt?.({ attempt, result: lastResult, willRetry });

      if (succeeded) {
        this.logger.info({ target: target.name, action: action.name, attempt }, 'Target ready');
        return done(PollStatus.READY);
      }

      if (!willRetry) {
        break;
      }

      this.logger.debug(
        {
          target: target.name,
          action: action.name,
          attempt,
          maxAttempts: budget.maxAttempts,
          outcome: lastResult.outcome,
          nextRetryMs: budget.delayMs,
        },
        'Not ready, waiting'
      );

      const slept = await sleep(budget.delayMs, signal);
      if (!slept) {
        return done(PollStatus.CANCELLED);
      }
    }

    this.logger.warn(
      { target: target.name, action: action.name, attempts, lastOutcome: lastResult?.outcome },
      'Attempt budget exhausted'
    );
    return done(PollStatus.TIMED_OUT);
  }
}

/**
 * Sleep for `ms`, returning false if the signal aborts the wait.
 */
async function sleep(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
  if (ms <= 0) {
    return !signal?.aborted;
  }
  try {
    await delay(ms, undefined, signal ? { signal } : {});
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
}
