/**
 * Tests for the readiness poller
 */

import { describe, it, expect } from 'vitest';
import { defineAction } from '../src/executor/catalog.js';
import { PollStatus } from '../src/readiness/poller.js';
import { ActionOutcome } from '../src/types/index.js';
import { ScriptedProvider, createHarness, fail, makeTarget, ok } from './mocks/scripted-provider.js';

const probe = defineAction('ping');

describe('ReadinessPoller', () => {
  it('should return ready on the first successful probe', async () => {
    const provider = new ScriptedProvider().script('dc01', 'ping', [
      'unreachable',
      'unreachable',
      'unreachable',
      ok(),
    ]);
    const target = makeTarget('dc01');
    const { poller } = createHarness(provider, [target]);

    const outcome = await poller.waitUntilReady(target, probe, { maxAttempts: 5, delayMs: 1 });

    expect(outcome.status).toBe(PollStatus.READY);
    expect(outcome.attempts).toBe(4);
    expect(outcome.lastResult?.outcome).toBe(ActionOutcome.UNCHANGED);
    expect(provider.callsFor('dc01')).toHaveLength(4);
  });

  it('should time out after exactly the attempt budget', async () => {
    const provider = new ScriptedProvider().script('dc01', 'ping', ['unreachable']);
    const target = makeTarget('dc01');
    const { poller } = createHarness(provider, [target]);

    const outcome = await poller.waitUntilReady(target, probe, { maxAttempts: 5, delayMs: 1 });

    expect(outcome.status).toBe(PollStatus.TIMED_OUT);
    expect(outcome.attempts).toBe(5);
    expect(outcome.lastResult?.outcome).toBe(ActionOutcome.UNREACHABLE);
    expect(provider.callsFor('dc01')).toHaveLength(5);
  });

  it('should stop waiting promptly when cancelled between attempts', async () => {
    const provider = new ScriptedProvider().script('dc01', 'ping', ['unreachable']);
    const target = makeTarget('dc01');
    const { poller } = createHarness(provider, [target]);
    const controller = new AbortController();

    const started = Date.now();
    const pending = poller.waitUntilReady(
      target,
      probe,
      { maxAttempts: 5, delayMs: 10000 },
      { signal: controller.signal }
    );
    setTimeout(() => controller.abort(), 20);
    const outcome = await pending;

    expect(outcome.status).toBe(PollStatus.CANCELLED);
    expect(outcome.attempts).toBe(1);
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it('should not probe at all when already cancelled', async () => {
    const provider = new ScriptedProvider();
    const target = makeTarget('dc01');
    const { poller } = createHarness(provider, [target]);
    const controller = new AbortController();
    controller.abort();

    const outcome = await poller.waitUntilReady(target, probe, { maxAttempts: 3, delayMs: 1 }, {
      signal: controller.signal,
    });

    expect(outcome).toMatchObject({ status: PollStatus.CANCELLED, attempts: 0, lastResult: null });
    expect(provider.calls).toHaveLength(0);
  });

  it('should report each attempt and whether another follows', async () => {
    const provider = new ScriptedProvider().script('dc01', 'ping', [fail('WinRM not listening'), ok()]);
    const target = makeTarget('dc01');
    const { poller } = createHarness(provider, [target]);
    const seen: Array<[number, boolean]> = [];

    await poller.waitUntilReady(target, probe, { maxAttempts: 3, delayMs: 1 }, {
      onAttempt: ({ attempt, willRetry }) => seen.push([attempt, willRetry]),
    });

    expect(seen).toEqual([
      [1, true],
      [2, false],
    ]);
  });

  it('should refuse a mutating probe', async () => {
    const target = makeTarget('dc01');
    const { poller } = createHarness(new ScriptedProvider(), [target]);

    await expect(
      poller.waitUntilReady(target, defineAction('reboot'), { maxAttempts: 1, delayMs: 0 })
    ).rejects.toThrow("Readiness probe 'reboot' must be a query action");
  });

  it('should only retry actions marked retry-safe', async () => {
    const target = makeTarget('dc01');
    const { poller } = createHarness(new ScriptedProvider(), [target]);

    await expect(
      poller.retry(target, defineAction('create-user'), { maxAttempts: 2, delayMs: 0 })
    ).rejects.toThrow("Action 'create-user' is not marked retry-safe");

    const outcome = await poller.retry(
      target,
      defineAction('download-file', {}, { retrySafe: true }),
      { maxAttempts: 2, delayMs: 0 }
    );
    expect(outcome.status).toBe(PollStatus.READY);
  });
});
