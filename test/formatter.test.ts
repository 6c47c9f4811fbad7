/**
 * Tests for terminal output formatting
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  formatDuration,
  formatFailure,
  formatFailureLocation,
  formatRunReport,
  truncate,
} from '../src/control-plane/formatter.js';
import { buildRunReport } from '../src/pipeline/report.js';
import {
  ErrorKind,
  PipelineState,
  Role,
  type PipelineReport,
  type StageRecord,
} from '../src/types/index.js';

function stage(name: string, completed: boolean): StageRecord {
  return {
    name,
    startedAt: new Date('2026-01-01T00:00:00Z'),
    completedAt: completed ? new Date('2026-01-01T00:00:10Z') : null,
    steps: [],
    rebooted: false,
    readiness: null,
  };
}

function pipeline(overrides: Partial<PipelineReport>): PipelineReport {
  return {
    id: 'controller:dc01',
    role: Role.CONTROLLER,
    target: 'dc01',
    required: true,
    state: PipelineState.COMPLETED,
    startedAt: null,
    completedAt: null,
    stages: [],
    failure: null,
    ...overrides,
  };
}

describe('formatter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should format durations', () => {
    expect(formatDuration(45)).toBe('45s');
    expect(formatDuration(125)).toBe('2m 5s');
    expect(formatDuration(3725)).toBe('1h 2m');
  });

  it('should truncate long text', () => {
    expect(truncate('abcdefghij', 6)).toBe('abc...');
    expect(truncate('abc', 6)).toBe('abc');
  });

  it('should locate failures', () => {
    const base = { kind: ErrorKind.ACTION_FAILED, diagnostic: 'x' };

    expect(formatFailureLocation({ ...base, stage: null, step: null })).toBe('before start');
    expect(formatFailureLocation({ ...base, stage: 'join', step: null })).toBe('join');
    expect(formatFailureLocation({ ...base, stage: 'join', step: 'Join domain' })).toBe('join > Join domain');
  });

  it('should mark optional pipelines in failure lines', () => {
    const line = formatFailure(
      pipeline({
        id: 'deploy:deploy01',
        required: false,
        state: PipelineState.FAILED,
        failure: { kind: ErrorKind.TIMED_OUT, stage: 'bootstrap', step: 'ping', diagnostic: 'not ready after 3 attempt(s)' },
      })
    );

    expect(line).toBe('deploy:deploy01 (optional) at bootstrap > ping: [timed_out] not ready after 3 attempt(s)');
  });

  it('should render a run report table with failures', () => {
    const report = buildRunReport({
      runId: 'run-1',
      startedAt: new Date('2026-01-01T00:00:00Z'),
      completedAt: new Date('2026-01-01T00:01:05Z'),
      cancelled: false,
      pipelines: [
        pipeline({ stages: [stage('features', true), stage('domain', true)] }),
        pipeline({
          id: 'member:member01',
          role: Role.MEMBER,
          target: 'member01',
          state: PipelineState.FAILED,
          stages: [stage('join', false)],
          failure: { kind: ErrorKind.ACTION_FAILED, stage: 'join', step: 'Join domain', diagnostic: 'bad credentials' },
        }),
      ],
    });

    const lines = formatRunReport(report).split('\n');

    expect(lines[0]).toBe('Run run-1  FAILED  1m 5s');
    expect(lines[1]).toBe('');
    expect(lines[2]).toBe(`${'PIPELINE'.padEnd(28)}  ${'STATE'.padEnd(10)}  ${'STAGES'}  LAST STAGE`);
    expect(lines[3]).toBe(['-'.repeat(28), '-'.repeat(10), '-'.repeat(6), '-'.repeat(24)].join('  '));
    expect(lines[4]).toBe(`${'controller:dc01'.padEnd(28)}  ${'COMPLETED'.padEnd(10)}  ${'2'.padEnd(6)}  domain`);
    expect(lines[5]).toBe(`${'member:member01'.padEnd(28)}  ${'FAILED'.padEnd(10)}  ${'0'.padEnd(6)}  join`);
    expect(lines.slice(6)).toEqual([
      '',
      'Failures:',
      '  ✗ member:member01 at join > Join domain: [action_failed] bad credentials',
    ]);
  });

  it('should say so when no pipeline was bound', () => {
    const report = buildRunReport({
      runId: 'run-2',
      startedAt: new Date('2026-01-01T00:00:00Z'),
      completedAt: new Date('2026-01-01T00:00:00Z'),
      cancelled: false,
      pipelines: [],
    });

    expect(formatRunReport(report)).toBe('Run run-2  COMPLETED  0s\n\nNo pipelines were bound to targets.');
  });
});
