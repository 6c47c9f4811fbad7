/**
 * Tests for the pipeline composer and execution planning
 */

import { describe, it, expect } from 'vitest';
import { planExecution } from '../src/pipeline/plan.js';
import { failedPipelines, succeeded } from '../src/pipeline/report.js';
import type { StageEvent } from '../src/workflow/engine.js';
import { defineAction } from '../src/executor/catalog.js';
import {
  CyclicDependencyError,
  ErrorKind,
  PipelineState,
  PostConditionKind,
  Role,
  RunStatus,
  UnknownCheckpointError,
  type Dependency,
  type RoleWorkflow,
  type Stage,
} from '../src/types/index.js';
import {
  ScriptedProvider,
  createHarness,
  fail,
  makeStage,
  makeStep,
  makeTarget,
} from './mocks/scripted-provider.js';

function workflow(
  role: Role,
  stages: Stage[],
  dependsOn: Dependency[] = [],
  required = true
): RoleWorkflow {
  return { role, stages, dependsOn, required };
}

const controllerWorkflow = workflow(Role.CONTROLLER, [
  makeStage('features', [makeStep('Install ADDS', 'install-feature')]),
  makeStage('domain', [makeStep('Create domain', 'create-domain')]),
  makeStage('users', [makeStep('Create user', 'create-user')]),
]);

const memberWorkflow = workflow(
  Role.MEMBER,
  [makeStage('join', [makeStep('Join domain', 'join-domain')])],
  [{ role: Role.CONTROLLER, checkpoint: 'domain' }]
);

const inventory = () => [
  makeTarget('dc01', Role.CONTROLLER),
  makeTarget('member01', Role.MEMBER),
  makeTarget('member02', Role.MEMBER),
];

describe('planExecution', () => {
  it('should order upstream roles before their dependents', () => {
    const plan = planExecution([memberWorkflow, controllerWorkflow]);

    expect(plan.order).toEqual([Role.CONTROLLER, Role.MEMBER]);
    expect(plan.dependencies).toEqual([
      { dependent: Role.MEMBER, upstream: Role.CONTROLLER, checkpoint: 'domain' },
    ]);
  });

  it('should resolve a missing checkpoint to the upstream final stage', () => {
    const plan = planExecution([
      controllerWorkflow,
      workflow(Role.MEMBER, memberWorkflow.stages, [{ role: Role.CONTROLLER, checkpoint: null }]),
    ]);

    expect(plan.dependencies[0]?.checkpoint).toBe('users');
  });

  it('should report the cycle path', () => {
    const cyclic = [
      workflow(Role.CONTROLLER, controllerWorkflow.stages, [{ role: Role.MEMBER, checkpoint: null }]),
      workflow(Role.MEMBER, memberWorkflow.stages, [{ role: Role.CONTROLLER, checkpoint: null }]),
    ];

    expect(() => planExecution(cyclic)).toThrow(CyclicDependencyError);
    expect(() => planExecution(cyclic)).toThrow('Cyclic role dependency: controller -> member -> controller');
  });

  it('should reject an unknown checkpoint', () => {
    const broken = workflow(Role.MEMBER, memberWorkflow.stages, [
      { role: Role.CONTROLLER, checkpoint: 'forest' },
    ]);

    expect(() => planExecution([controllerWorkflow, broken])).toThrow(UnknownCheckpointError);
    expect(() => planExecution([controllerWorkflow, broken])).toThrow(
      "Role 'member' depends on unknown checkpoint 'forest' of role 'controller'"
    );
  });

  it('should reject a dependency on an undeclared role', () => {
    expect(() => planExecution([memberWorkflow])).toThrow(
      "Role 'member' depends on undeclared role 'controller'"
    );
  });

  it('should reject two workflows for one role', () => {
    expect(() => planExecution([controllerWorkflow, controllerWorkflow])).toThrow(
      "Duplicate workflow for role 'controller'"
    );
  });
});

describe('PipelineComposer', () => {
  it('should hold dependents until the upstream checkpoint is reached', async () => {
    const provider = new ScriptedProvider().slow('dc01', 5);
    const { composer, engine } = createHarness(provider, inventory());
    const events: string[] = [];
    engine.on('stage-started', (event: StageEvent) => events.push(`start ${event.pipelineId} ${event.stage}`));
    engine.on('stage-completed', (event: StageEvent) => events.push(`done ${event.pipelineId} ${event.stage}`));

    const report = await composer.runAll([controllerWorkflow, memberWorkflow]);

    expect(report.status).toBe(RunStatus.COMPLETED);
    expect(succeeded(report)).toBe(true);
    expect(report.pipelines.map((pipeline) => [pipeline.id, pipeline.state])).toEqual([
      ['controller:dc01', PipelineState.COMPLETED],
      ['member:member01', PipelineState.COMPLETED],
      ['member:member02', PipelineState.COMPLETED],
    ]);

    const domainDone = events.indexOf('done controller:dc01 domain');
    expect(domainDone).toBeGreaterThan(-1);
    expect(events.indexOf('start member:member01 join')).toBeGreaterThan(domainDone);
    expect(events.indexOf('start member:member02 join')).toBeGreaterThan(domainDone);
  });

  it('should fail dependents without running them when upstream fails', async () => {
    const provider = new ScriptedProvider().script('dc01', 'create-domain', [fail('forest exists')]);
    const { composer } = createHarness(provider, inventory());

    const report = await composer.runAll([controllerWorkflow, memberWorkflow]);

    expect(report.status).toBe(RunStatus.FAILED);
    const member = report.pipelines.find((pipeline) => pipeline.id === 'member:member01');
    expect(member?.state).toBe(PipelineState.FAILED);
    expect(member?.failure).toEqual({
      kind: ErrorKind.DEPENDENCY_FAILED,
      stage: null,
      step: null,
      diagnostic: "upstream pipeline controller:dc01 failed before checkpoint 'domain'",
    });
    expect(provider.callsFor('member01')).toEqual([]);
    expect(provider.callsFor('member02')).toEqual([]);
  });

  it('should let dependents run when upstream fails after the checkpoint', async () => {
    const provider = new ScriptedProvider().script('dc01', 'create-user', [fail('password policy')]);
    const { composer } = createHarness(provider, inventory());

    const report = await composer.runAll([controllerWorkflow, memberWorkflow]);

    expect(report.status).toBe(RunStatus.FAILED);
    expect(report.pipelines.map((pipeline) => pipeline.state)).toEqual([
      PipelineState.FAILED,
      PipelineState.COMPLETED,
      PipelineState.COMPLETED,
    ]);
  });

  it('should keep sibling pipelines independent', async () => {
    const provider = new ScriptedProvider().script('member01', 'join-domain', [fail('bad credentials')]);
    const { composer } = createHarness(provider, inventory());

    const report = await composer.runAll([controllerWorkflow, memberWorkflow]);

    expect(report.status).toBe(RunStatus.FAILED);
    expect(failedPipelines(report).map((pipeline) => pipeline.id)).toEqual(['member:member01']);
    expect(provider.callsFor('member02')).toEqual(['join-domain']);
  });

  it('should still report when a pipeline throws mid-run', async () => {
    const provider = new ScriptedProvider();
    const { composer } = createHarness(provider, inventory());
    const controller = workflow(Role.CONTROLLER, [
      makeStage('features', [makeStep('Install ADDS', 'install-feature')]),
      makeStage('domain', [makeStep('Create domain', 'create-domain')], {
        postCondition: { kind: PostConditionKind.WAIT_UNTIL_READY, probe: defineAction('reboot'), budget: null },
      }),
    ]);

    const report = await composer.runAll([controller, memberWorkflow]);

    expect(report.status).toBe(RunStatus.FAILED);
    expect(report.pipelines.map((pipeline) => [pipeline.id, pipeline.state, pipeline.failure?.kind])).toEqual([
      ['controller:dc01', PipelineState.FAILED, ErrorKind.ACTION_FAILED],
      ['member:member01', PipelineState.FAILED, ErrorKind.DEPENDENCY_FAILED],
      ['member:member02', PipelineState.FAILED, ErrorKind.DEPENDENCY_FAILED],
    ]);
    expect(provider.callsFor('member01')).toEqual([]);
  });

  it('should throw on a cycle before invoking any action', async () => {
    const provider = new ScriptedProvider();
    const { composer } = createHarness(provider, inventory());
    const cyclic = [
      workflow(Role.CONTROLLER, controllerWorkflow.stages, [{ role: Role.MEMBER, checkpoint: 'join' }]),
      memberWorkflow,
    ];

    await expect(composer.runAll(cyclic)).rejects.toThrow(CyclicDependencyError);
    expect(provider.calls).toEqual([]);
  });

  it('should not fail the run for an optional role', async () => {
    const provider = new ScriptedProvider().script('deploy01', 'install-package', [fail('mirror offline')]);
    const { composer } = createHarness(provider, [...inventory(), makeTarget('deploy01', Role.DEPLOY)]);
    const deploy = workflow(
      Role.DEPLOY,
      [makeStage('bootstrap', [makeStep('Install tooling', 'install-package')])],
      [],
      false
    );

    const report = await composer.runAll([deploy, controllerWorkflow, memberWorkflow]);

    expect(report.status).toBe(RunStatus.COMPLETED);
    expect(failedPipelines(report).map((pipeline) => pipeline.id)).toEqual(['deploy:deploy01']);
  });

  it('should treat a checkpoint on a role without targets as reached', async () => {
    const provider = new ScriptedProvider();
    const { composer } = createHarness(provider, [makeTarget('dc01', Role.CONTROLLER)]);
    const deploy = workflow(Role.DEPLOY, [makeStage('bootstrap', [makeStep('Ping', 'ping')])]);
    const controller = workflow(Role.CONTROLLER, controllerWorkflow.stages, [
      { role: Role.DEPLOY, checkpoint: 'bootstrap' },
    ]);

    const report = await composer.runAll([deploy, controller]);

    expect(report.status).toBe(RunStatus.COMPLETED);
    expect(report.pipelines.map((pipeline) => pipeline.id)).toEqual(['controller:dc01']);
  });

  it('should cancel running and waiting pipelines', async () => {
    const provider = new ScriptedProvider().slow('dc01', 10000);
    const { composer } = createHarness(provider, inventory());
    const controller = new AbortController();

    const pending = composer.runAll([controllerWorkflow, memberWorkflow], controller.signal);
    setTimeout(() => controller.abort(), 20);
    const report = await pending;

    expect(report.status).toBe(RunStatus.CANCELLED);
    expect(report.pipelines.map((pipeline) => pipeline.failure?.kind)).toEqual([
      ErrorKind.CANCELLED,
      ErrorKind.CANCELLED,
      ErrorKind.CANCELLED,
    ]);
    expect(provider.callsFor('member01')).toEqual([]);
  });

  it('should produce a frozen report with a run id', async () => {
    const { composer } = createHarness(new ScriptedProvider(), inventory());

    const report = await composer.runAll([controllerWorkflow, memberWorkflow]);

    expect(report.runId).toHaveLength(12);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.pipelines)).toBe(true);
    expect(report.completedAt.getTime()).toBeGreaterThanOrEqual(report.startedAt.getTime());
  });
});
