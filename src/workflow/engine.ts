/**
 * Workflow Engine
 *
 * Runs one RolePipeline: stages in order, steps in order, reboot-then-wait
 * after any stage that asked for a reboot. A critical step failure stops the
 * pipeline; later stages never start.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import type { ActionExecutor } from '../executor/action-executor.js';
import { PollStatus, type PollOutcome, type ReadinessPoller } from '../readiness/poller.js';
import type { TargetRegistry } from '../registry/target-registry.js';
import { PipelineStateMachine } from './state-machine.js';
import {
  ActionOutcome,
  ErrorKind,
  PipelineEvent,
  PipelineState,
  PostConditionKind,
  TargetStatus,
  isSuccessOutcome,
  type Action,
  type ActionResult,
  type PipelineFailure,
  type PipelineReport,
  type PollBudget,
  type RolePipeline,
  type Stage,
  type StageRecord,
  type Step,
  type StepCondition,
  type StepOutcomes,
} from '../types/index.js';

export interface WorkflowEngineOptions {
  /** Budget for the wait that follows a reboot */
  rebootBudget: PollBudget;
  /** Budget for wait-until-ready stages */
  readinessBudget: PollBudget;
  /** Probe used when a stage does not name one */
  probe: Action;
  /** Action issued when a stage asks for a reboot */
  rebootAction: Action;
}

export interface StageEvent {
  pipelineId: string;
  stage: string;
  at: Date;
}

/**
 * Mutable run state of one pipeline.
 */
export class PipelineExecution {
  readonly stateMachine: PipelineStateMachine;
  readonly stages: StageRecord[] = [];
  readonly outcomes = new Map<string, ActionOutcome>();
  failure: PipelineFailure | null = null;

  constructor(readonly pipeline: RolePipeline) {
    this.stateMachine = new PipelineStateMachine(pipeline.id);
  }

  get state(): PipelineState {
    return this.stateMachine.currentState;
  }

  toReport(): PipelineReport {
    return {
      id: this.pipeline.id,
      role: this.pipeline.role,
      target: this.pipeline.target.name,
      required: this.pipeline.required,
      state: this.state,
      startedAt: this.stateMachine.enteredAt(PipelineState.RUNNING),
      completedAt: this.stateMachine.isTerminal
        ? this.stateMachine.history[this.stateMachine.history.length - 1]?.timestamp ?? null
        : null,
      stages: this.stages.map((stage) => ({ ...stage, steps: [...stage.steps] })),
      failure: this.failure,
    };
  }
}

export class WorkflowEngine extends EventEmitter {
  private readonly logger: Logger;

  constructor(
    private readonly executor: ActionExecutor,
    private readonly poller: ReadinessPoller,
    private readonly registry: TargetRegistry,
    private readonly options: WorkflowEngineOptions
  ) {
    super();
    this.logger = createLogger('workflow-engine');
  }

  prepare(pipeline: RolePipeline): PipelineExecution {
    return new PipelineExecution(pipeline);
  }

  /**
   * Prepare and run a pipeline in one call.
   */
  async execute(pipeline: RolePipeline, signal?: AbortSignal): Promise<PipelineReport> {
    return this.run(this.prepare(pipeline), signal);
  }

  /**
   * Fail a pipeline that never started (upstream failure or cancellation).
   * No action is invoked.
   */
  abandon(execution: PipelineExecution, kind: ErrorKind, diagnostic: string): PipelineReport {
    const event = kind === ErrorKind.CANCELLED ? PipelineEvent.CANCEL : PipelineEvent.DEPENDENCY_FAILED;
    execution.failure = { kind, stage: null, step: null, diagnostic };
    execution.stateMachine.transition(event, { diagnostic });
    this.registry.updateStatus(execution.pipeline.target.name, TargetStatus.FAILED);

    const report = execution.toReport();
    this.emit('pipeline-finished', report);
    return report;
  }

  async run(execution: PipelineExecution, signal?: AbortSignal): Promise<PipelineReport> {
    const { pipeline } = execution;

    if (signal?.aborted) {
      return this.abandon(execution, ErrorKind.CANCELLED, 'run cancelled before pipeline start');
    }

    execution.stateMachine.transition(PipelineEvent.START);
    this.emit('pipeline-started', { pipelineId: pipeline.id, at: new Date() });

    let current: string | null = null;
    try {
      for (const stage of pipeline.stages) {
        current = stage.name;
        if (signal?.aborted) {
          return this.fail(execution, cancelled(stage.name, null));
        }

        const record: StageRecord = {
          name: stage.name,
          startedAt: new Date(),
          completedAt: null,
          steps: [],
          rebooted: false,
          readiness: null,
        };
        execution.stages.push(record);
        this.emit('stage-started', { pipelineId: pipeline.id, stage: stage.name, at: record.startedAt });
        this.logger.info({ pipeline: pipeline.id, stage: stage.name }, 'Stage started');

        const failure = await this.runStage(execution, stage, record, signal);
        if (failure) {
          return this.fail(execution, failure);
        }

        record.completedAt = new Date();
        this.logger.info({ pipeline: pipeline.id, stage: stage.name }, 'Stage completed');
        this.emit('stage-completed', { pipelineId: pipeline.id, stage: stage.name, at: record.completedAt });
      }
    } catch (error) {
      if (execution.stateMachine.isTerminal) {
        throw error;
      }
      // A throw inside a stage still ends the pipeline as failed
      return this.fail(execution, {
        kind: ErrorKind.ACTION_FAILED,
        stage: current,
        step: null,
        diagnostic: error instanceof Error ? error.message : String(error),
      });
    }

    execution.stateMachine.transition(PipelineEvent.COMPLETE);
    const report = execution.toReport();
    this.emit('pipeline-finished', report);
    return report;
  }

  private async runStage(
    execution: PipelineExecution,
    stage: Stage,
    record: StageRecord,
    signal: AbortSignal | undefined
  ): Promise<PipelineFailure | null> {
    const { target } = execution.pipeline;
    let rebootRequested = false;

    for (const step of stage.steps) {
      if (signal?.aborted) {
        return cancelled(stage.name, step.label);
      }

      if (step.when && !conditionHolds(step.when, execution.outcomes)) {
        this.logger.debug({ pipeline: execution.pipeline.id, step: step.label }, 'Step skipped');
        record.steps.push({
          label: step.label,
          action: step.action.name,
          critical: step.critical,
          result: null,
          skipped: true,
          attempts: 0,
        });
        continue;
      }

      const { result, attempts } = await this.invokeStep(execution, step, signal);
      record.steps.push({
        label: step.label,
        action: step.action.name,
        critical: step.critical,
        result,
        skipped: false,
        attempts,
      });
      execution.outcomes.set(step.label, result.outcome);

      if (signal?.aborted || result.errorKind === ErrorKind.CANCELLED) {
        return cancelled(stage.name, step.label);
      }

      if (isSuccessOutcome(result.outcome)) {
        rebootRequested ||= result.requiresReboot;
        continue;
      }

      if (step.critical) {
        return {
          kind: result.errorKind ?? ErrorKind.ACTION_FAILED,
          stage: stage.name,
          step: step.label,
          diagnostic: result.diagnostic,
        };
      }

      this.logger.warn(
        { pipeline: execution.pipeline.id, step: step.label, outcome: result.outcome, diagnostic: result.diagnostic },
        'Non-critical step failed, continuing'
      );
    }

    const postCondition = stage.postCondition;
    const probe = postCondition?.probe ?? this.options.probe;

    if (rebootRequested) {
      const reboot = await this.executor.invoke(target, this.options.rebootAction, signal);
      record.rebooted = true;
      record.steps.push({
        label: this.options.rebootAction.name,
        action: this.options.rebootAction.name,
        critical: true,
        result: reboot,
        skipped: false,
        attempts: 1,
      });

      if (signal?.aborted || reboot.errorKind === ErrorKind.CANCELLED) {
        return cancelled(stage.name, this.options.rebootAction.name);
      }
      // Losing the connection while the host goes down is expected
      if (reboot.outcome === ActionOutcome.FAILED) {
        return {
          kind: reboot.errorKind ?? ErrorKind.ACTION_FAILED,
          stage: stage.name,
          step: this.options.rebootAction.name,
          diagnostic: reboot.diagnostic,
        };
      }

      const budget =
        postCondition?.kind === PostConditionKind.REBOOT_IF_FLAGGED && postCondition.budget
          ? postCondition.budget
          : this.options.rebootBudget;
      return this.awaitReadiness(execution, stage, record, probe, budget, signal);
    }

    if (postCondition?.kind === PostConditionKind.WAIT_UNTIL_READY) {
      const budget = postCondition.budget ?? this.options.readinessBudget;
      return this.awaitReadiness(execution, stage, record, probe, budget, signal);
    }

    return null;
  }

  private async invokeStep(
    execution: PipelineExecution,
    step: Step,
    signal: AbortSignal | undefined
  ): Promise<{ result: ActionResult; attempts: number }> {
    const { target } = execution.pipeline;

    if (!step.retry) {
      return { result: await this.executor.invoke(target, step.action, signal), attempts: 1 };
    }

    const outcome = await this.poller.retry(target, step.action, step.retry, {
      signal,
      onAttempt: ({ attempt, result, willRetry }) => {
        if (willRetry) {
          this.logger.info(
            { pipeline: execution.pipeline.id, step: step.label, attempt, outcome: result.outcome },
            'Retrying step'
          );
        }
      },
    });

    return { result: outcome.lastResult ?? cancelledResult(target.name, step.action.name), attempts: outcome.attempts };
  }

  private async awaitReadiness(
    execution: PipelineExecution,
    stage: Stage,
    record: StageRecord,
    probe: Action,
    budget: PollBudget,
    signal: AbortSignal | undefined
  ): Promise<PipelineFailure | null> {
    const outcome: PollOutcome = await this.poller.waitUntilReady(
      execution.pipeline.target,
      probe,
      budget,
      { signal }
    );
    record.readiness = { probe: probe.name, status: outcome.status, attempts: outcome.attempts };

    switch (outcome.status) {
      case PollStatus.READY:
        return null;
      case PollStatus.CANCELLED:
        return cancelled(stage.name, probe.name);
      case PollStatus.TIMED_OUT:
        return {
          kind: ErrorKind.TIMED_OUT,
          stage: stage.name,
          step: probe.name,
          diagnostic:
            `not ready after ${outcome.attempts} attempt(s)` +
            (outcome.lastResult?.diagnostic ? `: ${outcome.lastResult.diagnostic}` : ''),
        };
    }
  }

  private fail(execution: PipelineExecution, failure: PipelineFailure): PipelineReport {
    execution.failure = failure;
    const event = failure.kind === ErrorKind.CANCELLED ? PipelineEvent.CANCEL : PipelineEvent.FAIL;
    execution.stateMachine.transition(event, { ...failure });
    this.registry.updateStatus(execution.pipeline.target.name, TargetStatus.FAILED);

    this.logger.error({ pipeline: execution.pipeline.id, ...failure }, 'Pipeline failed');

    const report = execution.toReport();
    this.emit('pipeline-finished', report);
    return report;
  }
}

function conditionHolds(condition: StepCondition, outcomes: StepOutcomes): boolean {
  const outcome = outcomes.get(condition.step);
  if (outcome === undefined) {
    return false;
  }
  switch (condition.is) {
    case 'success':
      return isSuccessOutcome(outcome);
    case 'failed':
      return !isSuccessOutcome(outcome);
    case 'changed':
      return outcome === ActionOutcome.CHANGED;
    case 'unchanged':
      return outcome === ActionOutcome.UNCHANGED;
  }
}

function cancelled(stage: string, step: string | null): PipelineFailure {
  return { kind: ErrorKind.CANCELLED, stage, step, diagnostic: 'run cancelled' };
}

function cancelledResult(target: string, action: string): ActionResult {
  return {
    target,
    action,
    outcome: ActionOutcome.FAILED,
    diagnostic: 'cancelled',
    requiresReboot: false,
    errorKind: ErrorKind.CANCELLED,
    durationMs: 0,
  };
}
