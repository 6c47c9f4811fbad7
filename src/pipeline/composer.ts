/**
 * Pipeline Composer
 *
 * Binds role workflows to registered targets, orders roles by dependency and
 * runs every pipeline concurrently, holding each dependent pipeline in
 * `pending` until all upstream pipelines pass the declared checkpoint.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import type { TargetRegistry } from '../registry/target-registry.js';
import type { PipelineExecution, StageEvent, WorkflowEngine } from '../workflow/engine.js';
import { planExecution, type ExecutionPlan, type ResolvedDependency } from './plan.js';
import { buildRunReport } from './report.js';
import {
  ErrorKind,
  PipelineState,
  type PipelineReport,
  type RolePipeline,
  type RoleWorkflow,
  type RunReport,
} from '../types/index.js';

/**
 * One-shot boolean latch.
 */
class Checkpoint {
  private settled = false;
  private resolveFn: (reached: boolean) => void = () => undefined;
  readonly reached: Promise<boolean>;

  constructor() {
    this.reached = new Promise((resolve) => {
      this.resolveFn = resolve;
    });
  }

  settle(reached: boolean): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.resolveFn(reached);
  }
}

// Key for "pipeline completed", used when the upstream workflow has no stages
const COMPLETION = Symbol('completion');

type CheckpointKey = string | typeof COMPLETION;

/**
 * Checkpoints of every pipeline in a run, fed by engine events.
 */
class CheckpointBoard {
  private readonly board = new Map<string, Map<CheckpointKey, Checkpoint>>();
  private readonly finished = new Set<string>();

  get(pipelineId: string, key: CheckpointKey): Checkpoint {
    let checkpoints = this.board.get(pipelineId);
    if (!checkpoints) {
      checkpoints = new Map();
      this.board.set(pipelineId, checkpoints);
    }
    let checkpoint = checkpoints.get(key);
    if (!checkpoint) {
      checkpoint = new Checkpoint();
      checkpoints.set(key, checkpoint);
      if (this.finished.has(pipelineId)) {
        checkpoint.settle(false);
      }
    }
    return checkpoint;
  }

  stageCompleted(event: StageEvent): void {
    this.get(event.pipelineId, event.stage).settle(true);
  }

  /**
   * Anything not reached by the time a pipeline finishes never will be.
   */
  pipelineFinished(report: PipelineReport): void {
    this.finished.add(report.id);
    this.get(report.id, COMPLETION).settle(report.state === PipelineState.COMPLETED);
    for (const checkpoint of this.board.get(report.id)?.values() ?? []) {
      checkpoint.settle(false);
    }
  }
}

export class PipelineComposer {
  private readonly logger: Logger;

  constructor(
    private readonly engine: WorkflowEngine,
    private readonly registry: TargetRegistry
  ) {
    this.logger = createLogger('pipeline-composer');
  }

  /**
   * Validate and order the role graph without running anything.
   */
  plan(workflows: readonly RoleWorkflow[]): ExecutionPlan {
    return planExecution(workflows);
  }

  /**
   * Bind each role workflow to every registered target of that role.
   */
  bind(plan: ExecutionPlan): RolePipeline[] {
    const pipelines: RolePipeline[] = [];
    for (const role of plan.order) {
      const workflow = plan.workflows.get(role);
      if (!workflow) {
        continue;
      }
      for (const target of this.registry.byRole(role)) {
        pipelines.push({
          id: `${role}:${target.name}`,
          role,
          target,
          stages: workflow.stages,
          required: workflow.required,
        });
      }
    }

    const bound = new Set(pipelines.map((pipeline) => pipeline.target.name));
    for (const target of this.registry.all()) {
      if (!bound.has(target.name)) {
        this.logger.warn({ target: target.name, role: target.role }, 'No workflow for target role, skipping');
      }
    }

    return pipelines;
  }

  /**
   * Run every pipeline and return the terminal report.
   *
   * @throws CyclicDependencyError or UnknownCheckpointError before any action runs
   */
  async runAll(workflows: readonly RoleWorkflow[], signal?: AbortSignal): Promise<RunReport> {
    const plan = this.plan(workflows);
    const runId = nanoid(12);
    const startedAt = new Date();
    const executions = this.bind(plan).map((pipeline) => this.engine.prepare(pipeline));

    this.logger.info(
      { runId, order: plan.order, pipelines: executions.map((execution) => execution.pipeline.id) },
      'Run started'
    );

    const board = new CheckpointBoard();
    const onStageCompleted = (event: StageEvent): void => board.stageCompleted(event);
    const onPipelineFinished = (report: PipelineReport): void => board.pipelineFinished(report);
    this.engine.on('stage-completed', onStageCompleted);
    this.engine.on('pipeline-finished', onPipelineFinished);

    let reports: PipelineReport[];
    try {
      reports = await Promise.all(
        executions.map((execution) => this.launch(execution, plan, executions, board, signal))
      );
    } finally {
      this.engine.off('stage-completed', onStageCompleted);
      this.engine.off('pipeline-finished', onPipelineFinished);
    }

    const report = buildRunReport({
      runId,
      startedAt,
      completedAt: new Date(),
      cancelled: signal?.aborted ?? false,
      pipelines: reports,
    });

    this.logger.info({ runId, status: report.status }, 'Run finished');
    return report;
  }

  private async launch(
    execution: PipelineExecution,
    plan: ExecutionPlan,
    all: readonly PipelineExecution[],
    board: CheckpointBoard,
    signal: AbortSignal | undefined
  ): Promise<PipelineReport> {
    const { pipeline } = execution;
    const gates = plan.dependencies
      .filter((dependency) => dependency.dependent === pipeline.role)
      .flatMap((dependency) =>
        all
          .filter((upstream) => upstream.pipeline.role === dependency.upstream)
          .map((upstream) => ({
            upstream: upstream.pipeline.id,
            dependency,
            reached: board.get(upstream.pipeline.id, dependency.checkpoint ?? COMPLETION).reached,
          }))
      );

    if (gates.length > 0) {
      this.logger.debug(
        { pipeline: pipeline.id, waitingOn: gates.map((gate) => `${gate.upstream}@${checkpointLabel(gate.dependency)}`) },
        'Waiting for checkpoints'
      );
    }

    const outcomes = await Promise.all(gates.map(async (gate) => ({ ...gate, ok: await gate.reached })));

    if (signal?.aborted) {
      return this.engine.abandon(execution, ErrorKind.CANCELLED, 'run cancelled before pipeline start');
    }

    const missed = outcomes.find((outcome) => !outcome.ok);
    if (missed) {
      return this.engine.abandon(
        execution,
        ErrorKind.DEPENDENCY_FAILED,
        `upstream pipeline ${missed.upstream} failed before checkpoint '${checkpointLabel(missed.dependency)}'`
      );
    }

    return this.engine.run(execution, signal);
  }
}

function checkpointLabel(dependency: ResolvedDependency): string {
  return dependency.checkpoint ?? 'completion';
}
