import {
  ErrorKind,
  PipelineState,
  RunStatus,
  type PipelineReport,
  type RunReport,
  type StageRecord,
} from '../types/index.js';

export interface RunReportInput {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  /** Whether the run's signal was aborted */
  cancelled: boolean;
  pipelines: PipelineReport[];
}

/**
 * Freeze in place and keep the declared type.
 */
function frozen<T>(value: T): T {
  Object.freeze(value);
  return value;
}

function freezeStage(stage: StageRecord): StageRecord {
  return frozen({
    ...stage,
    steps: frozen(
      stage.steps.map((step) => frozen({ ...step, result: step.result ? frozen({ ...step.result }) : null }))
    ),
    readiness: stage.readiness ? frozen({ ...stage.readiness }) : null,
  });
}

function freezePipeline(pipeline: PipelineReport): PipelineReport {
  return frozen({
    ...pipeline,
    stages: frozen(pipeline.stages.map(freezeStage)),
    failure: pipeline.failure ? frozen({ ...pipeline.failure }) : null,
  });
}

/**
 * Assemble the terminal report. The result is deeply frozen and shares no
 * record with the engine.
 */
export function buildRunReport(input: RunReportInput): RunReport {
  const pipelines = input.pipelines.map(freezePipeline);

  let status: RunStatus;
  if (input.cancelled && pipelines.some((pipeline) => pipeline.failure?.kind === ErrorKind.CANCELLED)) {
    status = RunStatus.CANCELLED;
  } else if (
    pipelines.every((pipeline) => !pipeline.required || pipeline.state === PipelineState.COMPLETED)
  ) {
    status = RunStatus.COMPLETED;
  } else {
    status = RunStatus.FAILED;
  }

  return Object.freeze({
    runId: input.runId,
    startedAt: input.startedAt,
    completedAt: input.completedAt,
    status,
    pipelines: Object.freeze(pipelines),
  });
}

/**
 * Whether every required pipeline completed.
 */
export function succeeded(report: RunReport): boolean {
  return report.status === RunStatus.COMPLETED;
}

/**
 * Pipelines that did not complete, required ones first.
 */
export function failedPipelines(report: RunReport): PipelineReport[] {
  return report.pipelines
    .filter((pipeline) => pipeline.state !== PipelineState.COMPLETED)
    .sort((a, b) => Number(b.required) - Number(a.required));
}
