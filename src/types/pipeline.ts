import type { Action, ActionOutcome, ActionResult, ErrorKind } from './action.js';
import type { Role, Target } from './target.js';

/**
 * Attempt budget for a polling or retry loop.
 */
export interface PollBudget {
  maxAttempts: number;
  delayMs: number;
}

// Stage post-conditions
export const PostConditionKind = {
  REBOOT_IF_FLAGGED: 'reboot-if-flagged',
  WAIT_UNTIL_READY: 'wait-until-ready',
} as const;

export type PostConditionKind = (typeof PostConditionKind)[keyof typeof PostConditionKind];

export interface PostCondition {
  kind: PostConditionKind;
  /** Probe used after the stage; defaults to the configured probe action */
  probe: Action | null;
  /** Budget override; defaults to the reboot or readiness budget */
  budget: PollBudget | null;
}

/**
 * Condition on the outcome of an earlier step of the same pipeline.
 */
export interface StepCondition {
  step: string;
  /** `success` matches changed and unchanged */
  is: 'success' | 'failed' | 'changed' | 'unchanged';
}

/**
 * One action within a stage, plus how the workflow reacts to it.
 */
export interface Step {
  label: string;
  action: Action;
  /** Failure halts the pipeline and cascades to dependents */
  critical: boolean;
  /** Explicit retry budget; only valid for retry-safe actions */
  retry: PollBudget | null;
  when: StepCondition | null;
}

export interface Stage {
  name: string;
  steps: Step[];
  postCondition: PostCondition | null;
}

export interface Dependency {
  role: Role;
  /** Upstream stage name; null means the upstream's final stage */
  checkpoint: string | null;
}

/**
 * Declared stage sequence for every target of one role.
 */
export interface RoleWorkflow {
  role: Role;
  stages: Stage[];
  dependsOn: Dependency[];
  /** Whether the run fails when this role's pipelines fail */
  required: boolean;
}

/**
 * A role workflow bound to one target.
 */
export interface RolePipeline {
  id: string;
  role: Role;
  target: Target;
  stages: Stage[];
  required: boolean;
}

// Pipeline State (State Machine States)
export const PipelineState = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type PipelineState = (typeof PipelineState)[keyof typeof PipelineState];

// Pipeline Events
export const PipelineEvent = {
  START: 'start',
  COMPLETE: 'complete',
  FAIL: 'fail',
  DEPENDENCY_FAILED: 'dependency_failed',
  CANCEL: 'cancel',
} as const;

export type PipelineEvent = (typeof PipelineEvent)[keyof typeof PipelineEvent];

/**
 * State transition table.
 * Maps (current state, event) -> next state
 */
export const PIPELINE_TRANSITIONS: Record<
  PipelineState,
  Partial<Record<PipelineEvent, PipelineState>>
> = {
  [PipelineState.PENDING]: {
    [PipelineEvent.START]: PipelineState.RUNNING,
    [PipelineEvent.DEPENDENCY_FAILED]: PipelineState.FAILED,
    [PipelineEvent.CANCEL]: PipelineState.FAILED,
  },
  [PipelineState.RUNNING]: {
    [PipelineEvent.COMPLETE]: PipelineState.COMPLETED,
    [PipelineEvent.FAIL]: PipelineState.FAILED,
    [PipelineEvent.CANCEL]: PipelineState.FAILED,
  },
  // Terminal states - no transitions out
  [PipelineState.COMPLETED]: {},
  [PipelineState.FAILED]: {},
};

export const TERMINAL_PIPELINE_STATES: readonly PipelineState[] = [
  PipelineState.COMPLETED,
  PipelineState.FAILED,
];

export interface PipelineTransition {
  pipelineId: string;
  from: PipelineState;
  to: PipelineState;
  event: PipelineEvent;
  timestamp: Date;
}

/**
 * First critical failure of a pipeline.
 */
export interface PipelineFailure {
  kind: ErrorKind;
  stage: string | null;
  step: string | null;
  diagnostic: string;
}

export interface StepRecord {
  label: string;
  action: string;
  critical: boolean;
  /** null when the step's condition did not hold */
  result: ActionResult | null;
  skipped: boolean;
  attempts: number;
}

export interface ReadinessRecord {
  probe: string;
  status: 'ready' | 'timed_out' | 'cancelled';
  attempts: number;
}

export interface StageRecord {
  name: string;
  startedAt: Date;
  completedAt: Date | null;
  steps: StepRecord[];
  rebooted: boolean;
  readiness: ReadinessRecord | null;
}

export interface PipelineReport {
  id: string;
  role: Role;
  target: string;
  required: boolean;
  state: PipelineState;
  startedAt: Date | null;
  completedAt: Date | null;
  stages: StageRecord[];
  failure: PipelineFailure | null;
}

// Run Status
export const RunStatus = {
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

/**
 * Aggregated outcome of one invocation. Terminal and write-once.
 */
export interface RunReport {
  readonly runId: string;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly status: RunStatus;
  readonly pipelines: readonly PipelineReport[];
}

/**
 * Outcome lookup used by step conditions.
 */
export type StepOutcomes = ReadonlyMap<string, ActionOutcome>;
