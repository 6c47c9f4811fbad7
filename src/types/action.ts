// Side-effect class of an action
export const SideEffect = {
  MUTATING: 'mutating',
  QUERY: 'query',
} as const;

export type SideEffect = (typeof SideEffect)[keyof typeof SideEffect];

// Action Outcome
export const ActionOutcome = {
  CHANGED: 'changed',
  UNCHANGED: 'unchanged',
  FAILED: 'failed',
  UNREACHABLE: 'unreachable',
} as const;

export type ActionOutcome = (typeof ActionOutcome)[keyof typeof ActionOutcome];

// Failure classification carried on results and pipeline failures
export const ErrorKind = {
  ACTION_FAILED: 'action_failed',
  UNREACHABLE: 'unreachable',
  TIMED_OUT: 'timed_out',
  DEPENDENCY_FAILED: 'dependency_failed',
  CREDENTIAL_UNAVAILABLE: 'credential_unavailable',
  CANCELLED: 'cancelled',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export type ActionParams = Readonly<Record<string, unknown>>;

/**
 * A named idempotent operation. Immutable once defined.
 */
export interface Action {
  readonly name: string;
  readonly params: ActionParams;
  readonly sideEffect: SideEffect;
  /** Whether the action may be re-invoked after a failure */
  readonly retrySafe: boolean;
}

/**
 * Outcome of a single invocation. Produced once, never persisted beyond the run.
 */
export interface ActionResult {
  target: string;
  action: string;
  outcome: ActionOutcome;
  diagnostic: string;
  requiresReboot: boolean;
  errorKind: ErrorKind | null;
  durationMs: number;
}

/**
 * Whether the outcome counts as success (desired state reached).
 */
export function isSuccessOutcome(outcome: ActionOutcome): boolean {
  return outcome === ActionOutcome.CHANGED || outcome === ActionOutcome.UNCHANGED;
}
