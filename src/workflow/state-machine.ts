import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import {
  PIPELINE_TRANSITIONS,
  PipelineEvent,
  PipelineState,
  TERMINAL_PIPELINE_STATES,
  type PipelineTransition,
} from '../types/index.js';

/**
 * Error thrown when an invalid state transition is attempted.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly pipelineId: string,
    public readonly fromState: PipelineState,
    public readonly event: PipelineEvent,
    public readonly validEvents: PipelineEvent[]
  ) {
    super(
      `Invalid transition: Cannot apply '${event}' to pipeline ${pipelineId} ` +
        `in state '${fromState}'. Valid events: [${validEvents.join(', ')}]`
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Pending -> Running -> {Completed, Failed}, with an audit trail.
 */
export class PipelineStateMachine extends EventEmitter {
  private readonly logger: Logger;
  private _currentState: PipelineState = PipelineState.PENDING;
  private readonly _history: PipelineTransition[] = [];

  constructor(private readonly pipelineId: string) {
    super();
    this.logger = createLogger(`pipeline:${pipelineId}`);
  }

  get currentState(): PipelineState {
    return this._currentState;
  }

  get history(): readonly PipelineTransition[] {
    return this._history;
  }

  get isTerminal(): boolean {
    return TERMINAL_PIPELINE_STATES.includes(this._currentState);
  }

  /**
   * Time the pipeline entered a state, if it ever did.
   */
  enteredAt(state: PipelineState): Date | null {
    return this._history.find((transition) => transition.to === state)?.timestamp ?? null;
  }

  transition(event: PipelineEvent, metadata?: Record<string, unknown>): PipelineState {
    const validTransitions = PIPELINE_TRANSITIONS[this._currentState];
    const nextState = validTransitions[event];

    if (!nextState) {
      throw new InvalidTransitionError(
        this.pipelineId,
        this._currentState,
        event,
        this.getValidEvents()
      );
    }

    const transition: PipelineTransition = {
      pipelineId: this.pipelineId,
      from: this._currentState,
      to: nextState,
      event,
      timestamp: new Date(),
    };

    this._currentState = nextState;
    this._history.push(transition);

    this.logger.info({ from: transition.from, to: nextState, event, ...metadata }, 'State transition');

    this.emit('state-changed', transition);
    if (this.isTerminal) {
      this.emit('terminal-reached', nextState, this.pipelineId);
    }

    return nextState;
  }

  /**
   * Check if a transition is valid without performing it.
   */
  canTransition(event: PipelineEvent): boolean {
    return PIPELINE_TRANSITIONS[this._currentState][event] !== undefined;
  }

  getValidEvents(): PipelineEvent[] {
    const validTransitions = PIPELINE_TRANSITIONS[this._currentState];
    return Object.values(PipelineEvent).filter((event) => validTransitions[event] !== undefined);
  }
}
