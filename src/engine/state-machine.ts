/**
 * Pipeline state machine.
 *
 * Enforces the forward-only transitions of the Build and Revise flows,
 * producing typed errors on invalid transitions.
 */

import {
  PipelineState,
  StateTransitionRecord,
  VALID_PIPELINE_TRANSITIONS,
} from '../domain/pipeline';
import { Round } from '../domain/task';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a pipeline state transition for the given flow. */
export function transitionPipelineState(
  round: Round,
  current: PipelineState,
  target: PipelineState,
): TransitionResult<PipelineState> {
  const validTargets = VALID_PIPELINE_TRANSITIONS[round][current];
  if (!validTargets || !validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SYSTEM.INVALID_TRANSITION',
        message: `Invalid pipeline state transition: ${current} -> ${target}`,
        retryable: false,
        details: { round, current, target, validTargets: validTargets ?? [] },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a pipeline state is terminal. */
export function isTerminalPipelineState(state: PipelineState): boolean {
  return state === PipelineState.Completed || state === PipelineState.Failed;
}

export class InvalidTransitionError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'InvalidTransitionError';
  }
}

/** Tracks the current state and transition history of one run. */
export class PipelineStateTracker {
  private current: PipelineState = PipelineState.Received;
  private readonly history: StateTransitionRecord[] = [];

  constructor(readonly round: Round) {}

  get state(): PipelineState {
    return this.current;
  }

  /** Move to `target`; throws InvalidTransitionError if the flow forbids it. */
  advance(target: PipelineState): void {
    const result = transitionPipelineState(this.round, this.current, target);
    if (!result.success || !result.newStatus) {
      throw new InvalidTransitionError(
        result.error ?? createTypedError({ code: 'SYSTEM.INVALID_TRANSITION', message: `${this.current} -> ${target}` }),
      );
    }
    this.history.push({ from: this.current, to: result.newStatus, at: new Date().toISOString() });
    this.current = result.newStatus;
  }

  /** Enter Failed unless already terminal. */
  fail(): void {
    if (!isTerminalPipelineState(this.current)) {
      this.advance(PipelineState.Failed);
    }
  }

  getHistory(): readonly StateTransitionRecord[] {
    return [...this.history];
  }
}
