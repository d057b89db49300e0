/**
 * Pipeline state machine.
 *
 * Enforces valid state transitions for a pipeline run,
 * producing typed errors on invalid transitions.
 */

import { PipelineState, VALID_PIPELINE_TRANSITIONS } from '../domain/pipeline';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newState?: S;
  error?: TypedError;
}

/** Attempt a pipeline state transition. */
export function transitionPipelineState(
  current: PipelineState,
  target: PipelineState,
): TransitionResult<PipelineState> {
  const validTargets = VALID_PIPELINE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    const error = invalidTransitionError(current, target).typedError;
    return {
      success: false,
      error: { ...error, details: { ...error.details, validTargets } },
    };
  }
  return { success: true, newState: target };
}

/** Check if a pipeline state is terminal. */
export function isTerminalPipelineState(state: PipelineState): boolean {
  return state === PipelineState.Done || state === PipelineState.Failed;
}
