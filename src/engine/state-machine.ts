/**
 * Reconciliation and stage state machines.
 *
 * Enforces valid state transitions, producing typed errors on invalid
 * transitions.
 */

import {
  ReconcileStatus,
  StageStatus,
  VALID_RECONCILE_TRANSITIONS,
  VALID_STAGE_TRANSITIONS,
} from '../domain/reconciliation';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a reconciliation state transition. */
export function transitionReconcileStatus(
  current: ReconcileStatus,
  target: ReconcileStatus,
): TransitionResult<ReconcileStatus> {
  const validTargets = VALID_RECONCILE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SYSTEM.INVALID_TRANSITION',
        message: `Invalid reconciliation state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a stage state transition. */
export function transitionStageStatus(
  current: StageStatus,
  target: StageStatus,
): TransitionResult<StageStatus> {
  const validTargets = VALID_STAGE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SYSTEM.INVALID_STAGE_TRANSITION',
        message: `Invalid stage state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}
