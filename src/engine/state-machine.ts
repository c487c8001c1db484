/**
 * Run and stage lifecycles as transition tables. A status with no outgoing
 * transitions is terminal.
 */

import {
  RunStatus,
  StageStatus,
  VALID_RUN_TRANSITIONS,
  VALID_STAGE_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

export interface StateMachine<S extends string> {
  transition(current: S, target: S): TransitionResult<S>;
  isTerminal(status: S): boolean;
}

/** A lifecycle over `table`; invalid transitions fail with `<NAMESPACE>.INVALID_TRANSITION`. */
export function createStateMachine<S extends string>(
  entity: 'run' | 'stage',
  table: Readonly<Record<S, readonly S[]>>,
): StateMachine<S> {
  const code = `${entity.toUpperCase()}.INVALID_TRANSITION`;
  return {
    transition(current, target) {
      const validTargets = table[current];
      if (validTargets.includes(target)) return { success: true, newStatus: target };
      return {
        success: false,
        error: createTypedError({
          code,
          message: `Invalid ${entity} state transition: ${current} -> ${target}`,
          retryable: false,
          details: { current, target, validTargets },
        }),
      };
    },
    isTerminal: (status) => table[status].length === 0,
  };
}

export const runStateMachine = createStateMachine<RunStatus>('run', VALID_RUN_TRANSITIONS);
export const stageStateMachine = createStateMachine<StageStatus>('stage', VALID_STAGE_TRANSITIONS);

export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  return runStateMachine.transition(current, target);
}

export function transitionStageStatus(current: StageStatus, target: StageStatus): TransitionResult<StageStatus> {
  return stageStateMachine.transition(current, target);
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return runStateMachine.isTerminal(status);
}

export function isTerminalStageStatus(status: StageStatus): boolean {
  return stageStateMachine.isTerminal(status);
}
