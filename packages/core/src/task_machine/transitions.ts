/**
 * Pure task lifecycle: `(state, event) → { state, effects }`.
 *
 * The runner feeds events in and performs the effects; nothing here
 * touches a collaborator. Every phase after PLANNING is entered through a
 * checkpoint, where a pending cancellation wins over feedback.
 */

import { AGENT_PHASES, isTerminalPhase, isWorkPhase, nextPhase } from './phases';
import { InvalidTransitionError } from './errors';
import type {
  TaskEffect,
  TaskEvent,
  TaskMachineState,
  TaskPhase,
  TaskResultSummary,
  TransitionResult,
  WorkPhase,
} from './task_machine.types';

/**
 * Phases reachable from each phase. FAILED and CANCELLED are reachable
 * from every non-terminal phase.
 */
export const TRANSITIONS: Readonly<Record<TaskPhase, readonly TaskPhase[]>> = {
  QUEUED: ['PLANNING', 'FAILED', 'CANCELLED'],
  PLANNING: ['DRAFT_OPENED', 'FAILED', 'CANCELLED'],
  DRAFT_OPENED: ['IMPLEMENTING', 'FAILED', 'CANCELLED'],
  IMPLEMENTING: ['SELF_REVIEW', 'FAILED', 'CANCELLED'],
  SELF_REVIEW: ['TESTING', 'FAILED', 'CANCELLED'],
  TESTING: ['FINALIZING', 'FAILED', 'CANCELLED'],
  FINALIZING: ['READY', 'FAILED', 'CANCELLED'],
  READY: [],
  FAILED: [],
  CANCELLED: [],
};

export function canTransition(from: TaskPhase, to: TaskPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function createInitialState(branchName: string): TaskMachineState {
  return {
    phase: 'QUEUED',
    completed: [],
    summary: { branchName, filesTouched: [] },
    pendingFeedback: [],
  };
}

function moveTo(state: TaskMachineState, to: TaskPhase, eventType: TaskEvent['type']): TaskMachineState {
  if (!canTransition(state.phase, to)) {
    throw new InvalidTransitionError(state.phase, eventType, `${state.phase} cannot move to ${to}`);
  }
  return { ...state, phase: to };
}

function mergeSummary(summary: TaskResultSummary, patch: Partial<TaskResultSummary>): TaskResultSummary {
  return {
    ...summary,
    ...patch,
    filesTouched: patch.filesTouched ?? summary.filesTouched,
  };
}

/**
 * The phase whose body last succeeded and whose checkpoint is pending.
 */
function awaitingCheckpoint(state: TaskMachineState): WorkPhase | null {
  const last = state.completed[state.completed.length - 1];
  return last !== undefined && last === state.phase ? last : null;
}

export function transition(state: TaskMachineState, event: TaskEvent): TransitionResult {
  if (isTerminalPhase(state.phase)) {
    throw new InvalidTransitionError(state.phase, event.type, 'task already finished');
  }

  switch (event.type) {
    case 'start': {
      const next = moveTo(state, 'PLANNING', event.type);
      return { state: next, effects: [{ type: 'runPhase', phase: 'PLANNING', feedback: [] }] };
    }

    case 'phase_succeeded': {
      if (state.phase !== event.phase || awaitingCheckpoint(state) !== null) {
        throw new InvalidTransitionError(state.phase, event.type, `${event.phase} is not running`);
      }
      const completed = [...state.completed, event.phase];
      const summary = mergeSummary(state.summary, event.patch);

      const after = nextPhase(event.phase);
      if (after === 'READY') {
        const next = moveTo({ ...state, completed, summary }, 'READY', event.type);
        return { state: next, effects: [{ type: 'notifyReady' }, { type: 'releaseAgent' }] };
      }
      return {
        state: { ...state, completed, summary },
        effects: [{ type: 'checkpoint', next: after }],
      };
    }

    case 'checkpoint': {
      const finished = awaitingCheckpoint(state);
      if (finished === null || nextPhase(finished) !== event.next) {
        throw new InvalidTransitionError(state.phase, event.type, `no checkpoint pending before ${event.next}`);
      }

      if (event.cancellation) {
        const next = moveTo({ ...state, cancellation: event.cancellation }, 'CANCELLED', event.type);
        return {
          state: next,
          effects: [
            { type: 'publishCancellation', cancellation: event.cancellation, completed: [...state.completed] },
            { type: 'releaseAgent' },
          ],
        };
      }

      const effects: TaskEffect[] = [];
      let pending = state.pendingFeedback;
      if (event.feedback.length > 0) {
        effects.push({ type: 'acknowledgeFeedback', messages: event.feedback });
        pending = [...pending, ...event.feedback];
      }

      // Feedback waits for the next phase that invokes the coding agent.
      const takesFeedback = AGENT_PHASES.includes(event.next);
      effects.push({ type: 'runPhase', phase: event.next, feedback: takesFeedback ? pending : [] });

      const next = moveTo(
        { ...state, pendingFeedback: takesFeedback ? [] : pending },
        event.next,
        event.type,
      );
      return { state: next, effects };
    }

    case 'phase_failed': {
      if (state.phase !== event.phase || !isWorkPhase(state.phase)) {
        throw new InvalidTransitionError(state.phase, event.type, `${event.phase} is not running`);
      }
      const failure = { phase: event.phase, kind: event.kind, reason: event.reason };
      const next = moveTo({ ...state, failure }, 'FAILED', event.type);
      return { state: next, effects: [{ type: 'notifyFailure', failure }, { type: 'releaseAgent' }] };
    }
  }
}
