import { createInitialState, transition, canTransition } from './transitions';
import { InvalidTransitionError } from './errors';
import type { TaskMachineState, WorkPhase } from './task_machine.types';
import type { FeedbackMessage } from '../feedback_relay/feedback_relay.types';

const cancellation = { actorId: 'U1', actorName: 'Ana', requestedAt: 1_000 };

function feedback(sequence: number, text: string): FeedbackMessage {
  return { sequence, sender: { id: 'U1', name: 'Ana' }, text, timestamp: `100.${sequence}` };
}

/**
 * Runs the machine through `phases` with no cancellation and no feedback.
 */
function advanceThrough(phases: WorkPhase[]): TaskMachineState {
  let state = transition(createInitialState('rex/x'), { type: 'start' }).state;
  phases.forEach((phase, index) => {
    state = transition(state, { type: 'phase_succeeded', phase, patch: {} }).state;
    const next = phases[index + 1];
    if (next) {
      state = transition(state, { type: 'checkpoint', next, cancellation: null, feedback: [] }).state;
    }
  });
  return state;
}

describe('transition', () => {
  it('should start by running PLANNING without a checkpoint', () => {
    const result = transition(createInitialState('rex/x'), { type: 'start' });

    expect(result.state.phase).toBe('PLANNING');
    expect(result.effects).toEqual([{ type: 'runPhase', phase: 'PLANNING', feedback: [] }]);
  });

  it('should request a checkpoint after each phase and merge its results', () => {
    const planning = transition(createInitialState('rex/x'), { type: 'start' }).state;

    const result = transition(planning, {
      type: 'phase_succeeded',
      phase: 'PLANNING',
      patch: { plan: '1. do it', title: 'Do it' },
    });

    expect(result.state.phase).toBe('PLANNING');
    expect(result.state.completed).toEqual(['PLANNING']);
    expect(result.state.summary).toEqual({ branchName: 'rex/x', filesTouched: [], plan: '1. do it', title: 'Do it' });
    expect(result.effects).toEqual([{ type: 'checkpoint', next: 'DRAFT_OPENED' }]);
  });

  it('should enter the next phase at a clear checkpoint', () => {
    const state = advanceThrough(['PLANNING']);

    const result = transition(state, { type: 'checkpoint', next: 'DRAFT_OPENED', cancellation: null, feedback: [] });

    expect(result.state.phase).toBe('DRAFT_OPENED');
    expect(result.effects).toEqual([{ type: 'runPhase', phase: 'DRAFT_OPENED', feedback: [] }]);
  });

  it('should cancel at the checkpoint after SELF_REVIEW with every earlier phase completed', () => {
    const state = advanceThrough(['PLANNING', 'DRAFT_OPENED', 'IMPLEMENTING', 'SELF_REVIEW']);

    const result = transition(state, {
      type: 'checkpoint',
      next: 'TESTING',
      cancellation,
      feedback: [feedback(1, 'ignored')],
    });

    expect(result.state.phase).toBe('CANCELLED');
    expect(result.state.cancellation).toEqual(cancellation);
    expect(result.effects).toEqual([
      {
        type: 'publishCancellation',
        cancellation,
        completed: ['PLANNING', 'DRAFT_OPENED', 'IMPLEMENTING', 'SELF_REVIEW'],
      },
      { type: 'releaseAgent' },
    ]);
  });

  it('should acknowledge feedback and hand it to the next agent phase', () => {
    const state = advanceThrough(['PLANNING', 'DRAFT_OPENED']);
    const message = feedback(1, 'use Tailwind');

    const result = transition(state, { type: 'checkpoint', next: 'IMPLEMENTING', cancellation: null, feedback: [message] });

    expect(result.effects).toEqual([
      { type: 'acknowledgeFeedback', messages: [message] },
      { type: 'runPhase', phase: 'IMPLEMENTING', feedback: [message] },
    ]);
    expect(result.state.pendingFeedback).toEqual([]);
  });

  it('should hold feedback across DRAFT_OPENED until IMPLEMENTING', () => {
    const early = feedback(1, 'use Tailwind');
    const late = feedback(2, 'and dark mode');
    let state = advanceThrough(['PLANNING']);

    const toDraft = transition(state, { type: 'checkpoint', next: 'DRAFT_OPENED', cancellation: null, feedback: [early] });
    expect(toDraft.effects[1]).toEqual({ type: 'runPhase', phase: 'DRAFT_OPENED', feedback: [] });
    expect(toDraft.state.pendingFeedback).toEqual([early]);

    state = transition(toDraft.state, { type: 'phase_succeeded', phase: 'DRAFT_OPENED', patch: {} }).state;
    const toImplement = transition(state, { type: 'checkpoint', next: 'IMPLEMENTING', cancellation: null, feedback: [late] });

    expect(toImplement.effects[1]).toEqual({ type: 'runPhase', phase: 'IMPLEMENTING', feedback: [early, late] });
  });

  it('should finish READY after FINALIZING without another checkpoint', () => {
    const state = advanceThrough(['PLANNING', 'DRAFT_OPENED', 'IMPLEMENTING', 'SELF_REVIEW', 'TESTING', 'FINALIZING']);

    expect(state.phase).toBe('READY');
    expect(state.completed).toHaveLength(6);
  });

  it('should fail the running phase and release the agent', () => {
    const state = advanceThrough(['PLANNING', 'DRAFT_OPENED']);
    const implementing = transition(state, { type: 'checkpoint', next: 'IMPLEMENTING', cancellation: null, feedback: [] }).state;

    const result = transition(implementing, {
      type: 'phase_failed',
      phase: 'IMPLEMENTING',
      kind: 'validation',
      reason: 'no changes',
    });

    const failure = { phase: 'IMPLEMENTING', kind: 'validation', reason: 'no changes' };
    expect(result.state.phase).toBe('FAILED');
    expect(result.state.failure).toEqual(failure);
    expect(result.effects).toEqual([{ type: 'notifyFailure', failure }, { type: 'releaseAgent' }]);
  });

  it('should reject events for a phase that is not running', () => {
    const planning = transition(createInitialState('rex/x'), { type: 'start' }).state;

    expect(() => transition(planning, { type: 'phase_succeeded', phase: 'TESTING', patch: {} })).toThrow(
      InvalidTransitionError,
    );
  });

  it('should reject a checkpoint for the wrong next phase', () => {
    const state = advanceThrough(['PLANNING']);

    expect(() =>
      transition(state, { type: 'checkpoint', next: 'IMPLEMENTING', cancellation: null, feedback: [] }),
    ).toThrow("Cannot apply 'checkpoint' in phase PLANNING: no checkpoint pending before IMPLEMENTING");
  });

  it('should reject every event once terminal', () => {
    const state = advanceThrough(['PLANNING', 'DRAFT_OPENED', 'IMPLEMENTING', 'SELF_REVIEW', 'TESTING', 'FINALIZING']);

    expect(() => transition(state, { type: 'start' })).toThrow(
      "Cannot apply 'start' in phase READY: task already finished",
    );
  });
});

describe('canTransition', () => {
  it('should allow FAILED and CANCELLED from non-terminal phases only', () => {
    expect(canTransition('QUEUED', 'CANCELLED')).toBe(true);
    expect(canTransition('TESTING', 'FAILED')).toBe(true);
    expect(canTransition('READY', 'FAILED')).toBe(false);
    expect(canTransition('PLANNING', 'IMPLEMENTING')).toBe(false);
  });
});
