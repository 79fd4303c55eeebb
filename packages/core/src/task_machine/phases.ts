import type { TaskPhase, TerminalPhase, WorkPhase } from './task_machine.types';

export const TASK_PHASES: readonly TaskPhase[] = [
  'QUEUED',
  'PLANNING',
  'DRAFT_OPENED',
  'IMPLEMENTING',
  'SELF_REVIEW',
  'TESTING',
  'FINALIZING',
  'READY',
  'FAILED',
  'CANCELLED',
];

export const WORK_PHASES: readonly WorkPhase[] = [
  'PLANNING',
  'DRAFT_OPENED',
  'IMPLEMENTING',
  'SELF_REVIEW',
  'TESTING',
  'FINALIZING',
];

/** Phases whose body is a coding-agent invocation that takes feedback. */
export const AGENT_PHASES: readonly WorkPhase[] = ['PLANNING', 'IMPLEMENTING', 'SELF_REVIEW', 'TESTING'];

export const TERMINAL_PHASES: readonly TerminalPhase[] = ['READY', 'FAILED', 'CANCELLED'];

export function isTaskPhase(value: unknown): value is TaskPhase {
  return TASK_PHASES.some(phase => phase === value);
}

export function isWorkPhase(value: unknown): value is WorkPhase {
  return WORK_PHASES.some(phase => phase === value);
}

export function isTerminalPhase(phase: TaskPhase): phase is TerminalPhase {
  return TERMINAL_PHASES.some(terminal => terminal === phase);
}

/**
 * The work phase after `phase`, or READY after FINALIZING.
 */
export function nextPhase(phase: WorkPhase): WorkPhase | 'READY' {
  const index = WORK_PHASES.indexOf(phase);
  return WORK_PHASES[index + 1] ?? 'READY';
}
