export type {
  TaskPhase,
  WorkPhase,
  TerminalPhase,
  ErrorKind,
  TaskResultSummary,
  TaskFailure,
  TaskMachineState,
  TaskEvent,
  TaskEffect,
  TransitionResult,
  TaskOutcome,
  TaskRunnerDependencies,
} from './task_machine.types';
export {
  TASK_PHASES,
  WORK_PHASES,
  AGENT_PHASES,
  TERMINAL_PHASES,
  isTaskPhase,
  isWorkPhase,
  isTerminalPhase,
  nextPhase,
} from './phases';
export { TRANSITIONS, canTransition, createInitialState, transition } from './transitions';
export { TaskRunner } from './task_runner';
export { withRetry, DEFAULT_RETRY_DELAYS_MS } from './retry';
export type { RetryOptions } from './retry';
export { buildPrompt } from './prompts';
export type { PromptContext } from './prompts';
export * from './reports';
export { slugify, createBranchName, isValidBranchName, resolveUniqueBranchName } from './branch_name';
export {
  TaskError,
  TransientTaskError,
  TaskValidationError,
  NoChangesProducedError,
  InvalidBranchNameError,
  BranchNameExhaustedError,
  RetriesExhaustedError,
  InvalidTransitionError,
  classifyError,
  humanizeError,
} from './errors';
