export { TaskIntake } from './task_intake';
export { formatTaskId, parseTaskId } from './task_id';
export type {
  MentionEvent,
  ThreadMessageEvent,
  CancelActionEvent,
  CancelActionResult,
  MentionResult,
  ThreadMessageResult,
  TaskIntakeDependencies,
} from './task_intake.types';
