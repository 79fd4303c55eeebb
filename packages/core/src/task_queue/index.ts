export type { TaskMessage, TaskQueue, RedisTaskQueueOptions } from './task_queue.types';
export { TaskQueueError, InvalidTaskMessageError } from './errors';
export { validateTaskMessage, parseTaskMessage } from './task_message';
