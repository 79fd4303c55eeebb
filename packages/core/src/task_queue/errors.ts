/**
 * Custom Error Classes for the task queue
 */

/**
 * Base error class for all queue-related errors
 */
export class TaskQueueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskQueueError';
    Object.setPrototypeOf(this, TaskQueueError.prototype);
  }
}

/**
 * Error thrown when a message does not match the task message schema
 */
export class InvalidTaskMessageError extends TaskQueueError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid task message: ${errors.join('; ')}`);
    this.name = 'InvalidTaskMessageError';
    this.errors = errors;
    Object.setPrototypeOf(this, InvalidTaskMessageError.prototype);
  }
}
