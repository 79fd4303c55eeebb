/**
 * Custom Error Classes for the feedback relay
 */

export class FeedbackRelayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeedbackRelayError';
    Object.setPrototypeOf(this, FeedbackRelayError.prototype);
  }
}

/**
 * Error thrown when a thread is already bound to a different task
 */
export class AlreadyBoundError extends FeedbackRelayError {
  public readonly thread: string;
  public readonly existingTaskId: string;

  constructor(thread: string, existingTaskId: string) {
    super(`Thread ${thread} is already bound to task ${existingTaskId}`);
    this.name = 'AlreadyBoundError';
    this.thread = thread;
    this.existingTaskId = existingTaskId;
    Object.setPrototypeOf(this, AlreadyBoundError.prototype);
  }
}
