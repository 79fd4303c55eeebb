/**
 * Custom Error Classes for the coordination store
 */

/**
 * Base error class for all store-related errors
 */
export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

/**
 * Error thrown when the backing store cannot be reached
 */
export class StoreUnavailableError extends StoreError {
  public readonly operation: string;

  constructor(operation: string, cause?: string) {
    super(`Coordination store unavailable during ${operation}${cause ? `: ${cause}` : ''}`);
    this.name = 'StoreUnavailableError';
    this.operation = operation;
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

/**
 * Error thrown when a key holds a value of the wrong kind
 * (e.g. a list read as a counter)
 */
export class WrongValueTypeError extends StoreError {
  public readonly key: string;

  constructor(key: string, expected: string) {
    super(`Key ${key} does not hold a ${expected}`);
    this.name = 'WrongValueTypeError';
    this.key = key;
    Object.setPrototypeOf(this, WrongValueTypeError.prototype);
  }
}
