/**
 * Publisher errors and Octokit error mapping.
 */

/**
 * Semantic codes that abstract HTTP status codes.
 */
export type PublisherErrorCode =
  | 'PERMISSION_DENIED'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'VALIDATION_FAILED'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR';

export class PublisherError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: PublisherErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'PublisherError';
    Object.setPrototypeOf(this, PublisherError.prototype);
  }
}

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids a runtime import of @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

const RATE_LIMIT_PATTERN = /rate limit/i;

/**
 * Maps Octokit RequestError (and unknown errors) to PublisherError.
 */
export function mapOctokitError(error: unknown, context: string): PublisherError {
  if (isOctokitRequestError(error)) {
    const status = error.status;
    const detail = `${context}: ${error.message}`;

    if (status === 429 || (status === 403 && RATE_LIMIT_PATTERN.test(error.message))) {
      return new PublisherError(`Rate limited (${status}) ${detail}`, 'RATE_LIMITED', status);
    }
    if (status === 401 || status === 403) {
      return new PublisherError(`Permission denied (${status}) ${detail}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new PublisherError(`Not found ${detail}`, 'NOT_FOUND', status);
    }
    if (status === 409) {
      return new PublisherError(`Conflict ${detail}`, 'CONFLICT', status);
    }
    if (status === 422) {
      return new PublisherError(`Validation failed ${detail}`, 'VALIDATION_FAILED', status);
    }
    return new PublisherError(`GitHub API error (${status}) ${detail}`, 'SERVER_ERROR', status);
  }

  // Network / unknown errors
  const message = error instanceof Error ? error.message : String(error);
  return new PublisherError(`Network error ${context}: ${message}`, 'NETWORK_ERROR');
}
