/**
 * Error thrown when the coding agent cannot be reached or answers badly.
 *
 * `statusCode` is set for non-2xx answers, `code` for network failures
 * (ECONNREFUSED, ETIMEDOUT, ...).
 */
export class CodingAgentError extends Error {
  public readonly statusCode: number | undefined;
  public readonly code: string | undefined;

  constructor(message: string, options: { statusCode?: number; code?: string } = {}) {
    super(`CodingAgentError: ${message}`);
    this.name = 'CodingAgentError';
    this.statusCode = options.statusCode;
    this.code = options.code;
    Object.setPrototypeOf(this, CodingAgentError.prototype);
  }
}
