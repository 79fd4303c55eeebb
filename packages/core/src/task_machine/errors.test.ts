import {
  NoChangesProducedError,
  InvalidBranchNameError,
  RetriesExhaustedError,
  TransientTaskError,
  classifyError,
  humanizeError,
} from './errors';
import { StoreUnavailableError } from '../coordination_store/errors';
import { PublisherError } from '../pull_request/errors';
import { PushRejectedError } from '../workspace/errors';
import { CodingAgentError } from '../coding_agent/errors';

function withStatus(status: number, message = 'Error'): Error {
  return Object.assign(new Error(message), { status });
}

describe('classifyError', () => {
  it('should treat validation errors as validation', () => {
    expect(classifyError(new NoChangesProducedError())).toBe('validation');
    expect(classifyError(new InvalidBranchNameError('bad..name'))).toBe('validation');
  });

  it('should treat infrastructure failures as transient', () => {
    expect(classifyError(new TransientTaskError('flaky'))).toBe('transient');
    expect(classifyError(new StoreUnavailableError('get', 'ECONNREFUSED'))).toBe('transient');
    expect(classifyError(new PushRejectedError('rex/x', 'git push', 1, '! [rejected]'))).toBe('transient');
  });

  it('should map publisher codes', () => {
    expect(classifyError(new PublisherError('x', 'RATE_LIMITED', 429))).toBe('transient');
    expect(classifyError(new PublisherError('x', 'NETWORK_ERROR'))).toBe('transient');
    expect(classifyError(new PublisherError('x', 'PERMISSION_DENIED', 401))).toBe('validation');
    expect(classifyError(new PublisherError('x', 'VALIDATION_FAILED', 422))).toBe('validation');
    expect(classifyError(new PublisherError('x', 'NOT_FOUND', 404))).toBe('fatal');
  });

  it('should classify raw HTTP statuses', () => {
    expect(classifyError(withStatus(503))).toBe('transient');
    expect(classifyError(withStatus(429))).toBe('transient');
    expect(classifyError(withStatus(403, 'API rate limit exceeded for installation'))).toBe('transient');
    expect(classifyError(withStatus(403, 'Resource not accessible'))).toBe('validation');
    expect(classifyError(withStatus(401))).toBe('validation');
    expect(classifyError(withStatus(400))).toBe('fatal');
    expect(classifyError(new CodingAgentError('Bad Gateway', { statusCode: 502 }))).toBe('transient');
  });

  it('should find network codes on the cause chain', () => {
    const cause = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    expect(classifyError(new TypeError('fetch failed', { cause }))).toBe('transient');
    expect(classifyError(new CodingAgentError('timed out', { code: 'ETIMEDOUT' }))).toBe('transient');
  });

  it('should treat rejected pushes by message as transient', () => {
    expect(classifyError(new Error('Push rejected by remote'))).toBe('transient');
  });

  it('should treat everything else as fatal', () => {
    expect(classifyError(new Error('undefined is not a function'))).toBe('fatal');
    expect(classifyError('boom')).toBe('fatal');
  });
});

describe('humanizeError', () => {
  it('should keep the first non-empty line only', () => {
    const error = new Error('\nCould not push\n    at Object.<anonymous> (file.ts:1:1)');

    expect(humanizeError(error)).toBe('Could not push');
  });

  it('should fall back to the error name for empty messages', () => {
    expect(humanizeError(new TypeError(''))).toBe('TypeError');
    expect(humanizeError(undefined)).toBe('Unexpected error');
    expect(humanizeError('plain text')).toBe('plain text');
  });

  it('should truncate long messages', () => {
    const text = humanizeError(new Error('x'.repeat(400)));

    expect(text).toHaveLength(300);
    expect(text.endsWith('...')).toBe(true);
  });

  it('should describe exhausted retries', () => {
    const error = new RetriesExhaustedError(new Error('socket hang up'), 4);

    expect(humanizeError(error)).toBe('socket hang up (gave up after 4 attempts)');
    expect(classifyError(error)).toBe('transient');
  });
});
