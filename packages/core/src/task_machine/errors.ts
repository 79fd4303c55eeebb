/**
 * Task errors and the transient / validation / fatal classification the
 * runner applies at every phase boundary.
 */

import { StoreUnavailableError } from '../coordination_store/errors';
import { PublisherError } from '../pull_request/errors';
import { PushRejectedError } from '../workspace/errors';
import type { ErrorKind, TaskPhase } from './task_machine.types';

/**
 * Base error class for task execution
 */
export class TaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskError';
    Object.setPrototypeOf(this, TaskError.prototype);
  }
}

/**
 * A failure worth retrying (network, rate limit, rejected push)
 */
export class TransientTaskError extends TaskError {
  constructor(message: string) {
    super(message);
    this.name = 'TransientTaskError';
    Object.setPrototypeOf(this, TransientTaskError.prototype);
  }
}

/**
 * A failure that needs a human to change something first
 */
export class TaskValidationError extends TaskError {
  constructor(message: string) {
    super(message);
    this.name = 'TaskValidationError';
    Object.setPrototypeOf(this, TaskValidationError.prototype);
  }
}

export class NoChangesProducedError extends TaskValidationError {
  constructor() {
    super('The coding agent produced no changes. Please clarify the task and try again.');
    this.name = 'NoChangesProducedError';
    Object.setPrototypeOf(this, NoChangesProducedError.prototype);
  }
}

export class InvalidBranchNameError extends TaskValidationError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Invalid branch name: '${branchName}'`);
    this.name = 'InvalidBranchNameError';
    this.branchName = branchName;
    Object.setPrototypeOf(this, InvalidBranchNameError.prototype);
  }
}

export class BranchNameExhaustedError extends TaskValidationError {
  constructor(branchName: string, attempts: number) {
    super(`No free branch name for '${branchName}' after ${attempts} attempts`);
    this.name = 'BranchNameExhaustedError';
    Object.setPrototypeOf(this, BranchNameExhaustedError.prototype);
  }
}

/**
 * A transient failure that kept failing through every retry
 */
export class RetriesExhaustedError extends TaskError {
  public readonly lastError: unknown;
  public readonly attempts: number;

  constructor(lastError: unknown, attempts: number) {
    super(`${humanizeError(lastError)} (gave up after ${attempts} attempts)`);
    this.name = 'RetriesExhaustedError';
    this.lastError = lastError;
    this.attempts = attempts;
    Object.setPrototypeOf(this, RetriesExhaustedError.prototype);
  }
}

export class InvalidTransitionError extends TaskError {
  public readonly phase: TaskPhase;
  public readonly eventType: string;

  constructor(phase: TaskPhase, eventType: string, detail?: string) {
    super(`Cannot apply '${eventType}' in phase ${phase}${detail ? `: ${detail}` : ''}`);
    this.name = 'InvalidTransitionError';
    this.phase = phase;
    this.eventType = eventType;
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

// ==================== Classification ====================

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE']);
const RATE_LIMIT_PATTERN = /rate limit/i;
const PUSH_REJECTED_PATTERN = /push rejected|rejected.*\bpush\b|failed to push/i;

function numericField(error: Error, field: 'status' | 'statusCode'): number | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Network error code of `error` or of anything on its `cause` chain.
 */
function networkCode(error: unknown, depth = 0): string | undefined {
  if (!(error instanceof Error) || depth > 5) return undefined;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) return code;
  return networkCode(error.cause, depth + 1);
}

function classifyStatus(status: number, message: string): ErrorKind {
  if (status === 429 || status >= 500) return 'transient';
  if (status === 403 && RATE_LIMIT_PATTERN.test(message)) return 'transient';
  if (status === 401 || status === 403 || status === 422) return 'validation';
  return 'fatal';
}

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof TaskValidationError) return 'validation';
  if (
    error instanceof TransientTaskError ||
    error instanceof RetriesExhaustedError ||
    error instanceof StoreUnavailableError ||
    error instanceof PushRejectedError
  ) {
    return 'transient';
  }
  if (error instanceof PublisherError) {
    switch (error.code) {
      case 'RATE_LIMITED':
      case 'SERVER_ERROR':
      case 'NETWORK_ERROR':
        return 'transient';
      case 'PERMISSION_DENIED':
      case 'VALIDATION_FAILED':
        return 'validation';
      default:
        return 'fatal';
    }
  }
  if (!(error instanceof Error)) return 'fatal';

  const status = numericField(error, 'status') ?? numericField(error, 'statusCode');
  if (status !== undefined) {
    return classifyStatus(status, error.message);
  }
  if (networkCode(error) !== undefined) return 'transient';
  if (PUSH_REJECTED_PATTERN.test(error.message)) return 'transient';
  return 'fatal';
}

const MAX_REASON_LENGTH = 300;

/**
 * One line for the chat thread and the pull request. Never a stack trace.
 */
export function humanizeError(error: unknown): string {
  const raw = error instanceof Error ? error.message : typeof error === 'string' ? error : '';
  const firstLine = raw.split('\n').map(line => line.trim()).find(line => line.length > 0);
  const text = firstLine ?? (error instanceof Error ? error.name : 'Unexpected error');
  return text.length > MAX_REASON_LENGTH ? `${text.slice(0, MAX_REASON_LENGTH - 3)}...` : text;
}
