/**
 * Error taxonomy shared by adapters and orchestrators.
 *
 * ValidationError  - bad operator input, raised before any side effect
 * TransientError   - an external call failed but may succeed if retried
 * FatalError       - an external system reported an unrecoverable condition
 * TimeoutError     - a bounded wait ran out of time
 */

export const ErrorKind = {
  VALIDATION: 'validation',
  TRANSIENT: 'transient',
  FATAL: 'fatal',
  TIMEOUT: 'timeout',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export class ValidationError extends Error {
  readonly name = 'ValidationError';
  readonly kind = ErrorKind.VALIDATION;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly suggestion?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Origin of an adapter failure, kept for logging and operator output.
 */
export interface CommandFailureDetails {
  command: string;
  exitCode: number | null;
  output: string;
}

export class TransientError extends Error {
  readonly name = 'TransientError';
  readonly kind = ErrorKind.TRANSIENT;

  constructor(
    message: string,
    public readonly details?: CommandFailureDetails
  ) {
    super(message);
    Object.setPrototypeOf(this, TransientError.prototype);
  }
}

export class FatalError extends Error {
  readonly name: string = 'FatalError';
  readonly kind = ErrorKind.FATAL;

  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly details?: CommandFailureDetails
  ) {
    super(message);
    Object.setPrototypeOf(this, FatalError.prototype);
  }
}

/**
 * A destructive workflow stopped part-way. Completed steps are not rolled
 * back; remainingSteps tells the operator what is left to clean up.
 */
export class DestructiveOperationError extends FatalError {
  readonly name = 'DestructiveOperationError';

  constructor(
    message: string,
    public readonly completedSteps: string[],
    public readonly remainingSteps: string[],
    suggestion?: string
  ) {
    super(message, suggestion);
    Object.setPrototypeOf(this, DestructiveOperationError.prototype);
  }
}

export class TimeoutError extends Error {
  readonly name = 'TimeoutError';
  readonly kind = ErrorKind.TIMEOUT;

  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export type CpcError = ValidationError | TransientError | FatalError | TimeoutError;

export function isCpcError(error: unknown): error is CpcError {
  return (
    error instanceof ValidationError ||
    error instanceof TransientError ||
    error instanceof FatalError ||
    error instanceof TimeoutError
  );
}

/**
 * Default retryable-error predicate: only transient adapter failures.
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof TransientError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
