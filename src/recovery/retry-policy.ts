/**
 * Retry Policy Engine
 *
 * One policy object (attempt limit, backoff function, retryable-error
 * predicate) injected into every adapter, so retry behaviour is decided in
 * one place instead of at each call site.
 */

import type { RetryConfig } from '../config/index.js';
import { isRetryableError, toError } from '../types/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry-policy');

/**
 * Delay in milliseconds before retry number `retry` (0 = first retry).
 */
export type BackoffFunction = (retry: number) => number;

/**
 * Configuration for retry behavior.
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;

  backoff: BackoffFunction;

  /** Whether an error is worth another attempt */
  isRetryable: (error: Error) => boolean;
}

/**
 * Result of evaluating whether to retry.
 */
export interface RetryEvaluation {
  shouldRetry: boolean;

  /** Delay in milliseconds before retry (0 if shouldRetry is false) */
  delayMs: number;

  reason: string;
}

/**
 * Record of a single attempt.
 */
export interface RetryAttempt<T> {
  /** Attempt number (0 = first attempt, 1 = first retry, etc.) */
  attempt: number;
  success: boolean;
  result: T | null;
  error: Error | null;
  durationMs: number;
  willRetry: boolean;
  nextRetryMs: number | null;
}

/**
 * Summary of all attempts for an operation.
 */
export interface RetryResult<T> {
  success: boolean;
  result: T | null;
  finalError: Error | null;
  attempts: RetryAttempt<T>[];
  totalDurationMs: number;
  /** Number of retries performed (0 if succeeded on first try) */
  retriedCount: number;
}

export function fixedBackoff(delayMs: number): BackoffFunction {
  return () => delayMs;
}

export function linearBackoff(baseMs: number, maxMs: number): BackoffFunction {
  return retry => Math.min(baseMs * (retry + 1), maxMs);
}

/**
 * Default retry policy: 3 attempts, 2s/4s linear backoff, transient errors only.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoff: linearBackoff(2000, 60000),
  isRetryable: isRetryableError,
};

/**
 * No retry policy - for deterministic testing or when retries are undesirable.
 */
export const NO_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  backoff: fixedBackoff(0),
  isRetryable: () => false,
};

export function retryPolicyFromConfig(config: RetryConfig): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    backoff:
      config.backoff === 'fixed'
        ? fixedBackoff(config.backoffMs)
        : linearBackoff(config.backoffMs, config.maxBackoffMs),
    isRetryable: isRetryableError,
  };
}

/**
 * Create a retry policy engine with custom settings.
 */
export function createRetryPolicyEngine(
  overrides: Partial<RetryPolicy> = {},
  clock: Clock = systemClock
): RetryPolicyEngine {
  return new RetryPolicyEngine({ ...DEFAULT_RETRY_POLICY, ...overrides }, clock);
}

/**
 * RetryPolicyEngine - Executes operations with a retry policy.
 */
export class RetryPolicyEngine {
  constructor(
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Evaluate whether an error should trigger a retry.
   *
   * @param attemptCount - Attempts already made, including the failed one
   */
  evaluateRetry(error: Error, attemptCount: number): RetryEvaluation {
    if (attemptCount >= this.policy.maxAttempts) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Max attempts (${this.policy.maxAttempts}) exhausted`,
      };
    }

    if (!this.policy.isRetryable(error)) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `${error.name} is not retryable`,
      };
    }

    const delayMs = Math.max(0, this.policy.backoff(attemptCount - 1));

    return {
      shouldRetry: true,
      delayMs,
      reason: `Retrying after ${delayMs}ms (attempt ${attemptCount + 1}/${this.policy.maxAttempts})`,
    };
  }

  /**
   * Execute an operation with retry logic.
   *
   * @returns RetryResult with success status, result/error, and attempt history
   */
  async execute<T>(
    operation: () => Promise<T>,
    options?: { description?: string }
  ): Promise<RetryResult<T>> {
    const attempts: RetryAttempt<T>[] = [];
    const startTime = this.clock.now();
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.policy.maxAttempts; attempt++) {
      const attemptStart = this.clock.now();

      try {
        const result = await operation();

        const attemptRecord: RetryAttempt<T> = {
          attempt,
          success: true,
          result,
          error: null,
          durationMs: this.clock.now() - attemptStart,
          willRetry: false,
          nextRetryMs: null,
        };
        attempts.push(attemptRecord);

        return {
          success: true,
          result,
          finalError: null,
          attempts,
          totalDurationMs: this.clock.now() - startTime,
          retriedCount: attempt,
        };
      } catch (error) {
        lastError = toError(error);
        const evaluation = this.evaluateRetry(lastError, attempt + 1);

        const attemptRecord: RetryAttempt<T> = {
          attempt,
          success: false,
          result: null,
          error: lastError,
          durationMs: this.clock.now() - attemptStart,
          willRetry: evaluation.shouldRetry,
          nextRetryMs: evaluation.shouldRetry ? evaluation.delayMs : null,
        };
        attempts.push(attemptRecord);

        if (evaluation.shouldRetry) {
          log.info(
            {
              operation: options?.description,
              attempt,
              nextRetryMs: evaluation.delayMs,
              reason: evaluation.reason,
            },
            'Retrying operation'
          );
          await this.clock.sleep(evaluation.delayMs);
        } else {
          log.warn(
            { operation: options?.description, attempt, reason: evaluation.reason },
            'No more retries, failing'
          );
          break;
        }
      }
    }

    return {
      success: false,
      result: null,
      finalError: lastError,
      attempts,
      totalDurationMs: this.clock.now() - startTime,
      retriedCount: attempts.length - 1,
    };
  }

  /**
   * Execute and unwrap: resolves with the result or rethrows the final error.
   */
  async run<T>(operation: () => Promise<T>, description?: string): Promise<T> {
    const settled: { value?: { result: T } } = {};
    const outcome = await this.execute(
      async () => {
        const result = await operation();
        settled.value = { result };
        return result;
      },
      { description }
    );
    if (outcome.success && settled.value) {
      return settled.value.result;
    }
    throw outcome.finalError ?? new Error(`${description ?? 'Operation'} failed`);
  }
}
