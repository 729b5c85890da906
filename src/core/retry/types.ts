/**
 * Retry Types
 *
 * A retry policy is a plain value passed to every `RetryExecutor.execute`
 * call, so different call sites (upstream calls, text generation) can retry
 * on different schedules and tests can vary them per case.
 */

/**
 * Parameters of an exponential backoff schedule.
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Multiplier applied per attempt */
  growthFactor: number;
  /** Decides whether a failure is worth another attempt */
  isRetryable: (error: unknown) => boolean;
}

/**
 * Why a retried operation ultimately failed.
 *
 * - 'non_retryable': the policy refused to retry the last error
 * - 'exhausted': every attempt failed with a retryable error
 * - 'cancelled': the caller's AbortSignal fired
 */
export type RetryFailureClassification = 'non_retryable' | 'exhausted' | 'cancelled';

/**
 * Result of `RetryExecutor.execute`. Never thrown; always returned.
 */
export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | {
      ok: false;
      error: unknown;
      attempts: number;
      classification: RetryFailureClassification;
    };

/**
 * Emitted right before the executor waits for the next attempt.
 */
export interface RetryEvent {
  /** The attempt that just failed (1-based) */
  attempt: number;
  /** How long the executor is about to wait */
  delayMs: number;
  error: unknown;
}

/**
 * A unit of work that may be repeated.
 * `attempt` is 1-based; `signal` is the caller's cancellation signal.
 */
export type RetryableOperation<T> = (attempt: number, signal?: AbortSignal) => Promise<T>;

/**
 * Waits `ms` milliseconds, rejecting early when the signal aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Raised by the sleep helper when the wait is cancelled.
 */
export class RetryAbortedError extends Error {
  constructor(message: string = 'Retry cancelled') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}
