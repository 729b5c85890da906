/**
 * Retry Executor
 *
 * Runs an operation until it succeeds, fails with a non-retryable error,
 * runs out of attempts, or is cancelled. Waits between attempts follow a
 * deterministic exponential schedule:
 *
 *   delay(n) = min(baseDelayMs * growthFactor^(n - 1), maxDelayMs)
 *
 * With the defaults (5 attempts, 1s base, factor 2) the waits are
 * 1s, 2s, 4s, 8s. No jitter is applied.
 *
 * The executor never throws for operation failures; it returns a
 * `RetryOutcome` carrying the attempt count and a final classification so
 * callers can translate it into their own error types.
 *
 * @example
 * ```typescript
 * const executor = new RetryExecutor();
 * const outcome = await executor.execute(
 *   () => fetchSomething(),
 *   createRetryPolicy({ isRetryable: (e) => e instanceof NetworkError })
 * );
 *
 * if (outcome.ok) {
 *   console.log(outcome.value, 'after', outcome.attempts, 'attempts');
 * }
 * ```
 */

import {
  RetryAbortedError,
  type RetryEvent,
  type RetryOutcome,
  type RetryPolicy,
  type RetryableOperation,
  type SleepFn,
} from './types';

// ============================================================================
// Defaults
// ============================================================================

/**
 * Default schedule used for upstream calls.
 * `isRetryable` defaults to retrying everything; call sites narrow it.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  growthFactor: 2,
  isRetryable: () => true,
};

/**
 * Builds a policy from the defaults plus overrides.
 *
 * @throws RangeError if the resulting schedule is not usable
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0) {
    throw new RangeError('Retry delays must not be negative');
  }
  if (policy.growthFactor < 1) {
    throw new RangeError(`growthFactor must be at least 1, got ${policy.growthFactor}`);
  }

  return policy;
}

/**
 * Delay to wait after the given failed attempt (1-based).
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy): number {
  const raw = policy.baseDelayMs * Math.pow(policy.growthFactor, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

// ============================================================================
// Cancellable Sleep
// ============================================================================

/**
 * Timer-backed sleep that rejects with `RetryAbortedError` as soon as the
 * signal aborts. The timer and the abort listener are always cleaned up.
 */
export const sleep: SleepFn = (ms, signal) => {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

// ============================================================================
// Executor
// ============================================================================

export interface RetryExecutorOptions {
  /** Replaces the timer-backed sleep (tests record delays with it) */
  sleep?: SleepFn;
  /** Called before every wait; defaults to a `[Retry]` console line */
  onRetry?: (event: RetryEvent) => void;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function logRetry(event: RetryEvent): void {
  console.warn(
    `[Retry] Attempt ${event.attempt} failed (${describeError(event.error)}), ` +
      `retrying in ${event.delayMs}ms`
  );
}

export class RetryExecutor {
  private readonly sleepFn: SleepFn;
  private readonly onRetry: (event: RetryEvent) => void;

  constructor(options: RetryExecutorOptions = {}) {
    this.sleepFn = options.sleep ?? sleep;
    this.onRetry = options.onRetry ?? logRetry;
  }

  /**
   * Runs the operation under the given policy.
   *
   * @param operation - Work to attempt; receives the attempt number and signal
   * @param policy - Schedule and retryability predicate
   * @param signal - Aborts pending waits and prevents further attempts
   */
  async execute<T>(
    operation: RetryableOperation<T>,
    policy: RetryPolicy,
    signal?: AbortSignal
  ): Promise<RetryOutcome<T>> {
    let attempts = 0;
    let lastError: unknown = undefined;

    while (attempts < policy.maxAttempts) {
      if (signal?.aborted) {
        return { ok: false, error: signal.reason ?? new RetryAbortedError(), attempts, classification: 'cancelled' };
      }

      attempts++;

      try {
        const value = await operation(attempts, signal);
        return { ok: true, value, attempts };
      } catch (error) {
        lastError = error;

        if (signal?.aborted) {
          return { ok: false, error, attempts, classification: 'cancelled' };
        }

        if (!policy.isRetryable(error)) {
          return { ok: false, error, attempts, classification: 'non_retryable' };
        }

        if (attempts >= policy.maxAttempts) {
          break;
        }

        const delayMs = computeBackoffDelay(attempts, policy);
        this.onRetry({ attempt: attempts, delayMs, error });

        try {
          await this.sleepFn(delayMs, signal);
        } catch (sleepError) {
          if (sleepError instanceof RetryAbortedError) {
            return { ok: false, error, attempts, classification: 'cancelled' };
          }
          throw sleepError;
        }
      }
    }

    return { ok: false, error: lastError, attempts, classification: 'exhausted' };
  }
}
