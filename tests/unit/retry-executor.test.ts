/**
 * RetryExecutor Tests
 *
 * Covers the backoff schedule, retryability decisions, exhaustion and
 * cancellation. Sleeps are recorded instead of awaited.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  RetryAbortedError,
  RetryExecutor,
  computeBackoffDelay,
  createRetryPolicy,
  sleep,
  type RetryEvent,
} from '../../src/core/retry';

class TransientError extends Error {}
class FatalError extends Error {}

const policy = createRetryPolicy({
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  growthFactor: 2,
  isRetryable: (error) => error instanceof TransientError,
});

function createExecutor() {
  const delays: number[] = [];
  const events: RetryEvent[] = [];
  const executor = new RetryExecutor({
    sleep: async (ms) => {
      delays.push(ms);
    },
    onRetry: (event) => events.push(event),
  });
  return { executor, delays, events };
}

describe('computeBackoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([1, 2, 3, 4].map((n) => computeBackoffDelay(n, policy))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps every delay at maxDelayMs', () => {
    const capped = createRetryPolicy({ baseDelayMs: 1000, maxDelayMs: 3000, growthFactor: 2 });
    expect([1, 2, 3, 4].map((n) => computeBackoffDelay(n, capped))).toEqual([1000, 2000, 3000, 3000]);
  });
});

describe('createRetryPolicy', () => {
  it('fills in the defaults', () => {
    const defaults = createRetryPolicy();
    expect(defaults.maxAttempts).toBe(5);
    expect(defaults.baseDelayMs).toBe(1000);
    expect(defaults.maxDelayMs).toBe(60000);
    expect(defaults.growthFactor).toBe(2);
  });

  it('rejects unusable schedules', () => {
    expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
    expect(() => createRetryPolicy({ maxAttempts: 1.5 })).toThrow(RangeError);
    expect(() => createRetryPolicy({ baseDelayMs: -1 })).toThrow(RangeError);
    expect(() => createRetryPolicy({ growthFactor: 0.5 })).toThrow(RangeError);
  });
});

describe('RetryExecutor', () => {
  it('returns the value of a first-time success without waiting', async () => {
    const { executor, delays } = createExecutor();

    const outcome = await executor.execute(async () => 'done', policy);

    expect(outcome).toEqual({ ok: true, value: 'done', attempts: 1 });
    expect(delays).toEqual([]);
  });

  it('waits 1s, 2s, 4s, 8s and gives up after 5 attempts', async () => {
    const { executor, delays } = createExecutor();
    const operation = vi.fn(async () => {
      throw new TransientError('down');
    });

    const outcome = await executor.execute(operation, policy);

    expect(operation).toHaveBeenCalledTimes(5);
    expect(delays).toEqual([1000, 2000, 4000, 8000]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.attempts).toBe(5);
      expect(outcome.classification).toBe('exhausted');
      expect(outcome.error).toBeInstanceOf(TransientError);
    }
  });

  it('succeeds on a later attempt after retryable failures', async () => {
    const { executor, delays, events } = createExecutor();
    let calls = 0;

    const outcome = await executor.execute(async (attempt) => {
      calls++;
      if (attempt < 3) {
        throw new TransientError(`attempt ${attempt}`);
      }
      return attempt;
    }, policy);

    expect(outcome).toEqual({ ok: true, value: 3, attempts: 3 });
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(events.map((e) => [e.attempt, e.delayMs])).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('stops after one attempt on a non-retryable error', async () => {
    const { executor, delays } = createExecutor();
    const operation = vi.fn(async () => {
      throw new FatalError('bad request');
    });

    const outcome = await executor.execute(operation, policy);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.attempts).toBe(1);
      expect(outcome.classification).toBe('non_retryable');
    }
  });

  it('does not start when the signal is already aborted', async () => {
    const { executor } = createExecutor();
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    const outcome = await executor.execute(operation, policy, controller.signal);

    expect(operation).not.toHaveBeenCalled();
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.attempts).toBe(0);
      expect(outcome.classification).toBe('cancelled');
    }
  });

  it('reports cancellation when the signal aborts during a wait', async () => {
    const controller = new AbortController();
    const executor = new RetryExecutor({
      sleep: async () => {
        controller.abort();
        throw new RetryAbortedError();
      },
      onRetry: () => {},
    });
    const operation = vi.fn(async () => {
      throw new TransientError('down');
    });

    const outcome = await executor.execute(operation, policy, controller.signal);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.attempts).toBe(1);
      expect(outcome.classification).toBe('cancelled');
      expect(outcome.error).toBeInstanceOf(TransientError);
    }
  });

  it('passes the attempt number and signal to the operation', async () => {
    const { executor } = createExecutor();
    const controller = new AbortController();
    const seen: Array<[number, AbortSignal | undefined]> = [];

    await executor.execute(async (attempt, signal) => {
      seen.push([attempt, signal]);
      if (attempt === 1) {
        throw new TransientError('once');
      }
      return null;
    }, policy, controller.signal);

    expect(seen).toEqual([
      [1, controller.signal],
      [2, controller.signal],
    ]);
  });
});

describe('sleep', () => {
  it('rejects with RetryAbortedError when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RetryAbortedError);
  });

  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60000, controller.signal)).rejects.toBeInstanceOf(RetryAbortedError);
  });

  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});
