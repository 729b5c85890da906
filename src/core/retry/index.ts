export {
  RetryExecutor,
  DEFAULT_RETRY_POLICY,
  createRetryPolicy,
  computeBackoffDelay,
  sleep,
  type RetryExecutorOptions,
} from './retry-executor';

export {
  RetryAbortedError,
  type RetryPolicy,
  type RetryOutcome,
  type RetryEvent,
  type RetryFailureClassification,
  type RetryableOperation,
  type SleepFn,
} from './types';
