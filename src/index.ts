/**
 * Windowed Retry - retries throttled by a sliding-window retry budget
 *
 * Retries a fallible operation with jittered exponential backoff, and stops
 * calling a struggling service while its recent failure rate is too high
 * compared with its recent success rate.
 *
 * @packageDocumentation
 */

// Core retry functions
export {
  retry,
  retryWithResult,
  until,
  untilAttempts,
  createRetryable,
  isRetryable,
  POLICY_DEFAULT,
  POLICY_ON_RETRYABLE,
  RETRYABLE_CODES,
  DEFAULT_INTERVAL_MS,
} from './retry';

// Interval strategies
export {
  BackoffInterval,
  ConstantInterval,
  MAX_DELAY_MS,
  sleep,
  formatDelay,
} from './backoff';

// Retry budgets
export {
  RatioBudget,
  NoOpBudget,
} from './retry-budget';

// Rate estimation
export {
  SlidingWindowRate,
} from './sliding-window-rate';

// Errors
export {
  RetryCancelledError,
  getErrorCode,
} from './errors';

// Types
export type {
  IntervalStrategy,
  RetryBudget,
  BackoffIntervalOptions,
  BackoffExplanation,
  RatioBudgetOptions,
  BudgetRates,
  RetryPolicy,
  RetryContext,
  RetryOperation,
  RetryResult,
} from './types';
