import {
  IntervalStrategy,
  RetryBudget,
  RetryContext,
  RetryOperation,
  RetryPolicy,
  RetryResult,
} from './types';
import { BackoffInterval, ConstantInterval, sleep } from './backoff';
import { NoOpBudget } from './retry-budget';
import { RetryCancelledError, getErrorCode } from './errors';

/**
 * Codes which indicate a remote service may succeed if asked again:
 * retry request (454), too many requests, internal error, bad gateway,
 * service unavailable and gateway timeout.
 */
export const RETRYABLE_CODES: readonly number[] = Object.freeze([454, 429, 500, 502, 503, 504]);

/**
 * Interval used when a policy does not provide one.
 */
export const DEFAULT_INTERVAL_MS = 500;

const DEFAULT_BACKOFF = new BackoffInterval({
  minMs: 500,
  maxMs: 5000,
  factor: 1.5,
  jitter: 0.2,
  random: Math.random,
});

/**
 * Retry any error forever with exponential backoff. Cancel through the
 * session's AbortSignal.
 */
export const POLICY_DEFAULT: Readonly<RetryPolicy> = Object.freeze({
  interval: DEFAULT_BACKOFF,
  attempts: 0,
});

/**
 * Retry forever as long as the remote service answers with one of
 * `RETRYABLE_CODES`. Any other error is returned to the caller immediately.
 */
export const POLICY_ON_RETRYABLE: Readonly<RetryPolicy> = Object.freeze({
  interval: DEFAULT_BACKOFF,
  retryableCodes: RETRYABLE_CODES,
  attempts: 0,
});

/**
 * Run `operation` until it succeeds, the attempt limit is reached, a
 * non-retryable error occurs or `context.signal` aborts.
 *
 * The operation receives the current attempt number (starting at 1) and the
 * session's signal. The returned promise rejects with the exact error the
 * last attempt threw, or with `RetryCancelledError` when the session was
 * abandoned.
 *
 * @example
 * ```typescript
 * const budget = new RatioBudget({ ratio: 0.1 });
 *
 * const data = await retry(
 *   async (attempt, signal) => {
 *     const response = await fetch('https://api.example.com/data', { signal });
 *     if (!response.ok) throw Object.assign(new Error('request failed'), { status: response.status });
 *     return response.json();
 *   },
 *   { ...POLICY_ON_RETRYABLE, budget, attempts: 5 },
 *   { signal: AbortSignal.timeout(30000) }
 * );
 * ```
 */
export async function retry<T>(
  operation: RetryOperation<T>,
  policy: RetryPolicy = POLICY_DEFAULT,
  context: RetryContext = {}
): Promise<T> {
  const { signal } = context;
  const interval: IntervalStrategy = policy.interval ?? new ConstantInterval(DEFAULT_INTERVAL_MS);
  const budget: RetryBudget = policy.budget ?? new NoOpBudget();
  const limit = normalizeAttempts(policy.attempts);
  const clock = policy.clock ?? Date.now;
  const gateFirstAttempt = policy.gateFirstAttempt ?? true;

  for (let attempt = 1; ; attempt++) {
    // Cancellation wins over any pending retry
    if (signal?.aborted) {
      throw new RetryCancelledError(signal.reason);
    }

    // Over budget: skip this attempt without recording an outcome
    if ((attempt > 1 || gateFirstAttempt) && budget.isOver(clock())) {
      const delay = interval.next(attempt);
      policy.onBudgetBlocked?.(attempt, delay);
      await sleep(delay, signal);
      continue;
    }

    let lastError: unknown;
    try {
      const result = await operation(attempt, signal);
      budget.success(clock());
      return result;
    } catch (error) {
      lastError = error;
      budget.failure(clock());
    }

    if (signal?.aborted) {
      throw new RetryCancelledError(signal.reason);
    }

    // Attempt limit reached
    if (limit !== 0 && attempt >= limit) {
      throw lastError;
    }

    // Check if we should retry
    if (!isRetryable(lastError, policy)) {
      throw lastError;
    }

    // Calculate backoff delay
    const delay = interval.next(attempt);
    policy.onRetry?.(lastError, attempt, delay);
    await sleep(delay, signal);
  }
}

/**
 * Retry with detailed result information. Never rejects.
 */
export async function retryWithResult<T>(
  operation: RetryOperation<T>,
  policy: RetryPolicy = POLICY_DEFAULT,
  context: RetryContext = {}
): Promise<RetryResult<T>> {
  const startTime = Date.now();
  let attempts = 0;

  const counted: RetryOperation<T> = (attempt, signal) => {
    attempts++;
    return operation(attempt, signal);
  };

  try {
    const result = await retry(counted, policy, context);

    return {
      result,
      success: true,
      attempts,
      totalTimeMs: Date.now() - startTime,
    };
  } catch (error) {
    return {
      error,
      success: false,
      attempts,
      totalTimeMs: Date.now() - startTime,
    };
  }
}

/**
 * Retry with `POLICY_DEFAULT` until the operation succeeds or the signal aborts.
 */
export function until<T>(operation: RetryOperation<T>, context: RetryContext = {}): Promise<T> {
  return retry(operation, POLICY_DEFAULT, context);
}

/**
 * Retry any error with exponential backoff starting at `sleepMs` and growing
 * to at most ten times that, for at most `attempts` attempts.
 */
export function untilAttempts<T>(
  attempts: number,
  sleepMs: number,
  operation: RetryOperation<T>,
  context: RetryContext = {}
): Promise<T> {
  return retry(operation, {
    interval: new BackoffInterval({
      minMs: sleepMs,
      maxMs: sleepMs * 10,
      factor: 1.5,
      jitter: 0.2,
      random: Math.random,
    }),
    attempts,
  }, context);
}

/**
 * Create a retryable version of a function.
 *
 * @example
 * ```typescript
 * const fetchData = createRetryable(
 *   async (id: string) => {
 *     const response = await fetch(`/api/data/${id}`);
 *     return response.json();
 *   },
 *   { ...POLICY_DEFAULT, attempts: 3 }
 * );
 *
 * // Use like a normal function
 * const data = await fetchData('123');
 * ```
 */
export function createRetryable<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  policy: RetryPolicy = POLICY_DEFAULT,
  context: RetryContext = {}
): (...args: TArgs) => Promise<TResult> {
  return (...args: TArgs) => retry(() => fn(...args), policy, context);
}

/**
 * Whether `error` may be retried under `policy`. Without `retryableCodes`
 * every error is retryable; with them, errors without a code are not.
 */
export function isRetryable(error: unknown, policy: RetryPolicy): boolean {
  if (policy.retryableCodes === undefined) {
    return true;
  }

  const code = (policy.getCode ?? getErrorCode)(error);
  return code !== undefined && policy.retryableCodes.includes(code);
}

function normalizeAttempts(attempts: number | undefined): number {
  if (attempts === undefined || !Number.isFinite(attempts) || attempts < 0) {
    return 0;
  }
  return Math.floor(attempts);
}
