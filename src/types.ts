/**
 * Strategy deciding how long to sleep between attempts.
 */
export interface IntervalStrategy {
  /** Delay in milliseconds before the attempt following `attempt` (1-based) */
  next(attempt: number): number;
}

/**
 * Admission-control gate shared by every retry session of a process.
 */
export interface RetryBudget {
  /** Record successful operations at `now` (epoch ms) */
  success(now: number, hits?: number): void;

  /** Record failed operations at `now` (epoch ms) */
  failure(now: number, hits?: number): void;

  /** Whether recent failures are too high relative to recent successes */
  isOver(now: number): boolean;
}

/**
 * Exponential backoff configuration
 */
export interface BackoffIntervalOptions {
  /** Smallest delay ever returned, in milliseconds (default: 500) */
  minMs?: number;

  /** Largest delay ever returned, in milliseconds (default: 5000) */
  maxMs?: number;

  /** Growth factor applied per attempt (default: 1.5) */
  factor?: number;

  /** Fraction of the backoff used as the jitter range, 0 to 1 (default: 0.2) */
  jitter?: number;

  /** Uniform source in [0, 1). Without one, no jitter is applied. */
  random?: () => number;
}

/**
 * Breakdown of a single backoff calculation, returned by `BackoffInterval.explain()`
 */
export interface BackoffExplanation {
  attempt: number;

  /** factor ** attempt */
  powerOf: number;

  /** minMs * powerOf, before jitter and clamping */
  backoff: number;

  /** Lower end of the jitter range (0 without a random source) */
  rangeMin: number;

  /** Upper end of the jitter range (0 without a random source) */
  rangeMax: number;

  /** Backoff with jitter applied (0 without a random source) */
  withJitter: number;
}

/**
 * Ratio budget configuration
 */
export interface RatioBudgetOptions {
  /** Maximum tolerated failure/success rate ratio (default: 0.1) */
  ratio?: number;

  /** Failures per second below which the budget is never over (default: 0) */
  minFailureRate?: number;

  /** Trailing window length in one-second buckets (default: 60) */
  windowSize?: number;

  /** Callback when the over-budget verdict flips */
  onOverChange?: (over: boolean, rates: BudgetRates) => void;
}

/**
 * Rates observed by a budget at a point in time
 */
export interface BudgetRates {
  /** Successes per second over the window */
  successRate: number;

  /** Failures per second over the window */
  failureRate: number;

  /** Whether the budget is over at that time */
  over: boolean;
}

/**
 * Retry policy. Created per call site and never mutated by `retry()`.
 */
export interface RetryPolicy {
  /** Delay between attempts (default: constant 500ms) */
  interval?: IntervalStrategy;

  /** Admission-control gate (default: none) */
  budget?: RetryBudget;

  /** Codes which cause a retry. Unset means every error is retried. */
  retryableCodes?: readonly number[];

  /** Total attempts including the first, 0 for unlimited (default: 0) */
  attempts?: number;

  /** Extracts a retry code from an error (default: `getErrorCode`) */
  getCode?: (error: unknown) => number | undefined;

  /** Whether the budget may block the first attempt of a session (default: true) */
  gateFirstAttempt?: boolean;

  /** Source of the current time in epoch ms (default: Date.now) */
  clock?: () => number;

  /** Callback invoked before each retry sleep */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  /** Callback invoked when the budget skips an attempt */
  onBudgetBlocked?: (attempt: number, delayMs: number) => void;
}

/**
 * Per-session inputs which are not part of the policy
 */
export interface RetryContext {
  /** Abandons the session when aborted */
  signal?: AbortSignal;
}

/**
 * An operation run by `retry()`
 */
export type RetryOperation<T> = (attempt: number, signal?: AbortSignal) => Promise<T>;

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  /** The successful result, if any */
  result?: T;

  /** The final error, if the session failed */
  error?: unknown;

  /** Whether the operation succeeded */
  success: boolean;

  /** Number of times the operation was invoked */
  attempts: number;

  /** Total time spent including delays */
  totalTimeMs: number;
}
