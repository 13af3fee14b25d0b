/**
 * Interval strategies deciding how long to wait between attempts.
 *
 * Jitter spreads concurrent clients apart so they do not retry in lockstep:
 * https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */

import { BackoffExplanation, BackoffIntervalOptions, IntervalStrategy } from './types';
import { RetryCancelledError } from './errors';

/**
 * Longest delay a Node.js timer honours. Larger values fire after 1ms.
 */
export const MAX_DELAY_MS = 2147483647;

/**
 * Exponential backoff with optional jitter, clamped to `[minMs, maxMs]`.
 *
 * Jitter is only applied when a `random` source is supplied, which keeps the
 * calculation deterministic in tests.
 *
 * @example
 * ```typescript
 * const interval = new BackoffInterval({
 *   minMs: 500,
 *   maxMs: 5000,
 *   factor: 1.5,
 *   jitter: 0.2,
 *   random: Math.random,
 * });
 *
 * interval.next(1); // ~750ms, somewhere in [600, 900]
 * ```
 */
export class BackoffInterval implements IntervalStrategy {
  readonly minMs: number;
  readonly maxMs: number;
  readonly factor: number;
  readonly jitter: number;
  private readonly random?: () => number;

  constructor(options: BackoffIntervalOptions = {}) {
    // Out of range values are clamped rather than rejected
    this.minMs = clamp(finiteOr(options.minMs, 500), 0, MAX_DELAY_MS);
    this.maxMs = clamp(finiteOr(options.maxMs, 5000), this.minMs, MAX_DELAY_MS);
    // A factor <= 1 disables growth; that is left to the caller
    this.factor = finiteOr(options.factor, 1.5);
    this.jitter = Math.min(1, Math.max(0, finiteOr(options.jitter, 0.2)));
    this.random = options.random;
  }

  next(attempt: number): number {
    const backoff = this.minMs * Math.pow(this.factor, attempt);
    let delay = backoff;

    if (this.random) {
      const lower = backoff * (1 - this.jitter);
      const upper = backoff * (1 + this.jitter);
      delay = lower + this.random() * (upper - lower);
    }

    return clamp(delay, this.minMs, this.maxMs);
  }

  /**
   * Break down the calculation for `attempt`. Useful when choosing values for
   * the interval; retry behaviour is not affected.
   */
  explain(attempt: number): BackoffExplanation {
    const powerOf = Math.pow(this.factor, attempt);
    const backoff = this.minMs * powerOf;
    const explanation: BackoffExplanation = {
      attempt,
      powerOf,
      backoff,
      rangeMin: 0,
      rangeMax: 0,
      withJitter: 0,
    };

    if (this.random) {
      const spread = backoff * this.jitter;
      explanation.rangeMin = backoff - spread;
      explanation.rangeMax = backoff + spread;
      explanation.withJitter = explanation.rangeMin +
        this.random() * (explanation.rangeMax - explanation.rangeMin);
    }

    return explanation;
  }

  /**
   * Same as `explain()` formatted on a single line.
   */
  explainString(attempt: number): string {
    const e = this.explain(attempt);
    return `Attempt: ${e.attempt} BackOff: ${formatDelay(e.backoff)} ` +
      `WithJitter: ${formatDelay(e.withJitter)} ` +
      `Jitter Range: [${formatDelay(e.rangeMin)} - ${formatDelay(e.rangeMax)}]`;
  }
}

/**
 * Constant sleep between attempts, regardless of the attempt number.
 */
export class ConstantInterval implements IntervalStrategy {
  readonly delayMs: number;

  constructor(delayMs: number) {
    this.delayMs = clamp(finiteOr(delayMs, 0), 0, MAX_DELAY_MS);
  }

  next(_attempt: number): number {
    return this.delayMs;
  }
}

/**
 * Sleep for a specified duration.
 *
 * Rejects with `RetryCancelledError` as soon as `signal` aborts. Delays are
 * capped at `MAX_DELAY_MS`.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryCancelledError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RetryCancelledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(ms, MAX_DELAY_MS));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format a delay for display, e.g. `750ms` or `1.5s`.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

function clamp(value: number, min: number, max: number): number {
  if (value > max) return max;
  if (value < min) return min;
  return value;
}

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}
