import { BudgetRates, RatioBudgetOptions, RetryBudget } from './types';
import { SlidingWindowRate } from './sliding-window-rate';

/**
 * Retry budget comparing the recent failure rate with the recent success rate.
 *
 * Once failures per second exceed `ratio` times successes per second over the
 * trailing window, the budget is over and `retry()` stops calling the
 * operation until enough of the failures age out of the window. Only traffic
 * that is let through can bring the budget back under.
 *
 * One instance is meant to be shared by every session talking to the same
 * resource. All methods are synchronous, so each call runs to completion on
 * the event loop before another session can touch the estimators.
 *
 * See https://medium.com/yandex/good-retry-bad-retry-an-incident-story-648072d3cee6
 *
 * @example
 * ```typescript
 * const budget = new RatioBudget({ ratio: 0.1 });
 *
 * await retry(fetchFromService, { ...POLICY_DEFAULT, budget, attempts: 5 });
 * ```
 */
export class RatioBudget implements RetryBudget {
  readonly ratio: number;
  readonly minFailureRate: number;

  private readonly successes: SlidingWindowRate;
  private readonly failures: SlidingWindowRate;
  private readonly onOverChange?: (over: boolean, rates: BudgetRates) => void;
  private over: boolean = false;

  constructor(options: RatioBudgetOptions = {}) {
    this.ratio = nonNegative(options.ratio, 0.1);
    this.minFailureRate = nonNegative(options.minFailureRate, 0);
    const windowSize = options.windowSize ?? 60;
    this.successes = new SlidingWindowRate(windowSize);
    this.failures = new SlidingWindowRate(windowSize);
    this.onOverChange = options.onOverChange;
  }

  success(now: number, hits: number = 1): void {
    this.successes.add(now, hits);
  }

  failure(now: number, hits: number = 1): void {
    this.failures.add(now, hits);
  }

  isOver(now: number): boolean {
    return this.rates(now).over;
  }

  /**
   * Current success and failure rates along with the verdict they produce.
   */
  rates(now: number): BudgetRates {
    const successRate = this.successes.rate(now);
    const failureRate = this.failures.rate(now);
    const over = exceeds(failureRate, successRate, this.ratio, this.minFailureRate);

    const rates = { successRate, failureRate, over };
    if (over !== this.over) {
      this.over = over;
      this.onOverChange?.(over, rates);
    }
    return rates;
  }

  /**
   * Forget all recorded outcomes.
   */
  reset(): void {
    this.successes.reset();
    this.failures.reset();
    this.over = false;
  }
}

/**
 * Budget which is never over. Used when budget gating is disabled.
 */
export class NoOpBudget implements RetryBudget {
  success(_now: number, _hits?: number): void {}

  failure(_now: number, _hits?: number): void {}

  isOver(_now: number): boolean {
    return false;
  }
}

function exceeds(
  failureRate: number,
  successRate: number,
  ratio: number,
  minFailureRate: number
): boolean {
  // NaN means the clock went backwards: no data, not over
  if (!(failureRate > 0) || failureRate < minFailureRate) {
    return false;
  }

  if (!(successRate > 0)) {
    return true;
  }

  return failureRate / successRate > ratio;
}

function nonNegative(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(0, value);
}
