/**
 * Hits-per-second estimator over a trailing window of one-second buckets.
 *
 * The ring keeps `windowSize + 1` buckets. The newest bucket is still filling
 * and the oldest has partly aged out of the window, so once the ring is full
 * the oldest bucket is weighted by the share of its second that still falls
 * inside the window. This keeps the rate from jumping at every second boundary.
 *
 * Memory is allocated once in the constructor. Not safe to share between
 * independent writers without serialising access (see `RatioBudget`).
 *
 * @example
 * ```typescript
 * const rate = new SlidingWindowRate(60);
 * rate.add(Date.now(), 1);
 * rate.rate(Date.now()); // hits per second over the last minute
 * ```
 */
export class SlidingWindowRate {
  readonly windowSize: number;

  private readonly buckets: number[];
  // Index of the newest bucket
  private head: number = 0;
  // Buckets seen since the first sample, capped at buckets.length
  private observed: number = 0;
  private lastUpdate: number | null = null;

  constructor(windowSize: number = 60) {
    this.windowSize = Number.isFinite(windowSize) && windowSize >= 1
      ? Math.floor(windowSize)
      : 1;
    this.buckets = new Array<number>(this.windowSize + 1).fill(0);
  }

  /**
   * Record `hits` at `now` (epoch ms). Ignored when `now` precedes the last update.
   */
  add(now: number, hits: number): void {
    if (this.lastUpdate !== null && now < this.lastUpdate) {
      return;
    }

    this.advance(now);
    this.buckets[this.head] += hits;
  }

  /**
   * Hits per second over the window ending at `now` (epoch ms).
   *
   * @returns `NaN` when `now` precedes the last update, which callers must
   * treat as "no data" rather than zero
   */
  rate(now: number): number {
    if (this.lastUpdate === null) {
      return 0;
    }
    if (now < this.lastUpdate) {
      return NaN;
    }

    this.advance(now);
    const elapsed = secondFraction(now);

    // History is not yet full: average over the time actually observed
    if (this.observed <= this.windowSize) {
      let sum = 0;
      for (const count of this.buckets) {
        sum += count;
      }
      const seconds = Math.max(1, this.observed - 1 + elapsed);
      return sum / seconds;
    }

    const oldest = (this.head + 1) % this.buckets.length;
    let sum = (1 - elapsed) * this.buckets[oldest];
    for (let i = 0; i < this.buckets.length; i++) {
      if (i !== oldest) {
        sum += this.buckets[i];
      }
    }
    return sum / this.windowSize;
  }

  /**
   * Forget all recorded hits and the last update time.
   */
  reset(): void {
    this.buckets.fill(0);
    this.head = 0;
    this.observed = 0;
    this.lastUpdate = null;
  }

  private advance(now: number): void {
    // First sample starts the window at the current head
    if (this.lastUpdate === null) {
      this.observed = 1;
      this.lastUpdate = now;
      return;
    }

    // Whole seconds crossed since the last update
    const elapsed = bucketOf(now) - bucketOf(this.lastUpdate);
    if (elapsed > 0) {
      // Anything past a full turn of the ring has aged out anyway
      const shift = Math.min(elapsed, this.buckets.length);
      // Clear each bucket the head moves onto
      for (let i = 0; i < shift; i++) {
        this.head = (this.head + 1) % this.buckets.length;
        this.buckets[this.head] = 0;
      }
      this.observed = Math.min(this.observed + shift, this.buckets.length);
    }

    this.lastUpdate = now;
  }
}

const BUCKET_MS = 1000;

function bucketOf(time: number): number {
  return Math.floor(time / BUCKET_MS);
}

/**
 * Portion of the current one-second bucket already elapsed at `time`, in [0, 1).
 */
function secondFraction(time: number): number {
  return (time - bucketOf(time) * BUCKET_MS) / BUCKET_MS;
}
