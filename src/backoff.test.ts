import { BackoffInterval, ConstantInterval, MAX_DELAY_MS, formatDelay, sleep } from './backoff';
import { RetryCancelledError } from './errors';

describe('BackoffInterval', () => {
  it('should grow exponentially without jitter', () => {
    const interval = new BackoffInterval({ minMs: 100, maxMs: 10000, factor: 2 });

    expect(interval.next(0)).toBe(100);
    expect(interval.next(1)).toBe(200);
    expect(interval.next(2)).toBe(400);
    expect(interval.next(3)).toBe(800);
  });

  it('should cap at maxMs', () => {
    const interval = new BackoffInterval({ minMs: 100, maxMs: 1000, factor: 2 });

    expect(interval.next(10)).toBe(1000);
  });

  it('should never go below minMs with a shrinking factor', () => {
    const interval = new BackoffInterval({ minMs: 100, maxMs: 1000, factor: 0.5 });

    expect(interval.next(3)).toBe(100);
  });

  it('should be non-decreasing in the attempt without jitter', () => {
    const interval = new BackoffInterval({ minMs: 50, maxMs: 60000, factor: 1.3 });

    let previous = 0;
    for (let attempt = 1; attempt <= 40; attempt++) {
      const delay = interval.next(attempt);
      expect(delay).toBeGreaterThanOrEqual(previous);
      previous = delay;
    }
  });

  it('should sample within the jitter range', () => {
    const options = { minMs: 100, maxMs: 10000, factor: 2, jitter: 0.2 };

    expect(new BackoffInterval({ ...options, random: () => 0 }).next(1)).toBe(160);
    expect(new BackoffInterval({ ...options, random: () => 0.5 }).next(1)).toBe(200);
    expect(new BackoffInterval({ ...options, random: () => 0.75 }).next(1)).toBe(220);
  });

  it('should stay within [minMs, maxMs] with jitter', () => {
    const interval = new BackoffInterval({
      minMs: 100,
      maxMs: 2000,
      factor: 2,
      jitter: 1,
      random: Math.random,
    });

    for (let attempt = 0; attempt <= 20; attempt++) {
      for (let i = 0; i < 20; i++) {
        const delay = interval.next(attempt);
        expect(delay).toBeGreaterThanOrEqual(100);
        expect(delay).toBeLessThanOrEqual(2000);
      }
    }
  });

  it('should repair out of range options', () => {
    const interval = new BackoffInterval({ minMs: -10, maxMs: -20, jitter: 5 });

    expect(interval.minMs).toBe(0);
    expect(interval.maxMs).toBe(0);
    expect(interval.jitter).toBe(1);
    expect(new BackoffInterval({ jitter: -1 }).jitter).toBe(0);
    expect(new BackoffInterval({ minMs: 300, maxMs: 100 }).maxMs).toBe(300);
  });

  it('should cap delays at the longest timer Node.js honours', () => {
    const interval = new BackoffInterval({ minMs: 1000, maxMs: 10 * MAX_DELAY_MS, factor: 10 });

    expect(interval.maxMs).toBe(2147483647);
    expect(interval.next(12)).toBe(2147483647);
    expect(new BackoffInterval({ minMs: 3 * MAX_DELAY_MS }).minMs).toBe(2147483647);
  });

  it('should apply defaults', () => {
    const interval = new BackoffInterval();

    expect(interval.minMs).toBe(500);
    expect(interval.maxMs).toBe(5000);
    expect(interval.factor).toBe(1.5);
    expect(interval.jitter).toBe(0.2);
  });

  describe('explain', () => {
    const interval = new BackoffInterval({
      minMs: 500,
      maxMs: 5000,
      factor: 2,
      jitter: 0.5,
      random: () => 0.25,
    });

    it('should break down the calculation', () => {
      expect(interval.explain(2)).toEqual({
        attempt: 2,
        powerOf: 4,
        backoff: 2000,
        rangeMin: 1000,
        rangeMax: 3000,
        withJitter: 1500,
      });
    });

    it('should leave the jitter range empty without a random source', () => {
      const plain = new BackoffInterval({ minMs: 500, maxMs: 5000, factor: 2 });

      expect(plain.explain(1)).toEqual({
        attempt: 1,
        powerOf: 2,
        backoff: 1000,
        rangeMin: 0,
        rangeMax: 0,
        withJitter: 0,
      });
    });

    it('should format the explanation', () => {
      expect(interval.explainString(2)).toBe(
        'Attempt: 2 BackOff: 2.0s WithJitter: 1.5s Jitter Range: [1.0s - 3.0s]'
      );
    });
  });
});

describe('ConstantInterval', () => {
  it('should ignore the attempt number', () => {
    const interval = new ConstantInterval(250);

    expect(interval.next(1)).toBe(250);
    expect(interval.next(99)).toBe(250);
  });

  it('should not go negative', () => {
    expect(new ConstantInterval(-5).delayMs).toBe(0);
  });

  it('should cap at the longest timer Node.js honours', () => {
    expect(new ConstantInterval(5 * MAX_DELAY_MS).next(1)).toBe(2147483647);
  });
});

describe('sleep', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    jest.useFakeTimers();

    const done = jest.fn();
    const pending = sleep(1000).then(done);

    jest.advanceTimersByTime(999);
    await Promise.resolve();
    expect(done).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should not fire early for delays beyond the timer limit', async () => {
    jest.useFakeTimers();

    const done = jest.fn();
    const pending = sleep(4 * MAX_DELAY_MS).then(done);

    jest.advanceTimersByTime(1000);
    await Promise.resolve();
    expect(done).not.toHaveBeenCalled();

    jest.advanceTimersByTime(MAX_DELAY_MS);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should reject as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort('shutdown');

    await expect(pending).rejects.toBeInstanceOf(RetryCancelledError);
    await expect(pending).rejects.toMatchObject({ cause: 'shutdown' });
  });

  it('should reject immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort('gone');

    await expect(sleep(60000, controller.signal)).rejects.toBeInstanceOf(RetryCancelledError);
  });
});

describe('formatDelay', () => {
  it('should format milliseconds and seconds', () => {
    expect(formatDelay(750)).toBe('750ms');
    expect(formatDelay(1500)).toBe('1.5s');
  });
});
