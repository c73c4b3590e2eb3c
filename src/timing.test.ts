import { describe, expect, it } from 'vitest';
import { TimeoutError, pause, randomBetween, withTimeout } from './timing.js';

describe('withTimeout', () => {
  it('passes the result through', async () => {
    await expect(withTimeout(Promise.resolve(42), 50, 'answer')).resolves.toBe(42);
  });

  it('rejects with TimeoutError when the work is too slow', async () => {
    const never = new Promise<number>(() => {});
    await expect(withTimeout(never, 10, 'slow call')).rejects.toThrow(new TimeoutError('slow call', 10));
  });
});

describe('randomBetween', () => {
  it('scales the random value into the range', () => {
    expect(randomBetween(2000, 4000, () => 0)).toBe(2000);
    expect(randomBetween(2000, 4000, () => 0.25)).toBe(2500);
    expect(randomBetween(2000, 4000, () => 1)).toBe(4000);
  });

  it('returns the minimum for an empty range', () => {
    expect(randomBetween(500, 500, () => 0.9)).toBe(500);
  });
});

describe('pause', () => {
  it('resolves early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const waiting = pause(10_000, controller.signal);
    controller.abort();
    await waiting;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});
