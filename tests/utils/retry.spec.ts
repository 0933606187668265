import { afterEach, describe, expect, it, vi } from 'vitest';
import { SleepAbortedError, computeBackoffDelay, sleep } from '../../src/utils/retry.js';

describe('computeBackoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([0, 1, 2, 3].map((index) => computeBackoffDelay(index))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps at the maximum delay', () => {
    expect(computeBackoffDelay(3, { baseDelayMs: 500, maxDelayMs: 2000 })).toBe(2000);
    expect(computeBackoffDelay(40)).toBe(60_000);
  });

  it('treats negative and fractional indexes as whole retries from zero', () => {
    expect(computeBackoffDelay(-3, { baseDelayMs: 100 })).toBe(100);
    expect(computeBackoffDelay(1.7, { baseDelayMs: 100 })).toBe(200);
  });

  it('honors a custom factor', () => {
    expect(computeBackoffDelay(2, { baseDelayMs: 10, backoffFactor: 3 })).toBe(90);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves immediately for non-positive delays', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
    await expect(sleep(-5)).resolves.toBeUndefined();
  });

  it('rejects when the signal aborts mid-sleep', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(SleepAbortedError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(SleepAbortedError);
  });
});
