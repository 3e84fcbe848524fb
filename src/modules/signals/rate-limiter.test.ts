import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../errors.js';
import { RateLimiter, sleep } from './rate-limiter.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('serves concurrent waiters in order without overdrawing', async () => {
    const limiter = new RateLimiter(2, 1);
    const done: number[] = [];
    const all = [0, 1, 2, 3].map(i => limiter.acquire().then(() => {
      done.push(i);
    }));

    await vi.advanceTimersByTimeAsync(0);
    expect(done).toEqual([0, 1]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(done).toEqual([0, 1, 2]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(done).toEqual([0, 1, 2, 3]);
    await Promise.all(all);
  });

  it('rejects an aborted waiter without blocking the next one', async () => {
    const limiter = new RateLimiter(1, 1);
    await limiter.acquire();

    const controller = new AbortController();
    const aborted = limiter.acquire(1, controller.signal);
    const rejection = expect(aborted).rejects.toBeInstanceOf(AbortError);
    controller.abort();
    await rejection;

    let served = false;
    const next = limiter.acquire().then(() => {
      served = true;
    });
    await vi.advanceTimersByTimeAsync(1000);
    expect(served).toBe(true);
    await next;
  });

  it('builds a per-minute bucket', () => {
    expect(RateLimiter.perMinute(30).available).toBe(30);
    expect(RateLimiter.perMinute(30, 5).available).toBe(5);
  });
});

describe('sleep', () => {
  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(AbortError);
  });
});
