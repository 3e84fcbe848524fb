import { describe, expect, it, vi } from 'vitest';
import { AbortError, ProviderError, ProviderTimeoutError } from '../errors.js';
import { backoffDelay, DEFAULT_RETRY, isTransientError, withRetry } from './retry.js';

const fast = { baseDelayMs: 0, maxDelayMs: 0 };

describe('withRetry', () => {
  it('retries transient failures until one succeeds', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new ProviderError('unavailable', 'test', 'kw', 503);
      return 'ok';
    });

    await expect(withRetry(fn, { ...fast, maxRetries: 2 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('gives up after maxRetries', async () => {
    const fn = vi.fn(async () => {
      throw new ProviderError('rate limited', 'test', 'kw', 429);
    });

    await expect(withRetry(fn, { ...fast, maxRetries: 2 })).rejects.toThrow('rate limited');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const fn = vi.fn(async () => {
      throw new ProviderError('bad request', 'test', 'kw', 400);
    });

    await expect(withRetry(fn, { ...fast, maxRetries: 5 })).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('honours a custom shouldRetry', async () => {
    const fn = vi.fn(async () => {
      throw new Error('nope');
    });

    await expect(withRetry(fn, { ...fast, maxRetries: 1, shouldRetry: () => true })).rejects.toThrow('nope');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBeInstanceOf(AbortError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('backoffDelay', () => {
  const opts = { ...DEFAULT_RETRY, random: () => 0.5 };

  it('doubles the ceiling per attempt', () => {
    expect(backoffDelay(1, opts)).toBe(250);
    expect(backoffDelay(3, opts)).toBe(1000);
  });

  it('caps the ceiling at maxDelayMs', () => {
    expect(backoffDelay(10, opts)).toBe(4000);
  });
});

describe('isTransientError', () => {
  it('classifies common failures', () => {
    expect(isTransientError(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isTransientError(new ProviderError('server', 'p', 'k', 502))).toBe(true);
    expect(isTransientError(new ProviderError('parse', 'p', 'k'))).toBe(false);
    expect(isTransientError(new ProviderTimeoutError('p', 'k', 100))).toBe(false);
    expect(isTransientError(new AbortError())).toBe(false);
  });
});
