import { AbortError } from '../errors.js';

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Token bucket rate limiter, one per external provider.
 * Waiters are served strictly in arrival order, so concurrent fetches for
 * the same provider can never overdraw the bucket.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly maxTokens: number,
    private readonly refillRatePerSecond: number,
    private readonly now: () => number = Date.now,
  ) {
    this.tokens = maxTokens;
    this.lastRefill = now();
  }

  static perMinute(requestsPerMinute: number, burst = requestsPerMinute): RateLimiter {
    return new RateLimiter(burst, requestsPerMinute / 60);
  }

  private refill(): void {
    const now = this.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRatePerSecond);
    this.lastRefill = now;
  }

  acquire(cost = 1, signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.take(cost, signal));
    // A rejected (aborted) waiter must not block the ones behind it
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async take(cost: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new AbortError();
    this.refill();
    if (this.tokens < cost) {
      // Wait until we have enough tokens
      const deficit = cost - this.tokens;
      await sleep((deficit / this.refillRatePerSecond) * 1000, signal);
      this.refill();
    }
    this.tokens -= cost;
  }

  get available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }
}
