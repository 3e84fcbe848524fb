import { getLogger } from '../../../utils/logger.js';
import { AbortError, ProviderError, ProviderTimeoutError } from '../../errors.js';
import type { RateLimiter } from '../rate-limiter.js';
import { withRetry, type RetryOptions } from '../retry.js';
import type { Axis, AxisMetrics, FetchOptions, SignalProvider } from '../types.js';

export interface ExternalProviderOptions {
  limiter: RateLimiter;
  retry?: Partial<Omit<RetryOptions, 'signal'>>;
  /** Per-attempt timeout for the underlying HTTP call */
  requestTimeoutMs?: number;
}

/**
 * Shared plumbing for providers that call a third-party API: rate limiting,
 * retry with backoff, and a per-request timeout. Subclasses only implement
 * `request` and report failures as ProviderError.
 */
export abstract class ExternalProvider<A extends Axis> implements SignalProvider<A> {
  abstract readonly name: string;
  abstract readonly axis: A;

  protected log = getLogger();
  /** Rate-limiter tokens one fetch consumes, one per upstream API call */
  protected readonly requestCost: number = 1;

  constructor(private readonly options: ExternalProviderOptions) {}

  protected abstract request(keyword: string, signal: AbortSignal): Promise<AxisMetrics[A]>;

  async fetch(keyword: string, options: FetchOptions = {}): Promise<AxisMetrics[A]> {
    const { signal } = options;
    return withRetry(async (attempt) => {
      await this.options.limiter.acquire(this.requestCost, signal);
      this.log.debug({ provider: this.name, keyword, attempt }, 'Provider request');
      return this.withTimeout(keyword, signal, (s) => this.request(keyword, s));
    }, { ...this.options.retry, signal });
  }

  private async withTimeout<T>(
    keyword: string,
    parent: AbortSignal | undefined,
    run: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = this.options.requestTimeoutMs;
    const controller = new AbortController();
    const onParentAbort = () => controller.abort();
    if (parent?.aborted) throw new AbortError();
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let timedOut = false;
    const timer = timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs);

    try {
      return await run(controller.signal);
    } catch (err) {
      if (timedOut && timeoutMs !== undefined) throw new ProviderTimeoutError(this.name, keyword, timeoutMs);
      if (parent?.aborted) throw new AbortError();
      throw err;
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  protected fail(keyword: string, message: string, status?: number, cause?: unknown): ProviderError {
    return new ProviderError(`${this.name}: ${message}`, this.name, keyword, status, { cause });
  }
}
