import { getLogger } from '../../utils/logger.js';
import { AbortError, ProviderError, errorMessage } from '../errors.js';
import { sleep } from './rate-limiter.js';

export interface RetryOptions {
  /** Attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  /** Injected for tests; defaults to Math.random */
  random?: () => number;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];

export function isTransientError(error: unknown): boolean {
  if (error instanceof AbortError) return false;
  if (error instanceof ProviderError) return error.retryable;
  if (error instanceof TypeError) return true; // fetch() network failure
  const code = error instanceof Error && 'code' in error ? String(error.code) : '';
  return NETWORK_ERROR_CODES.includes(code);
}

/**
 * Exponential backoff with full jitter: the delay before attempt n+1 is a
 * uniform draw from [0, min(maxDelay, base * 2^n)].
 */
export function backoffDelay(attempt: number, opts: RetryOptions): number {
  const ceiling = Math.min(opts.maxDelayMs, opts.baseDelayMs * 2 ** (attempt - 1));
  return Math.floor((opts.random ?? Math.random)() * ceiling);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY, ...options };
  const shouldRetry = opts.shouldRetry ?? isTransientError;
  const log = getLogger();

  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) throw new AbortError('Retry aborted');

    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt > opts.maxRetries || !shouldRetry(err)) throw err;

      const delay = backoffDelay(attempt, opts);
      log.debug({ attempt, maxRetries: opts.maxRetries, delay, err: errorMessage(err) }, 'Retrying after failure');
      await sleep(delay, opts.signal);
    }
  }
}
