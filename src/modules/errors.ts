/**
 * Error types shared across the analysis pipeline.
 *
 * Provider errors never leave an axis analyzer: they are logged and the
 * keyword falls back to synthetic data. Topic-source and config errors are
 * run-level and reach the CLI.
 */

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly keyword: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }

  /** 429 and 5xx are worth another attempt; 4xx and malformed bodies are not. */
  get retryable(): boolean {
    if (this.status === undefined) return false;
    return this.status === 429 || this.status >= 500;
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(provider: string, keyword: string, timeoutMs: number) {
    super(`${provider} timed out after ${timeoutMs}ms`, provider, keyword);
    this.name = 'ProviderTimeoutError';
  }
}

export class MissingCredentialsError extends Error {
  constructor(public readonly provider: string, public readonly keys: string[]) {
    super(`${provider} requires ${keys.join(', ')}`);
    this.name = 'MissingCredentialsError';
  }
}

export class TopicSourceError extends Error {
  constructor(message: string, public readonly source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TopicSourceError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
