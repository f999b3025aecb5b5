/** The source asked us to slow down; `retryAfterSeconds` is its hint. */
export class RateLimitedError extends Error {
  constructor(
    public readonly retryAfterSeconds: number,
    message = `GitHub rate limit hit, retry after ${retryAfterSeconds}s`,
  ) {
    super(message);
    this.name = 'RateLimitedError';
  }
}

/** Network failure, timeout or 5xx. Retried like a rate limit. */
export class SourceUnavailableError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

/** A 4xx other than rate limiting. Not retried. */
export class SourceRequestError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = 'SourceRequestError';
  }
}

export function isTransient(err: unknown): err is RateLimitedError | SourceUnavailableError {
  return err instanceof RateLimitedError || err instanceof SourceUnavailableError;
}
