import { RateLimitedError, SourceRequestError, SourceUnavailableError } from '../../utils/github.errors';

export type SyncErrorKind = 'not_tracked' | 'rate_limited' | 'network' | 'source' | 'storage';

/** The only rejection `SyncService.sync` produces. The cursor is untouched when it is thrown. */
export class SyncError extends Error {
  constructor(
    public readonly kind: SyncErrorKind,
    message: string,
    public readonly retryAfterSeconds?: number,
  ) {
    super(message);
    this.name = 'SyncError';
  }

  static fromFetch(err: unknown): SyncError {
    if (err instanceof SyncError) return err;
    if (err instanceof RateLimitedError) {
      return new SyncError('rate_limited', err.message, err.retryAfterSeconds);
    }
    if (err instanceof SourceUnavailableError) return new SyncError('network', err.message);
    if (err instanceof SourceRequestError) return new SyncError('source', err.message);
    return new SyncError('source', err instanceof Error ? err.message : String(err));
  }

  static fromStorage(err: unknown): SyncError {
    if (err instanceof SyncError) return err;
    return new SyncError('storage', err instanceof Error ? err.message : String(err));
  }
}
