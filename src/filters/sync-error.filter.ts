import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { SyncError, SyncErrorKind } from '../modules/sync/sync.errors';

const STATUS_BY_KIND: Record<SyncErrorKind, HttpStatus> = {
  not_tracked: HttpStatus.NOT_FOUND,
  rate_limited: HttpStatus.TOO_MANY_REQUESTS,
  network: HttpStatus.BAD_GATEWAY,
  source: HttpStatus.BAD_GATEWAY,
  storage: HttpStatus.INTERNAL_SERVER_ERROR,
};

@Catch(SyncError)
export class SyncErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(SyncErrorFilter.name);

  catch(error: SyncError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_KIND[error.kind];

    if (status >= 500) this.logger.error(`${error.kind}: ${error.message}`);
    if (error.kind === 'rate_limited' && error.retryAfterSeconds !== undefined) {
      response.setHeader('Retry-After', String(error.retryAfterSeconds));
    }
    response.status(status).json({
      success: false,
      statusCode: status,
      error: error.kind,
      message: error.message,
      ...(error.retryAfterSeconds !== undefined ? { retryAfterSeconds: error.retryAfterSeconds } : {}),
    });
  }
}
