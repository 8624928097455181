import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ErrorPayload, readErrorPayload } from '../error-payload';

const DEFAULT_ERROR_CODE = 'UNKNOWN_ERROR';

const toErrorCode = (message: string) => {
  const normalized = message
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .replace(/_+/g, '_');
  return normalized || DEFAULT_ERROR_CODE;
};

const resolveMessage = (payload: ErrorPayload | string | undefined) => {
  if (!payload) {
    return null;
  }
  if (typeof payload === 'string') {
    return payload;
  }
  if (Array.isArray(payload.message)) {
    return payload.message.join(' ');
  }
  return payload.message ?? payload.error ?? null;
};

/**
 * Renders every error as `{ statusCode, message, error, errorCode }`.
 * Domain errors carry their own `errorCode`; others get one derived from
 * the message.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    if (!(exception instanceof HttpException)) {
      this.logger.error(
        exception instanceof Error ? exception.message : String(exception),
        exception instanceof Error ? exception.stack : undefined,
      );
      response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Unexpected error.',
        error: 'Internal Server Error',
        errorCode: 'INTERNAL_ERROR',
      });
      return;
    }

    const status = exception.getStatus();
    const payload = readErrorPayload(exception);
    const message = resolveMessage(payload) || exception.message;
    const details = typeof payload === 'object' ? payload : undefined;

    response.status(status).json({
      statusCode: status,
      message,
      error: details?.error,
      errorCode: details?.errorCode ?? toErrorCode(message),
    });
  }
}
