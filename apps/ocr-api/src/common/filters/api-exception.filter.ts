import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { STATUS_CODES } from 'http';
import type { Response } from 'express';
import {
  ApiErrorBody,
  defaultReasonFor,
  isErrorReason,
} from '../errors/error-reason';

/**
 * Gives every HttpException the same body:
 *
 *   { statusCode, error, reason, message }
 *
 * Exceptions thrown by this codebase already carry `reason`; those raised by
 * Nest itself (ValidationPipe, the multer interceptor, unknown routes) get
 * one derived from the status code. Every 401 carries the Bearer challenge.
 */
@Catch(HttpException)
export class ApiExceptionFilter implements ExceptionFilter<HttpException> {
  catch(exception: HttpException, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const status = exception.getStatus();
    const body = this.toBody(exception, status);

    if (status === HttpStatus.UNAUTHORIZED) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }

    res.status(status).json(body);
  }

  private toBody(exception: HttpException, status: number): ApiErrorBody {
    const response = exception.getResponse();
    const fallbackError = STATUS_CODES[status] ?? 'Error';

    if (typeof response === 'string') {
      return {
        statusCode: status,
        error: fallbackError,
        reason: defaultReasonFor(status),
        message: response,
      };
    }

    const fields = new Map(Object.entries(response));
    const message = fields.get('message');
    const error = fields.get('error');
    const reason = fields.get('reason');

    return {
      statusCode: status,
      error: typeof error === 'string' ? error : fallbackError,
      reason: isErrorReason(reason) ? reason : defaultReasonFor(status),
      message: isMessage(message) ? message : exception.message,
    };
  }
}

function isMessage(value: unknown): value is string | string[] {
  return (
    typeof value === 'string' ||
    (Array.isArray(value) && value.every((item) => typeof item === 'string'))
  );
}
