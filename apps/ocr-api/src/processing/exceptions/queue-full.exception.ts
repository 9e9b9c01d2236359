import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorReason } from '../../common/errors/error-reason';

/**
 * Thrown when the processing queue is at capacity.
 * Maps to HTTP 503 Service Unavailable; the client may retry later.
 */
export class QueueFullException extends HttpException {
  constructor(capacity: number) {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'Service Unavailable',
        reason: ErrorReason.QUEUE_FULL,
        message: `Processing queue is full (${capacity} jobs waiting). Try again later.`,
      },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}
