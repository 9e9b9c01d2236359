import { HttpStatus } from '@nestjs/common';

/**
 * Machine-stable reason codes carried in every error body as `reason`.
 * Clients should branch on these, not on `message`.
 */
export const ErrorReason = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  INVALID_STATE: 'INVALID_STATE',
  QUEUE_FULL: 'QUEUE_FULL',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  HTTP_ERROR: 'HTTP_ERROR',
} as const;

export type ErrorReason = (typeof ErrorReason)[keyof typeof ErrorReason];

const REASONS: ReadonlySet<unknown> = new Set(Object.values(ErrorReason));

export function isErrorReason(value: unknown): value is ErrorReason {
  return REASONS.has(value);
}

/** Reason used when an exception (e.g. one raised by Nest itself) names none */
export function defaultReasonFor(status: number): ErrorReason {
  switch (status) {
    case HttpStatus.BAD_REQUEST:
      return ErrorReason.VALIDATION_ERROR;
    case HttpStatus.UNAUTHORIZED:
      return ErrorReason.AUTHENTICATION_ERROR;
    case HttpStatus.FORBIDDEN:
      return ErrorReason.FORBIDDEN;
    case HttpStatus.NOT_FOUND:
      return ErrorReason.NOT_FOUND;
    case HttpStatus.PAYLOAD_TOO_LARGE:
      return ErrorReason.PAYLOAD_TOO_LARGE;
    default:
      return status >= 500 ? ErrorReason.INTERNAL_ERROR : ErrorReason.HTTP_ERROR;
  }
}

/** Body shape shared by every error response */
export interface ApiErrorBody {
  statusCode: number;
  error: string;
  reason: ErrorReason;
  message: string | string[];
}
