import { UnauthorizedException } from '@nestjs/common';
import { ErrorReason } from '../../common/errors/error-reason';

/**
 * Thrown when a bearer token is missing, malformed, expired, badly signed,
 * or names a subject that is no longer configured.
 *
 * HTTP 401; ApiExceptionFilter adds `WWW-Authenticate: Bearer`.
 */
export class AuthenticationException extends UnauthorizedException {
  constructor(message: string) {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      reason: ErrorReason.AUTHENTICATION_ERROR,
      message,
    });
  }
}
