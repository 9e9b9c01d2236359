import { UnauthorizedException } from '@nestjs/common';
import { ErrorReason } from '../../common/errors/error-reason';

/**
 * Thrown when login credentials are invalid (unknown user or wrong password).
 *
 * HTTP 401 Unauthorized. One message for both cases so usernames cannot
 * be enumerated.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      reason: ErrorReason.AUTHENTICATION_ERROR,
      message: 'Incorrect username or password',
    });
  }
}
