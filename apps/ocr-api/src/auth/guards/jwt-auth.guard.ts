import { Injectable, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { AuthenticationException } from '../exceptions';

/**
 * JWT Authentication Guard: protects routes that require a bearer token.
 *
 * Overrides handleRequest so every failure becomes an
 * AuthenticationException with a specific message.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  /**
   * Cases:
   * - No token provided → "Authentication token is missing"
   * - Token expired → "Authentication token has expired"
   * - Token invalid → "Invalid authentication token"
   * - Strategy threw → forward the strategy's error
   */
  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
  ): TUser {
    if (err) {
      this.logger.warn(`JWT auth error: ${err.message}`);
      throw err instanceof AuthenticationException
        ? err
        : new AuthenticationException(err.message);
    }

    if (!user) {
      const message = this.getFailureMessage(info);
      this.logger.debug(`JWT auth rejected: ${message}`);
      throw new AuthenticationException(message);
    }

    return user;
  }

  private getFailureMessage(info: Error | undefined): string {
    if (!info || info.message === 'No auth token') {
      return 'Authentication token is missing';
    }

    if (info.name === 'TokenExpiredError') {
      return 'Authentication token has expired';
    }

    if (info.name === 'JsonWebTokenError') {
      return 'Invalid authentication token';
    }

    return info.message || 'Authentication failed';
  }
}
