import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { AuthenticationException } from './exceptions';
import type { JwtPayload } from './interfaces';

/** TTL used when a caller does not ask for one */
export const DEFAULT_TOKEN_TTL_MINUTES = 15;

/**
 * Issues and validates signed bearer tokens.
 *
 * Secret and algorithm come from JwtModule (see AuthModule); this class
 * only decides what goes into a token and how a bad one is reported.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(private readonly jwtService: JwtService) {}

  issueToken(username: string, ttlMinutes: number = DEFAULT_TOKEN_TTL_MINUTES): string {
    const payload: JwtPayload = { sub: username };
    return this.jwtService.sign(payload, { expiresIn: `${ttlMinutes}m` });
  }

  /**
   * Verifies signature and expiry, then returns the subject.
   *
   * Programmatic entry point for code that holds a raw token. HTTP routes
   * go through JwtStrategy instead: passport-jwt verifies the token there
   * and `resolveSubject` reads the claim.
   *
   * @throws AuthenticationException for any invalid token
   */
  async validateToken(token: string): Promise<string> {
    let payload: unknown;

    try {
      payload = await this.jwtService.verifyAsync<JwtPayload>(token);
    } catch (error) {
      const name = error instanceof Error ? error.name : 'Error';
      this.logger.debug(`Token rejected: ${name}`);
      throw new AuthenticationException(
        name === 'TokenExpiredError'
          ? 'Authentication token has expired'
          : 'Invalid authentication token',
      );
    }

    return this.resolveSubject(payload);
  }

  /**
   * Extracts `sub` from an already verified payload.
   *
   * @throws AuthenticationException if the claim is absent or not a string
   */
  resolveSubject(payload: unknown): string {
    const subject =
      typeof payload === 'object' && payload !== null && 'sub' in payload
        ? payload.sub
        : undefined;

    if (typeof subject !== 'string' || subject.length === 0) {
      throw new AuthenticationException('Authentication token has no subject');
    }

    return subject;
  }
}
