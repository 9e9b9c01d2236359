import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { AppConfiguration } from '../../config/configuration.interface';
import { CredentialStore } from '../credential-store.service';
import { TokenService } from '../token.service';
import { AuthenticationException } from '../exceptions';
import type { RequestUser } from '../interfaces';

/**
 * JWT Strategy — validates Bearer tokens on protected routes.
 *
 * Flow:
 * 1. Passport extracts the JWT from the Authorization header
 * 2. passport-jwt verifies signature, algorithm and expiry
 * 3. validate() checks the subject claim and that the user is still configured
 * 4. The returned RequestUser is attached to request.user
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    configService: ConfigService<AppConfiguration, true>,
    private readonly tokenService: TokenService,
    private readonly credentialStore: CredentialStore,
  ) {
    const security = configService.get('security', { infer: true });

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: security.secretKey,
      algorithms: [security.algorithm],
    });
  }

  validate(payload: unknown): RequestUser {
    const username = this.tokenService.resolveSubject(payload);

    if (!this.credentialStore.has(username)) {
      this.logger.warn(`JWT validation failed: user ${username} is not configured`);
      throw new AuthenticationException('User no longer exists');
    }

    return { username };
  }
}
