import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import type { AppConfiguration } from '../config/configuration.interface';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { CredentialStore } from './credential-store.service';
import { TokenService } from './token.service';
import { JwtStrategy } from './strategies/jwt.strategy';

/**
 * Everything needed to log in and to protect routes.
 *
 * Provides:
 * - CredentialStore over the configured users
 * - TokenService for signing and verifying bearer tokens
 * - Passport JWT strategy behind JwtAuthGuard
 * - POST /token and GET /users/me
 */
@Module({
  imports: [
    PassportModule.register({ defaultStrategy: 'jwt' }),

    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfiguration, true>) => {
        const security = configService.get('security', { infer: true });

        return {
          secret: security.secretKey,
          signOptions: { algorithm: security.algorithm },
          verifyOptions: { algorithms: [security.algorithm] },
        };
      },
    }),
  ],
  controllers: [AuthController],
  providers: [AuthService, CredentialStore, TokenService, JwtStrategy],
  exports: [AuthService, TokenService, PassportModule],
})
export class AuthModule {}
