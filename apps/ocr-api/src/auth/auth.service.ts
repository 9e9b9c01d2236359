import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfiguration } from '../config/configuration.interface';
import { CredentialStore } from './credential-store.service';
import { TokenService } from './token.service';
import { TokenRequestDto, TokenResponseDto, UserProfileDto } from './dto';
import { InvalidCredentialsException } from './exceptions';

/**
 * Login and profile lookup.
 *
 * Tokens are issued for `security.accessTokenExpireMinutes`.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly tokenTtlMinutes: number;

  constructor(
    private readonly credentialStore: CredentialStore,
    private readonly tokenService: TokenService,
    configService: ConfigService<AppConfiguration, true>,
  ) {
    this.tokenTtlMinutes = configService.get('security', { infer: true }).accessTokenExpireMinutes;
  }

  /**
   * @throws InvalidCredentialsException if the user is unknown or the password is wrong
   */
  async login(dto: TokenRequestDto): Promise<TokenResponseDto> {
    const valid = await this.credentialStore.verify(dto.username, dto.password);

    if (!valid) {
      this.logger.warn(`Login failed for user "${dto.username}"`);
      throw new InvalidCredentialsException();
    }

    const accessToken = this.tokenService.issueToken(dto.username, this.tokenTtlMinutes);
    this.logger.log(`User logged in: ${dto.username}`);

    return new TokenResponseDto(accessToken);
  }

  getProfile(username: string): UserProfileDto {
    return new UserProfileDto(username);
  }
}
