import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import type { AppConfiguration } from '../config/configuration.interface';

/** $2a$, $2b$ and $2y$ are the bcrypt variants bcrypt.compare understands */
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$/;

export function isBcryptHash(value: string): boolean {
  return BCRYPT_HASH_PATTERN.test(value);
}

/**
 * CredentialStore — the configured users, loaded once at startup.
 *
 * Stored passwords are bcrypt hashes or, for older configuration files,
 * plaintext. Plaintext entries are compared directly and flagged with a
 * warning at startup; they are kept only so existing deployments keep
 * working.
 */
@Injectable()
export class CredentialStore {
  private readonly logger = new Logger(CredentialStore.name);
  private readonly credentials: ReadonlyMap<string, string>;

  constructor(configService: ConfigService<AppConfiguration, true>) {
    const users = configService.get('users', { infer: true });
    this.credentials = new Map(users.map((user) => [user.username, user.password]));

    const plaintext = users.filter((user) => !isBcryptHash(user.password));
    if (plaintext.length > 0) {
      this.logger.warn(
        `Plaintext passwords configured for: ${plaintext.map((user) => user.username).join(', ')}. ` +
          'Replace them with bcrypt hashes.',
      );
    }
  }

  has(username: string): boolean {
    return this.credentials.has(username);
  }

  /**
   * Checks a presented password against the stored credential.
   * Unknown users are simply rejected.
   */
  async verify(username: string, password: string): Promise<boolean> {
    const stored = this.credentials.get(username);
    if (stored === undefined) {
      return false;
    }

    if (isBcryptHash(stored)) {
      return bcrypt.compare(password, stored);
    }

    return password === stored;
  }
}
