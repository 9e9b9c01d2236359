import { JwtService } from '@nestjs/jwt';
import { DEFAULT_TOKEN_TTL_MINUTES, TokenService } from './token.service';
import { AuthenticationException } from './exceptions';

describe('TokenService', () => {
  const jwtService = new JwtService({
    secret: 'test-secret',
    signOptions: { algorithm: 'HS256' },
    verifyOptions: { algorithms: ['HS256'] },
  });
  const service = new TokenService(jwtService);

  it('issues a token whose subject round-trips', async () => {
    const token = service.issueToken('alice', 30);

    await expect(service.validateToken(token)).resolves.toBe('alice');
  });

  it('defaults the lifetime to 15 minutes', () => {
    const token = service.issueToken('alice');
    const claims = jwtService.decode<{ iat: number; exp: number }>(token);

    expect(claims.exp - claims.iat).toBe(DEFAULT_TOKEN_TTL_MINUTES * 60);
  });

  it('honours the requested lifetime', () => {
    const token = service.issueToken('alice', 30);
    const claims = jwtService.decode<{ iat: number; exp: number }>(token);

    expect(claims.exp - claims.iat).toBe(30 * 60);
  });

  it('rejects expired tokens', async () => {
    const expired = jwtService.sign({
      sub: 'alice',
      exp: Math.floor(Date.now() / 1000) - 60,
    });

    await expect(service.validateToken(expired)).rejects.toThrow(
      new AuthenticationException('Authentication token has expired'),
    );
  });

  it('rejects tokens signed with another secret', async () => {
    const forged = new JwtService({ secret: 'other-secret' }).sign({ sub: 'alice' });

    await expect(service.validateToken(forged)).rejects.toThrow(
      new AuthenticationException('Invalid authentication token'),
    );
  });

  it('rejects tokens without a subject', async () => {
    const anonymous = jwtService.sign({ role: 'reader' });

    await expect(service.validateToken(anonymous)).rejects.toThrow(
      new AuthenticationException('Authentication token has no subject'),
    );
  });

  it('rejects garbage', async () => {
    await expect(service.validateToken('not-a-jwt')).rejects.toBeInstanceOf(
      AuthenticationException,
    );
  });
});
