/**
 * Claims signed into every access token.
 *
 * `sub` is the username; `exp` is added by the signer from the token TTL.
 */
export interface JwtPayload {
  sub: string;
  exp?: number;
  iat?: number;
}
