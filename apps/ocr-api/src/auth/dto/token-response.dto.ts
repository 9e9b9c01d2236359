/**
 * Response body for POST /token, in OAuth2 token-response form.
 */
export class TokenResponseDto {
  access_token: string;
  token_type: 'bearer';

  constructor(accessToken: string) {
    this.access_token = accessToken;
    this.token_type = 'bearer';
  }
}
