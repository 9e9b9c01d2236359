import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * OAuth2 password-grant form for POST /token.
 *
 * Accepts application/x-www-form-urlencoded or JSON. The grant/scope/client
 * fields are tolerated so standard OAuth2 clients can log in, but ignored.
 */
export class TokenRequestDto {
  @IsString()
  @IsNotEmpty({ message: 'username is required' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'password is required' })
  password!: string;

  @IsOptional()
  @IsString()
  grant_type?: string;

  @IsOptional()
  @IsString()
  scope?: string;

  @IsOptional()
  @IsString()
  client_id?: string;

  @IsOptional()
  @IsString()
  client_secret?: string;
}
