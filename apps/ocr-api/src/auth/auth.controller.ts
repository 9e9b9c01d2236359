import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthService } from './auth.service';
import { TokenRequestDto, TokenResponseDto, UserProfileDto } from './dto';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { CurrentUser } from './decorators/current-user.decorator';
import type { RequestUser } from './interfaces';

/**
 * AuthController — token exchange and the caller's profile.
 *
 * Routes:
 * - POST /token     → exchange username/password for a bearer token (public)
 * - GET  /users/me  → the authenticated username (protected)
 */
@Controller()
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 200 OK with `{ access_token, token_type: "bearer" }`
   * @throws 401 Unauthorized if the credentials are wrong
   * @throws 400 Bad Request if a field is missing
   */
  @Post('token')
  @HttpCode(HttpStatus.OK)
  async token(@Body() dto: TokenRequestDto): Promise<TokenResponseDto> {
    return this.authService.login(dto);
  }

  @Get('users/me')
  @UseGuards(JwtAuthGuard)
  me(@CurrentUser() user: RequestUser): UserProfileDto {
    return this.authService.getProfile(user.username);
  }
}
