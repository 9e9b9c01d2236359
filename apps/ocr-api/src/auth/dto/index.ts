export { TokenRequestDto } from './token-request.dto';
export { TokenResponseDto } from './token-response.dto';
export { UserProfileDto } from './user-profile.dto';
