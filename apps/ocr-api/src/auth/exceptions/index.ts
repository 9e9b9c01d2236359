export { AuthenticationException } from './authentication.exception';
export { InvalidCredentialsException } from './invalid-credentials.exception';
