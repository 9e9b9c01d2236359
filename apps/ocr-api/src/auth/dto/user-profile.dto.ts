/**
 * Public view of an authenticated user. Never includes the credential.
 */
export class UserProfileDto {
  username: string;

  constructor(username: string) {
    this.username = username;
  }
}
