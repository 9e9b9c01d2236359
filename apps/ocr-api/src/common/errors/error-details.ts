/**
 * Shape checks for caught values. Errors raised inside Node's own modules
 * can come from another realm, where `instanceof Error` is false.
 */

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
}

/** True for errno-style errors such as `{ code: 'ENOENT' }` */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
