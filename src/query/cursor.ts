const CURSOR_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/**
 * Checks that a token looks like a backend-issued cursor. Returns the
 * token unchanged, or null when it cannot be one.
 */
export function decodeCursor(token: string): string | null {
  if (token === '' || !CURSOR_PATTERN.test(token)) return null;
  return Buffer.from(token, 'base64').length > 0 ? token : null;
}
