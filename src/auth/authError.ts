/**
 * AuthError: fatal credential failure
 *
 * Raised for missing/malformed credential files and for a refresh token
 * rejected by the OAuth provider. Always ends the run.
 */

export type AuthErrorCode =
  | "FILE_MISSING"
  | "FILE_INVALID"
  | "NO_REFRESH_TOKEN"
  | "REFRESH_REJECTED"
  | "REFRESH_FAILED";

export class AuthError extends Error {
  public readonly code: AuthErrorCode;

  constructor(code: AuthErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
    this.code = code;
  }
}
