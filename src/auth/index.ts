/**
 * Credential loader public API
 */

export { loadCredentials } from "./credentialLoader";
export type { LoadCredentialsOptions } from "./credentialLoader";
export { OAuthCredentials } from "./oauthCredentials";
export { AuthError } from "./authError";
export type { AuthErrorCode } from "./authError";
