/**
 * OAuth credential constants
 */

/**
 * Default token endpoint when the keys file does not name one
 */
export const GOOGLE_OAUTH2_TOKEN_URL = "https://oauth2.googleapis.com/token";

/**
 * Refresh this many seconds before the stored expiry
 */
export const TOKEN_EXPIRY_BUFFER_SECONDS = 60;

/**
 * Default credential file locations (relative to the home directory)
 */
export const DEFAULT_KEYS_FILE = "~/.config/gdrive-mcp/gcp-oauth.keys.json";
export const DEFAULT_TOKEN_FILE =
  "~/.config/gdrive-mcp/.gdrive-server-credentials.json";

/**
 * Environment variables overriding the credential paths
 */
export const KEYS_FILE_ENV = "GOOGLE_OAUTH_KEYS_FILE";
export const TOKEN_FILE_ENV = "GOOGLE_OAUTH_TOKEN_FILE";

/**
 * Indentation used when rewriting the token file
 */
export const TOKEN_FILE_JSON_INDENT = 2;
