/**
 * OAuth credential file shapes
 *
 * Both files are managed outside this project (created by an OAuth
 * consent flow) and only read here. The token file may be rewritten
 * after a refresh.
 */

/**
 * Paths to the two credential files
 */
export type CredentialPaths = {
  /** OAuth client ("installed" or "web" app) keys file */
  keysFile: string;
  /** Saved access/refresh token file */
  tokenFile: string;
};

/**
 * OAuth client keys, as found under `installed` or `web`
 */
export type OAuthClientKeys = {
  clientId: string;
  clientSecret: string;
  tokenUri: string;
};

/**
 * Saved token file contents
 *
 * Unknown fields are preserved verbatim when the file is rewritten.
 */
export type StoredToken = {
  access_token?: string;
  refresh_token?: string;
  /** Expiry as epoch milliseconds */
  expiry_date?: number;
  token_type?: string;
  scope?: string;
  [key: string]: unknown;
};

/**
 * Response body of the OAuth2 token endpoint for a refresh_token grant
 */
export type OAuthRefreshResponse = {
  access_token: string;
  expires_in: number;
  token_type?: string;
  scope?: string;
};

/**
 * Anything that can hand out a valid bearer token
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}
