/**
 * Credential loader
 *
 * Reads the externally managed OAuth files and returns a ready-to-use
 * token handle. The access token is validated (and refreshed when
 * expired) before returning, so auth problems surface at startup.
 */

import type { CredentialPaths, HttpRequestFn } from "@/types";
import * as logger from "@/logger";
import { OAuthCredentials } from "./oauthCredentials";
import { parseClientKeys, parseStoredToken, readJsonFile } from "./credentialFiles";

export type LoadCredentialsOptions = {
  httpRequest?: HttpRequestFn;
  now?: () => number;
};

/**
 * Load OAuth credentials from the keys and token files
 *
 * Side effect: the token file is rewritten when a refresh happens.
 *
 * @throws {AuthError} Missing/malformed files or rejected refresh token
 */
export async function loadCredentials(
  paths: CredentialPaths,
  options: LoadCredentialsOptions = {},
): Promise<OAuthCredentials> {
  const keys = parseClientKeys(
    readJsonFile(paths.keysFile, "OAuth keys file"),
    paths.keysFile,
  );
  const token = parseStoredToken(
    readJsonFile(paths.tokenFile, "Token file"),
    paths.tokenFile,
  );

  const credentials = new OAuthCredentials({
    keys,
    token,
    tokenFile: paths.tokenFile,
    httpRequest: options.httpRequest,
    now: options.now,
  });

  await credentials.getAccessToken();
  logger.debug("OAuth credentials ready", { tokenFile: paths.tokenFile });

  return credentials;
}
