/**
 * OAuthCredentials: user OAuth token handle with transparent refresh
 *
 * Holds the client keys and the saved token. getAccessToken() returns the
 * current access token, refreshing it first (refresh_token grant) when it
 * is missing or about to expire. A refreshed token is written back to the
 * token file so the next run can reuse it.
 */

import { writeFileSync } from "fs";
import type {
  AccessTokenProvider,
  HttpRequestFn,
  OAuthClientKeys,
  OAuthRefreshResponse,
  StoredToken,
} from "@/types";
import { httpRequest as defaultHttpRequest, isHttpError } from "@/clients/http";
import {
  TOKEN_EXPIRY_BUFFER_SECONDS,
  TOKEN_FILE_JSON_INDENT,
} from "@/constants/credentials";
import * as logger from "@/logger";
import { AuthError } from "./authError";

const MS_PER_SECOND = 1000;

/**
 * HTTP statuses with which the token endpoint rejects a refresh token
 * (invalid_grant / invalid_client)
 */
const REFRESH_REJECTED_STATUSES = [400, 401];

export type OAuthCredentialsInit = {
  keys: OAuthClientKeys;
  token: StoredToken;
  tokenFile: string;
  httpRequest?: HttpRequestFn;
  /** Clock override (tests) */
  now?: () => number;
};

function isRefreshResponse(value: unknown): value is OAuthRefreshResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "access_token" in value &&
    typeof value.access_token === "string" &&
    value.access_token !== "" &&
    "expires_in" in value &&
    typeof value.expires_in === "number"
  );
}

export class OAuthCredentials implements AccessTokenProvider {
  private readonly keys: OAuthClientKeys;
  private readonly tokenFile: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => number;
  private token: StoredToken;

  constructor(init: OAuthCredentialsInit) {
    this.keys = init.keys;
    this.token = { ...init.token };
    this.tokenFile = init.tokenFile;
    this.httpRequest = init.httpRequest ?? defaultHttpRequest;
    this.now = init.now ?? Date.now;
  }

  /**
   * True when the access token is present and not about to expire
   *
   * A token without expiry_date is trusted as-is.
   */
  isValid(): boolean {
    if (!this.token.access_token) {
      return false;
    }
    if (this.token.expiry_date === undefined) {
      return true;
    }
    return (
      this.token.expiry_date - TOKEN_EXPIRY_BUFFER_SECONDS * MS_PER_SECOND >
      this.now()
    );
  }

  /**
   * Current access token, refreshed first if needed
   *
   * @throws {AuthError} When a refresh is needed and fails
   */
  async getAccessToken(): Promise<string> {
    if (!this.isValid()) {
      await this.refresh();
    }
    const accessToken = this.token.access_token;
    if (!accessToken) {
      throw new AuthError("REFRESH_FAILED", "No access token after refresh");
    }
    return accessToken;
  }

  /**
   * Exchange the refresh token for a new access token and persist it
   *
   * @throws {AuthError} NO_REFRESH_TOKEN, REFRESH_REJECTED or REFRESH_FAILED
   */
  async refresh(): Promise<void> {
    const refreshToken = this.token.refresh_token;
    if (!refreshToken) {
      throw new AuthError(
        "NO_REFRESH_TOKEN",
        `Access token expired and token file has no refresh_token: ${this.tokenFile}`,
      );
    }

    logger.info("Refreshing OAuth access token");

    let response: unknown;
    try {
      response = await this.httpRequest<unknown>({
        method: "POST",
        url: this.keys.tokenUri,
        form: {
          client_id: this.keys.clientId,
          client_secret: this.keys.clientSecret,
          refresh_token: refreshToken,
          grant_type: "refresh_token",
        },
      });
    } catch (error) {
      if (isHttpError(error) && REFRESH_REJECTED_STATUSES.includes(error.status)) {
        throw new AuthError(
          "REFRESH_REJECTED",
          `OAuth refresh token was rejected (revoked or expired), re-authorize to create a new token file: HTTP ${error.status}`,
          { cause: error },
        );
      }
      throw new AuthError(
        "REFRESH_FAILED",
        `OAuth token refresh failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (!isRefreshResponse(response)) {
      throw new AuthError(
        "REFRESH_FAILED",
        "OAuth token endpoint returned no access_token/expires_in",
      );
    }

    this.token = {
      ...this.token,
      access_token: response.access_token,
      expiry_date: this.now() + response.expires_in * MS_PER_SECOND,
    };

    this.persist();
  }

  /**
   * Rewrite the token file in place with the current token
   *
   * A write failure is logged, not thrown: the in-memory token is valid
   * for this run either way.
   */
  private persist(): void {
    try {
      writeFileSync(
        this.tokenFile,
        JSON.stringify(this.token, null, TOKEN_FILE_JSON_INDENT) + "\n",
        "utf-8",
      );
      logger.info("OAuth token refreshed and saved", { tokenFile: this.tokenFile });
    } catch (error) {
      logger.warn("OAuth token refreshed but could not be saved", {
        tokenFile: this.tokenFile,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
