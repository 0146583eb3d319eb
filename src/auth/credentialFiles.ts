/**
 * Credential file readers
 *
 * Parse and validate the OAuth keys file and the saved token file.
 * Every failure is an AuthError naming the offending file.
 */

import { readFileSync } from "fs";
import type { OAuthClientKeys, StoredToken } from "@/types";
import { GOOGLE_OAUTH2_TOKEN_URL } from "@/constants/credentials";
import { AuthError } from "./authError";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Absolute path
 * @param label - Human name for error messages ("OAuth keys file")
 * @throws {AuthError} FILE_MISSING or FILE_INVALID
 */
export function readJsonFile(filePath: string, label: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    const reason = isNodeError(error) && error.code === "ENOENT"
      ? "not found"
      : "not readable";
    throw new AuthError("FILE_MISSING", `${label} ${reason}: ${filePath}`, {
      cause: error,
    });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new AuthError("FILE_INVALID", `${label} is not valid JSON: ${filePath}`, {
      cause: error,
    });
  }
}

/**
 * Extract client keys from an "installed"/"web" OAuth client file
 *
 * A flat object carrying client_id/client_secret is accepted too.
 *
 * @throws {AuthError} FILE_INVALID when client_id or client_secret is missing
 */
export function parseClientKeys(raw: unknown, filePath: string): OAuthClientKeys {
  const section = isRecord(raw)
    ? isRecord(raw.installed)
      ? raw.installed
      : isRecord(raw.web)
        ? raw.web
        : raw
    : null;

  if (
    !section ||
    typeof section.client_id !== "string" ||
    section.client_id === "" ||
    typeof section.client_secret !== "string" ||
    section.client_secret === ""
  ) {
    throw new AuthError(
      "FILE_INVALID",
      `OAuth keys file must contain installed.client_id and installed.client_secret: ${filePath}`,
    );
  }

  return {
    clientId: section.client_id,
    clientSecret: section.client_secret,
    tokenUri:
      typeof section.token_uri === "string" && section.token_uri !== ""
        ? section.token_uri
        : GOOGLE_OAUTH2_TOKEN_URL,
  };
}

/**
 * Validate the saved token file
 *
 * access_token and refresh_token are each optional here; whether a
 * refresh is possible is decided when one is needed.
 *
 * @throws {AuthError} FILE_INVALID on wrong field types
 */
export function parseStoredToken(raw: unknown, filePath: string): StoredToken {
  if (!isRecord(raw)) {
    throw new AuthError("FILE_INVALID", `Token file must be a JSON object: ${filePath}`);
  }

  for (const field of ["access_token", "refresh_token", "token_type", "scope"]) {
    const value = raw[field];
    if (value !== undefined && value !== null && typeof value !== "string") {
      throw new AuthError(
        "FILE_INVALID",
        `Token file field "${field}" must be a string: ${filePath}`,
      );
    }
  }
  const expiry = raw.expiry_date;
  if (expiry !== undefined && expiry !== null && typeof expiry !== "number") {
    throw new AuthError(
      "FILE_INVALID",
      `Token file field "expiry_date" must be epoch milliseconds: ${filePath}`,
    );
  }

  // Unknown fields are carried through; explicit nulls become absent
  return {
    ...raw,
    access_token: optionalString(raw.access_token),
    refresh_token: optionalString(raw.refresh_token),
    expiry_date: typeof expiry === "number" ? expiry : undefined,
    token_type: optionalString(raw.token_type),
    scope: optionalString(raw.scope),
  };
}
