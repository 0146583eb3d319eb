/**
 * Unit tests for OAuth credential loading and refresh
 *
 * Uses temp directories for the keys/token files and mock HTTP for the
 * token endpoint.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { AuthError, loadCredentials } from "@/auth";
import { GOOGLE_OAUTH2_TOKEN_URL } from "@/constants/credentials";
import { createMockHttp } from "../helpers/mockHttp";

const NOW = 1_700_000_000_000;

describe("loadCredentials", () => {
  const mockHttp = createMockHttp();
  let dir: string;
  let keysFile: string;
  let tokenFile: string;

  function writeKeys(content: unknown): void {
    writeFileSync(keysFile, JSON.stringify(content));
  }

  function writeToken(content: unknown): void {
    writeFileSync(tokenFile, JSON.stringify(content));
  }

  beforeEach(() => {
    mockHttp.reset();
    dir = mkdtempSync(join(tmpdir(), "job-sheet-creds-"));
    keysFile = join(dir, "keys.json");
    tokenFile = join(dir, "token.json");
    writeKeys({
      installed: { client_id: "test-client-id", client_secret: "test-secret" },
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should use a still-valid access token without refreshing", async () => {
    writeToken({
      access_token: "test-access-token",
      refresh_token: "test-refresh-token",
      expiry_date: NOW + 10 * 60 * 1000,
    });

    const credentials = await loadCredentials(
      { keysFile, tokenFile },
      { httpRequest: mockHttp.request, now: () => NOW },
    );

    expect(await credentials.getAccessToken()).toBe("test-access-token");
    expect(mockHttp.getRecordedRequests()).toHaveLength(0);
  });

  it("should refresh an expired token and rewrite the token file", async () => {
    writeToken({
      access_token: "stale-token",
      refresh_token: "test-refresh-token",
      expiry_date: NOW - 1000,
      scope: "https://www.googleapis.com/auth/drive.file",
      token_type: "Bearer",
    });
    mockHttp.on("POST", GOOGLE_OAUTH2_TOKEN_URL, {
      access_token: "fresh-token",
      expires_in: 3599,
      token_type: "Bearer",
    });

    const credentials = await loadCredentials(
      { keysFile, tokenFile },
      { httpRequest: mockHttp.request, now: () => NOW },
    );

    expect(await credentials.getAccessToken()).toBe("fresh-token");

    const [req] = mockHttp.getRecordedRequests();
    expect(req.form).toEqual({
      client_id: "test-client-id",
      client_secret: "test-secret",
      refresh_token: "test-refresh-token",
      grant_type: "refresh_token",
    });

    expect(JSON.parse(readFileSync(tokenFile, "utf-8"))).toEqual({
      access_token: "fresh-token",
      refresh_token: "test-refresh-token",
      expiry_date: NOW + 3599 * 1000,
      scope: "https://www.googleapis.com/auth/drive.file",
      token_type: "Bearer",
    });
  });

  it("should refresh a token expiring within the safety window", async () => {
    writeToken({
      access_token: "almost-stale",
      refresh_token: "test-refresh-token",
      expiry_date: NOW + 30 * 1000,
    });
    mockHttp.on("POST", GOOGLE_OAUTH2_TOKEN_URL, { access_token: "fresh-token", expires_in: 3600 });

    const credentials = await loadCredentials(
      { keysFile, tokenFile },
      { httpRequest: mockHttp.request, now: () => NOW },
    );

    expect(await credentials.getAccessToken()).toBe("fresh-token");
  });

  it("should refresh again when the token expires later in the run", async () => {
    let clock = NOW;
    writeToken({
      access_token: "first-token",
      refresh_token: "test-refresh-token",
      expiry_date: NOW + 10 * 60 * 1000,
    });
    mockHttp.on("POST", GOOGLE_OAUTH2_TOKEN_URL, {
      access_token: "second-token",
      expires_in: 3600,
    });

    const credentials = await loadCredentials(
      { keysFile, tokenFile },
      { httpRequest: mockHttp.request, now: () => clock },
    );
    expect(await credentials.getAccessToken()).toBe("first-token");
    expect(mockHttp.getRecordedRequests()).toHaveLength(0);

    clock = NOW + 20 * 60 * 1000;

    expect(await credentials.getAccessToken()).toBe("second-token");
    expect(await credentials.getAccessToken()).toBe("second-token");
    expect(mockHttp.requestsTo("POST", GOOGLE_OAUTH2_TOKEN_URL)).toHaveLength(1);
    expect(JSON.parse(readFileSync(tokenFile, "utf-8"))).toEqual({
      access_token: "second-token",
      refresh_token: "test-refresh-token",
      expiry_date: clock + 3600 * 1000,
    });
  });

  it("should use token_uri from a web client keys file", async () => {
    writeKeys({
      web: {
        client_id: "test-client-id",
        client_secret: "test-secret",
        token_uri: "https://oauth.test/token",
      },
    });
    writeToken({ refresh_token: "test-refresh-token" });
    mockHttp.on("POST", "https://oauth.test/token", { access_token: "fresh-token", expires_in: 60 });

    const credentials = await loadCredentials(
      { keysFile, tokenFile },
      { httpRequest: mockHttp.request, now: () => NOW },
    );

    expect(await credentials.getAccessToken()).toBe("fresh-token");
    expect(mockHttp.requestsTo("POST", "https://oauth.test/token")).toHaveLength(1);
  });

  it("should fail with REFRESH_REJECTED when the refresh token is revoked", async () => {
    writeToken({ access_token: "stale", refresh_token: "revoked", expiry_date: NOW - 1 });
    mockHttp.onResponse("POST", GOOGLE_OAUTH2_TOKEN_URL, {
      status: 400,
      body: { error: "invalid_grant" },
    });

    const error = await loadCredentials(
      { keysFile, tokenFile },
      { httpRequest: mockHttp.request, now: () => NOW },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ code: "REFRESH_REJECTED" });
  });

  it("should fail with REFRESH_FAILED on a server error", async () => {
    writeToken({ refresh_token: "test-refresh-token" });
    mockHttp.onResponse("POST", GOOGLE_OAUTH2_TOKEN_URL, { status: 503, body: "unavailable" });

    await expect(
      loadCredentials({ keysFile, tokenFile }, { httpRequest: mockHttp.request, now: () => NOW }),
    ).rejects.toMatchObject({ name: "AuthError", code: "REFRESH_FAILED" });
  });

  it("should fail with NO_REFRESH_TOKEN when expired and not refreshable", async () => {
    writeToken({ access_token: "stale", expiry_date: NOW - 1 });

    await expect(
      loadCredentials({ keysFile, tokenFile }, { httpRequest: mockHttp.request, now: () => NOW }),
    ).rejects.toMatchObject({ code: "NO_REFRESH_TOKEN" });
    expect(mockHttp.getRecordedRequests()).toHaveLength(0);
  });

  it("should fail with FILE_MISSING naming the missing file", async () => {
    await expect(
      loadCredentials({ keysFile, tokenFile }, { httpRequest: mockHttp.request }),
    ).rejects.toMatchObject({
      code: "FILE_MISSING",
      message: `Token file not found: ${tokenFile}`,
    });
  });

  it("should fail with FILE_INVALID on malformed files", async () => {
    writeFileSync(tokenFile, "{not json");
    await expect(
      loadCredentials({ keysFile, tokenFile }, { httpRequest: mockHttp.request }),
    ).rejects.toMatchObject({ code: "FILE_INVALID" });

    writeToken({ access_token: "x" });
    writeKeys({ installed: { client_id: "test-client-id" } });
    await expect(
      loadCredentials({ keysFile, tokenFile }, { httpRequest: mockHttp.request }),
    ).rejects.toMatchObject({ code: "FILE_INVALID" });
  });
});
