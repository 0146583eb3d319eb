/**
 * HTTP client wrapper: general-purpose client using native fetch
 * Supports timeouts, query params, JSON/form bodies, text or JSON responses,
 * and structured error handling.
 *
 * Requests are made exactly once: a failure surfaces to the caller, which
 * decides whether it is fatal (auth, sheet write) or per-item (search page,
 * listing detail).
 */

import type { HttpQueryValue, HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  FORM_CONTENT_TYPE,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
export function buildUrl(
  baseUrl: string,
  query?: Record<string, HttpQueryValue>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Build the fetch body and its content-type header
 */
function buildBody(
  req: HttpRequest,
): { body?: string; headers: Record<string, string> } {
  if (req.form) {
    return {
      body: new URLSearchParams(req.form).toString(),
      headers: { "Content-Type": FORM_CONTENT_TYPE },
    };
  }
  if (req.json !== undefined) {
    return { body: JSON.stringify(req.json), headers: { ...DEFAULT_JSON_HEADERS } };
  }
  return { headers: {} };
}

/**
 * Read the response body according to the requested response type
 */
async function readBody<T>(
  req: HttpRequest,
  response: Response,
  url: string,
): Promise<T> {
  if (req.responseType === "text") {
    return (await response.text()) as T;
  }

  // Handle 204 No Content
  if (response.status === 204) {
    return undefined as T;
  }

  // Check content-type before parsing JSON
  const contentType = response.headers.get("content-type");
  const isJson =
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"));

  if (!isJson) {
    logger.warn("Non-JSON response received", {
      method: req.method,
      url,
      status: response.status,
      contentType: contentType || "none",
    });
    // Return text content as fallback, let caller handle it
    return (await response.text()) as T;
  }

  return (await response.json()) as T;
}

/**
 * Perform an HTTP request with timeout and error handling
 *
 * @template T - Expected response type (string for responseType "text")
 * @param req - HTTP request configuration
 * @returns Parsed JSON response, or body text for responseType "text"
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors or timeouts (AbortError/TimeoutError)
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const { body, headers: bodyHeaders } = buildBody(req);

    // Build headers - body defaults first, caller headers override
    const headers: Record<string, string> = { ...bodyHeaders, ...req.headers };

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };
    if (body !== undefined) {
      options.body = body;
    }

    logger.debug("HTTP request", { method: req.method, url });

    const response = await fetch(url, options);

    // Check for HTTP errors (non-2xx)
    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    return await readBody<T>(req, response, url);
  } finally {
    clearTimeout(timeoutId);
  }
}
