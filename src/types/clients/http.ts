/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * How the response body is read
 * - json: parsed JSON (default)
 * - text: raw body as string (HTML pages)
 */
export type HttpResponseType = "json" | "text";

export type HttpQueryValue = string | number | boolean | Array<string | number | boolean>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, HttpQueryValue>;
  json?: unknown;
  /** URL-encoded form body (sent as application/x-www-form-urlencoded) */
  form?: Record<string, string>;
  responseType?: HttpResponseType;
  timeoutMs?: number;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}
