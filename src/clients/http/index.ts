/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError, isHttpError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpResponseType,
} from "@/types";
