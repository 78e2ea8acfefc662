/**
 * HTTP client public API
 */

export { httpRequest, buildUrl, compactQuery, parseRetryAfter } from "./httpClient";
export { HttpError } from "./httpError";
export { createHttpSession, formatProxyUrl } from "./session";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpSession,
  HttpSessionOptions,
} from "@/types";
