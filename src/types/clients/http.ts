/**
 * HTTP client type definitions
 */

import type { Dispatcher } from "undici";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

export type HttpQueryValue = string | number | boolean | Array<string | number | boolean>;

export type HttpQuery = Record<string, HttpQueryValue>;

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: HttpQuery;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  /** undici dispatcher (proxy / TLS agent) the request is sent through */
  dispatcher?: Dispatcher;
}

/**
 * Request function shape injected into API clients (production or mock)
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<unknown>;

/**
 * Minimal header reader, satisfied by both undici and global Headers
 */
export interface HttpHeadersLike {
  get(name: string): string | null;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: HttpHeadersLike;
}

/**
 * Options for building a long-lived HTTP session
 */
export interface HttpSessionOptions {
  /** Proxy URLs, rotated per request ("host:port" gets an http:// scheme) */
  proxies?: string[];
  /** Path to a PEM CA bundle trusted for TLS connections */
  caCert?: string;
}

export interface HttpSession {
  /** Dispatcher for the next request, or undefined for the global one */
  nextDispatcher(): Dispatcher | undefined;
  /** Close every dispatcher the session created */
  close(): Promise<void>;
}
