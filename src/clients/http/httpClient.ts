/**
 * HTTP client wrapper — general-purpose JSON client on undici fetch
 * Supports timeouts, query params, per-request dispatchers (proxy / TLS),
 * retries with exponential backoff, and structured error handling
 */

import { fetch, type RequestInit, type Response } from "undici";
import type { HttpHeadersLike, HttpQuery, HttpQueryValue, HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants";
import { describeError } from "@/utils";
import * as logger from "@/logger";

/**
 * Drop undefined entries so optional filters never reach the query string
 */
export function compactQuery(
  query: Record<string, HttpQueryValue | undefined>,
): HttpQuery {
  const compacted: HttpQuery = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      compacted[key] = value;
    }
  }
  return compacted;
}

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
export function buildUrl(baseUrl: string, query?: HttpQuery): string {
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
  } catch (error) {
    logger.debug("Could not read error response body", {
      error: describeError(error),
    });
    return undefined;
  }
}

function isMethodRetryable(method: string): boolean {
  return RETRYABLE_HTTP_METHODS.some((retryable) => retryable === method);
}

function isStatusRetryable(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
function isErrorRetryable(error: unknown, method: string): boolean {
  if (!isMethodRetryable(method)) {
    return false;
  }

  if (error instanceof HttpError) {
    return isStatusRetryable(error.status);
  }

  // AbortError (timeout), TypeError (network failure inside fetch)
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Exponential backoff with jitter:
 * min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
  retryAfterHeader: string | null,
): number {
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  if (retryAfterMs !== null) {
    return Math.min(retryAfterMs, maxRetryAfterMs);
  }

  return computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isJsonContentType(contentType: string | null): boolean {
  return (
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"))
  );
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
      dispatcher: req.dispatcher,
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      const responseHeaders: HttpHeadersLike = response.headers;
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: responseHeaders,
      });
    }

    if (response.status === 204) {
      return undefined;
    }

    const contentType = response.headers.get("content-type");

    if (!isJsonContentType(contentType)) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url,
        status: response.status,
        contentType: contentType || "none",
      });
      // Return text content as fallback, let caller handle it
      return await response.text();
    }

    try {
      return await response.json();
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        status: response.status,
        error: describeError(parseError),
      });
      return undefined;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent methods (GET, HEAD) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408, 429 (respecting Retry-After) and 5xx
 *
 * The parsed body is returned as `unknown`; callers validate its shape.
 *
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest(req, url, timeoutMs);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts) {
        break;
      }

      if (!isErrorRetryable(error, req.method)) {
        throw error;
      }

      let retryAfterHeader: string | null = null;
      if (error instanceof HttpError && error.headers) {
        if (error.status === 429 || error.status === 503) {
          retryAfterHeader = error.headers.get("retry-after");
        }
      }

      const delayMs = computeRetryDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
        retryAfterHeader,
      );

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason: error instanceof HttpError ? `status ${error.status}` : describeError(error),
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}
