/**
 * HTTP session constants — defaults and configuration
 */

import type { HttpMethod } from "@/types";

/**
 * Default total attempts (1 initial + 4 retries)
 */
export const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Backoff scale in milliseconds
 * Waits before retries 1..4: 300ms, 600ms, 1.2s, 2.4s
 */
export const DEFAULT_BACKOFF_FACTOR_MS = 300;

/**
 * Status codes presumed transient
 * - 429: Too Many Requests (rate limit)
 * - 500, 502, 503, 504: server and gateway errors
 */
export const DEFAULT_RETRYABLE_STATUS_CODES: readonly number[] = [
  429, 500, 502, 503, 504,
];

/**
 * Methods eligible for retry
 * POST is included: most APIs reject a duplicate insert rather than performing it twice
 */
export const DEFAULT_RETRYABLE_METHODS: readonly HttpMethod[] = [
  "HEAD",
  "GET",
  "PUT",
  "POST",
  "DELETE",
  "OPTIONS",
  "TRACE",
];

/**
 * Every method the session can issue
 */
export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "OPTIONS",
  "TRACE",
];

/**
 * Effective per-request timeout when the session is built without one (5 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 5_000;

/**
 * Upper bound for honoring a Retry-After header, when enabled
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Desktop Chrome identity sent as User-Agent
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 6.1; WOW64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/56.0.2924.76 Safari/537.36";

/**
 * Default headers for JSON request bodies
 */
export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * URL schemes the session will send to
 */
export const SUPPORTED_URL_PROTOCOLS: readonly string[] = ["http:", "https:"];
