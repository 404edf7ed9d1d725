/**
 * HTTP session type definitions
 */

import type { Logger } from "@/types/logger";

export type HttpMethod =
  | "GET"
  | "HEAD"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "OPTIONS"
  | "TRACE";

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | QueryValue[]>;

export type RequestBody = string | URLSearchParams | Uint8Array;

/**
 * Retry configuration as accepted from callers (every field optional)
 */
export interface RetryConfigurationInput {
  /** Total attempts including the first one. Must be an integer >= 1. */
  maxAttempts?: number;
  /** Backoff scale in ms: wait before attempt n is factor * 2^(n-1). */
  backoffFactorMs?: number;
  /** Status codes treated as transient failures */
  retryableStatusCodes?: Iterable<number>;
  /** Methods eligible for retry (case-insensitive) */
  retryableMethods?: Iterable<string>;
  /** Use a server's Retry-After header instead of the computed backoff. Off by default. */
  respectRetryAfter?: boolean;
  /** Upper bound for a Retry-After wait */
  maxRetryAfterMs?: number;
}

/**
 * Validated, frozen retry configuration
 */
export interface RetryConfiguration {
  readonly maxAttempts: number;
  readonly backoffFactorMs: number;
  readonly retryableStatusCodes: ReadonlySet<number>;
  readonly retryableMethods: ReadonlySet<HttpMethod>;
  readonly respectRetryAfter: boolean;
  readonly maxRetryAfterMs: number;
}

/**
 * Result of a single attempt, as seen by the retry policy
 */
export type AttemptOutcome =
  | { kind: "response"; status: number; retryAfter?: string | null }
  | { kind: "network-error"; error: Error };

/**
 * Where a logical request goes after an attempt
 */
export type AttemptDecision = "success" | "terminal" | "retry" | "exhausted";

/**
 * Payload passed to the onRetry hook before each backoff wait
 */
export interface RetryEvent {
  method: HttpMethod;
  url: string;
  /** Index of the attempt that just failed (0-based) */
  attemptIndex: number;
  maxAttempts: number;
  delayMs: number;
  /** "status 503" or the network error name */
  reason: string;
}

/**
 * Per-call request options
 */
export interface RequestOptions {
  headers?: Record<string, string>;
  query?: QueryParams;
  /** Serialized as JSON; sets Content-Type unless given */
  json?: unknown;
  body?: RequestBody;
  /** Overrides the session default. Omit to use the default. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Request after the session pipeline has filled in defaults
 */
export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Headers;
  body?: RequestBody;
  timeoutMs?: number | null;
  signal?: AbortSignal;
}

/**
 * What a transport receives for one attempt
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Headers;
  body?: RequestBody;
  /**
   * Bounds the wait for response headers; null means no timeout.
   * Reading the body afterwards is not covered, and close() no longer aborts it.
   */
  timeoutMs: number | null;
  signal?: AbortSignal;
}

/**
 * Capability that moves bytes: connection handling, TLS, redirects and framing live here.
 *
 * Network failures must reject with ConnectionError or TimeoutError so the
 * session can tell them apart from bugs.
 */
export interface Transport {
  send(request: TransportRequest): Promise<Response>;
  close?(): Promise<void> | void;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface SessionOptions {
  retry?: RetryConfigurationInput;
  /** Default per-request timeout in ms; null disables it */
  timeoutMs?: number | null;
  /** Value of the User-Agent header */
  userAgent?: string;
  /** Extra default headers sent with every request */
  headers?: Record<string, string>;
  transport?: Transport;
  logger?: Logger;
  /** Called before each backoff wait; a throw is logged at warn and ignored */
  onRetry?: (event: RetryEvent) => void;
  /** Optional wait function (for testing) */
  sleep?: SleepFn;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}
