/**
 * RetryPolicy — pure retry/backoff decisions over request attempts
 *
 * No I/O and no clock: given the attempt index, the method and what happened,
 * it answers whether to try again and how long to wait first.
 */

import type {
  AttemptDecision,
  AttemptOutcome,
  HttpMethod,
  RetryConfiguration,
  RetryConfigurationInput,
} from "@/types";
import {
  DEFAULT_BACKOFF_FACTOR_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  DEFAULT_RETRYABLE_METHODS,
  DEFAULT_RETRYABLE_STATUS_CODES,
  HTTP_METHODS,
} from "@/constants";
import { ConfigurationError } from "./errors";

/**
 * Narrow an arbitrary method string to a known uppercase HttpMethod
 */
export function toHttpMethod(method: string): HttpMethod | null {
  const upper = method.toUpperCase();
  return HTTP_METHODS.find((m) => m === upper) ?? null;
}

function resolveMethods(methods: Iterable<string>): Set<HttpMethod> {
  const resolved = new Set<HttpMethod>();
  for (const method of methods) {
    const known = toHttpMethod(method);
    if (!known) {
      throw new ConfigurationError(
        `retryableMethods contains unknown HTTP method "${method}"`,
      );
    }
    resolved.add(known);
  }
  return resolved;
}

function resolveStatusCodes(codes: Iterable<number>): Set<number> {
  const resolved = new Set<number>();
  for (const code of codes) {
    if (!Number.isInteger(code) || code < 100 || code > 599) {
      throw new ConfigurationError(
        `retryableStatusCodes contains invalid status code ${code}`,
      );
    }
    resolved.add(code);
  }
  return resolved;
}

/**
 * Fill defaults, validate and freeze a retry configuration
 *
 * @throws {ConfigurationError} On a non-integer or < 1 maxAttempts, a negative
 * or non-finite backoff, unknown methods or out-of-range status codes
 */
export function resolveRetryConfiguration(
  input: RetryConfigurationInput = {},
): RetryConfiguration {
  const maxAttempts = input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ConfigurationError(
      `maxAttempts must be an integer >= 1, got ${maxAttempts}`,
    );
  }

  const backoffFactorMs = input.backoffFactorMs ?? DEFAULT_BACKOFF_FACTOR_MS;
  if (!Number.isFinite(backoffFactorMs) || backoffFactorMs < 0) {
    throw new ConfigurationError(
      `backoffFactorMs must be a finite number >= 0, got ${backoffFactorMs}`,
    );
  }

  const maxRetryAfterMs = input.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;
  if (!Number.isFinite(maxRetryAfterMs) || maxRetryAfterMs < 0) {
    throw new ConfigurationError(
      `maxRetryAfterMs must be a finite number >= 0, got ${maxRetryAfterMs}`,
    );
  }

  return Object.freeze({
    maxAttempts,
    backoffFactorMs,
    retryableStatusCodes: resolveStatusCodes(
      input.retryableStatusCodes ?? DEFAULT_RETRYABLE_STATUS_CODES,
    ),
    retryableMethods: resolveMethods(
      input.retryableMethods ?? DEFAULT_RETRYABLE_METHODS,
    ),
    respectRetryAfter: input.respectRetryAfter ?? false,
    maxRetryAfterMs,
  });
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(
  retryAfterHeader: string | null | undefined,
  now: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  // delay-seconds is a bare non-negative integer
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return null;
}

export class RetryPolicy {
  readonly config: RetryConfiguration;

  constructor(config: RetryConfiguration | RetryConfigurationInput = {}) {
    this.config = resolveRetryConfiguration(config);
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  isMethodRetryable(method: string): boolean {
    const known = toHttpMethod(method);
    return known !== null && this.config.retryableMethods.has(known);
  }

  isStatusRetryable(status: number): boolean {
    return this.config.retryableStatusCodes.has(status);
  }

  /**
   * True when the outcome is transient in itself, ignoring attempts and method
   */
  isOutcomeRetryable(outcome: AttemptOutcome): boolean {
    if (outcome.kind === "network-error") {
      return true;
    }
    return this.isStatusRetryable(outcome.status);
  }

  /**
   * Decide whether another attempt follows the one at attemptIndex
   *
   * @param attemptIndex - 0-based index of the attempt that produced outcome
   */
  shouldRetry(
    method: string,
    attemptIndex: number,
    outcome: AttemptOutcome,
  ): boolean {
    if (attemptIndex + 1 >= this.config.maxAttempts) {
      return false;
    }
    if (!this.isMethodRetryable(method)) {
      return false;
    }
    return this.isOutcomeRetryable(outcome);
  }

  /**
   * Name the state transition that follows an attempt
   */
  classifyOutcome(
    method: string,
    attemptIndex: number,
    outcome: AttemptOutcome,
  ): AttemptDecision {
    if (this.shouldRetry(method, attemptIndex, outcome)) {
      return "retry";
    }
    if (this.isOutcomeRetryable(outcome)) {
      return this.isMethodRetryable(method) ? "exhausted" : "terminal";
    }
    if (outcome.kind === "network-error") {
      return "terminal";
    }
    return outcome.status < 400 ? "success" : "terminal";
  }

  /**
   * Deterministic exponential backoff, in ms, before attempt attemptIndex
   *
   * 0 for the first attempt, then factor * 2^(attemptIndex - 1).
   */
  backoffDuration(attemptIndex: number): number {
    if (attemptIndex <= 0) {
      return 0;
    }
    return this.config.backoffFactorMs * Math.pow(2, attemptIndex - 1);
  }

  /**
   * Wait before attempt attemptIndex, honoring Retry-After only when enabled
   */
  retryDelay(
    attemptIndex: number,
    retryAfterHeader?: string | null,
    now?: number,
  ): number {
    if (this.config.respectRetryAfter) {
      const retryAfterMs = parseRetryAfter(retryAfterHeader, now);
      if (retryAfterMs !== null) {
        return Math.min(retryAfterMs, this.config.maxRetryAfterMs);
      }
    }
    return this.backoffDuration(attemptIndex);
  }
}
