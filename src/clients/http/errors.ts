/**
 * Session error taxonomy
 *
 * Retry decisions hinge on these classes: only TransientNetworkError
 * subclasses are retried as network failures, anything else thrown by a
 * transport propagates on the first attempt.
 */

/**
 * Base class for every error raised by the session layer
 */
export class ResilientSessionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResilientSessionError";

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Network-level failure: no status code was received
 */
export abstract class TransientNetworkError extends ResilientSessionError {
  public readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientNetworkError";
    this.url = url;
  }
}

/**
 * Connection refused, reset, DNS failure and similar
 */
export class ConnectionError extends TransientNetworkError {
  constructor(url: string, options?: { cause?: unknown; detail?: string }) {
    super(
      `Connection failed - ${url}${options?.detail ? ` - ${options.detail}` : ""}`,
      url,
      options,
    );
    this.name = "ConnectionError";
  }
}

/**
 * Attempt did not complete within its timeout
 */
export class TimeoutError extends TransientNetworkError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Request timed out after ${timeoutMs}ms - ${url}`, url, options);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A response whose status is in the retryable set
 */
export class RetryableStatusError extends ResilientSessionError {
  public readonly status: number;
  public readonly url: string;

  constructor(status: number, url: string) {
    super(`Retryable status ${status} - ${url}`);
    this.name = "RetryableStatusError";
    this.status = status;
    this.url = url;
  }
}

/**
 * Attempts ran out while the last outcome was still a retryable status
 */
export class MaxRetriesExceededError extends ResilientSessionError {
  public readonly attempts: number;
  public readonly url: string;
  public readonly lastStatus: number;
  public readonly lastResponse: Response;

  constructor(details: {
    attempts: number;
    url: string;
    lastResponse: Response;
  }) {
    super(
      `Max retries exceeded after ${details.attempts} attempt(s) - ${details.url} - last status ${details.lastResponse.status}`,
      {
        cause: new RetryableStatusError(
          details.lastResponse.status,
          details.url,
        ),
      },
    );
    this.name = "MaxRetriesExceededError";
    this.attempts = details.attempts;
    this.url = details.url;
    this.lastStatus = details.lastResponse.status;
    this.lastResponse = details.lastResponse;
  }
}

/**
 * Invalid construction parameters
 */
export class ConfigurationError extends ResilientSessionError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Per-request options rejected before the first attempt
 */
export class InvalidRequestError extends ResilientSessionError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/**
 * Caller aborted the request through its AbortSignal
 */
export class RequestCancelledError extends ResilientSessionError {
  constructor(url: string, options?: { cause?: unknown }) {
    super(`Request cancelled - ${url}`, options);
    this.name = "RequestCancelledError";
  }
}

/**
 * Request issued on a session that was already closed
 */
export class SessionClosedError extends ResilientSessionError {
  constructor(url: string) {
    super(`Session is closed - ${url}`);
    this.name = "SessionClosedError";
  }
}

/**
 * URL that does not parse, or uses a scheme other than http(s)
 */
export class InvalidUrlError extends ResilientSessionError {
  public readonly url: string;

  constructor(url: string, reason: string) {
    super(`Invalid URL "${url}": ${reason}`);
    this.name = "InvalidUrlError";
    this.url = url;
  }
}

export function isTransientNetworkError(
  error: unknown,
): error is TransientNetworkError {
  return error instanceof TransientNetworkError;
}
