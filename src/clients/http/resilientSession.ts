/**
 * ResilientSession — long-lived HTTP session with retries, a default timeout
 * and a fixed User-Agent
 *
 * Wraps a Transport instead of extending one. Every request goes through the
 * same pipeline (default headers, default timeout) and the same attempt loop:
 *
 *   INIT -> ATTEMPTING -> SUCCESS
 *                      -> RETRYING (wait retryDelay) -> ATTEMPTING
 *                      -> EXHAUSTED
 *
 * Only the terminal outcome reaches the caller: the final Response (2xx or a
 * non-retryable status such as 404), MaxRetriesExceededError, or the last
 * network error.
 */

import type {
  AttemptOutcome,
  HttpMethod,
  Logger,
  PreparedRequest,
  RequestOptions,
  RetryEvent,
  SessionOptions,
  SleepFn,
  Transport,
} from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  DEFAULT_USER_AGENT,
  SUPPORTED_URL_PROTOCOLS,
} from "@/constants";
import * as logger from "@/logger";
import { sleep as defaultSleep } from "@/utils/sleep";
import {
  ConfigurationError,
  InvalidRequestError,
  InvalidUrlError,
  MaxRetriesExceededError,
  RequestCancelledError,
  ResilientSessionError,
  SessionClosedError,
  TransientNetworkError,
  isTransientNetworkError,
} from "./errors";
import { FetchTransport } from "./fetchTransport";
import {
  applyDefaultHeaders,
  applyDefaultTimeout,
  buildUrl,
  composeMiddleware,
  type RequestMiddleware,
} from "./middleware";
import { RetryPolicy, toHttpMethod } from "./retryPolicy";

type ReadyRequest = PreparedRequest & { timeoutMs: number | null };

function resolveTimeout(timeoutMs: number | null | undefined): number | null {
  if (timeoutMs === undefined) {
    return DEFAULT_HTTP_TIMEOUT_MS;
  }
  if (timeoutMs === null) {
    return null;
  }
  if (!isValidTimeout(timeoutMs)) {
    throw new ConfigurationError(
      `timeoutMs must be a positive number or null, got ${timeoutMs}`,
    );
  }
  return timeoutMs;
}

const BODYLESS_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>([
  "GET",
  "HEAD",
]);

function isValidTimeout(timeoutMs: number): boolean {
  return Number.isFinite(timeoutMs) && timeoutMs > 0;
}

function resolveDefaultHeaders(
  headers: Record<string, string> | undefined,
  userAgent: string,
): Readonly<Record<string, string>> {
  let merged: Headers;
  try {
    merged = new Headers(headers);
    merged.set("User-Agent", userAgent);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid default headers: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const record: Record<string, string> = {};
  merged.forEach((value, name) => {
    record[name] = value;
  });
  return Object.freeze(record);
}

function assertSupportedUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidUrlError(url, "not an absolute URL");
  }
  if (!SUPPORTED_URL_PROTOCOLS.includes(parsed.protocol)) {
    throw new InvalidUrlError(url, `unsupported scheme "${parsed.protocol}"`);
  }
}

export class ResilientSession {
  readonly retryPolicy: RetryPolicy;
  /** Effective default timeout; null when disabled */
  readonly timeoutMs: number | null;
  readonly userAgent: string;
  /** Header names are lowercased */
  readonly defaultHeaders: Readonly<Record<string, string>>;

  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly onRetry?: (event: RetryEvent) => void;
  private readonly sleep: SleepFn;
  private readonly prepare: RequestMiddleware;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  /**
   * @throws {ConfigurationError} On invalid retry settings, timeout, user agent or headers
   */
  constructor(options: SessionOptions = {}) {
    this.retryPolicy = new RetryPolicy(options.retry);
    this.timeoutMs = resolveTimeout(options.timeoutMs);

    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    if (!this.userAgent.trim()) {
      throw new ConfigurationError("userAgent must not be empty");
    }
    this.defaultHeaders = resolveDefaultHeaders(options.headers, this.userAgent);

    this.transport = options.transport ?? new FetchTransport();
    this.log =
      options.logger ?? logger.withContext({ component: "ResilientSession" });
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? defaultSleep;

    this.prepare = composeMiddleware(
      applyDefaultHeaders(this.defaultHeaders),
      applyDefaultTimeout(this.timeoutMs),
    );

    this.log.debug("ResilientSession initialized", {
      maxAttempts: this.retryPolicy.maxAttempts,
      backoffFactorMs: this.retryPolicy.config.backoffFactorMs,
      timeoutMs: this.timeoutMs,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Issue a request, retrying transient failures per the session's RetryPolicy
   *
   * @returns The final response, including non-2xx responses that are not retried
   * @throws {MaxRetriesExceededError} Attempts exhausted on a retryable status
   * @throws {ConnectionError} Last attempt failed to connect
   * @throws {TimeoutError} Last attempt timed out
   * @throws {RequestCancelledError} options.signal aborted
   * @throws {SessionClosedError} Session closed before or during the request
   * @throws {InvalidUrlError} URL is not absolute http(s)
   * @throws {InvalidRequestError} Unknown method, body on GET/HEAD, bad timeoutMs
   */
  async request(
    method: HttpMethod | Lowercase<HttpMethod>,
    url: string,
    options: RequestOptions = {},
  ): Promise<Response> {
    const httpMethod = toHttpMethod(method);
    if (!httpMethod) {
      throw new InvalidRequestError(`Unsupported HTTP method "${method}"`);
    }
    if (this.closed) {
      throw new SessionClosedError(url);
    }
    if (options.signal?.aborted) {
      throw new RequestCancelledError(url, { cause: options.signal.reason });
    }
    const hasJson = options.json !== undefined;
    const hasBody = options.body !== undefined;
    if (hasJson && hasBody) {
      throw new InvalidRequestError("Pass either json or body, not both");
    }
    if ((hasJson || hasBody) && BODYLESS_METHODS.has(httpMethod)) {
      throw new InvalidRequestError(`${httpMethod} requests cannot have a body`);
    }
    if (options.timeoutMs !== undefined && !isValidTimeout(options.timeoutMs)) {
      throw new InvalidRequestError(
        `timeoutMs must be a positive number, got ${options.timeoutMs}`,
      );
    }

    assertSupportedUrl(url);

    // JSON defaults first, caller headers override; session defaults go underneath in prepare()
    const headers = new Headers(
      options.json !== undefined ? DEFAULT_JSON_HEADERS : undefined,
    );
    new Headers(options.headers).forEach((value, name) =>
      headers.set(name, value),
    );

    const prepared = this.prepare({
      method: httpMethod,
      url: buildUrl(url, options.query),
      headers,
      body:
        options.json !== undefined ? JSON.stringify(options.json) : options.body,
      timeoutMs: options.timeoutMs,
    });

    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(options.signal?.reason);
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    this.inFlight.add(controller);

    try {
      return await this.runAttempts(
        { ...prepared, timeoutMs: prepared.timeoutMs ?? null },
        controller.signal,
      );
    } finally {
      options.signal?.removeEventListener("abort", onCallerAbort);
      this.inFlight.delete(controller);
    }
  }

  get(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("GET", url, options);
  }

  head(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("HEAD", url, options);
  }

  options(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("OPTIONS", url, options);
  }

  delete(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("DELETE", url, options);
  }

  trace(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("TRACE", url, options);
  }

  post(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("POST", url, options);
  }

  put(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("PUT", url, options);
  }

  patch(url: string, options?: RequestOptions): Promise<Response> {
    return this.request("PATCH", url, options);
  }

  /**
   * Abort in-flight requests and release the transport. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.inFlight.forEach((controller) => controller.abort());
    this.inFlight.clear();

    await this.transport.close?.();
    this.log.debug("ResilientSession closed");
  }

  private async runAttempts(
    req: ReadyRequest,
    signal: AbortSignal,
  ): Promise<Response> {
    const policy = this.retryPolicy;

    for (let attemptIndex = 0; ; attemptIndex++) {
      const result = await this.attempt(req, signal);
      const outcome: AttemptOutcome = isTransientNetworkError(result)
        ? { kind: "network-error", error: result }
        : {
            kind: "response",
            status: result.status,
            retryAfter: result.headers.get("retry-after"),
          };

      const decision = policy.classifyOutcome(req.method, attemptIndex, outcome);

      if (decision === "success" || decision === "terminal") {
        if (isTransientNetworkError(result)) {
          throw result;
        }
        return result;
      }

      if (decision === "exhausted") {
        this.log.warn("HTTP request failed after all attempts", {
          method: req.method,
          url: req.url,
          attempts: attemptIndex + 1,
          reason: describeOutcome(outcome),
        });
        if (isTransientNetworkError(result)) {
          throw result;
        }
        throw new MaxRetriesExceededError({
          attempts: attemptIndex + 1,
          url: req.url,
          lastResponse: result,
        });
      }

      // RETRYING
      const delayMs = policy.retryDelay(
        attemptIndex + 1,
        outcome.kind === "response" ? outcome.retryAfter : null,
      );

      if (!isTransientNetworkError(result)) {
        await this.discardBody(result, req.url);
      }

      const event: RetryEvent = {
        method: req.method,
        url: req.url,
        attemptIndex,
        maxAttempts: policy.maxAttempts,
        delayMs,
        reason: describeOutcome(outcome),
      };
      this.log.debug("Retrying HTTP request", { ...event });
      this.notifyRetry(event);

      try {
        await this.sleep(delayMs, signal);
      } catch (error) {
        throw this.cancellation(req.url, error);
      }
    }
  }

  private async attempt(
    req: ReadyRequest,
    signal: AbortSignal,
  ): Promise<Response | TransientNetworkError> {
    if (signal.aborted) {
      throw this.cancellation(req.url, signal.reason);
    }

    try {
      return await this.transport.send({
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: req.body,
        timeoutMs: req.timeoutMs,
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw this.cancellation(req.url, error);
      }
      if (isTransientNetworkError(error)) {
        return error;
      }
      throw error;
    }
  }

  /**
   * A throwing hook is logged; the retry goes ahead
   */
  private notifyRetry(event: RetryEvent): void {
    try {
      this.onRetry?.(event);
    } catch (error) {
      this.log.warn("onRetry hook failed", {
        method: event.method,
        url: event.url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private cancellation(url: string, cause: unknown): ResilientSessionError {
    if (this.closed) {
      return new SessionClosedError(url);
    }
    if (cause instanceof RequestCancelledError) {
      return cause;
    }
    return new RequestCancelledError(url, { cause });
  }

  /**
   * Release the connection held by a response we are about to retry
   */
  private async discardBody(response: Response, url: string): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.log.debug("Failed to discard response body", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function describeOutcome(outcome: AttemptOutcome): string {
  return outcome.kind === "response"
    ? `status ${outcome.status}`
    : outcome.error.name;
}

/**
 * Run fn with a fresh session and close it on every exit path
 */
export async function withSession<T>(
  options: SessionOptions | undefined,
  fn: (session: ResilientSession) => Promise<T>,
): Promise<T> {
  const session = new ResilientSession(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
