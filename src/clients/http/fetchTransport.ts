/**
 * FetchTransport — Transport over native fetch
 *
 * One fetch per send(), bounded by an AbortController that fires on the
 * attempt timeout, on the caller's signal, or on close(). Fetch failures are
 * mapped onto the session's error taxonomy so the retry loop can classify them.
 *
 * The controller is released once the response headers arrive: the body is
 * read without a timeout and close() does not abort it.
 */

import type { Transport, TransportRequest } from "@/types";
import {
  ConnectionError,
  RequestCancelledError,
  TimeoutError,
} from "./errors";

export interface FetchTransportConfig {
  /**
   * Optional fetch implementation (for testing/mocking)
   * Defaults to the global fetch
   */
  fetchImpl?: typeof fetch;
}

/**
 * Pull a short reason out of a fetch failure (undici nests the system error in cause)
 */
function describeFailure(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  if (error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

export class FetchTransport implements Transport {
  private readonly fetchImpl: typeof fetch;
  private readonly inFlight = new Set<AbortController>();

  constructor(config?: FetchTransportConfig) {
    this.fetchImpl = config?.fetchImpl ?? globalThis.fetch.bind(globalThis);
  }

  async send(req: TransportRequest): Promise<Response> {
    if (req.signal?.aborted) {
      throw new RequestCancelledError(req.url, { cause: req.signal.reason });
    }

    const controller = new AbortController();
    const timeoutMs = req.timeoutMs;
    let timedOut = false;

    const timeoutId =
      timeoutMs === null
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeoutMs);

    const onCallerAbort = (): void => controller.abort();
    req.signal?.addEventListener("abort", onCallerAbort, { once: true });
    this.inFlight.add(controller);

    try {
      return await this.fetchImpl(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut && timeoutMs !== null) {
        throw new TimeoutError(req.url, timeoutMs, { cause: error });
      }

      // Aborted by the caller or by close()
      if (controller.signal.aborted) {
        throw new RequestCancelledError(req.url, { cause: error });
      }

      throw new ConnectionError(req.url, {
        cause: error,
        detail: describeFailure(error),
      });
    } finally {
      clearTimeout(timeoutId);
      req.signal?.removeEventListener("abort", onCallerAbort);
      this.inFlight.delete(controller);
    }
  }

  /**
   * Abort every request still in flight
   */
  close(): void {
    this.inFlight.forEach((controller) => controller.abort());
    this.inFlight.clear();
  }
}
