/**
 * Mock Transport for offline session tests
 *
 * Provides a controllable Transport that:
 * - Replays a scripted sequence of replies per route (last reply repeats)
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 * - Records every attempt with its final headers and timeout
 *
 * Usage:
 *   const mock = createMockTransport();
 *   mock.on("GET", "https://example.test/items", { status: 503 }, { status: 200, body: "ok" });
 *   const session = new ResilientSession({ transport: mock, sleep: createRecordingSleep().sleep });
 */

import type { HttpMethod, Transport, TransportRequest } from "@/types";
import { ConnectionError, TimeoutError } from "@/clients/http";

type RouteKey = string; // "METHOD URL"

export type MockReply =
  | { status: number; body?: string | null; headers?: Record<string, string> }
  | { networkError: "connection" | "timeout" }
  | ((req: TransportRequest) => Promise<Response>);

export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number | null;
}

export interface MockTransport extends Transport {
  /**
   * Register replies for a given method+url, consumed one per attempt
   * The last reply repeats once the sequence is used up
   */
  on(method: HttpMethod, url: string, ...replies: MockReply[]): void;

  /**
   * Get recorded attempts (for assertions)
   */
  getRecordedRequests(): RecordedRequest[];

  /**
   * Number of times close() was called
   */
  closeCount(): number;

  /**
   * Clear all mocks and recorded requests
   */
  reset(): void;
}

function buildRouteKey(method: string, url: string): RouteKey {
  return `${method.toUpperCase()} ${url}`;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name] = value;
  });
  return record;
}

async function materialize(
  reply: MockReply,
  req: TransportRequest,
): Promise<Response> {
  if (typeof reply === "function") {
    return reply(req);
  }
  if ("networkError" in reply) {
    if (reply.networkError === "timeout") {
      throw new TimeoutError(req.url, req.timeoutMs ?? 0);
    }
    throw new ConnectionError(req.url, { detail: "ECONNREFUSED" });
  }
  return new Response(reply.body ?? null, {
    status: reply.status,
    headers: reply.headers,
  });
}

/**
 * Create a mock transport
 */
export function createMockTransport(): MockTransport {
  const routes = new Map<RouteKey, MockReply[]>();
  const hits = new Map<RouteKey, number>();
  const recordedRequests: RecordedRequest[] = [];
  let closes = 0;

  const on = (
    method: HttpMethod,
    url: string,
    ...replies: MockReply[]
  ): void => {
    if (replies.length === 0) {
      throw new Error("[MockTransport] on() needs at least one reply");
    }
    const key = buildRouteKey(method, url);
    routes.set(key, replies);
    hits.set(key, 0);
  };

  const send = async (req: TransportRequest): Promise<Response> => {
    recordedRequests.push({
      method: req.method,
      url: req.url,
      headers: headersToRecord(req.headers),
      body: typeof req.body === "string" ? req.body : undefined,
      timeoutMs: req.timeoutMs,
    });

    const key = buildRouteKey(req.method, req.url);
    const replies = routes.get(key);

    if (!replies) {
      throw new Error(
        `[MockTransport] Unmocked request: ${key}\n` +
          `All requests must be explicitly mocked to prevent accidental network calls.\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    const hit = hits.get(key) ?? 0;
    hits.set(key, hit + 1);
    const reply = replies[Math.min(hit, replies.length - 1)];
    return materialize(reply, req);
  };

  return {
    on,
    send,
    close: () => {
      closes += 1;
    },
    getRecordedRequests: () => [...recordedRequests],
    closeCount: () => closes,
    reset: () => {
      routes.clear();
      hits.clear();
      recordedRequests.length = 0;
      closes = 0;
    },
  };
}

/**
 * Sleep stand-in that records each wait and resolves on the next microtask
 * Honors the abort signal like the real sleep
 */
export function createRecordingSleep(): {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  waits: number[];
} {
  const waits: number[] = [];
  const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    waits.push(ms);
    if (signal?.aborted) {
      throw signal.reason;
    }
  };
  return { sleep, waits };
}
