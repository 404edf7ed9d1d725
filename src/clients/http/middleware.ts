/**
 * Request pipeline — small composable steps applied before every attempt loop
 *
 * The session composes these once at construction:
 * applyDefaultHeaders -> applyDefaultTimeout -> transport.send
 */

import type { PreparedRequest, QueryParams } from "@/types";

export type RequestMiddleware = (req: PreparedRequest) => PreparedRequest;

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
export function buildUrl(baseUrl: string, query?: QueryParams): string {
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
 * Fill timeoutMs when the call did not set one
 *
 * An explicit per-call value, including one equal to the default, is kept.
 */
export function applyDefaultTimeout(
  defaultTimeoutMs: number | null,
): RequestMiddleware {
  return (req) =>
    req.timeoutMs === undefined ? { ...req, timeoutMs: defaultTimeoutMs } : req;
}

/**
 * Merge default headers under the request's own (request wins, names compared case-insensitively)
 */
export function applyDefaultHeaders(
  defaults: Record<string, string>,
): RequestMiddleware {
  return (req) => {
    const headers = new Headers(defaults);
    req.headers.forEach((value, name) => headers.set(name, value));
    return { ...req, headers };
  };
}

/**
 * Compose middleware left to right
 */
export function composeMiddleware(
  ...steps: RequestMiddleware[]
): RequestMiddleware {
  return (req) => steps.reduce((acc, step) => step(acc), req);
}
