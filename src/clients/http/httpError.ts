/**
 * HttpError class — structured error for non-2xx responses
 *
 * The session never throws it: terminal responses are returned as-is.
 * Callers opt in with raiseForStatus().
 */

import type { HttpErrorDetails } from "@/types";
import { ERROR_BODY_SNIPPET_MAX_LENGTH } from "@/constants";

/**
 * Structured error class for HTTP failures
 * Contains status, URL, and optional response body snippet for debugging
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(
  response: Response,
): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    // Body already consumed or stream broken: the status alone is enough
    return undefined;
  }
}

/**
 * Throw an HttpError when the response is not 2xx
 *
 * Consumes the body of a failed response to build the snippet.
 *
 * @returns The same response when it is 2xx
 */
export async function raiseForStatus(response: Response): Promise<Response> {
  if (response.ok) {
    return response;
  }

  const bodySnippet = await extractBodySnippet(response);
  throw new HttpError({
    status: response.status,
    statusText: response.statusText,
    url: response.url,
    bodySnippet,
    headers: response.headers,
  });
}
