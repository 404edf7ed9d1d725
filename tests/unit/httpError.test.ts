/**
 * Unit tests for raiseForStatus and the error taxonomy
 */

import { describe, it, expect } from "vitest";
import {
  ConnectionError,
  HttpError,
  MaxRetriesExceededError,
  RetryableStatusError,
  TimeoutError,
  TransientNetworkError,
  isTransientNetworkError,
  raiseForStatus,
} from "@/clients/http";

describe("raiseForStatus", () => {
  it("should return 2xx responses unchanged", async () => {
    const response = new Response("ok", { status: 200 });
    await expect(raiseForStatus(response)).resolves.toBe(response);
  });

  it("should throw HttpError with a body snippet for non-2xx", async () => {
    const response = new Response("missing item", {
      status: 404,
      statusText: "Not Found",
    });

    const error = await raiseForStatus(response).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(404);
      expect(error.statusText).toBe("Not Found");
      expect(error.bodySnippet).toBe("missing item");
      expect(error.message).toBe("HTTP 404 Not Found -  - missing item");
    }
  });

  it("should truncate long bodies to 200 characters", async () => {
    const response = new Response("x".repeat(250), { status: 500 });
    const error = await raiseForStatus(response).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.bodySnippet).toBe("x".repeat(200) + "...");
    }
  });

  it("should omit the snippet for empty bodies", async () => {
    const response = new Response(null, { status: 503 });
    const error = await raiseForStatus(response).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.bodySnippet).toBeUndefined();
    }
  });
});

describe("error taxonomy", () => {
  it("should treat connection errors and timeouts as transient", () => {
    const connection = new ConnectionError("https://example.test/", {
      detail: "ECONNRESET",
    });
    const timeout = new TimeoutError("https://example.test/", 5000);

    expect(connection).toBeInstanceOf(TransientNetworkError);
    expect(isTransientNetworkError(connection)).toBe(true);
    expect(isTransientNetworkError(timeout)).toBe(true);
    expect(isTransientNetworkError(new Error("boom"))).toBe(false);

    expect(connection.message).toBe(
      "Connection failed - https://example.test/ - ECONNRESET",
    );
    expect(timeout.message).toBe(
      "Request timed out after 5000ms - https://example.test/",
    );
    expect(timeout.name).toBe("TimeoutError");
  });

  it("should carry the last response on MaxRetriesExceededError", () => {
    const lastResponse = new Response(null, { status: 503 });
    const error = new MaxRetriesExceededError({
      attempts: 3,
      url: "https://example.test/",
      lastResponse,
    });

    expect(error.attempts).toBe(3);
    expect(error.lastStatus).toBe(503);
    expect(error.lastResponse).toBe(lastResponse);
    expect(error.cause).toBeInstanceOf(RetryableStatusError);
    expect(error.message).toBe(
      "Max retries exceeded after 3 attempt(s) - https://example.test/ - last status 503",
    );
  });
});
