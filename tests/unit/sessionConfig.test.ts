/**
 * Unit tests for environment-driven session configuration
 */

import { describe, it, expect } from "vitest";
import { readSessionOptionsFromEnv } from "@/config/sessionConfig";
import { ConfigurationError, ResilientSession } from "@/clients/http";

describe("readSessionOptionsFromEnv", () => {
  it("should return no options for an empty environment", () => {
    expect(readSessionOptionsFromEnv({})).toEqual({});
  });

  it("should ignore empty and blank variables", () => {
    expect(
      readSessionOptionsFromEnv({ HTTP_MAX_ATTEMPTS: "", HTTP_USER_AGENT: "  " }),
    ).toEqual({});
  });

  it("should read every supported variable", () => {
    expect(
      readSessionOptionsFromEnv({
        HTTP_MAX_ATTEMPTS: "3",
        HTTP_BACKOFF_FACTOR_MS: "150.5",
        HTTP_TIMEOUT_MS: "2500",
        HTTP_USER_AGENT: "test-agent/2.0",
        HTTP_RESPECT_RETRY_AFTER: "true",
      }),
    ).toEqual({
      retry: {
        maxAttempts: 3,
        backoffFactorMs: 150.5,
        respectRetryAfter: true,
      },
      timeoutMs: 2500,
      userAgent: "test-agent/2.0",
    });
  });

  it("should map HTTP_TIMEOUT_MS=none to a disabled timeout", () => {
    expect(readSessionOptionsFromEnv({ HTTP_TIMEOUT_MS: "None" })).toEqual({
      timeoutMs: null,
    });
  });

  it("should accept 0 and 1 as booleans", () => {
    expect(
      readSessionOptionsFromEnv({ HTTP_RESPECT_RETRY_AFTER: "0" }),
    ).toEqual({ retry: { respectRetryAfter: false } });
  });

  it("should reject a non-integer attempt count", () => {
    expect(() =>
      readSessionOptionsFromEnv({ HTTP_MAX_ATTEMPTS: "2.5" }),
    ).toThrow('HTTP_MAX_ATTEMPTS must be an integer, got "2.5"');
  });

  it("should reject a non-numeric timeout", () => {
    expect(() =>
      readSessionOptionsFromEnv({ HTTP_TIMEOUT_MS: "fast" }),
    ).toThrow(ConfigurationError);
  });

  it("should reject an unknown boolean", () => {
    expect(() =>
      readSessionOptionsFromEnv({ HTTP_RESPECT_RETRY_AFTER: "maybe" }),
    ).toThrow('HTTP_RESPECT_RETRY_AFTER must be true or false, got "maybe"');
  });

  it("should leave range checks to the session constructor", () => {
    const options = readSessionOptionsFromEnv({ HTTP_MAX_ATTEMPTS: "0" });
    expect(options).toEqual({ retry: { maxAttempts: 0 } });
    expect(() => new ResilientSession(options)).toThrow(ConfigurationError);
  });
});
