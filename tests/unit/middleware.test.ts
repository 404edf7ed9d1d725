/**
 * Unit tests for the request pipeline steps
 */

import { describe, it, expect } from "vitest";
import {
  applyDefaultHeaders,
  applyDefaultTimeout,
  buildUrl,
  composeMiddleware,
} from "@/clients/http";
import type { PreparedRequest } from "@/types";

function makeRequest(overrides: Partial<PreparedRequest> = {}): PreparedRequest {
  return {
    method: "GET",
    url: "https://example.test/items",
    headers: new Headers(),
    ...overrides,
  };
}

describe("buildUrl", () => {
  it("should return the base URL untouched without query", () => {
    expect(buildUrl("https://example.test/items")).toBe(
      "https://example.test/items",
    );
    expect(buildUrl("https://example.test/items", {})).toBe(
      "https://example.test/items",
    );
  });

  it("should append scalar and repeated params", () => {
    expect(
      buildUrl("https://example.test/items", {
        q: "a b",
        page: 2,
        tag: ["x", "y"],
        fresh: true,
      }),
    ).toBe("https://example.test/items?q=a+b&page=2&tag=x&tag=y&fresh=true");
  });

  it("should keep existing params", () => {
    expect(buildUrl("https://example.test/items?sort=asc", { page: 1 })).toBe(
      "https://example.test/items?sort=asc&page=1",
    );
  });
});

describe("applyDefaultTimeout", () => {
  it("should inject the default when the call sets none", () => {
    const req = applyDefaultTimeout(5000)(makeRequest());
    expect(req.timeoutMs).toBe(5000);
  });

  it("should keep an explicit per-call timeout", () => {
    const req = applyDefaultTimeout(5000)(makeRequest({ timeoutMs: 250 }));
    expect(req.timeoutMs).toBe(250);
  });

  it("should inject null when the session has no timeout", () => {
    const req = applyDefaultTimeout(null)(makeRequest());
    expect(req.timeoutMs).toBeNull();
  });

  it("should not mutate the incoming request", () => {
    const original = makeRequest();
    applyDefaultTimeout(5000)(original);
    expect(original.timeoutMs).toBeUndefined();
  });
});

describe("applyDefaultHeaders", () => {
  it("should add defaults to the request", () => {
    const req = applyDefaultHeaders({ "User-Agent": "agent/1.0" })(
      makeRequest(),
    );
    expect(req.headers.get("user-agent")).toBe("agent/1.0");
  });

  it("should let request headers win, case-insensitively", () => {
    const req = applyDefaultHeaders({
      "User-Agent": "agent/1.0",
      Accept: "text/html",
    })(makeRequest({ headers: new Headers({ accept: "application/json" }) }));

    expect(req.headers.get("accept")).toBe("application/json");
    expect(req.headers.get("user-agent")).toBe("agent/1.0");
  });
});

describe("composeMiddleware", () => {
  it("should apply steps left to right", () => {
    const pipeline = composeMiddleware(
      (req) => ({ ...req, url: `${req.url}/a` }),
      (req) => ({ ...req, url: `${req.url}/b` }),
    );
    expect(pipeline(makeRequest()).url).toBe("https://example.test/items/a/b");
  });

  it("should be the identity with no steps", () => {
    const req = makeRequest();
    expect(composeMiddleware()(req)).toBe(req);
  });
});
