#!/usr/bin/env tsx

/**
 * Manual test: one GET through a ResilientSession
 *
 * Verifies:
 * - Session options load from .env / HTTP_* variables
 * - Request completes (or fails with a typed error) against a live URL
 * - Retries show up in the log with LOG_LEVEL=debug
 *
 * Usage: tsx scripts/smoke-session.ts https://httpbin.org/status/503
 */

import "dotenv/config";
import {
  MaxRetriesExceededError,
  readSessionOptionsFromEnv,
  withSession,
} from "@/index";
import * as logger from "@/logger";

async function main() {
  const url = process.argv[2] ?? "https://example.com/";
  const options = readSessionOptionsFromEnv();

  logger.info("Starting session smoke test", { url, ...options });

  const status = await withSession(
    {
      ...options,
      onRetry: (event) => logger.info("Retry scheduled", { ...event }),
    },
    async (session) => {
      const started = Date.now();
      const response = await session.get(url);
      logger.info("Response received", {
        status: response.status,
        elapsedMs: Date.now() - started,
        contentType: response.headers.get("content-type"),
      });
      return response.status;
    },
  );

  logger.info("✓ Test complete", { status });
}

main().catch((error) => {
  if (error instanceof MaxRetriesExceededError) {
    logger.error("Gave up", { attempts: error.attempts, lastStatus: error.lastStatus });
  } else {
    logger.error("Test failed", { error: error.message, stack: error.stack });
  }
  process.exit(1);
});
