/**
 * Session configuration from environment variables
 *
 * Unset or empty variables are left out so the session defaults apply.
 * Scripts load .env first with `import "dotenv/config"`.
 */

import type { RetryConfigurationInput, SessionOptions } from "@/types";
import {
  ENV_HTTP_BACKOFF_FACTOR_MS,
  ENV_HTTP_MAX_ATTEMPTS,
  ENV_HTTP_RESPECT_RETRY_AFTER,
  ENV_HTTP_TIMEOUT_MS,
  ENV_HTTP_USER_AGENT,
  TIMEOUT_DISABLED_VALUE,
} from "@/constants";
import { ConfigurationError } from "@/clients/http/errors";

type Env = Record<string, string | undefined>;

function readVar(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function parseNumberVar(
  name: string,
  raw: string,
  { integer }: { integer: boolean },
): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(
      `${name} must be ${integer ? "an integer" : "a number"}, got "${raw}"`,
    );
  }
  return value;
}

function parseBooleanVar(name: string, raw: string): boolean {
  const normalized = raw.toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw new ConfigurationError(`${name} must be true or false, got "${raw}"`);
}

/**
 * Build SessionOptions from HTTP_* environment variables
 *
 * Range checks (maxAttempts >= 1, positive timeout) are left to the session
 * constructor, which raises ConfigurationError for them.
 *
 * @throws {ConfigurationError} When a set variable does not parse
 */
export function readSessionOptionsFromEnv(
  env: Env = process.env,
): SessionOptions {
  const options: SessionOptions = {};
  const retry: RetryConfigurationInput = {};

  const maxAttempts = readVar(env, ENV_HTTP_MAX_ATTEMPTS);
  if (maxAttempts !== undefined) {
    retry.maxAttempts = parseNumberVar(ENV_HTTP_MAX_ATTEMPTS, maxAttempts, {
      integer: true,
    });
  }

  const backoffFactor = readVar(env, ENV_HTTP_BACKOFF_FACTOR_MS);
  if (backoffFactor !== undefined) {
    retry.backoffFactorMs = parseNumberVar(
      ENV_HTTP_BACKOFF_FACTOR_MS,
      backoffFactor,
      { integer: false },
    );
  }

  const respectRetryAfter = readVar(env, ENV_HTTP_RESPECT_RETRY_AFTER);
  if (respectRetryAfter !== undefined) {
    retry.respectRetryAfter = parseBooleanVar(
      ENV_HTTP_RESPECT_RETRY_AFTER,
      respectRetryAfter,
    );
  }

  const timeout = readVar(env, ENV_HTTP_TIMEOUT_MS);
  if (timeout !== undefined) {
    options.timeoutMs =
      timeout.toLowerCase() === TIMEOUT_DISABLED_VALUE
        ? null
        : parseNumberVar(ENV_HTTP_TIMEOUT_MS, timeout, { integer: false });
  }

  const userAgent = readVar(env, ENV_HTTP_USER_AGENT);
  if (userAgent !== undefined) {
    options.userAgent = userAgent;
  }

  if (Object.keys(retry).length > 0) {
    options.retry = retry;
  }

  return options;
}
