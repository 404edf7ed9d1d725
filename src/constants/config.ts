/**
 * Environment variable names read by readSessionOptionsFromEnv
 */

export const ENV_HTTP_MAX_ATTEMPTS = "HTTP_MAX_ATTEMPTS";
export const ENV_HTTP_BACKOFF_FACTOR_MS = "HTTP_BACKOFF_FACTOR_MS";
export const ENV_HTTP_TIMEOUT_MS = "HTTP_TIMEOUT_MS";
export const ENV_HTTP_USER_AGENT = "HTTP_USER_AGENT";
export const ENV_HTTP_RESPECT_RETRY_AFTER = "HTTP_RESPECT_RETRY_AFTER";

/**
 * HTTP_TIMEOUT_MS value that disables the default timeout
 */
export const TIMEOUT_DISABLED_VALUE = "none";
