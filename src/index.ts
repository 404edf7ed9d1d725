/**
 * resilient-session — HTTP session with retries, backoff and a default timeout
 */

export * from "@/clients/http";
export { readSessionOptionsFromEnv } from "@/config/sessionConfig";
export { sleep } from "@/utils/sleep";
export type { Logger, LogLevel, LogMeta } from "@/types";
