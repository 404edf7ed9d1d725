/**
 * HTTP session public API
 */

export { ResilientSession, withSession } from "./resilientSession";
export {
  RetryPolicy,
  resolveRetryConfiguration,
  parseRetryAfter,
  toHttpMethod,
} from "./retryPolicy";
export { FetchTransport } from "./fetchTransport";
export type { FetchTransportConfig } from "./fetchTransport";
export {
  applyDefaultHeaders,
  applyDefaultTimeout,
  buildUrl,
  composeMiddleware,
} from "./middleware";
export type { RequestMiddleware } from "./middleware";
export { HttpError, raiseForStatus } from "./httpError";
export {
  ResilientSessionError,
  TransientNetworkError,
  ConnectionError,
  TimeoutError,
  RetryableStatusError,
  MaxRetriesExceededError,
  ConfigurationError,
  InvalidRequestError,
  RequestCancelledError,
  SessionClosedError,
  InvalidUrlError,
  isTransientNetworkError,
} from "./errors";
export type {
  AttemptDecision,
  AttemptOutcome,
  HttpErrorDetails,
  HttpMethod,
  PreparedRequest,
  QueryParams,
  RequestBody,
  RequestOptions,
  RetryConfiguration,
  RetryConfigurationInput,
  RetryEvent,
  SessionOptions,
  SleepFn,
  Transport,
  TransportRequest,
} from "@/types";
