export { DryRunRequestExecutor } from "./dry-run-executor.js";
export type { RecordedRequest } from "./dry-run-executor.js";
export {
  AuthorizationError,
  BadRequestError,
  ConnectionError,
  HttpRequestError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  errorForStatus,
} from "./errors.js";
export { FetchRequestExecutor, parseRetryAfter } from "./fetch-executor.js";
export type { FetchExecutorConfig } from "./fetch-executor.js";
export type {
  Credentials,
  HeaderDecorator,
  RequestExecutor,
  RetryOnRateLimitConfig,
} from "./types.js";
