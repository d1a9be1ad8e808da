export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  InvalidTaskTransitionError,
  RateLimitedError,
  ValidationError,
  ExternalServiceError,
  UnsupportedMediaTypeError,
  ExtractionError,
  ClassificationError,
  StoreTransientError,
  StoreError,
  statusOf,
  messageOf,
} from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, BreakerLogger } from "./circuit-breaker.js";

export { withRetry, calculateDelay, sleep } from "./retry.js";
export type { RetryOptions, BackoffStrategy } from "./retry.js";
