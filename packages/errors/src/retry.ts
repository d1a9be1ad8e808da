import { AppError } from "./app-error.js";

export type BackoffStrategy = "fixed" | "exponential";

export interface RetryOptions {
  /** Total number of attempts, including the first. Default: 3 */
  maxAttempts?: number;
  /** Default: "exponential" */
  backoff?: BackoffStrategy;
  /** Delay before the first retry, and the whole window under "fixed". Default: 1000 */
  baseDelayMs?: number;
  /** Cap on exponential delays. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. Ignored when `isRetryable` is given. */
  retryableErrors?: string[];
  /** Overrides the default 4xx/5xx classification. */
  isRetryable?: (error: unknown) => boolean;
  /** Runs before each sleep. `attempt` is the 1-based attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  backoff: "exponential",
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
} satisfies RetryOptions;

function codeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Client errors (4xx) are NOT retried; server errors (5xx) and network errors ARE retried.
 */
function isRetryableError(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    return error.statusCode >= 500;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = codeOf(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * exponential: min(maxDelay, baseDelay * 2^retry) * random(0.5, 1.0)
 * fixed: baseDelay
 */
export function calculateDelay(
  retry: number,
  backoff: BackoffStrategy,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  if (backoff === "fixed") return baseDelayMs;
  const cappedDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, retry));
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or `maxAttempts` is reached.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const { maxAttempts, backoff, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const retryable =
    options?.isRetryable ?? ((error: unknown) => isRetryableError(error, options?.retryableErrors));
  const wait = options?.sleep ?? sleep;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxAttempts || !retryable(error)) {
        break;
      }

      const delay = calculateDelay(attempt - 1, backoff, baseDelayMs, maxDelayMs);
      await options?.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }

  throw lastError;
}
