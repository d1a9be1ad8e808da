import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 60000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  rollingCountTimeout?: number;
  rollingCountBuckets?: number;
}

/** Anything with a pino-style `warn(obj, msg)`. */
export interface BreakerLogger {
  warn(obj: Record<string, unknown>, msg: string): void;
}

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout">
> = {
  timeout: 60_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  logger: BreakerLogger,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...options, name });

  breaker.on("open", () => {
    logger.warn({ breaker: name, state: "open" }, "Circuit opened, requests will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger.warn({ breaker: name, state: "half-open" }, "Circuit half-open, next request is a trial");
  });

  breaker.on("close", () => {
    logger.warn({ breaker: name, state: "closed" }, "Circuit closed");
  });

  return breaker;
}
