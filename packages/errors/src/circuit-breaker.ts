import CircuitBreaker from "opossum";
import type { Logger } from "@quire/logger";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Minimum number of requests in the window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
}

const DEFAULT_OPTIONS: Required<
  Pick<
    CircuitBreakerOptions,
    "timeout" | "errorThresholdPercentage" | "resetTimeout" | "volumeThreshold"
  >
> = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  logger: Logger,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const mergedOptions = { ...DEFAULT_OPTIONS, ...options, name };

  const breaker = new CircuitBreaker(fn, mergedOptions);

  breaker.on("open", () => {
    logger.warn({ breaker: name }, "circuit opened, requests will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger.warn({ breaker: name }, "circuit half-open, next request is a probe");
  });

  breaker.on("close", () => {
    logger.info({ breaker: name }, "circuit closed");
  });

  return breaker;
}

/** opossum rejects short-circuited calls with this code. */
export function isOpenCircuitError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EOPENBREAKER";
}
