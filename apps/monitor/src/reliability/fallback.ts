import { log } from "../logger.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import { CircuitOpenError } from "./errors.js";

/**
 * Run `operation` through `breaker`, substituting `fallback` when the circuit
 * rejects the call. The operation's own errors still propagate.
 *
 * @example
 * const users = await callWithFallback(dbBreaker, () => repo.listUsers(), () => ({
 *   users: [],
 *   error: "Database temporarily unavailable",
 *   fallback: true,
 * }));
 */
export async function callWithFallback<T, F = T>(
  breaker: CircuitBreaker,
  operation: () => T | Promise<T>,
  fallback: (error: CircuitOpenError) => F | Promise<F>
): Promise<T | F> {
  try {
    return await breaker.call(operation);
  } catch (error) {
    if (error instanceof CircuitOpenError) {
      log.breaker.warn({ breaker: breaker.name, retryAfterMs: error.retryAfterMs }, "serving fallback");
      return fallback(error);
    }
    throw error;
  }
}
