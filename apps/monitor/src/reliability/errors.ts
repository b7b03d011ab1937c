/**
 * Errors raised by the reliability engine.
 *
 * Guarded operations' own errors are never wrapped: `CircuitBreaker.call`
 * rethrows them unchanged, so callers can tell the two apart with `instanceof`.
 */

/**
 * Thrown when a call is rejected because the circuit is open.
 * The guarded operation was not invoked.
 */
export class CircuitOpenError extends Error {
  readonly name = "CircuitOpenError";
  readonly code = "CIRCUIT_OPEN";
  readonly breakerName: string;
  /** Time until the breaker will admit a trial call; 0 while a trial is already running */
  readonly retryAfterMs: number;

  constructor(breakerName: string, retryAfterMs: number) {
    super(`Circuit breaker '${breakerName}' is OPEN`);
    this.breakerName = breakerName;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Thrown at startup when a custom SLO file cannot be used.
 */
export class SloConfigError extends Error {
  readonly name = "SloConfigError";
  readonly code = "SLO_CONFIG_INVALID";
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid SLO configuration in ${source}: ${issues.join("; ")}`);
    this.source = source;
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
