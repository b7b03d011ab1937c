/**
 * Circuit breaker types.
 */

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerState {
  /** Current state of the circuit */
  state: CircuitState;
  /** Consecutive failures since the last success */
  failureCount: number;
  /** Timestamp of the last recorded failure, null until the first one */
  lastFailureTime: number | null;
  /** True while the single HALF_OPEN trial call is running */
  trialInFlight: boolean;
  /** Bumped on every state change; outcomes admitted under an older generation are ignored */
  generation: number;
}

export interface CircuitBreakerConfig {
  /** Failures before the circuit opens */
  failureThreshold: number;
  /** Time in ms after the last failure before a trial call is allowed */
  recoveryTimeoutMs: number;
}

/**
 * Read-only view of a breaker for reporting.
 * This is the shape served by the breaker-status endpoint.
 */
export interface CircuitBreakerSnapshot {
  name: string;
  state: CircuitState;
  failureCount: number;
  lastFailureTimestamp: number | null;
  threshold: number;
  /** Recovery timeout in ms */
  timeout: number;
}

/**
 * Ticket for an admitted call, handed back when the call settles.
 */
export interface Admission {
  /** The call is the HALF_OPEN trial */
  trial: boolean;
  /** State generation the call was admitted under */
  generation: number;
}

/**
 * Outcome of the pre-call decision step.
 * - `proceed`: run the operation under `admission`.
 * - `reject`: fail fast, the operation must not run.
 */
export type CircuitDecision =
  | { action: "proceed"; admission: Admission; newState: CircuitBreakerState }
  | { action: "reject"; retryAfterMs: number };
