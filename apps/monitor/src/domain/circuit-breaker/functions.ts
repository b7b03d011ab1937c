/**
 * Circuit breaker pure functions.
 * All state transitions are pure - no side effects.
 */

import type {
  Admission,
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
  CircuitBreakerState,
  CircuitDecision,
} from "./types.js";

/** Multiple of the recovery timeout after which an open circuit counts as stuck */
export const STUCK_OPEN_FACTOR = 2;

/**
 * Create initial circuit breaker state.
 */
export function createInitialState(): CircuitBreakerState {
  return {
    state: "CLOSED",
    failureCount: 0,
    lastFailureTime: null,
    trialInFlight: false,
    generation: 0,
  };
}

/**
 * Whether the recovery timeout has elapsed since the last failure.
 * An open circuit with no recorded failure is always eligible.
 */
export function recoveryElapsed(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): boolean {
  if (state.lastFailureTime === null) {
    return true;
  }
  return now - state.lastFailureTime >= config.recoveryTimeoutMs;
}

/**
 * Whether a call's outcome still applies: the circuit has not changed state
 * since the call was admitted.
 */
export function isCurrent(state: CircuitBreakerState, admission: Admission): boolean {
  return state.generation === admission.generation;
}

/**
 * Decide whether a call may proceed.
 *
 * OPEN moves to HALF_OPEN once the recovery timeout has elapsed and the caller
 * that observes it becomes the trial. Only one trial runs at a time: further
 * attempts while it is in flight are rejected.
 *
 * @param state - Current circuit state
 * @param config - Circuit breaker configuration
 * @param now - Current timestamp
 * @returns The decision, with the state to store when the call proceeds
 */
export function checkCircuit(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): CircuitDecision {
  if (state.state === "CLOSED") {
    return {
      action: "proceed",
      admission: { trial: false, generation: state.generation },
      newState: state,
    };
  }

  if (state.state === "HALF_OPEN") {
    if (state.trialInFlight) {
      return { action: "reject", retryAfterMs: 0 };
    }
    return {
      action: "proceed",
      admission: { trial: true, generation: state.generation },
      newState: { ...state, trialInFlight: true },
    };
  }

  // State is open - check if we should transition to half-open
  if (recoveryElapsed(state, config, now)) {
    const generation = state.generation + 1;
    return {
      action: "proceed",
      admission: { trial: true, generation },
      newState: { ...state, state: "HALF_OPEN", trialInFlight: true, generation },
    };
  }

  const elapsed = state.lastFailureTime === null ? 0 : now - state.lastFailureTime;
  return { action: "reject", retryAfterMs: Math.max(0, config.recoveryTimeoutMs - elapsed) };
}

/**
 * Record a successful operation.
 *
 * Outcomes from an older generation are dropped: a slow call admitted while
 * CLOSED cannot reset the count of a circuit that has since opened. Only the
 * trial closes a HALF_OPEN circuit.
 *
 * @param state - Current circuit state
 * @param admission - Ticket the finished call was admitted with
 * @returns New circuit state after success
 */
export function recordSuccess(state: CircuitBreakerState, admission: Admission): CircuitBreakerState {
  if (!isCurrent(state, admission)) {
    return state;
  }

  if (admission.trial) {
    return {
      ...state,
      state: "CLOSED",
      failureCount: 0,
      trialInFlight: false,
      generation: state.generation + 1,
    };
  }

  return { ...state, failureCount: 0 };
}

/**
 * Record a failed operation.
 *
 * A failed trial always re-opens the circuit and restarts the recovery timer.
 * Outcomes from an older generation are dropped.
 *
 * @param state - Current circuit state
 * @param config - Circuit breaker configuration
 * @param now - Current timestamp
 * @param admission - Ticket the finished call was admitted with
 * @returns New circuit state after failure
 */
export function recordFailure(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number,
  admission: Admission
): CircuitBreakerState {
  if (!isCurrent(state, admission)) {
    return state;
  }

  const failureCount = state.failureCount + 1;
  const opens = admission.trial || failureCount >= config.failureThreshold;

  return {
    state: opens ? "OPEN" : state.state,
    failureCount,
    lastFailureTime: now,
    trialInFlight: admission.trial ? false : state.trialInFlight,
    generation: opens ? state.generation + 1 : state.generation,
  };
}

/**
 * Release the trial slot without touching counters.
 * Used when the trial ends in an error the breaker does not count.
 */
export function releaseTrial(state: CircuitBreakerState, admission: Admission): CircuitBreakerState {
  if (!admission.trial || !isCurrent(state, admission)) {
    return state;
  }
  return { ...state, trialInFlight: false };
}

/**
 * Open for longer than {@link STUCK_OPEN_FACTOR} recovery timeouts since the last failure.
 */
export function isStuckOpen(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): boolean {
  if (state.state !== "OPEN" || state.lastFailureTime === null) {
    return false;
  }
  return now - state.lastFailureTime > config.recoveryTimeoutMs * STUCK_OPEN_FACTOR;
}

/**
 * Build the reporting snapshot for a breaker.
 */
export function toSnapshot(
  name: string,
  state: CircuitBreakerState,
  config: CircuitBreakerConfig
): CircuitBreakerSnapshot {
  return {
    name,
    state: state.state,
    failureCount: state.failureCount,
    lastFailureTimestamp: state.lastFailureTime,
    threshold: config.failureThreshold,
    timeout: config.recoveryTimeoutMs,
  };
}
