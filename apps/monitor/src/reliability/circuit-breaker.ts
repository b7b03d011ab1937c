import {
  checkCircuit,
  createInitialState,
  isCurrent,
  isStuckOpen,
  recordFailure,
  recordSuccess,
  releaseTrial,
  toSnapshot,
} from "../domain/circuit-breaker/index.js";
import type {
  Admission,
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
  CircuitBreakerState,
  CircuitState,
} from "../domain/circuit-breaker/index.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { log } from "../logger.js";
import {
  CIRCUIT_STATE_VALUES,
  circuitBreakerFailuresTotal,
  circuitBreakerRejectionsTotal,
  circuitBreakerState,
} from "../metrics.js";
import { CircuitOpenError } from "./errors.js";

export interface CircuitBreakerOptions {
  /** Unique name, used in logs, metrics and the registry */
  name: string;
  /** Failures before the circuit opens */
  failureThreshold?: number;
  /** Time after the last failure before a trial call is admitted (ms) */
  recoveryTimeoutMs?: number;
  /**
   * Which errors count against the breaker. Errors for which this returns
   * false are rethrown without touching the failure count.
   */
  isFailure?: (error: unknown) => boolean;
  timeProvider?: TimeProvider;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_RECOVERY_TIMEOUT_MS = 60_000;

const countEveryError = (): boolean => true;

/**
 * Fault-isolation state machine guarding one risky operation.
 *
 * CLOSED runs calls directly. After `failureThreshold` consecutive failures the
 * circuit opens and rejects calls with {@link CircuitOpenError} until
 * `recoveryTimeoutMs` has passed since the last failure; the next call is then
 * run as a single HALF_OPEN trial that either closes or re-opens the circuit.
 *
 * Every read-modify-write of the state happens synchronously, so the decision
 * step cannot interleave with another caller's. A call that settles after the
 * circuit has changed state leaves it untouched.
 */
export class CircuitBreaker {
  readonly name: string;
  private readonly config: CircuitBreakerConfig;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly time: TimeProvider;
  private state: CircuitBreakerState = createInitialState();

  constructor(options: CircuitBreakerOptions) {
    const failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    const recoveryTimeoutMs = options.recoveryTimeoutMs ?? DEFAULT_RECOVERY_TIMEOUT_MS;

    if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be a positive integer, got ${failureThreshold}`);
    }
    if (!(recoveryTimeoutMs > 0)) {
      throw new RangeError(`recoveryTimeoutMs must be positive, got ${recoveryTimeoutMs}`);
    }

    this.name = options.name;
    this.config = { failureThreshold, recoveryTimeoutMs };
    this.isFailure = options.isFailure ?? countEveryError;
    this.time = options.timeProvider ?? new SystemTimeProvider();

    circuitBreakerState.set({ breaker: this.name }, CIRCUIT_STATE_VALUES.CLOSED);
    log.breaker.info({ breaker: this.name, failureThreshold, recoveryTimeoutMs }, "initialized");
  }

  /**
   * Run `operation` under breaker protection.
   *
   * @returns The operation's result
   * @throws CircuitOpenError when the call is rejected; the operation's own error otherwise
   */
  async call<T>(operation: () => T | Promise<T>): Promise<T> {
    const admission = this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.onError(error, admission);
      throw error;
    }

    this.transition(recordSuccess(this.state, admission));
    return result;
  }

  /**
   * Read-only snapshot for reporting. Never changes state, even when the
   * recovery timeout has already elapsed.
   */
  getState(): CircuitBreakerSnapshot {
    return toSnapshot(this.name, this.state, this.config);
  }

  get currentState(): CircuitState {
    return this.state.state;
  }

  /** Open for more than twice the recovery timeout since the last failure */
  isStuckOpen(now: number = this.time.now()): boolean {
    return isStuckOpen(this.state, this.config, now);
  }

  /**
   * Decision step: check state, maybe move to HALF_OPEN, claim the trial slot.
   *
   * @returns the ticket the call settles with
   */
  private admit(): Admission {
    const decision = checkCircuit(this.state, this.config, this.time.now());

    if (decision.action === "reject") {
      circuitBreakerRejectionsTotal.inc({ breaker: this.name });
      log.breaker.debug(
        { breaker: this.name, retryAfterMs: decision.retryAfterMs },
        "call rejected"
      );
      throw new CircuitOpenError(this.name, decision.retryAfterMs);
    }

    this.transition(decision.newState);
    return decision.admission;
  }

  private onError(error: unknown, admission: Admission): void {
    if (!this.isFailure(error)) {
      this.transition(releaseTrial(this.state, admission));
      return;
    }

    // Admitted before the last state change
    if (!isCurrent(this.state, admission)) {
      log.breaker.debug({ breaker: this.name, state: this.state.state }, "ignoring stale failure");
      return;
    }

    circuitBreakerFailuresTotal.inc({ breaker: this.name });
    this.transition(recordFailure(this.state, this.config, this.time.now(), admission));
  }

  private transition(next: CircuitBreakerState): void {
    const previous = this.state.state;
    this.state = next;

    if (previous === next.state) {
      return;
    }

    circuitBreakerState.set({ breaker: this.name }, CIRCUIT_STATE_VALUES[next.state]);

    if (next.state === "OPEN") {
      log.breaker.warn(
        { breaker: this.name, failures: next.failureCount, from: previous },
        "opened"
      );
    } else if (next.state === "HALF_OPEN") {
      log.breaker.info({ breaker: this.name }, "half-open, running trial call");
    } else {
      log.breaker.info({ breaker: this.name, from: previous }, "closed");
    }
  }
}
