/**
 * Circuit Breaker Registry
 *
 * Read-side aggregation over every live breaker, for the status endpoints and
 * the reliability report. Breakers are owned by whatever guards the call; the
 * registry only keeps references.
 */

import type { CircuitBreakerSnapshot } from "../domain/circuit-breaker/index.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { log } from "../logger.js";
import type { CircuitBreaker } from "./circuit-breaker.js";

export interface CircuitBreakerSummary {
  total: number;
  open: number;
  critical: number;
}

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly time: TimeProvider;

  constructor(timeProvider: TimeProvider = new SystemTimeProvider()) {
    this.time = timeProvider;
  }

  /**
   * Track a breaker. Entries are never replaced: registering a taken name
   * keeps the first breaker and returns it.
   */
  register(breaker: CircuitBreaker): CircuitBreaker {
    const existing = this.breakers.get(breaker.name);
    if (existing) {
      if (existing !== breaker) {
        log.breaker.warn({ breaker: breaker.name }, "breaker name already registered, keeping the first");
      }
      return existing;
    }
    this.breakers.set(breaker.name, breaker);
    return breaker;
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  get size(): number {
    return this.breakers.size;
  }

  snapshotAll(): Record<string, CircuitBreakerSnapshot> {
    const snapshots: Record<string, CircuitBreakerSnapshot> = {};
    for (const [name, breaker] of this.breakers) {
      snapshots[name] = breaker.getState();
    }
    return snapshots;
  }

  listOpen(): string[] {
    const open: string[] = [];
    for (const [name, breaker] of this.breakers) {
      if (breaker.currentState === "OPEN") {
        open.push(name);
      }
    }
    return open;
  }

  /** Breakers stuck open for more than twice their recovery timeout */
  listCritical(now: number = this.time.now()): string[] {
    const critical: string[] = [];
    for (const [name, breaker] of this.breakers) {
      if (breaker.isStuckOpen(now)) {
        critical.push(name);
      }
    }
    return critical;
  }

  summary(now: number = this.time.now()): CircuitBreakerSummary {
    return {
      total: this.breakers.size,
      open: this.listOpen().length,
      critical: this.listCritical(now).length,
    };
  }
}
