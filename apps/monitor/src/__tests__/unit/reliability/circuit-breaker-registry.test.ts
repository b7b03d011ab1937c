import { describe, it, expect, beforeEach } from "vitest";
import { MockTimeProvider } from "../../../domain/utils/time.js";
import { CircuitBreaker } from "../../../reliability/circuit-breaker.js";
import { CircuitBreakerRegistry } from "../../../reliability/circuit-breaker-registry.js";

async function trip(breaker: CircuitBreaker): Promise<void> {
  await expect(breaker.call(() => Promise.reject(new Error("down")))).rejects.toThrow("down");
}

describe("CircuitBreakerRegistry", () => {
  let time: MockTimeProvider;
  let registry: CircuitBreakerRegistry;
  let database: CircuitBreaker;
  let payments: CircuitBreaker;

  beforeEach(() => {
    time = new MockTimeProvider(0);
    registry = new CircuitBreakerRegistry(time);
    database = registry.register(
      new CircuitBreaker({ name: "database", failureThreshold: 1, recoveryTimeoutMs: 60000, timeProvider: time })
    );
    payments = registry.register(
      new CircuitBreaker({ name: "payments", failureThreshold: 1, recoveryTimeoutMs: 10000, timeProvider: time })
    );
  });

  it("should look breakers up by name", () => {
    expect(registry.get("database")).toBe(database);
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.size).toBe(2);
  });

  it("should keep the first entry registered under a name", () => {
    const duplicate = new CircuitBreaker({ name: "database", timeProvider: time });

    const registered = registry.register(duplicate);

    expect(registered).toBe(database);
    expect(registry.get("database")).toBe(database);
    expect(registry.size).toBe(2);
  });

  it("should snapshot every breaker by name", async () => {
    await trip(payments);

    const snapshots = registry.snapshotAll();

    expect(Object.keys(snapshots)).toEqual(["database", "payments"]);
    expect(snapshots.database?.state).toBe("CLOSED");
    expect(snapshots.payments).toEqual({
      name: "payments",
      state: "OPEN",
      failureCount: 1,
      lastFailureTimestamp: 0,
      threshold: 1,
      timeout: 10000,
    });
  });

  it("should list open breakers", async () => {
    expect(registry.listOpen()).toEqual([]);

    await trip(payments);

    expect(registry.listOpen()).toEqual(["payments"]);
  });

  it("should list breakers stuck open past twice their timeout", async () => {
    await trip(database);
    await trip(payments);

    expect(registry.listCritical(20000)).toEqual([]);
    expect(registry.listCritical(20001)).toEqual(["payments"]);
    expect(registry.listCritical(120001)).toEqual(["database", "payments"]);
  });

  it("should summarise totals using the registry clock", async () => {
    await trip(payments);
    time.setTime(25000);

    expect(registry.summary()).toEqual({ total: 2, open: 1, critical: 1 });
  });
});
