import { describe, it, expect } from "vitest";
import { DEFAULT_SLO_DEFINITIONS, createSloDefinition } from "../../../domain/slo/index.js";
import { DAY_MS, MockTimeProvider } from "../../../domain/utils/time.js";
import { createReliabilityContext } from "../../../reliability/context.js";

describe("createReliabilityContext", () => {
  it("should use the built-in SLO set by default", () => {
    const ctx = createReliabilityContext();

    expect(ctx.slos).toBe(DEFAULT_SLO_DEFINITIONS);
    expect(ctx.evaluator.latencyThresholdMs).toBe(200);
  });

  it("should retain buckets for the longest SLO window", () => {
    const slos = [
      createSloDefinition({ name: "weekly", sliName: "availability", target: 99, windowDays: 7 }),
      createSloDefinition({ name: "quarterly", sliName: "availability", target: 99, windowDays: 90 }),
    ];

    const ctx = createReliabilityContext({ slos });

    expect(ctx.recorder.retentionMs).toBe(90 * DAY_MS);
  });

  it("should prefer an explicit retention", () => {
    const ctx = createReliabilityContext({ retentionMs: DAY_MS });

    expect(ctx.recorder.retentionMs).toBe(DAY_MS);
  });

  it("should create breakers on the shared clock with configured defaults", async () => {
    const time = new MockTimeProvider(5000);
    const ctx = createReliabilityContext({
      timeProvider: time,
      breakerDefaults: { failureThreshold: 2, recoveryTimeoutMs: 30000 },
    });

    const breaker = ctx.createBreaker({ name: "inventory" });
    await expect(breaker.call(() => Promise.reject(new Error("down")))).rejects.toThrow("down");

    expect(ctx.registry.get("inventory")).toBe(breaker);
    expect(breaker.getState()).toMatchObject({ threshold: 2, timeout: 30000, lastFailureTimestamp: 5000 });
  });

  it("should let per-breaker options override the defaults", () => {
    const ctx = createReliabilityContext({ breakerDefaults: { failureThreshold: 2 } });

    const breaker = ctx.createBreaker({ name: "ledger", failureThreshold: 10 });

    expect(breaker.getState().threshold).toBe(10);
  });

  it("should hand back the registered breaker for a taken name without resetting it", async () => {
    const ctx = createReliabilityContext({ timeProvider: new MockTimeProvider(0) });
    const first = ctx.createBreaker({ name: "ledger", failureThreshold: 1 });
    await expect(first.call(() => Promise.reject(new Error("down")))).rejects.toThrow("down");

    const second = ctx.createBreaker({ name: "ledger", failureThreshold: 10 });

    expect(second).toBe(first);
    expect(ctx.registry.size).toBe(1);
    expect(second.getState()).toMatchObject({ state: "OPEN", threshold: 1 });
  });

  it("should keep separate contexts independent", () => {
    const first = createReliabilityContext();
    const second = createReliabilityContext();

    first.createBreaker({ name: "shared-name" });
    first.recorder.record("/api", 200, 10);

    expect(second.registry.size).toBe(0);
    expect(second.recorder.bucketCount()).toBe(0);
  });
});
