import { describe, it, expect } from "vitest";
import {
  CircuitOpenError,
  MockTimeProvider,
  callWithFallback,
  createReliabilityContext,
} from "../../../reliability/index.js";

describe("reliability public API", () => {
  it("should guard a dependency, degrade and recover through one context", async () => {
    const time = new MockTimeProvider(Date.UTC(2024, 0, 15, 10, 30));
    const ctx = createReliabilityContext({ timeProvider: time });
    const database = ctx.createBreaker({ name: "database", failureThreshold: 3, recoveryTimeoutMs: 60000 });
    const listUsers = (healthy: boolean): Promise<string[]> => (healthy ? Promise.resolve(["alice"]) : Promise.reject(new Error("down")));

    for (let i = 0; i < 3; i++) {
      await expect(database.call(() => listUsers(false))).rejects.toThrow("down");
    }
    expect(ctx.report.evaluate().overallStatus).toBe("DEGRADED");

    time.advanceBy(30000);
    const served = await callWithFallback(database, () => listUsers(true), (error: CircuitOpenError) => ({
      fallback: true,
      retryAfterMs: error.retryAfterMs,
    }));
    expect(served).toEqual({ fallback: true, retryAfterMs: 30000 });

    time.advanceBy(31000);
    await expect(database.call(() => listUsers(true))).resolves.toEqual(["alice"]);

    expect(database.getState()).toMatchObject({ state: "CLOSED", failureCount: 0 });
    expect(ctx.report.evaluate().overallStatus).toBe("HEALTHY");
  });
});
