import { describe, it, expect, vi, beforeEach } from "vitest";
import { MockTimeProvider } from "../../../domain/utils/time.js";
import { CircuitBreaker } from "../../../reliability/circuit-breaker.js";
import { CircuitOpenError } from "../../../reliability/errors.js";
import { callWithFallback } from "../../../reliability/fallback.js";

describe("callWithFallback", () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    breaker = new CircuitBreaker({
      name: "user-service",
      failureThreshold: 1,
      recoveryTimeoutMs: 60000,
      timeProvider: new MockTimeProvider(0),
    });
  });

  it("should return the operation result while the circuit is closed", async () => {
    const fallback = vi.fn(() => []);

    await expect(callWithFallback(breaker, async () => ["alice"], fallback)).resolves.toEqual(["alice"]);
    expect(fallback).not.toHaveBeenCalled();
  });

  it("should propagate the operation's own error", async () => {
    await expect(
      callWithFallback(breaker, () => Promise.reject(new Error("query failed")), () => [])
    ).rejects.toThrow("query failed");
  });

  it("should serve the fallback when the circuit rejects the call", async () => {
    await expect(breaker.call(() => Promise.reject(new Error("down")))).rejects.toThrow("down");
    const operation = vi.fn(async () => ["alice"]);
    const fallback = vi.fn((error: CircuitOpenError) => ({
      users: [],
      error: "Database temporarily unavailable",
      retryAfterMs: error.retryAfterMs,
    }));

    const result = await callWithFallback(breaker, operation, fallback);

    expect(result).toEqual({ users: [], error: "Database temporarily unavailable", retryAfterMs: 60000 });
    expect(operation).not.toHaveBeenCalled();
    expect(fallback).toHaveBeenCalledTimes(1);
    expect(fallback.mock.calls[0]?.[0]).toBeInstanceOf(CircuitOpenError);
  });
});
