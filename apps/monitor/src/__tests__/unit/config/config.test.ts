import { describe, it, expect } from "vitest";
import { configSchema } from "@steadyline/config";

/**
 * Tests for config defaults and validation.
 * Every key has a default, so an empty environment must parse.
 */
describe("configSchema defaults", () => {
  it("should parse an empty environment", () => {
    const config = configSchema.parse({});

    expect(config).toEqual({
      NODE_ENV: "development",
      SERVICE_NAME: "steadyline-monitor",
      PORT: 6001,
      HOST: "0.0.0.0",
      CIRCUIT_FAILURE_THRESHOLD: 5,
      CIRCUIT_RECOVERY_TIMEOUT_MS: 60000,
      SLI_LATENCY_THRESHOLD_MS: 200,
      ERROR_BUDGET_CRITICAL_THRESHOLD: 0.5,
      METRICS_RETENTION_DAYS: undefined,
    });
  });

  describe("circuit breaker defaults", () => {
    it("should coerce numeric strings", () => {
      const config = configSchema.parse({
        CIRCUIT_FAILURE_THRESHOLD: "3",
        CIRCUIT_RECOVERY_TIMEOUT_MS: "15000",
      });

      expect(config.CIRCUIT_FAILURE_THRESHOLD).toBe(3);
      expect(config.CIRCUIT_RECOVERY_TIMEOUT_MS).toBe(15000);
    });

    it("should reject a zero failure threshold", () => {
      expect(() => configSchema.parse({ CIRCUIT_FAILURE_THRESHOLD: "0" })).toThrow();
    });

    it("should reject a fractional failure threshold", () => {
      expect(() => configSchema.parse({ CIRCUIT_FAILURE_THRESHOLD: "2.5" })).toThrow();
    });
  });

  describe("SLO settings", () => {
    it("should reject a critical threshold above 1", () => {
      expect(() => configSchema.parse({ ERROR_BUDGET_CRITICAL_THRESHOLD: "1.5" })).toThrow();
    });

    it("should treat an empty retention as unset", () => {
      const config = configSchema.parse({ METRICS_RETENTION_DAYS: "" });

      expect(config.METRICS_RETENTION_DAYS).toBeUndefined();
    });

    it("should parse a retention in days", () => {
      const config = configSchema.parse({ METRICS_RETENTION_DAYS: "90" });

      expect(config.METRICS_RETENTION_DAYS).toBe(90);
    });

    it("should reject a negative retention", () => {
      expect(() => configSchema.parse({ METRICS_RETENTION_DAYS: "-1" })).toThrow();
    });

    it("should pass the SLO file path through", () => {
      const config = configSchema.parse({ SLO_CONFIG_PATH: "/etc/slos.json" });

      expect(config.SLO_CONFIG_PATH).toBe("/etc/slos.json");
    });
  });

  it("should reject an unknown NODE_ENV", () => {
    expect(() => configSchema.parse({ NODE_ENV: "staging" })).toThrow();
  });
});
