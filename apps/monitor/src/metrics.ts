import promClient from "prom-client";

// Initialize Prometheus default metrics (CPU, memory, etc.)
// Guard against multiple registrations (e.g., in test environments)
const globalFlags = globalThis as typeof globalThis & {
  __steadylineDefaultMetricsInitialized?: boolean;
};
if (!globalFlags.__steadylineDefaultMetricsInitialized) {
  promClient.collectDefaultMetrics({
    prefix: "steadyline_",
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
  globalFlags.__steadylineDefaultMetricsInitialized = true;
}

export const register = promClient.register;

// ============================================
// Circuit Breaker Metrics
// ============================================

/** Numeric encoding used by the circuit_breaker_state gauge */
export const CIRCUIT_STATE_VALUES = {
  CLOSED: 0,
  HALF_OPEN: 1,
  OPEN: 2,
} as const;

/**
 * Gauge: Current breaker state (0 closed, 1 half-open, 2 open)
 * Labels: breaker
 */
export const circuitBreakerState = new promClient.Gauge({
  name: "circuit_breaker_state",
  help: "Current circuit breaker state (0=closed, 1=half-open, 2=open)",
  labelNames: ["breaker"],
});

/**
 * Counter: Calls rejected without invoking the guarded operation
 * Labels: breaker
 */
export const circuitBreakerRejectionsTotal = new promClient.Counter({
  name: "circuit_breaker_rejections_total",
  help: "Total calls rejected because the circuit was open",
  labelNames: ["breaker"],
});

/**
 * Counter: Guarded operation failures counted against a breaker
 * Labels: breaker
 */
export const circuitBreakerFailuresTotal = new promClient.Counter({
  name: "circuit_breaker_failures_total",
  help: "Total guarded operation failures recorded by circuit breakers",
  labelNames: ["breaker"],
});

// ============================================
// Request / SLO Metrics
// ============================================

/**
 * Counter: Request outcomes folded into the recorder
 * Labels: outcome (success/error)
 */
export const requestsRecordedTotal = new promClient.Counter({
  name: "reliability_requests_recorded_total",
  help: "Total request outcomes recorded for SLI calculation",
  labelNames: ["outcome"],
});

/**
 * Gauge: Last evaluated SLI value (percent)
 * Labels: slo
 */
export const sloSliValue = new promClient.Gauge({
  name: "slo_sli_value",
  help: "Most recently evaluated SLI value in percent",
  labelNames: ["slo"],
});

/**
 * Gauge: Remaining error budget (percentage points)
 * Labels: slo
 */
export const sloErrorBudgetRemaining = new promClient.Gauge({
  name: "slo_error_budget_remaining",
  help: "Remaining error budget in percentage points",
  labelNames: ["slo"],
});
