/**
 * Reliability engine public API.
 */

export { createReliabilityContext } from "./context.js";
export type { ReliabilityContext, ReliabilityContextOptions } from "./context.js";

export {
  CircuitBreaker,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_RECOVERY_TIMEOUT_MS,
} from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";
export { CircuitBreakerRegistry } from "./circuit-breaker-registry.js";
export type { CircuitBreakerSummary } from "./circuit-breaker-registry.js";
export { callWithFallback } from "./fallback.js";

export { RequestRecorder, DEFAULT_RETENTION_MS } from "./request-recorder.js";
export type { RequestRecorderOptions } from "./request-recorder.js";
export { SliEvaluator, DEFAULT_LATENCY_THRESHOLD_MS, FRESHNESS_SLI } from "./sli-evaluator.js";
export type { SliEvaluatorOptions } from "./sli-evaluator.js";
export { ErrorBudget, ErrorBudgetTracker, DEFAULT_CRITICAL_THRESHOLD } from "./error-budget.js";
export type { BudgetEvaluation } from "./error-budget.js";
export { ReliabilityReport, deriveOverallStatus, sloAlerts } from "./reliability-report.js";
export type { ReliabilityReportPayload, SloResult } from "./reliability-report.js";
export { loadSloDefinitions, parseSloDefinitions, sloDefinitionSchema } from "./slo-config.js";

export { CircuitOpenError, SloConfigError } from "./errors.js";

export {
  ALL_SCOPE,
  DEFAULT_SLO_DEFINITIONS,
  SLI_NAMES,
  SLO_RECOMMENDATIONS,
  createSloDefinition,
  MockTimeProvider,
  SystemTimeProvider,
} from "../domain/index.js";
export type {
  CircuitBreakerSnapshot,
  CircuitState,
  MetricBucket,
  OverallStatus,
  RequestAggregate,
  SliName,
  SloDefinition,
  SloStatus,
  TimeProvider,
} from "../domain/index.js";
