import { SLO_RECOMMENDATIONS } from "../domain/slo/index.js";
import type { OverallStatus, SloDefinition, SloStatus } from "../domain/slo/index.js";
import { DAY_MS, SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { log } from "../logger.js";
import { sloErrorBudgetRemaining, sloSliValue } from "../metrics.js";
import type { CircuitBreakerRegistry } from "./circuit-breaker-registry.js";
import type { ErrorBudgetTracker } from "./error-budget.js";

export interface SloResult {
  target: number;
  sliValue: number;
  status: SloStatus;
  budgetConsumedThisCall: number;
  budgetRemaining: number;
  isCritical: boolean;
  windowDays: number;
}

/**
 * Wire contract of the dashboard endpoint. Consumers depend on these fields;
 * add to it, don't rename.
 */
export interface ReliabilityReportPayload {
  /** Evaluation time, ISO 8601 */
  timestamp: string;
  overallStatus: OverallStatus;
  slos: Record<string, SloResult>;
  alerts: string[];
  recommendations: string[];
  circuitBreakers: {
    total: number;
    open: string[];
    critical: string[];
  };
}

export interface ReliabilityReportDeps {
  slos: readonly SloDefinition[];
  budgets: ErrorBudgetTracker;
  registry: CircuitBreakerRegistry;
  timeProvider?: TimeProvider;
}

export function sloAlerts(name: string, result: SloResult): string[] {
  const alerts: string[] = [];
  if (result.status === "FAIL") {
    alerts.push(
      `SLO VIOLATION: ${name} - ${result.sliValue.toFixed(2)}% < ${result.target.toFixed(2)}%`
    );
  }
  if (result.isCritical) {
    alerts.push(`ERROR BUDGET CRITICAL: ${name} - ${result.budgetRemaining.toFixed(2)}% remaining`);
  }
  return alerts;
}

/**
 * CRITICAL beats DEGRADED beats HEALTHY.
 */
export function deriveOverallStatus(
  results: readonly SloResult[],
  openBreakers: number,
  criticalBreakers: number
): OverallStatus {
  if (criticalBreakers > 0 || results.some((r) => r.isCritical)) {
    return "CRITICAL";
  }
  if (openBreakers > 0 || results.some((r) => r.status === "FAIL")) {
    return "DEGRADED";
  }
  return "HEALTHY";
}

/**
 * Dashboard aggregator: runs every SLO through its error budget and combines
 * the verdicts with breaker health.
 *
 * Each `evaluate` charges the budgets, so repeated evaluations of a failing
 * window keep consuming.
 */
export class ReliabilityReport {
  private readonly slos: readonly SloDefinition[];
  private readonly budgets: ErrorBudgetTracker;
  private readonly registry: CircuitBreakerRegistry;
  private readonly time: TimeProvider;

  constructor(deps: ReliabilityReportDeps) {
    this.slos = deps.slos;
    this.budgets = deps.budgets;
    this.registry = deps.registry;
    this.time = deps.timeProvider ?? new SystemTimeProvider();
  }

  evaluate(now: number = this.time.now()): ReliabilityReportPayload {
    const slos: Record<string, SloResult> = {};
    const alerts: string[] = [];
    const recommendations: string[] = [];

    for (const slo of this.slos) {
      const evaluation = this.budgets.evaluate(slo, now - slo.windowDays * DAY_MS, now);
      const result: SloResult = {
        target: slo.target,
        windowDays: slo.windowDays,
        ...evaluation,
      };
      slos[slo.name] = result;
      alerts.push(...sloAlerts(slo.name, result));

      const recommendation = SLO_RECOMMENDATIONS[slo.name];
      if (result.status === "FAIL" && recommendation !== undefined) {
        recommendations.push(recommendation);
      }

      sloSliValue.set({ slo: slo.name }, result.sliValue);
      sloErrorBudgetRemaining.set({ slo: slo.name }, result.budgetRemaining);
    }

    const open = this.registry.listOpen();
    const critical = this.registry.listCritical(now);
    const overallStatus = deriveOverallStatus(Object.values(slos), open.length, critical.length);

    if (overallStatus === "HEALTHY") {
      log.report.debug({ slos: this.slos.length }, "reliability healthy");
    } else {
      log.report.warn(
        { overallStatus, alerts: alerts.length, openBreakers: open, criticalBreakers: critical },
        "reliability degraded"
      );
    }

    return {
      timestamp: new Date(now).toISOString(),
      overallStatus,
      slos,
      alerts,
      recommendations,
      circuitBreakers: {
        total: this.registry.size,
        open,
        critical,
      },
    };
  }
}
