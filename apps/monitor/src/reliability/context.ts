/**
 * Reliability context.
 *
 * One explicitly constructed object holds the recorder, breaker registry,
 * evaluator, budgets and report for a process, all sharing one clock. Create it
 * at startup and pass it to whatever needs it; tests build their own.
 */

import { DEFAULT_SLO_DEFINITIONS, longestWindowDays } from "../domain/slo/index.js";
import type { SloDefinition } from "../domain/slo/index.js";
import { DAY_MS, SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { log } from "../logger.js";
import {
  CircuitBreaker,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_RECOVERY_TIMEOUT_MS,
  type CircuitBreakerOptions,
} from "./circuit-breaker.js";
import { CircuitBreakerRegistry } from "./circuit-breaker-registry.js";
import { DEFAULT_CRITICAL_THRESHOLD, ErrorBudgetTracker } from "./error-budget.js";
import { ReliabilityReport } from "./reliability-report.js";
import { DEFAULT_RETENTION_MS, RequestRecorder } from "./request-recorder.js";
import { SliEvaluator } from "./sli-evaluator.js";

export interface ReliabilityContextOptions {
  /** Objectives to evaluate; defaults to the built-in set */
  slos?: readonly SloDefinition[];
  timeProvider?: TimeProvider;
  /** Latency SLI threshold (ms) */
  latencyThresholdMs?: number;
  /** Fraction of budget below which an SLO is critical */
  criticalBudgetThreshold?: number;
  /** Bucket retention (ms); defaults to the longest SLO window */
  retentionMs?: number;
  /** Defaults applied by {@link ReliabilityContext.createBreaker} */
  breakerDefaults?: {
    failureThreshold?: number;
    recoveryTimeoutMs?: number;
  };
}

export interface ReliabilityContext {
  readonly timeProvider: TimeProvider;
  readonly slos: readonly SloDefinition[];
  readonly recorder: RequestRecorder;
  readonly registry: CircuitBreakerRegistry;
  readonly evaluator: SliEvaluator;
  readonly budgets: ErrorBudgetTracker;
  readonly report: ReliabilityReport;
  /**
   * Create a breaker on the context clock and register it. A taken name
   * returns the breaker already registered under it.
   */
  createBreaker(options: Omit<CircuitBreakerOptions, "timeProvider">): CircuitBreaker;
}

export function createReliabilityContext(options: ReliabilityContextOptions = {}): ReliabilityContext {
  const timeProvider = options.timeProvider ?? new SystemTimeProvider();
  const slos = options.slos ?? DEFAULT_SLO_DEFINITIONS;

  const longestWindowMs = longestWindowDays(slos) * DAY_MS;
  const retentionMs = options.retentionMs ?? (longestWindowMs > 0 ? longestWindowMs : DEFAULT_RETENTION_MS);

  const recorder = new RequestRecorder({ retentionMs, timeProvider });
  const registry = new CircuitBreakerRegistry(timeProvider);
  const evaluator = new SliEvaluator(recorder, { latencyThresholdMs: options.latencyThresholdMs });
  const budgets = new ErrorBudgetTracker(
    evaluator,
    slos,
    options.criticalBudgetThreshold ?? DEFAULT_CRITICAL_THRESHOLD
  );
  const report = new ReliabilityReport({ slos, budgets, registry, timeProvider });

  const failureThreshold = options.breakerDefaults?.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
  const recoveryTimeoutMs = options.breakerDefaults?.recoveryTimeoutMs ?? DEFAULT_RECOVERY_TIMEOUT_MS;

  return {
    timeProvider,
    slos,
    recorder,
    registry,
    evaluator,
    budgets,
    report,
    createBreaker(breakerOptions) {
      const existing = registry.get(breakerOptions.name);
      if (existing) {
        log.breaker.warn({ breaker: breakerOptions.name }, "breaker name already registered, keeping the first");
        return existing;
      }

      const breaker = new CircuitBreaker({
        failureThreshold,
        recoveryTimeoutMs,
        ...breakerOptions,
        timeProvider,
      });
      return registry.register(breaker);
    },
  };
}
