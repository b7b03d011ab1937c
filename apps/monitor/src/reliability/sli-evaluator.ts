import {
  ALL_SCOPE,
  availabilityPercent,
  errorRatePercent,
  latencyCompliancePercent,
} from "../domain/slo/index.js";
import type { SliName } from "../domain/slo/index.js";
import type { RequestRecorder } from "./request-recorder.js";

export interface SliEvaluatorOptions {
  /** Requests strictly faster than this count as compliant (ms) */
  latencyThresholdMs?: number;
}

export const DEFAULT_LATENCY_THRESHOLD_MS = 200;

/**
 * Placeholder freshness indicator. There is no staleness instrumentation yet,
 * so the value is fixed.
 */
export const FRESHNESS_SLI = 99.5;

/**
 * Computes Service Level Indicators over a time window from recorder data.
 * All indicators are percentages; a window without traffic scores 100.
 */
export class SliEvaluator {
  readonly latencyThresholdMs: number;

  constructor(
    private readonly recorder: RequestRecorder,
    options: SliEvaluatorOptions = {}
  ) {
    this.latencyThresholdMs = options.latencyThresholdMs ?? DEFAULT_LATENCY_THRESHOLD_MS;
  }

  /** successful / total x 100 */
  availability(startTime: number, endTime: number, scope: string = ALL_SCOPE): number {
    return availabilityPercent(this.recorder.aggregate(scope, startTime, endTime));
  }

  /** Share of requests under the latency threshold */
  latency(startTime: number, endTime: number, scope: string = ALL_SCOPE): number {
    const { latencySamples } = this.recorder.aggregate(scope, startTime, endTime);
    return latencyCompliancePercent(latencySamples, this.latencyThresholdMs);
  }

  /** (total - errors) / total x 100 */
  errorRate(startTime: number, endTime: number, scope: string = ALL_SCOPE): number {
    return errorRatePercent(this.recorder.aggregate(scope, startTime, endTime));
  }

  freshness(): number {
    return FRESHNESS_SLI;
  }

  evaluate(sliName: SliName, startTime: number, endTime: number, scope: string = ALL_SCOPE): number {
    switch (sliName) {
      case "availability":
        return this.availability(startTime, endTime, scope);
      case "latency":
        return this.latency(startTime, endTime, scope);
      case "error_rate":
        return this.errorRate(startTime, endTime, scope);
      case "freshness":
        return this.freshness();
    }
  }
}
