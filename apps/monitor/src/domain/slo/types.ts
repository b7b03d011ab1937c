/**
 * SLI / SLO types.
 */

/** Aggregate scope that every recorded request is also counted under */
export const ALL_SCOPE = "all";

export const SLI_NAMES = ["availability", "latency", "error_rate", "freshness"] as const;

export type SliName = (typeof SLI_NAMES)[number];

export type SloStatus = "PASS" | "FAIL";

export type OverallStatus = "HEALTHY" | "DEGRADED" | "CRITICAL";

export interface SloDefinition {
  /** Unique key, e.g. "availability" or "latency_p95" */
  readonly name: string;
  /** Which indicator the objective is measured against */
  readonly sliName: SliName;
  /** Target percentage, 0-100 */
  readonly target: number;
  /** Evaluation window */
  readonly windowDays: number;
  readonly description: string;
}

/** Totals for one scope over some time range */
export interface RequestAggregate {
  totalRequests: number;
  successfulRequests: number;
  errorCount: number;
  /** Latencies in ms, in recording order */
  latencySamples: number[];
}

/** One hour of request outcomes for one scope */
export interface MetricBucket extends RequestAggregate {
  scope: string;
  /** Start of the UTC hour, epoch ms */
  hourStart: number;
}
