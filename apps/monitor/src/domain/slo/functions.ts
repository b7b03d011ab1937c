/**
 * SLI pure functions.
 * Indicators are percentages in [0, 100]; an empty window is fully compliant.
 */

import type { RequestAggregate, SloStatus } from "./types.js";

/**
 * 2xx and 3xx count as success; everything else, including 1xx, is an error.
 */
export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400;
}

export function emptyAggregate(): RequestAggregate {
  return {
    totalRequests: 0,
    successfulRequests: 0,
    errorCount: 0,
    latencySamples: [],
  };
}

/**
 * Fold `source` into `target` in place.
 */
export function mergeAggregate(target: RequestAggregate, source: RequestAggregate): void {
  target.totalRequests += source.totalRequests;
  target.successfulRequests += source.successfulRequests;
  target.errorCount += source.errorCount;
  for (const sample of source.latencySamples) {
    target.latencySamples.push(sample);
  }
}

export function availabilityPercent(aggregate: RequestAggregate): number {
  if (aggregate.totalRequests === 0) {
    return 100;
  }
  return (aggregate.successfulRequests / aggregate.totalRequests) * 100;
}

export function errorRatePercent(aggregate: RequestAggregate): number {
  if (aggregate.totalRequests === 0) {
    return 100;
  }
  return ((aggregate.totalRequests - aggregate.errorCount) / aggregate.totalRequests) * 100;
}

/**
 * Share of samples strictly below `thresholdMs`, as a percentage.
 */
export function latencyCompliancePercent(samples: readonly number[], thresholdMs: number): number {
  if (samples.length === 0) {
    return 100;
  }
  let underThreshold = 0;
  for (const sample of samples) {
    if (sample < thresholdMs) {
      underThreshold++;
    }
  }
  return (underThreshold / samples.length) * 100;
}

export function sloStatus(sliValue: number, target: number): SloStatus {
  return sliValue >= target ? "PASS" : "FAIL";
}
