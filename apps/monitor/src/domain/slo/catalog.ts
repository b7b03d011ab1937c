/**
 * Built-in SLO set and the remediation hints attached to each objective.
 */

import type { SliName, SloDefinition } from "./types.js";

export interface SloDefinitionInput {
  name: string;
  sliName: SliName;
  target: number;
  windowDays: number;
  description?: string;
}

/**
 * Create an immutable SLO definition.
 */
export function createSloDefinition(input: SloDefinitionInput): SloDefinition {
  return Object.freeze({
    name: input.name,
    sliName: input.sliName,
    target: input.target,
    windowDays: input.windowDays,
    description: input.description ?? `${input.name}: ${input.target}% over ${input.windowDays} days`,
  });
}

export const DEFAULT_SLO_DEFINITIONS: readonly SloDefinition[] = Object.freeze([
  createSloDefinition({
    name: "availability",
    sliName: "availability",
    target: 99.9,
    windowDays: 30,
    description: "Availability: 99.9% of requests succeed over 30 days",
  }),
  createSloDefinition({
    name: "latency_p95",
    sliName: "latency",
    target: 95.0,
    windowDays: 30,
    description: "Latency: 95% of requests complete under the latency threshold over 30 days",
  }),
  createSloDefinition({
    name: "error_rate",
    sliName: "error_rate",
    target: 99.0,
    windowDays: 30,
    description: "Error rate: at most 1% of requests fail over 30 days",
  }),
  createSloDefinition({
    name: "freshness",
    sliName: "freshness",
    target: 99.5,
    windowDays: 7,
    description: "Data freshness: 99.5% of data queries return fresh data over 7 days",
  }),
]);

/** Keyed by SLO name; objectives outside this table get no recommendation */
export const SLO_RECOMMENDATIONS: Readonly<Record<string, string>> = Object.freeze({
  availability: "Investigate infrastructure issues and implement redundancy",
  latency_p95: "Optimize database queries and implement caching",
  error_rate: "Review error logs and implement better error handling",
  freshness: "Check database replication lag and query performance",
});

/**
 * Longest evaluation window across `definitions`, in days (0 when empty).
 */
export function longestWindowDays(definitions: readonly SloDefinition[]): number {
  return definitions.reduce((max, slo) => Math.max(max, slo.windowDays), 0);
}
