import {
  ALL_SCOPE,
  emptyAggregate,
  isSuccessStatus,
  mergeAggregate,
} from "../domain/slo/index.js";
import type { MetricBucket, RequestAggregate } from "../domain/slo/index.js";
import { DAY_MS, SystemTimeProvider, hourStart, type TimeProvider } from "../domain/utils/time.js";
import { log } from "../logger.js";
import { requestsRecordedTotal } from "../metrics.js";

export interface RequestRecorderOptions {
  /** How long hourly buckets are kept (ms). Defaults to 30 days. */
  retentionMs?: number;
  timeProvider?: TimeProvider;
}

export const DEFAULT_RETENTION_MS = 30 * DAY_MS;

/**
 * Folds request outcomes into hourly buckets, per endpoint and under the
 * aggregate "all" scope.
 *
 * Buckets older than the retention window are evicted lazily: the first
 * `record` call in a new hour drops everything before `now - retention`.
 */
export class RequestRecorder {
  /** scope -> hour start -> bucket */
  private readonly buckets = new Map<string, Map<number, MetricBucket>>();
  private readonly time: TimeProvider;
  readonly retentionMs: number;
  private lastPruneHour: number | null = null;

  constructor(options: RequestRecorderOptions = {}) {
    this.time = options.timeProvider ?? new SystemTimeProvider();
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
  }

  /**
   * Record one completed request. Never throws; odd inputs such as negative
   * latencies are stored as given.
   */
  record(
    endpoint: string,
    statusCode: number,
    latencyMs: number,
    timestamp: number = this.time.now()
  ): void {
    const hour = hourStart(timestamp);
    const success = isSuccessStatus(statusCode);

    this.addToBucket(endpoint, hour, success, latencyMs);
    if (endpoint !== ALL_SCOPE) {
      this.addToBucket(ALL_SCOPE, hour, success, latencyMs);
    }

    requestsRecordedTotal.inc({ outcome: success ? "success" : "error" });

    const currentHour = hourStart(this.time.now());
    if (this.lastPruneHour !== currentHour) {
      this.lastPruneHour = currentHour;
      this.prune();
    }
  }

  /**
   * Sum every bucket of `scope` whose hour lies between the hour containing
   * `startTime` and the hour containing `endTime`, inclusive.
   */
  aggregate(scope: string, startTime: number, endTime: number): RequestAggregate {
    const result = emptyAggregate();
    const scoped = this.buckets.get(scope);
    if (!scoped) {
      return result;
    }

    const first = hourStart(startTime);
    const last = hourStart(endTime);
    const hours = [...scoped.keys()].filter((hour) => hour >= first && hour <= last).sort((a, b) => a - b);

    for (const hour of hours) {
      const bucket = scoped.get(hour);
      if (bucket) {
        mergeAggregate(result, bucket);
      }
    }
    return result;
  }

  /**
   * Drop buckets that start before the hour containing `now - retentionMs`.
   *
   * @returns number of buckets evicted
   */
  prune(now: number = this.time.now()): number {
    const cutoff = hourStart(now - this.retentionMs);
    let evicted = 0;

    for (const [scope, scoped] of this.buckets) {
      for (const hour of scoped.keys()) {
        if (hour < cutoff) {
          scoped.delete(hour);
          evicted++;
        }
      }
      if (scoped.size === 0) {
        this.buckets.delete(scope);
      }
    }

    if (evicted > 0) {
      log.slo.debug({ evicted, cutoff: new Date(cutoff).toISOString() }, "pruned request buckets");
    }
    return evicted;
  }

  /** Copies of the buckets held for `scope`, oldest first */
  bucketsFor(scope: string): MetricBucket[] {
    const scoped = this.buckets.get(scope);
    if (!scoped) {
      return [];
    }
    return [...scoped.values()]
      .sort((a, b) => a.hourStart - b.hourStart)
      .map((bucket) => ({ ...bucket, latencySamples: [...bucket.latencySamples] }));
  }

  scopes(): string[] {
    return [...this.buckets.keys()];
  }

  bucketCount(): number {
    let count = 0;
    for (const scoped of this.buckets.values()) {
      count += scoped.size;
    }
    return count;
  }

  private addToBucket(scope: string, hour: number, success: boolean, latencyMs: number): void {
    let scoped = this.buckets.get(scope);
    if (!scoped) {
      scoped = new Map();
      this.buckets.set(scope, scoped);
    }

    let bucket = scoped.get(hour);
    if (!bucket) {
      bucket = { scope, hourStart: hour, ...emptyAggregate() };
      scoped.set(hour, bucket);
    }

    bucket.totalRequests++;
    if (success) {
      bucket.successfulRequests++;
    } else {
      bucket.errorCount++;
    }
    bucket.latencySamples.push(latencyMs);
  }
}
