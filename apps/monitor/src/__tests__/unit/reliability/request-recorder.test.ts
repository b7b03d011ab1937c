import { describe, it, expect, beforeEach } from "vitest";
import { HOUR_MS, MockTimeProvider } from "../../../domain/utils/time.js";
import { RequestRecorder } from "../../../reliability/request-recorder.js";

const T0 = Date.UTC(2024, 0, 15, 10, 30);

describe("RequestRecorder", () => {
  let time: MockTimeProvider;
  let recorder: RequestRecorder;

  beforeEach(() => {
    time = new MockTimeProvider(T0);
    recorder = new RequestRecorder({ timeProvider: time });
  });

  describe("record", () => {
    it("should count into both the endpoint and the all scope", () => {
      recorder.record("/users", 200, 50);
      recorder.record("/users", 503, 900);
      recorder.record("/orders", 201, 120);

      expect(recorder.aggregate("/users", T0, T0)).toEqual({
        totalRequests: 2,
        successfulRequests: 1,
        errorCount: 1,
        latencySamples: [50, 900],
      });
      expect(recorder.aggregate("all", T0, T0)).toEqual({
        totalRequests: 3,
        successfulRequests: 2,
        errorCount: 1,
        latencySamples: [50, 900, 120],
      });
    });

    it("should count a request recorded under the all scope once", () => {
      recorder.record("all", 200, 10);

      expect(recorder.aggregate("all", T0, T0).totalRequests).toBe(1);
      expect(recorder.scopes()).toEqual(["all"]);
    });

    it("should keep total equal to successes plus errors", () => {
      const statuses = [200, 204, 301, 399, 400, 404, 500, 101];
      for (const status of statuses) {
        recorder.record("/mixed", status, 10);
      }

      const aggregate = recorder.aggregate("/mixed", T0, T0);

      expect(aggregate.totalRequests).toBe(8);
      expect(aggregate.successfulRequests).toBe(4);
      expect(aggregate.errorCount).toBe(4);
    });

    it("should store odd inputs as given", () => {
      recorder.record("/odd", 999, -5);

      expect(recorder.aggregate("/odd", T0, T0)).toEqual({
        totalRequests: 1,
        successfulRequests: 0,
        errorCount: 1,
        latencySamples: [-5],
      });
    });

    it("should bucket by the hour of an explicit timestamp", () => {
      recorder.record("/users", 200, 10, T0 - HOUR_MS);

      expect(recorder.bucketsFor("/users").map((bucket) => bucket.hourStart)).toEqual([
        Date.UTC(2024, 0, 15, 9),
      ]);
    });
  });

  describe("aggregate", () => {
    it("should include whole hours at both ends of the range", () => {
      recorder.record("/users", 200, 10, Date.UTC(2024, 0, 15, 10, 5));
      recorder.record("/users", 200, 20, Date.UTC(2024, 0, 15, 11, 10));
      recorder.record("/users", 500, 30, Date.UTC(2024, 0, 15, 12, 59));
      recorder.record("/users", 200, 40, Date.UTC(2024, 0, 15, 13, 0));

      const aggregate = recorder.aggregate("/users", Date.UTC(2024, 0, 15, 10, 45), Date.UTC(2024, 0, 15, 12, 0));

      expect(aggregate).toEqual({
        totalRequests: 3,
        successfulRequests: 2,
        errorCount: 1,
        latencySamples: [10, 20, 30],
      });
    });

    it("should return a zeroed aggregate for an unknown scope", () => {
      expect(recorder.aggregate("/missing", 0, T0)).toEqual({
        totalRequests: 0,
        successfulRequests: 0,
        errorCount: 0,
        latencySamples: [],
      });
    });
  });

  describe("retention", () => {
    it("should evict buckets older than the retention window when the hour advances", () => {
      const shortLived = new RequestRecorder({ retentionMs: 2 * HOUR_MS, timeProvider: time });
      shortLived.record("/users", 200, 10);
      expect(shortLived.bucketCount()).toBe(2);

      time.setTime(Date.UTC(2024, 0, 15, 13, 5));
      shortLived.record("/orders", 200, 10);

      expect(shortLived.scopes().sort()).toEqual(["/orders", "all"]);
      expect(shortLived.bucketCount()).toBe(2);
      expect(shortLived.aggregate("all", T0, time.now()).totalRequests).toBe(1);
    });

    it("should report how many buckets were pruned", () => {
      recorder.record("/users", 200, 10);
      recorder.record("/orders", 200, 10);

      expect(recorder.prune(T0 + 31 * 24 * HOUR_MS)).toBe(3);
      expect(recorder.bucketCount()).toBe(0);
    });

    it("should keep buckets inside the window", () => {
      recorder.record("/users", 200, 10);

      expect(recorder.prune(T0 + 29 * 24 * HOUR_MS)).toBe(0);
      expect(recorder.bucketCount()).toBe(2);
    });
  });

  describe("bucketsFor", () => {
    it("should return copies the caller cannot use to change the recorder", () => {
      recorder.record("/users", 200, 10);

      const [bucket] = recorder.bucketsFor("/users");
      bucket?.latencySamples.push(999);

      expect(recorder.aggregate("/users", T0, T0).latencySamples).toEqual([10]);
    });
  });
});
