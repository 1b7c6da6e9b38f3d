import { describe, it, expect } from "vitest";
import { MetricsCollector } from "./metrics.js";

describe("MetricsCollector", () => {
  it("should count calls and keep their durations", () => {
    const metrics = new MetricsCollector();

    metrics.recordCall("add", 2);
    metrics.recordCall("add", 4);

    expect(metrics.getMetrics("add")).toEqual({ calls: 2, durationMs: [2, 4] });
    expect(metrics.getMetrics("delete")).toBeUndefined();
  });

  it("should keep only the last 100 samples", () => {
    const metrics = new MetricsCollector();

    for (let i = 0; i < 150; i++) {
      metrics.recordCall("listAll", i);
    }

    const recorded = metrics.getMetrics("listAll");
    expect(recorded?.calls).toBe(150);
    expect(recorded?.durationMs).toHaveLength(100);
    expect(recorded?.durationMs[0]).toBe(50);
  });

  it("should time a function and pass its result through", () => {
    const metrics = new MetricsCollector();

    expect(metrics.time("get", () => "value")).toBe("value");
    expect(metrics.getMetrics("get")?.calls).toBe(1);
  });

  it("should still record a call that throws", () => {
    const metrics = new MetricsCollector();

    expect(() =>
      metrics.time("sortByPrice", () => {
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(metrics.getMetrics("sortByPrice")?.calls).toBe(1);
  });

  it("should compute p95", () => {
    const metrics = new MetricsCollector();
    const values = Array.from({ length: 20 }, (_, i) => i + 1);

    expect(metrics.getP95(values)).toBe(19);
    expect(metrics.getP95([])).toBe(0);
  });

  it("should compute the bucket hit rate", () => {
    const metrics = new MetricsCollector();
    expect(metrics.getHitRate()).toBe(0);

    metrics.recordBucketLookup(true);
    metrics.recordBucketLookup(true);
    metrics.recordBucketLookup(true);
    metrics.recordBucketLookup(false);

    expect(metrics.getHitRate()).toBe(0.75);
  });

  it("should summarize and reset", () => {
    const metrics = new MetricsCollector();
    metrics.recordCall("delete", 1);
    metrics.recordDeleteMiss();

    expect(metrics.snapshot()).toEqual({
      operations: { delete: { calls: 1, p95Ms: 1 } },
      bucketHits: 0,
      bucketMisses: 0,
      deleteMisses: 1,
    });

    metrics.reset();
    expect(metrics.snapshot()).toEqual({ operations: {}, bucketHits: 0, bucketMisses: 0, deleteMisses: 0 });
  });

  it("should ignore everything when disabled", () => {
    const metrics = new MetricsCollector(false);

    expect(metrics.time("add", () => 1)).toBe(1);
    metrics.recordBucketLookup(true);
    metrics.recordDeleteMiss();

    expect(metrics.enabled).toBe(false);
    expect(metrics.snapshot()).toEqual({ operations: {}, bucketHits: 0, bucketMisses: 0, deleteMisses: 0 });
  });
});
