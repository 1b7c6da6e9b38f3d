/**
 * Per-catalog operation metrics
 */

import { performance } from "node:perf_hooks";

export type OperationName =
  | "add"
  | "delete"
  | "get"
  | "searchByLocation"
  | "searchByPriceRange"
  | "sortByPrice"
  | "listAll";

export interface OperationMetrics {
  calls: number;
  /** Last 100 samples */
  durationMs: number[];
}

export interface OperationSummary {
  calls: number;
  p95Ms: number;
}

export interface MetricsSnapshot {
  operations: Partial<Record<OperationName, OperationSummary>>;
  bucketHits: number;
  bucketMisses: number;
  deleteMisses: number;
}

const MAX_SAMPLES = 100;

export class MetricsCollector {
  #enabled: boolean;
  #operations = new Map<OperationName, OperationMetrics>();
  #bucketHits = 0;
  #bucketMisses = 0;
  #deleteMisses = 0;

  constructor(enabled = true) {
    this.#enabled = enabled;
  }

  get enabled(): boolean {
    return this.#enabled;
  }

  #getMetrics(op: OperationName): OperationMetrics {
    let metrics = this.#operations.get(op);
    if (!metrics) {
      metrics = { calls: 0, durationMs: [] };
      this.#operations.set(op, metrics);
    }
    return metrics;
  }

  /**
   * Record one call and its duration
   */
  recordCall(op: OperationName, ms: number): void {
    if (!this.#enabled) return;

    const metrics = this.#getMetrics(op);
    metrics.calls++;
    metrics.durationMs.push(ms);

    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  /**
   * Run fn and record its duration under op
   */
  time<T>(op: OperationName, fn: () => T): T {
    if (!this.#enabled) return fn();

    const start = performance.now();
    try {
      return fn();
    } finally {
      this.recordCall(op, performance.now() - start);
    }
  }

  /**
   * Record whether a location search found a bucket
   */
  recordBucketLookup(hit: boolean): void {
    if (!this.#enabled) return;
    if (hit) {
      this.#bucketHits++;
    } else {
      this.#bucketMisses++;
    }
  }

  recordDeleteMiss(): void {
    if (!this.#enabled) return;
    this.#deleteMisses++;
  }

  getMetrics(op: OperationName): OperationMetrics | undefined {
    return this.#operations.get(op);
  }

  /**
   * Fraction of location searches that found a bucket
   */
  getHitRate(): number {
    const total = this.#bucketHits + this.#bucketMisses;
    return total > 0 ? this.#bucketHits / total : 0;
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  snapshot(): MetricsSnapshot {
    const operations: Partial<Record<OperationName, OperationSummary>> = {};
    for (const [op, metrics] of this.#operations) {
      operations[op] = { calls: metrics.calls, p95Ms: this.getP95(metrics.durationMs) };
    }
    return {
      operations,
      bucketHits: this.#bucketHits,
      bucketMisses: this.#bucketMisses,
      deleteMisses: this.#deleteMisses,
    };
  }

  reset(): void {
    this.#operations.clear();
    this.#bucketHits = 0;
    this.#bucketMisses = 0;
    this.#deleteMisses = 0;
  }
}
