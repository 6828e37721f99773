/**
 * Fetch timing for the cache metrics.
 *
 * Keeps a bounded window of samples per operation and reports averages and
 * percentiles. Every query times its producer calls here and logs each
 * duration at debug level.
 *
 * @module observability/perf
 */

import { type QueryLaneLogger } from './logger.js';

/** A completed timing record */
export interface TimingRecord {
  readonly operation: string;
  readonly durationMs: number;
  readonly timestamp: number;
  readonly metadata?: Record<string, unknown>;
}

/** Performance summary for an operation */
export interface PerfSummary {
  readonly operation: string;
  readonly count: number;
  readonly totalMs: number;
  readonly avgMs: number;
  readonly minMs: number;
  readonly maxMs: number;
  readonly p50Ms: number;
  readonly p95Ms: number;
  readonly p99Ms: number;
}

export interface OperationProfilerOptions {
  logger?: QueryLaneLogger;
  /** Samples kept per operation; older ones are dropped (default: 1000) */
  maxSamples?: number;
}

/**
 * Tracks operation durations with percentiles.
 *
 * @example
 * ```typescript
 * const profiler = new OperationProfiler();
 *
 * const end = profiler.start('fetch');
 * await producer();
 * end({ key: 'todos' });
 * console.log(profiler.getSummary('fetch')?.p95Ms);
 * ```
 */
export class OperationProfiler {
  private readonly logger?: QueryLaneLogger;
  private readonly timings = new Map<string, number[]>();
  private readonly maxSamples: number;

  constructor(options: OperationProfilerOptions = {}) {
    this.logger = options.logger;
    this.maxSamples = options.maxSamples ?? 1000;
  }

  /** Start timing an operation. Returns a function to call when done. */
  start(operation: string): (metadata?: Record<string, unknown>) => TimingRecord {
    const startTime = performance.now();

    return (metadata?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
      this.record(operation, durationMs);

      this.logger?.debug(`${operation}: ${durationMs}ms`, { ...metadata, durationMs });

      return { operation, durationMs, timestamp: Date.now(), metadata };
    };
  }

  record(operation: string, durationMs: number): void {
    let samples = this.timings.get(operation);
    if (!samples) {
      samples = [];
      this.timings.set(operation, samples);
    }
    samples.push(durationMs);
    if (samples.length > this.maxSamples) samples.shift();
  }

  getSummary(operation: string): PerfSummary | null {
    const samples = this.timings.get(operation);
    if (!samples || samples.length === 0) return null;

    const sorted = [...samples].sort((a, b) => a - b);
    const count = sorted.length;
    const total = sorted.reduce((a, b) => a + b, 0);
    const at = (fraction: number): number => sorted[Math.min(count - 1, Math.floor(count * fraction))] ?? 0;

    return {
      operation,
      count,
      totalMs: Math.round(total * 100) / 100,
      avgMs: Math.round((total / count) * 100) / 100,
      minMs: at(0),
      maxMs: at(1),
      p50Ms: at(0.5),
      p95Ms: at(0.95),
      p99Ms: at(0.99),
    };
  }

  reset(operation: string): void {
    this.timings.delete(operation);
  }
}
