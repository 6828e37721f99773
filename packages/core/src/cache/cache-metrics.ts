import { OperationProfiler } from '../observability/perf.js';
import type { CacheMetrics } from './types.js';

const FETCH_OPERATION = 'fetch';

/**
 * Cumulative counters for one cache store. Fetch durations are fed in by
 * queries and summarised through an {@link OperationProfiler}.
 */
export class CacheMetricsTracker {
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private evictionPressure = 0;
  private droppedEntries = 0;
  private readonly profiler: OperationProfiler;

  constructor(profiler: OperationProfiler = new OperationProfiler()) {
    this.profiler = profiler;
  }

  recordHit(): void {
    this.hits++;
  }

  recordMiss(): void {
    this.misses++;
  }

  recordEviction(): void {
    this.evictions++;
  }

  recordPressure(): void {
    this.evictionPressure++;
  }

  recordDrop(): void {
    this.droppedEntries++;
  }

  recordFetch(durationMs: number): void {
    this.profiler.record(FETCH_OPERATION, durationMs);
  }

  snapshot(): CacheMetrics {
    const total = this.hits + this.misses;
    const summary = this.profiler.getSummary(FETCH_OPERATION);
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      evictionPressure: this.evictionPressure,
      droppedEntries: this.droppedEntries,
      hitRate: total > 0 ? this.hits / total : 0,
      fetch: {
        count: summary?.count ?? 0,
        avgMs: summary?.avgMs ?? 0,
        p95Ms: summary?.p95Ms ?? 0,
      },
    };
  }

  reset(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.evictionPressure = 0;
    this.droppedEntries = 0;
    this.profiler.reset(FETCH_OPERATION);
  }
}
