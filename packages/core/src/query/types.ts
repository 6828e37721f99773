import type { CacheStore } from '../cache/cache-store.js';
import type { QueryLaneLogger } from '../observability/logger.js';
import type { CircuitBreakerConfig, CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import type { RequestDeduplicator } from './request-deduplicator.js';

/** Lifecycle status shared by queries and mutations */
export type QueryStatus = 'idle' | 'loading' | 'success' | 'error';

/** Asynchronous producer for a query's data */
export type QueryFn<T> = () => Promise<T>;

/**
 * Snapshot of a query.
 *
 * `status === 'success'` implies `data` is present; `status === 'error'`
 * implies `error` is present. `isFetching` may be true alongside any status.
 */
export interface QueryState<T> {
  status: QueryStatus;
  isFetching: boolean;
  data: T | undefined;
  error: Error | undefined;
  dataUpdatedAt: number | undefined;
  isStale: boolean;
  isInvalidated: boolean;
  /** Consecutive failed fetches; reset on success */
  fetchFailureCount: number;
}

export interface QueryOptions<T> {
  /** Gates execution entirely (default: true) */
  enabled?: boolean;
  /** Freshness window in ms (default: the client's defaultStaleTime) */
  staleTime?: number;
  /** Retention in ms after the last subscriber leaves (default: the client's defaultCacheTime) */
  cacheTime?: number;
  /** Fetch on first subscriber even when cached data is fresh (default: false) */
  refetchOnMount?: boolean;
  /** Cleared by `clearSecureCache()` regardless of subscribers (default: false) */
  isSecure?: boolean;
  /** Hard expiry in ms for secure entries; required with `isSecure` */
  maxAge?: number;
  /** Guard the producer with a circuit breaker; `true` uses the defaults */
  circuitBreaker?: boolean | CircuitBreakerConfig;
  onSuccess?: (data: T) => void;
  onError?: (error: Error) => void;
  onSettled?: (data: T | undefined, error: Error | undefined) => void;
}

export type QueryKind = 'query' | 'infinite';

/** Query lifecycle notifications forwarded to the client's event stream */
export type QueryLifecycleEvent =
  | { type: 'fetch-start'; kind: QueryKind; key: string; timestamp: number }
  | { type: 'fetch-success'; kind: QueryKind; key: string; timestamp: number; durationMs: number }
  | {
      type: 'fetch-error';
      kind: QueryKind;
      key: string;
      timestamp: number;
      durationMs: number;
      error: Error;
    }
  | { type: 'invalidated'; kind: QueryKind; key: string; timestamp: number }
  | { type: 'disposed'; kind: QueryKind; key: string; timestamp: number };

/** Collaborators a query needs from its client */
export interface QueryContext {
  store: CacheStore;
  deduplicator: RequestDeduplicator;
  logger: QueryLaneLogger;
  breakers?: CircuitBreakerRegistry;
  emit?: (event: QueryLifecycleEvent) => void;
  /**
   * Called once the last listener has been gone for `idleDisposeMs`. A
   * listener that returns within that window keeps the instance alive.
   */
  onIdle?: (key: string, instance: object) => void;
  /** Grace period before `onIdle`; 0 or unset reports idle right away */
  idleDisposeMs?: number;
}

export interface QueryMetrics {
  fetchCount: number;
  successCount: number;
  errorCount: number;
  avgFetchMs: number;
  p95FetchMs: number;
  lastFetchMs: number | undefined;
}
