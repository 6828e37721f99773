import type { QueryLaneLogger } from '../observability/logger.js';
import type { EvictionPolicy } from './eviction/eviction-policy.js';

/** Built-in eviction strategies */
export type EvictionPolicyName = 'lru' | 'lfu' | 'fifo';

/**
 * One cached value and its bookkeeping.
 *
 * The store owns these objects. Everything outside the store sees copies
 * (see {@link CacheStore.inspectEntry}).
 */
export interface CacheEntry<T = unknown> {
  key: string;
  data: T | undefined;
  /** False for placeholder entries that only carry a subscriber count */
  hasData: boolean;
  createdAt: number;
  lastAccessedAt: number;
  updatedAt: number;
  staleTime: number;
  cacheTime: number;
  accessCount: number;
  refCount: number;
  isSecure: boolean;
  /** Hard expiry for secure entries written with `maxAge` */
  expiresAt?: number;
  isInvalidated: boolean;
  /** When refCount last dropped to 0 */
  releasedAt?: number;
  sizeBytes: number;
  /** Store tick at first insert; breaks createdAt ties */
  insertOrder: number;
  /** Store tick at last access; breaks lastAccessedAt ties */
  accessOrder: number;
}

/** Metadata accepted by {@link CacheStore.set} */
export interface CacheEntryMetadata {
  staleTime?: number;
  cacheTime?: number;
  isSecure?: boolean;
  /** Only honoured for secure entries */
  maxAge?: number;
}

export interface CacheStoreConfig {
  /** Entry count limit (default: 1000) */
  maxEntries: number;
  /** Estimated byte limit (default: 50 MiB) */
  maxCacheSize: number;
  /** Eviction strategy (default: 'lru') */
  evictionPolicy: EvictionPolicyName | EvictionPolicy;
  /** Staleness window for entries written without one (default: 0) */
  defaultStaleTime: number;
  /** Retention after the last subscriber leaves (default: 5 minutes) */
  defaultCacheTime: number;
  /** Run garbage collection on an interval; disabled when unset */
  gcIntervalMs?: number;
  logger?: QueryLaneLogger;
}

export const DEFAULT_CACHE_CONFIG: Omit<CacheStoreConfig, 'gcIntervalMs' | 'logger'> = {
  maxEntries: 1000,
  maxCacheSize: 50 * 1024 * 1024,
  evictionPolicy: 'lru',
  defaultStaleTime: 0,
  defaultCacheTime: 5 * 60 * 1000,
};

export interface FetchTimingSummary {
  count: number;
  avgMs: number;
  p95Ms: number;
}

export interface CacheMetrics {
  hits: number;
  misses: number;
  evictions: number;
  /** Writes that left the store over a limit because nothing was evictable */
  evictionPressure: number;
  /** Entries removed by the consistency check */
  droppedEntries: number;
  hitRate: number;
  fetch: FetchTimingSummary;
}

export interface CacheInfo {
  entryCount: number;
  sizeBytes: number;
  maxEntries: number;
  maxCacheSize: number;
  policy: string;
  metrics: CacheMetrics;
}

export type CacheChangeReason = 'set' | 'remove' | 'evict' | 'expire' | 'clear' | 'invalidate';

export interface CacheChangeEvent {
  type: CacheChangeReason;
  /** Absent for `clear` */
  key?: string;
  timestamp: number;
}
