import { Subject, takeUntil, type Observable } from 'rxjs';
import { CacheEntryError } from '../errors/querylane-error.js';
import { createLogger, type QueryLaneLogger } from '../observability/logger.js';
import {
  checkEntryConsistency,
  estimateSize,
  isEntryExpired,
  snapshotEntry,
} from './cache-entry.js';
import { CacheMetricsTracker } from './cache-metrics.js';
import { resolveEvictionPolicy, type EvictionPolicy } from './eviction/index.js';
import {
  DEFAULT_CACHE_CONFIG,
  type CacheChangeEvent,
  type CacheChangeReason,
  type CacheEntry,
  type CacheEntryMetadata,
  type CacheInfo,
  type CacheMetrics,
  type CacheStoreConfig,
  type EvictionPolicyName,
} from './types.js';

/**
 * In-memory key → entry map with freshness metadata, reference counts,
 * size accounting and pluggable eviction.
 *
 * The store is the only owner of entry lifetime. Queries hold keys and a
 * reference count; every read they get back is a frozen copy.
 *
 * @example
 * ```typescript
 * const store = new CacheStore({ maxEntries: 3, evictionPolicy: 'lru' });
 *
 * store.set('todos', [{ id: 1 }], { staleTime: 5000 });
 * store.get('todos')?.data; // [{ id: 1 }]
 * store.getInfo().metrics.hitRate; // 1
 * ```
 */
export class CacheStore {
  private readonly maxEntries: number;
  private readonly maxCacheSize: number;
  private readonly defaultStaleTime: number;
  private readonly defaultCacheTime: number;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly metricsTracker = new CacheMetricsTracker();
  private readonly logger: QueryLaneLogger;
  private readonly destroy$ = new Subject<void>();
  private readonly changesSubject = new Subject<CacheChangeEvent>();
  private policy: EvictionPolicy;
  private totalSize = 0;
  private tick = 0;
  private gcTimer: ReturnType<typeof setInterval> | null = null;

  /** Entry writes, removals and evictions */
  readonly changes$: Observable<CacheChangeEvent>;

  constructor(config: Partial<CacheStoreConfig> = {}) {
    this.maxEntries = config.maxEntries ?? DEFAULT_CACHE_CONFIG.maxEntries;
    this.maxCacheSize = config.maxCacheSize ?? DEFAULT_CACHE_CONFIG.maxCacheSize;
    this.defaultStaleTime = config.defaultStaleTime ?? DEFAULT_CACHE_CONFIG.defaultStaleTime;
    this.defaultCacheTime = config.defaultCacheTime ?? DEFAULT_CACHE_CONFIG.defaultCacheTime;
    this.policy = resolveEvictionPolicy(config.evictionPolicy ?? DEFAULT_CACHE_CONFIG.evictionPolicy);
    this.logger = config.logger ?? createLogger({ module: 'cache' });
    this.changes$ = this.changesSubject.asObservable().pipe(takeUntil(this.destroy$));

    if (config.gcIntervalMs !== undefined) {
      this.gcTimer = setInterval(() => this.collectGarbage(), config.gcIntervalMs);
      this.gcTimer.unref();
    }
  }

  /**
   * Read an entry. Counts a hit when a live entry with data is found, a miss
   * otherwise. Expired and inconsistent entries are removed on the way.
   */
  get<T>(key: string): Readonly<CacheEntry<T>> | undefined {
    const entry = this.readLive(key);
    if (!entry?.hasData) {
      this.metricsTracker.recordMiss();
      return undefined;
    }

    this.policy.onAccess(entry, Date.now(), ++this.tick);
    this.metricsTracker.recordHit();
    return this.typed<T>(entry);
  }

  /** True when a live entry with data exists. No metrics, no bookkeeping. */
  has(key: string): boolean {
    return this.readLive(key)?.hasData ?? false;
  }

  /**
   * Insert or overwrite an entry. An existing entry keeps its creation time,
   * access count and reference count. May evict other entries.
   */
  set<T>(key: string, data: T, metadata: CacheEntryMetadata = {}): Readonly<CacheEntry<T>> {
    const now = Date.now();
    const sizeBytes = estimateSize(data);
    let entry = this.entries.get(key);

    if (entry) {
      this.totalSize -= entry.sizeBytes;
      entry.data = data;
      entry.hasData = true;
      entry.updatedAt = now;
      entry.staleTime = metadata.staleTime ?? entry.staleTime;
      entry.cacheTime = metadata.cacheTime ?? entry.cacheTime;
      entry.isSecure = metadata.isSecure ?? entry.isSecure;
      entry.isInvalidated = false;
      entry.sizeBytes = sizeBytes;
    } else {
      entry = this.createEntry(key, metadata, now);
      entry.data = data;
      entry.hasData = true;
      entry.sizeBytes = sizeBytes;
    }
    entry.expiresAt = this.expiryFor(entry.isSecure, metadata.maxAge, now);

    this.totalSize += sizeBytes;
    this.emit('set', key);
    this.enforceLimits(key);

    return this.typed<T>(entry);
  }

  /** Remove an entry regardless of its reference count */
  remove(key: string): boolean {
    return this.delete(key, 'remove');
  }

  /** Remove every entry. Metrics are kept. */
  clear(): void {
    this.entries.clear();
    this.totalSize = 0;
    this.emit('clear');
  }

  /**
   * Remove every entry flagged secure, referenced or not.
   *
   * @returns the removed keys
   */
  clearSecureEntries(): string[] {
    const removed: string[] = [];
    for (const entry of [...this.entries.values()]) {
      if (entry.isSecure) {
        this.delete(entry.key, 'remove');
        removed.push(entry.key);
      }
    }
    if (removed.length > 0) {
      this.logger.info('Cleared secure entries', { count: removed.length });
    }
    return removed;
  }

  /**
   * Add a subscriber reference. Creates a data-less placeholder when the key
   * has no entry yet, so the reference survives until the first write.
   *
   * @returns the new reference count
   */
  retain(key: string, metadata: CacheEntryMetadata = {}): number {
    let entry = this.readLive(key);
    if (!entry) {
      entry = this.createEntry(key, metadata, Date.now());
    }
    entry.refCount++;
    entry.releasedAt = undefined;
    return entry.refCount;
  }

  /**
   * Drop a subscriber reference. Starts the `cacheTime` clock at zero
   * references and removes placeholders outright.
   *
   * @returns the new reference count
   */
  release(key: string): number {
    const entry = this.entries.get(key);
    if (!entry) return 0;

    entry.refCount = Math.max(0, entry.refCount - 1);
    if (entry.refCount === 0) {
      entry.releasedAt = Date.now();
      if (!entry.hasData) {
        this.delete(key, 'remove');
        return 0;
      }
      this.enforceLimits();
    }
    return entry.refCount;
  }

  /** Mark an entry for refetch without touching its data */
  invalidate(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry?.hasData) return false;
    entry.isInvalidated = true;
    this.emit('invalidate', key);
    return true;
  }

  /**
   * Invalidate every entry with data that matches the predicate.
   *
   * @returns the invalidated keys
   */
  invalidateWhere(predicate: (entry: Readonly<CacheEntry>) => boolean): string[] {
    const keys: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.hasData && predicate(snapshotEntry(entry))) {
        entry.isInvalidated = true;
        keys.push(entry.key);
      }
    }
    for (const key of keys) this.emit('invalidate', key);
    return keys;
  }

  /** Swap the eviction strategy. Existing bookkeeping carries over. */
  setEvictionPolicy(policy: EvictionPolicyName | EvictionPolicy): void {
    this.policy = resolveEvictionPolicy(policy);
    this.logger.debug('Eviction policy changed', { policy: this.policy.name });
    this.enforceLimits();
  }

  get policyName(): string {
    return this.policy.name;
  }

  /**
   * Remove expired and inconsistent entries.
   *
   * @returns the number of entries removed
   */
  collectGarbage(): number {
    const now = Date.now();
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      const problem = checkEntryConsistency(entry);
      if (problem) {
        this.drop(entry.key, problem);
        removed++;
      } else if (isEntryExpired(entry, now)) {
        this.delete(entry.key, 'expire');
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug('Garbage collected', { removed });
    }
    return removed;
  }

  /** Record a producer duration in the store metrics */
  recordFetch(durationMs: number): void {
    this.metricsTracker.recordFetch(durationMs);
  }

  get metrics(): CacheMetrics {
    return this.metricsTracker.snapshot();
  }

  getInfo(): CacheInfo {
    return {
      entryCount: this.entries.size,
      sizeBytes: this.totalSize,
      maxEntries: this.maxEntries,
      maxCacheSize: this.maxCacheSize,
      policy: this.policy.name,
      metrics: this.metricsTracker.snapshot(),
    };
  }

  getKeys(): string[] {
    return Array.from(this.entries.keys());
  }

  /** Copy of an entry as stored. No metrics, no bookkeeping, no expiry. */
  inspectEntry<T = unknown>(key: string): Readonly<CacheEntry<T>> | undefined {
    const entry = this.entries.get(key);
    return entry ? this.typed<T>(entry) : undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  destroy(): void {
    if (this.gcTimer) {
      clearInterval(this.gcTimer);
      this.gcTimer = null;
    }
    this.entries.clear();
    this.totalSize = 0;
    this.destroy$.next();
    this.destroy$.complete();
    this.changesSubject.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private createEntry(key: string, metadata: CacheEntryMetadata, now: number): CacheEntry {
    const isSecure = metadata.isSecure ?? false;
    const entry: CacheEntry = {
      key,
      data: undefined,
      hasData: false,
      createdAt: now,
      lastAccessedAt: now,
      updatedAt: now,
      staleTime: metadata.staleTime ?? this.defaultStaleTime,
      cacheTime: metadata.cacheTime ?? this.defaultCacheTime,
      accessCount: 0,
      refCount: 0,
      isSecure,
      isInvalidated: false,
      sizeBytes: 0,
      insertOrder: 0,
      accessOrder: 0,
    };
    this.policy.onInsert(entry, now, ++this.tick);
    this.entries.set(key, entry);
    return entry;
  }

  private expiryFor(isSecure: boolean, maxAge: number | undefined, now: number): number | undefined {
    return isSecure && maxAge !== undefined ? now + maxAge : undefined;
  }

  /** Live entry for a key, after the consistency and expiry checks */
  private readLive(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    const problem = checkEntryConsistency(entry);
    if (problem) {
      this.drop(key, problem);
      return undefined;
    }

    if (entry.hasData && isEntryExpired(entry, Date.now())) {
      this.delete(key, 'expire');
      return undefined;
    }

    return entry;
  }

  private drop(key: string, reason: string): void {
    this.logger.error('Dropping inconsistent cache entry', new CacheEntryError(key, reason));
    this.metricsTracker.recordDrop();
    this.delete(key, 'remove');
  }

  private delete(key: string, reason: CacheChangeReason): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    this.totalSize -= entry.sizeBytes;
    this.emit(reason, key);
    return true;
  }

  /**
   * Evict until under both limits. Referenced entries and the entry just
   * written are never victims; when nothing is evictable the overflow is
   * accepted and counted as pressure.
   */
  private enforceLimits(protectedKey?: string): void {
    while (this.entries.size > this.maxEntries || this.totalSize > this.maxCacheSize) {
      const candidates = [...this.entries.values()].filter(
        (entry) => entry.refCount === 0 && entry.key !== protectedKey
      );

      if (candidates.length === 0) {
        this.recordPressure('no evictable entries');
        return;
      }

      let victim: string | undefined;
      try {
        victim = this.policy.select(candidates);
      } catch (error) {
        this.logger.error('Eviction policy failed', error, { policy: this.policy.name });
        this.recordPressure('policy error');
        return;
      }

      if (victim === undefined || !candidates.some((entry) => entry.key === victim)) {
        this.recordPressure('policy returned no candidate');
        return;
      }

      this.delete(victim, 'evict');
      this.metricsTracker.recordEviction();
      this.logger.debug('Evicted entry', { key: victim, policy: this.policy.name });
    }
  }

  private recordPressure(reason: string): void {
    this.metricsTracker.recordPressure();
    this.logger.warn('Cache over limit', {
      reason,
      entryCount: this.entries.size,
      sizeBytes: this.totalSize,
    });
  }

  private emit(type: CacheChangeReason, key?: string): void {
    this.changesSubject.next({ type, key, timestamp: Date.now() });
  }

  private typed<T>(entry: CacheEntry): Readonly<CacheEntry<T>> {
    // Entries are stored untyped; each key is written and read by one query.
    return snapshotEntry(entry) as Readonly<CacheEntry<T>>;
  }
}
