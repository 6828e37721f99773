import { Subject, filter, takeUntil, type Observable, type Subscription } from 'rxjs';
import { CacheStore } from '../cache/cache-store.js';
import type { EvictionPolicy } from '../cache/eviction/index.js';
import type { CacheEntry, CacheInfo, EvictionPolicyName } from '../cache/types.js';
import { ConfigurationError, QueryLaneError } from '../errors/querylane-error.js';
import {
  MutationTypeRegistry,
  type MutationHandler,
  type MutationTypeOptions,
} from '../mutation/mutation-registry.js';
import { Mutation } from '../mutation/mutation.js';
import {
  OfflineQueueManager,
  type DrainResult,
  type OfflineQueueStorage,
  type ProcessQueueOptions,
} from '../mutation/offline-queue.js';
import type {
  MutationContext,
  MutationFn,
  MutationLifecycleEvent,
  MutationOptions,
} from '../mutation/types.js';
import { NetworkStatus } from '../network/network-status.js';
import { createLogger, type QueryLaneLogger } from '../observability/logger.js';
import {
  InfiniteQuery,
  type InfiniteQueryFn,
  type InfiniteQueryOptions,
} from '../query/infinite-query.js';
import { keyHasPrefix } from '../query/query-key.js';
import { Query, type InvalidateOptions } from '../query/query.js';
import { RequestDeduplicator } from '../query/request-deduplicator.js';
import type {
  QueryContext,
  QueryFn,
  QueryLifecycleEvent,
  QueryOptions,
} from '../query/types.js';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import { assertQueryKey } from '../validation/key-validation.js';
import {
  infiniteQueryOptionsSchema,
  queryClientConfigSchema,
  queryOptionsSchema,
  validateConfig,
} from '../validation/schemas.js';

/**
 * Configuration for a {@link QueryClient}.
 *
 * @example
 * ```typescript
 * const client = new QueryClient({
 *   maxEntries: 500,
 *   evictionPolicy: 'lfu',
 *   defaultStaleTime: 30_000,
 *   online: navigator.onLine,
 *   queue: { storage: localQueueStorage },
 * });
 * ```
 */
export interface QueryClientConfig {
  /** Entry count limit of the cache store (default: 1000) */
  maxEntries?: number;
  /** Estimated byte limit of the cache store (default: 50 MiB) */
  maxCacheSize?: number;
  /** Eviction strategy (default: 'lru') */
  evictionPolicy?: EvictionPolicyName | EvictionPolicy;
  /** Staleness window for queries that set none (default: 0) */
  defaultStaleTime?: number;
  /** Retention for queries that set none (default: 5 minutes) */
  defaultCacheTime?: number;
  /** How long an instance outlives its last listener (default: 5000) */
  idleDisposeMs?: number;
  /** Periodic garbage collection of expired entries; off when unset */
  gcIntervalMs?: number;
  /** Initial network flag (default: true) */
  online?: boolean;
  queue?: {
    /** Replays run at once during a drain (default: 1) */
    concurrency?: number;
    /** Attempt ceiling for mutation types registered without one (default: 5) */
    defaultMaxAttempts?: number;
    storage?: OfflineQueueStorage;
  };
  /** Parent logger; components log through children of it */
  logger?: QueryLaneLogger;
}

export interface PrefetchConfig<T = unknown> {
  key: string;
  producer: QueryFn<T>;
  options?: QueryOptions<T>;
}

/** Everything published on {@link QueryClient.events$} */
export type QueryClientEvent = QueryLifecycleEvent | MutationLifecycleEvent;

type QueryInstance = Query<unknown> | InfiniteQuery<unknown, unknown>;

const DEFAULT_STALE_TIME = 0;
const DEFAULT_CACHE_TIME = 5 * 60 * 1000;
const DEFAULT_IDLE_DISPOSE_MS = 5000;

/**
 * Composition root: owns the cache store, the request deduplicator, the
 * circuit breakers, the network flag, the mutation registry and the offline
 * queue, and hands out one query instance per key.
 *
 * There is no global instance. Create one client per host and inject it.
 *
 * Instances are shared: every `getQuery()` call for a key returns the same
 * object until its last listener has been gone for `idleDisposeMs`, at which
 * point the instance is dropped while its cache entry stays for `cacheTime`. The producer and
 * options of the first call for a key win.
 *
 * @example Basic usage
 * ```typescript
 * const client = new QueryClient({ defaultStaleTime: 5000 });
 *
 * const user = client.getQuery('user:1', () => api.getUser(1));
 * const subscription = user.subscribe((state) => render(state));
 *
 * await client.prefetchQuery('user:2', () => api.getUser(2));
 * client.invalidateQueriesWithPrefix('user:');
 * ```
 *
 * @example Offline writes
 * ```typescript
 * client.registerMutationType('createPost', (input: NewPost) => api.createPost(input));
 *
 * const createPost = client.getMutation((input: NewPost) => api.createPost(input), {
 *   mutationType: 'createPost',
 *   queueWhenOffline: true,
 * });
 *
 * client.setOnline(false);
 * await createPost.mutate({ title: 'Draft' }); // queued
 * client.setOnline(true); // replays the queue
 * ```
 *
 * @see {@link Query} for the per-key lifecycle
 * @see {@link OfflineQueueManager} for replay ordering and dead entries
 */
export class QueryClient {
  private readonly store: CacheStore;
  private readonly deduplicator = new RequestDeduplicator();
  private readonly breakers = new CircuitBreakerRegistry();
  private readonly network: NetworkStatus;
  private readonly registry: MutationTypeRegistry;
  private readonly offlineQueue: OfflineQueueManager;
  private readonly logger: QueryLaneLogger;
  private readonly defaults: { staleTime: number; cacheTime: number };
  private readonly queries = new Map<string, QueryInstance>();
  private readonly mutations = new Set<{ dispose(): void }>();
  private readonly queryContext: QueryContext;
  private readonly mutationContext: MutationContext;
  private readonly destroy$ = new Subject<void>();
  private readonly eventsSubject = new Subject<QueryClientEvent>();
  private readonly reconnect: Subscription;
  private destroyed = false;

  /** Query and mutation lifecycle events */
  readonly events$: Observable<QueryClientEvent>;

  constructor(config: QueryClientConfig = {}) {
    validateConfig(queryClientConfigSchema, config, { component: 'QueryClient' });

    this.logger = config.logger ?? createLogger({ module: 'querylane' });
    this.defaults = {
      staleTime: config.defaultStaleTime ?? DEFAULT_STALE_TIME,
      cacheTime: config.defaultCacheTime ?? DEFAULT_CACHE_TIME,
    };

    this.store = new CacheStore({
      maxEntries: config.maxEntries,
      maxCacheSize: config.maxCacheSize,
      evictionPolicy: config.evictionPolicy,
      defaultStaleTime: this.defaults.staleTime,
      defaultCacheTime: this.defaults.cacheTime,
      gcIntervalMs: config.gcIntervalMs,
      logger: this.logger.child('cache'),
    });
    this.network = new NetworkStatus(config.online ?? true);
    this.registry = new MutationTypeRegistry({
      defaultMaxAttempts: config.queue?.defaultMaxAttempts,
    });
    this.offlineQueue = new OfflineQueueManager(this.registry, {
      concurrency: config.queue?.concurrency,
      network: this.network,
      storage: config.queue?.storage,
      logger: this.logger.child('offline-queue'),
    });

    this.queryContext = {
      store: this.store,
      deduplicator: this.deduplicator,
      logger: this.logger.child('query'),
      breakers: this.breakers,
      emit: (event) => this.eventsSubject.next(event),
      onIdle: (key, instance) => this.dropIdle(key, instance),
      idleDisposeMs: config.idleDisposeMs ?? DEFAULT_IDLE_DISPOSE_MS,
    };
    this.mutationContext = {
      queue: this.offlineQueue,
      network: this.network,
      logger: this.logger.child('mutation'),
      emit: (event) => this.eventsSubject.next(event),
      onDispose: (mutation) => this.mutations.delete(mutation),
    };

    this.events$ = this.eventsSubject.asObservable().pipe(takeUntil(this.destroy$));
    this.reconnect = this.network.changes$
      .pipe(
        filter((online) => online),
        takeUntil(this.destroy$)
      )
      .subscribe(() => {
        this.logger.info('Back online, replaying offline queue', {
          pending: this.offlineQueue.length,
        });
        void this.offlineQueue.processQueue();
      });
  }

  // ── Queries ──────────────────────────────────────────────────────────

  /**
   * Get the query for a key, creating it on first use.
   *
   * @throws InvalidKeyError for a malformed key
   * @throws ConfigurationError for invalid options, or when the key belongs to
   * an infinite query
   */
  getQuery<T>(key: string, producer: QueryFn<T>, options: QueryOptions<T> = {}): Query<T> {
    this.assertActive();
    assertQueryKey(key);
    validateConfig(queryOptionsSchema, options, { key });

    const existing = this.lookup(key);
    if (existing) {
      if (existing.kind !== 'query') throw kindConflict(key, existing.kind, 'query');
      return existing as unknown as Query<T>;
    }

    const query = new Query<T>(key, producer, options, this.queryContext, this.defaults);
    this.queries.set(key, query as unknown as Query<unknown>);
    return query;
  }

  /**
   * Get the infinite query for a key, creating it on first use.
   *
   * @throws ConfigurationError when `getNextPageParam` is missing, the
   * options are invalid, or the key belongs to a regular query
   */
  getInfiniteQuery<TData, TParam>(
    key: string,
    producer: InfiniteQueryFn<TData, TParam>,
    options: InfiniteQueryOptions<TData, TParam>
  ): InfiniteQuery<TData, TParam> {
    this.assertActive();
    assertQueryKey(key);
    validateConfig(infiniteQueryOptionsSchema, options, { key });

    const existing = this.lookup(key);
    if (existing) {
      if (existing.kind !== 'infinite') throw kindConflict(key, existing.kind, 'infinite');
      return existing as unknown as InfiniteQuery<TData, TParam>;
    }

    const query = new InfiniteQuery<TData, TParam>(
      key,
      producer,
      options,
      this.queryContext,
      this.defaults
    );
    this.queries.set(key, query as unknown as InfiniteQuery<unknown, unknown>);
    return query;
  }

  getQueryByKey<T>(key: string): Query<T> | undefined {
    const existing = this.lookup(key);
    return existing?.kind === 'query' ? (existing as unknown as Query<T>) : undefined;
  }

  getInfiniteQueryByKey<TData, TParam>(key: string): InfiniteQuery<TData, TParam> | undefined {
    const existing = this.lookup(key);
    return existing?.kind === 'infinite'
      ? (existing as unknown as InfiniteQuery<TData, TParam>)
      : undefined;
  }

  /**
   * Mark a key for refetch. Data is kept; an active query refetches unless
   * `refetchActive` is false.
   *
   * @returns whether anything was invalidated
   */
  invalidateQuery(key: string, options: InvalidateOptions = {}): boolean {
    const query = this.lookup(key);
    if (query) {
      query.invalidate(options);
      return true;
    }
    return this.store.invalidate(key);
  }

  /** @returns the keys that were invalidated */
  invalidateQueries(keys: readonly string[], options: InvalidateOptions = {}): string[] {
    return keys.filter((key) => this.invalidateQuery(key, options));
  }

  /** @returns the keys that were invalidated */
  invalidateQueriesWithPrefix(prefix: string, options: InvalidateOptions = {}): string[] {
    return this.invalidateQueriesWhere((key) => keyHasPrefix(key, prefix), options);
  }

  /**
   * Invalidate every cached or active key the predicate accepts.
   *
   * @returns the keys that were invalidated
   */
  invalidateQueriesWhere(
    predicate: (key: string) => boolean,
    options: InvalidateOptions = {}
  ): string[] {
    const keys = new Set([...this.store.getKeys(), ...this.queries.keys()]);
    return this.invalidateQueries(Array.from(keys).filter(predicate), options);
  }

  /**
   * Warm the cache for a key. Uses the registered query when there is one,
   * otherwise a temporary instance sharing the client's deduplication.
   *
   * Rejects with the producer error.
   */
  async prefetchQuery<T>(
    key: string,
    producer: QueryFn<T>,
    options: QueryOptions<T> = {}
  ): Promise<T | undefined> {
    this.assertActive();
    assertQueryKey(key);
    validateConfig(queryOptionsSchema, options, { key });

    const existing = this.lookup(key);
    if (existing) {
      if (existing.kind !== 'query') throw kindConflict(key, existing.kind, 'query');
      const registered: Query<T> = existing as unknown as Query<T>;
      return registered.prefetch();
    }

    const temporary = new Query<T>(key, producer, options, this.queryContext, this.defaults);
    try {
      return await temporary.prefetch();
    } finally {
      temporary.dispose();
    }
  }

  /**
   * Prefetch several keys concurrently. Every prefetch runs to completion;
   * the returned promise then rejects with the first failure, if any.
   */
  async prefetchQueries(configs: ReadonlyArray<PrefetchConfig>): Promise<void> {
    const results = await Promise.allSettled(
      configs.map((config) => this.prefetchQuery(config.key, config.producer, config.options))
    );
    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    if (failure) throw failure.reason;
  }

  /**
   * Write data for a key as if a fetch had succeeded.
   *
   * @throws ConfigurationError when the key belongs to an infinite query
   */
  setQueryData<T>(key: string, updater: T | ((previous: T | undefined) => T)): T {
    this.assertActive();
    assertQueryKey(key);

    const existing = this.lookup(key);
    if (existing) {
      if (existing.kind !== 'query') throw kindConflict(key, existing.kind, 'query');
      const query: Query<T> = existing as unknown as Query<T>;
      return query.setData(updater);
    }

    const data = isUpdater(updater) ? updater(this.getQueryData<T>(key)) : updater;
    this.store.set(key, data, {
      staleTime: this.defaults.staleTime,
      cacheTime: this.defaults.cacheTime,
    });
    return data;
  }

  /** Cached data for a key, without touching hit metrics or recency */
  getQueryData<T>(key: string): T | undefined {
    if (!this.store.has(key)) return undefined;
    return this.store.inspectEntry<T>(key)?.data;
  }

  /** Drop the query instance and its cache entry */
  removeQuery(key: string): boolean {
    const query = this.queries.get(key);
    if (query) {
      this.queries.delete(key);
      query.dispose();
    }
    return this.store.remove(key) || query !== undefined;
  }

  /** Dispose every query and empty the cache. Metrics are kept. */
  clear(): void {
    for (const query of this.queries.values()) query.dispose();
    this.queries.clear();
    this.deduplicator.clear();
    this.store.clear();
    this.logger.info('Cache cleared');
  }

  /**
   * Remove every secure entry, referenced or not, and dispose the queries
   * that owned them.
   *
   * @returns the removed keys
   */
  clearSecureCache(): string[] {
    const keys = this.store.clearSecureEntries();
    for (const key of keys) {
      const query = this.queries.get(key);
      if (query) {
        this.queries.delete(key);
        query.dispose();
      }
    }
    return keys;
  }

  getCacheInfo(): CacheInfo {
    return this.store.getInfo();
  }

  getCacheKeys(): string[] {
    return this.store.getKeys();
  }

  inspectEntry<T = unknown>(key: string): Readonly<CacheEntry<T>> | undefined {
    return this.store.inspectEntry<T>(key);
  }

  setEvictionPolicy(policy: EvictionPolicyName | EvictionPolicy): void {
    this.store.setEvictionPolicy(policy);
  }

  /** Run expiry now instead of waiting for the next access or timer */
  collectGarbage(): number {
    return this.store.collectGarbage();
  }

  get circuitBreakers(): CircuitBreakerRegistry {
    return this.breakers;
  }

  // ── Mutations ────────────────────────────────────────────────────────

  /**
   * Create a mutation. Mutations are not shared or cached.
   *
   * @throws ConfigurationError for invalid options, or `queueWhenOffline`
   * without `mutationType`
   */
  getMutation<TData, TVariables, TContext = unknown>(
    producer: MutationFn<TData, TVariables>,
    options: MutationOptions<TData, TVariables, TContext> = {}
  ): Mutation<TData, TVariables, TContext> {
    this.assertActive();
    const mutation = new Mutation(producer, options, this.mutationContext);
    this.mutations.add(mutation);
    return mutation;
  }

  /** Register the handler the offline queue replays a mutation type with */
  registerMutationType<TVariables, TData>(
    typeId: string,
    handler: MutationHandler<TVariables, TData>,
    options: MutationTypeOptions = {}
  ): void {
    this.registry.register(typeId, handler, options);
  }

  get mutationTypes(): MutationTypeRegistry {
    return this.registry;
  }

  get queue(): OfflineQueueManager {
    return this.offlineQueue;
  }

  /** Pending offline entries per mutation type */
  getQueueStats(): Record<string, number> {
    return this.offlineQueue.getQueueStats();
  }

  processQueue(options: ProcessQueueOptions = {}): Promise<DrainResult> {
    return this.offlineQueue.processQueue(options);
  }

  // ── Network ──────────────────────────────────────────────────────────

  get isOnline(): boolean {
    return this.network.isOnline;
  }

  /** Going from offline to online replays the offline queue */
  setOnline(online: boolean): void {
    if (this.network.setOnline(online)) {
      this.logger.debug('Network status changed', { online });
    }
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  /** Dispose every query and mutation and release timers and streams */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    this.reconnect.unsubscribe();
    for (const query of this.queries.values()) query.dispose();
    this.queries.clear();
    for (const mutation of [...this.mutations]) mutation.dispose();
    this.mutations.clear();

    this.destroy$.next();
    this.destroy$.complete();
    this.eventsSubject.complete();
    this.deduplicator.clear();
    this.offlineQueue.destroy();
    this.breakers.destroy();
    this.network.destroy();
    this.store.destroy();
  }

  // ── Private ──────────────────────────────────────────────────────────

  /** Registered instance for a key; disposed instances are forgotten */
  private lookup(key: string): QueryInstance | undefined {
    const query = this.queries.get(key);
    if (query?.isDisposed) {
      this.queries.delete(key);
      return undefined;
    }
    return query;
  }

  private dropIdle(key: string, instance: object): void {
    if (this.queries.get(key) !== instance) return;
    const query = this.queries.get(key);
    this.queries.delete(key);
    query?.dispose();
    this.logger.debug('Idle query dropped', { key });
  }

  private assertActive(): void {
    if (this.destroyed) {
      throw new QueryLaneError({ code: 'QL_X900', message: 'QueryClient has been destroyed' });
    }
  }
}

function kindConflict(key: string, owner: string, requested: string): ConfigurationError {
  return new ConfigurationError([`key "${key}" is a ${owner} query, requested as ${requested}`], {
    code: 'QL_C103',
    context: { key },
  });
}

function isUpdater<T>(value: T | ((previous: T | undefined) => T)): value is (previous: T | undefined) => T {
  return typeof value === 'function';
}
