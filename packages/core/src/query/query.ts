import { isEntryFresh } from '../cache/cache-entry.js';
import type { CacheEntry, CacheEntryMetadata } from '../cache/types.js';
import { CircuitOpenError, QueryLaneError, toError } from '../errors/querylane-error.js';
import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { BaseQuery } from './base-query.js';
import type { QueryContext, QueryFn, QueryOptions, QueryState } from './types.js';

interface ResolvedQueryOptions<T> extends QueryOptions<T> {
  enabled: boolean;
  staleTime: number;
  cacheTime: number;
  refetchOnMount: boolean;
  isSecure: boolean;
}

export interface InvalidateOptions {
  /** Refetch right away when the query has listeners (default: true) */
  refetchActive?: boolean;
}

/**
 * Per-key lifecycle around one asynchronous producer.
 *
 * - Concurrent triggers for the key share one in-flight request through the
 *   client's deduplicator.
 * - Stale data is served immediately while one background refetch runs.
 * - `refetch()` and invalidation start a new generation; results of older
 *   generations are discarded and their awaiters get the newest outcome.
 * - A failed fetch never drops data; `status` becomes `'error'` only when
 *   there was nothing to keep.
 *
 * Obtain instances through `QueryClient.getQuery()` so every caller of a key
 * shares the same object.
 *
 * @example
 * ```typescript
 * const query = client.getQuery('user:1', () => api.getUser(1), { staleTime: 5000 });
 *
 * const subscription = query.subscribe((state) => {
 *   if (state.status === 'success') render(state.data);
 * });
 *
 * await query.fetch();
 * subscription.unsubscribe();
 * ```
 */
export class Query<T> extends BaseQuery<QueryState<T>> {
  readonly kind = 'query' as const;

  private readonly producer: QueryFn<T>;
  private readonly options: ResolvedQueryOptions<T>;
  private readonly breaker: CircuitBreaker | undefined;
  private enabled: boolean;
  private generation = 0;
  private current: Promise<T> | null = null;

  constructor(
    key: string,
    producer: QueryFn<T>,
    options: QueryOptions<T>,
    context: QueryContext,
    defaults: { staleTime: number; cacheTime: number }
  ) {
    const resolved: ResolvedQueryOptions<T> = {
      ...options,
      enabled: options.enabled ?? true,
      staleTime: options.staleTime ?? defaults.staleTime,
      cacheTime: options.cacheTime ?? defaults.cacheTime,
      refetchOnMount: options.refetchOnMount ?? false,
      isSecure: options.isSecure ?? false,
    };

    const cached = context.store.has(key) ? context.store.inspectEntry<T>(key) : undefined;
    super(key, context, {
      status: cached ? 'success' : 'idle',
      isFetching: false,
      data: cached?.data,
      error: undefined,
      dataUpdatedAt: cached?.updatedAt,
      isStale: cached ? !isEntryFresh(cached, Date.now()) : true,
      isInvalidated: cached?.isInvalidated ?? false,
      fetchFailureCount: 0,
    });

    this.producer = producer;
    this.options = resolved;
    this.enabled = resolved.enabled;
    this.breaker = this.resolveBreaker();
  }

  /** Current state, with `isStale` evaluated now */
  get state(): QueryState<T> {
    const state = this.currentState;
    const entry = this.store.inspectEntry<T>(this.key);
    const isStale = entry?.hasData ? !isEntryFresh(entry, Date.now()) : true;
    return { ...state, isStale };
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Resolve the data for this key. Fresh data resolves without a producer
   * call; stale data resolves immediately and starts one background refetch;
   * with no data the producer is awaited.
   *
   * Never rejects: failures resolve `undefined` and are recorded in state.
   */
  async fetch(): Promise<T | undefined> {
    if (!this.canExecute()) return this.currentState.data;

    const entry = this.store.get<T>(this.key);
    if (entry?.hasData) {
      this.adoptEntry(entry);
      if (!isEntryFresh(entry, Date.now())) {
        this.runInBackground(this.execute(false), 'Background refetch');
      }
      return entry.data;
    }

    try {
      return await this.execute(false);
    } catch {
      // Recorded in state.error
      return undefined;
    }
  }

  /**
   * Start a new generation regardless of freshness. An in-flight request of
   * an older generation is superseded.
   *
   * Never rejects.
   */
  async refetch(): Promise<T | undefined> {
    if (!this.canExecute()) return this.currentState.data;
    try {
      return await this.execute(true);
    } catch {
      // Recorded in state.error
      return this.currentState.data;
    }
  }

  /**
   * Warm the cache. Resolves fresh data without a producer call and rejects
   * with the producer error on failure.
   */
  async prefetch(): Promise<T | undefined> {
    if (!this.canExecute()) return this.currentState.data;
    const entry = this.store.get<T>(this.key);
    if (entry?.hasData && isEntryFresh(entry, Date.now())) {
      this.adoptEntry(entry);
      return entry.data;
    }
    return this.execute(false);
  }

  /**
   * Mark the data for refetch without clearing it. Listeners get a refetch
   * right away unless `refetchActive` is false; otherwise the next access
   * refetches.
   */
  invalidate(options: InvalidateOptions = {}): void {
    const refetchActive = options.refetchActive ?? true;
    this.store.invalidate(this.key);
    this.setState({ isInvalidated: true, isStale: true });
    this.emit({ type: 'invalidated' });

    if (refetchActive && this.listenerCount > 0 && this.canExecute()) {
      this.runInBackground(this.execute(true), 'Refetch after invalidation');
    }
  }

  /** Write data directly, as if a fetch had succeeded */
  setData(updater: T | ((previous: T | undefined) => T)): T {
    const data = isUpdater(updater) ? updater(this.currentState.data) : updater;
    const entry = this.store.set(this.key, data, this.cacheMetadata());
    this.setState({
      status: 'success',
      data,
      error: undefined,
      dataUpdatedAt: entry.updatedAt,
      isStale: !isEntryFresh(entry, Date.now()),
      isInvalidated: false,
    });
    return data;
  }

  /** Enable or disable execution. Enabling a mounted query fetches if needed. */
  setEnabled(enabled: boolean): void {
    if (this.enabled === enabled) return;
    this.enabled = enabled;
    if (enabled && this.listenerCount > 0) {
      this.runInBackground(this.fetch(), 'Fetch after enable');
    }
  }

  /** In-flight results are discarded and never reach the store */
  override dispose(): void {
    if (this.current) this.context.deduplicator.forget(this.key, this.current);
    this.generation++;
    this.current = null;
    super.dispose();
  }

  // ── Protected ────────────────────────────────────────────────────────

  protected onMount(): void {
    const entry = this.store.get<T>(this.key);
    if (entry?.hasData) {
      this.adoptEntry(entry);
    }
    if (!this.enabled) return;

    const hasData = entry?.hasData ?? false;
    const stale = !entry || !isEntryFresh(entry, Date.now());
    if (!hasData || stale || this.options.refetchOnMount) {
      this.runInBackground(this.execute(hasData && this.options.refetchOnMount), 'Fetch on mount');
    }
  }

  protected cacheMetadata(): CacheEntryMetadata {
    return {
      staleTime: this.options.staleTime,
      cacheTime: this.options.cacheTime,
      isSecure: this.options.isSecure,
      maxAge: this.options.maxAge,
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private canExecute(): boolean {
    return this.enabled && !this.disposed;
  }

  /**
   * Join the in-flight request for the key, or start a new generation when
   * there is none or `force` is set. Rejects with the producer error.
   */
  private execute(force: boolean): Promise<T> {
    const inFlight = this.context.deduplicator.get<T>(this.key);
    if (inFlight && !force) {
      return inFlight === this.current ? inFlight : this.follow(inFlight);
    }

    const generation = ++this.generation;
    const promise = this.runGeneration(generation);
    this.current = promise;
    this.context.deduplicator.track(this.key, promise);
    return promise;
  }

  private async runGeneration(generation: number): Promise<T> {
    if (this.breaker && !this.breaker.canAttempt()) {
      const error = new CircuitOpenError(this.breaker.scope, this.breaker.retryAt);
      this.applyFailure(error);
      throw error;
    }

    const previous = this.currentState;
    this.setState({
      status: previous.status === 'idle' ? 'loading' : previous.status,
      isFetching: true,
    });
    this.emit({ type: 'fetch-start' });

    let data: T;
    try {
      data = await this.timeProducer(this.producer);
    } catch (caught) {
      const error = toError(caught);
      this.breaker?.recordFailure(error);
      if (generation !== this.generation) return this.newestOutcome(generation);
      this.applyFailure(error);
      throw error;
    }

    this.breaker?.recordSuccess();
    if (generation !== this.generation) return this.newestOutcome(generation);
    this.applySuccess(data);
    return data;
  }

  /** Await a request started by another instance for the same key */
  private async follow(inFlight: Promise<T>): Promise<T> {
    this.setState({ isFetching: true });
    try {
      return await inFlight;
    } finally {
      const entry = this.store.inspectEntry<T>(this.key);
      if (entry?.hasData) this.adoptEntry(entry);
      this.setState({ isFetching: false });
    }
  }

  private newestOutcome(generation: number): Promise<T> {
    this.logger.debug('Discarding superseded result', {
      key: this.key,
      generation,
      newest: this.generation,
    });
    return (
      this.current ??
      Promise.reject(
        new QueryLaneError({ code: 'QL_X900', message: 'Query disposed before it settled' })
      )
    );
  }

  private applySuccess(data: T): void {
    if (this.disposed) return;
    const entry = this.store.set(this.key, data, this.cacheMetadata());
    this.setState({
      status: 'success',
      isFetching: false,
      data,
      error: undefined,
      dataUpdatedAt: entry.updatedAt,
      isStale: !isEntryFresh(entry, Date.now()),
      isInvalidated: false,
      fetchFailureCount: 0,
    });

    const { onSuccess, onSettled } = this.options;
    if (onSuccess) this.invokeCallback('onSuccess', () => onSuccess(data));
    if (onSettled) this.invokeCallback('onSettled', () => onSettled(data, undefined));
  }

  private applyFailure(error: Error): void {
    if (this.disposed) return;
    const previous = this.currentState;
    const hasData = previous.status === 'success';
    this.setState({
      status: hasData ? 'success' : 'error',
      isFetching: false,
      error,
      fetchFailureCount: previous.fetchFailureCount + 1,
    });
    this.logger.warn('Query fetch failed', {
      key: this.key,
      error: error.message,
      keptData: hasData,
    });

    const { onError, onSettled } = this.options;
    if (onError) this.invokeCallback('onError', () => onError(error));
    if (onSettled) this.invokeCallback('onSettled', () => onSettled(previous.data, error));
  }

  /** Take over data another writer put in the store */
  private adoptEntry(entry: Readonly<CacheEntry<T>>): void {
    const state = this.currentState;
    if (state.dataUpdatedAt === entry.updatedAt && state.status === 'success') return;
    this.setState({
      status: 'success',
      data: entry.data,
      dataUpdatedAt: entry.updatedAt,
      isStale: !isEntryFresh(entry, Date.now()),
      isInvalidated: entry.isInvalidated,
    });
  }

  private resolveBreaker(): CircuitBreaker | undefined {
    const config = this.options.circuitBreaker;
    const registry = this.context.breakers;
    if (!config || !registry) return undefined;
    const settings = config === true ? {} : config;
    return registry.get(settings.scope ?? this.key, settings);
  }
}

function isUpdater<T>(value: T | ((previous: T | undefined) => T)): value is (previous: T | undefined) => T {
  return typeof value === 'function';
}
