import { BehaviorSubject, type Observable, type Subscription } from 'rxjs';
import { toError } from '../errors/querylane-error.js';
import type { CacheStore } from '../cache/cache-store.js';
import type { CacheEntryMetadata } from '../cache/types.js';
import type { QueryLaneLogger } from '../observability/logger.js';
import { OperationProfiler } from '../observability/perf.js';
import type { QueryContext, QueryKind, QueryLifecycleEvent, QueryMetrics } from './types.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type LifecycleEventInit = DistributiveOmit<QueryLifecycleEvent, 'kind' | 'key' | 'timestamp'>;

const FETCH_OPERATION = 'fetch';

/**
 * Listener, reference-count and state plumbing shared by {@link Query} and
 * {@link InfiniteQuery}.
 *
 * Each listener holds one reference on the cache entry. The first listener
 * triggers {@link onMount}. When the last one leaves and none returns within
 * the context's `idleDisposeMs`, the client is told so it can drop the
 * instance, while the entry stays in the store for `cacheTime`.
 */
export abstract class BaseQuery<TState> {
  readonly key: string;
  abstract readonly kind: QueryKind;

  protected readonly store: CacheStore;
  protected readonly logger: QueryLaneLogger;
  protected readonly context: QueryContext;
  protected readonly stateSubject: BehaviorSubject<TState>;
  protected disposed = false;

  private listeners = 0;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly profiler: OperationProfiler;
  private fetchCount = 0;
  private successCount = 0;
  private errorCount = 0;
  private lastFetchMs: number | undefined;

  /** Replays the current state to each new subscriber */
  readonly state$: Observable<TState>;

  protected constructor(key: string, context: QueryContext, initialState: TState) {
    this.key = key;
    this.context = context;
    this.store = context.store;
    this.logger = context.logger;
    this.profiler = new OperationProfiler({ logger: context.logger });
    this.stateSubject = new BehaviorSubject<TState>(initialState);
    this.state$ = this.stateSubject.asObservable();
  }

  get listenerCount(): number {
    return this.listeners;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get metrics(): QueryMetrics {
    const summary = this.profiler.getSummary(FETCH_OPERATION);
    return {
      fetchCount: this.fetchCount,
      successCount: this.successCount,
      errorCount: this.errorCount,
      avgFetchMs: summary?.avgMs ?? 0,
      p95FetchMs: summary?.p95Ms ?? 0,
      lastFetchMs: this.lastFetchMs,
    };
  }

  /** Register a subscriber and retain the cache entry */
  addListener(): void {
    if (this.disposed) {
      this.logger.warn('addListener on disposed query', { key: this.key });
      return;
    }
    this.cancelIdle();
    this.listeners++;
    this.store.retain(this.key, this.cacheMetadata());
    if (this.listeners === 1) {
      this.onMount();
    }
  }

  /** Unregister a subscriber and release the cache entry */
  removeListener(): void {
    if (this.listeners === 0) return;
    this.listeners--;
    this.store.release(this.key);
    if (this.listeners === 0) {
      this.scheduleIdle();
    }
  }

  /**
   * Listen to state changes. Counts as a listener until the returned
   * subscription is closed.
   */
  subscribe(listener: (state: TState) => void): Subscription {
    this.addListener();
    const subscription = this.state$.subscribe(listener);
    subscription.add(() => this.removeListener());
    return subscription;
  }

  /**
   * Tear the instance down. Outstanding references are released; the cache
   * entry itself is left to the store.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelIdle();
    while (this.listeners > 0) {
      this.listeners--;
      this.store.release(this.key);
    }
    this.emit({ type: 'disposed' });
    this.stateSubject.complete();
  }

  // ── Protected ────────────────────────────────────────────────────────

  /** First listener attached */
  protected abstract onMount(): void;

  /** Metadata for cache writes and placeholder entries */
  protected abstract cacheMetadata(): CacheEntryMetadata;

  protected get currentState(): TState {
    return this.stateSubject.getValue();
  }

  protected setState(patch: Partial<TState>): void {
    if (this.disposed) return;
    this.stateSubject.next({ ...this.stateSubject.getValue(), ...patch });
  }

  protected emit(init: LifecycleEventInit): void {
    this.context.emit?.({ ...init, kind: this.kind, key: this.key, timestamp: Date.now() });
  }

  /**
   * Time a producer call and feed the duration into the query and cache
   * metrics.
   */
  protected async timeProducer<R>(producer: () => Promise<R>): Promise<R> {
    this.fetchCount++;
    const end = this.profiler.start(FETCH_OPERATION);
    const finish = (): number => {
      const { durationMs } = end({ key: this.key });
      this.lastFetchMs = durationMs;
      this.store.recordFetch(durationMs);
      return durationMs;
    };

    try {
      const result = await producer();
      const durationMs = finish();
      this.successCount++;
      this.emit({ type: 'fetch-success', durationMs });
      return result;
    } catch (error) {
      const durationMs = finish();
      this.errorCount++;
      this.emit({
        type: 'fetch-error',
        durationMs,
        error: toError(error),
      });
      throw error;
    }
  }

  /** Run a user callback; a throwing callback is logged, never propagated */
  protected invokeCallback(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error(`${name} callback threw`, error, { key: this.key });
    }
  }

  /** Start work whose outcome is already recorded in state */
  protected runInBackground(promise: Promise<unknown>, action: string): void {
    void promise.catch((error: unknown) => {
      this.logger.debug(`${action} failed`, {
        key: this.key,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private scheduleIdle(): void {
    const { onIdle, idleDisposeMs = 0 } = this.context;
    if (!onIdle) return;
    if (idleDisposeMs <= 0) {
      onIdle(this.key, this);
      return;
    }
    const timer = setTimeout(() => {
      this.idleTimer = null;
      if (this.listeners === 0 && !this.disposed) onIdle(this.key, this);
    }, idleDisposeMs);
    timer.unref();
    this.idleTimer = timer;
  }

  private cancelIdle(): void {
    if (this.idleTimer === null) return;
    clearTimeout(this.idleTimer);
    this.idleTimer = null;
  }
}
