import { BehaviorSubject, type Observable, type Subscription } from 'rxjs';
import { ConfigurationError, QueryLaneError, toError } from '../errors/querylane-error.js';
import type { QueryLaneLogger } from '../observability/logger.js';
import { computeBackoffDelay, sleep } from '../utils/backoff.js';
import { mutationOptionsSchema, validateConfig } from '../validation/schemas.js';
import type { OfflineMutationEntry, OfflineQueueEvent } from './offline-queue.js';
import type {
  MutationContext,
  MutationFn,
  MutationLifecycleEvent,
  MutationOptions,
  MutationState,
} from './types.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type MutationEventInit = DistributiveOmit<MutationLifecycleEvent, 'mutationType' | 'timestamp'>;

interface ReplayWaiter<TData> {
  resolve: (data: TData) => void;
  reject: (error: Error) => void;
}

interface Follower<TData> {
  subscription: Subscription;
  waiter: ReplayWaiter<TData> | undefined;
}

const DEFAULT_MAX_RETRIES = 0;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_MAX_RETRY_DELAY_MS = 30_000;

function initialState<TData, TVariables>(): MutationState<TData, TVariables> {
  return {
    status: 'idle',
    data: undefined,
    error: undefined,
    variables: undefined,
    isQueued: false,
    failureCount: 0,
    queuedEntryId: undefined,
  };
}

/**
 * One-shot write around a producer, with retry and offline queuing.
 *
 * Online, the producer runs and is retried with exponential backoff up to
 * `maxRetries` times. Offline with `queueWhenOffline`, the variables go to
 * the offline queue under `mutationType`; the state then stays `idle` with
 * `isQueued` until the queue replays the entry, and follows that replay.
 *
 * The most recent call owns the state. Callbacks run for every call.
 *
 * @example
 * ```typescript
 * const addTodo = client.getMutation((input: NewTodo) => api.addTodo(input), {
 *   mutationType: 'addTodo',
 *   queueWhenOffline: true,
 *   onMutate: (input) => {
 *     const previous = client.getQueryData<Todo[]>('todos');
 *     client.setQueryData<Todo[]>('todos', (todos = []) => [...todos, draft(input)]);
 *     return previous;
 *   },
 *   onError: (_error, _input, previous) => client.setQueryData('todos', previous ?? []),
 * });
 *
 * await addTodo.mutate({ title: 'Write docs' });
 * ```
 */
export class Mutation<TData, TVariables, TContext = unknown> {
  private readonly producer: MutationFn<TData, TVariables>;
  private readonly options: MutationOptions<TData, TVariables, TContext>;
  private readonly context: MutationContext;
  private readonly logger: QueryLaneLogger;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly stateSubject = new BehaviorSubject<MutationState<TData, TVariables>>(
    initialState()
  );
  private readonly followers = new Set<Follower<TData>>();
  private runId = 0;
  private disposed = false;
  private backoff = new AbortController();

  readonly state$: Observable<MutationState<TData, TVariables>>;

  constructor(
    producer: MutationFn<TData, TVariables>,
    options: MutationOptions<TData, TVariables, TContext>,
    context: MutationContext
  ) {
    validateConfig(mutationOptionsSchema, options, { mutationType: options.mutationType });
    if (options.queueWhenOffline && !options.mutationType) {
      throw new ConfigurationError(['queueWhenOffline is set but mutationType is missing'], {
        code: 'QL_C102',
      });
    }

    this.producer = producer;
    this.options = options;
    this.context = context;
    this.logger = context.logger;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
    this.state$ = this.stateSubject.asObservable();
  }

  get state(): MutationState<TData, TVariables> {
    return this.stateSubject.getValue();
  }

  get mutationType(): string | undefined {
    return this.options.mutationType;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Run the write. Resolves the data, or `undefined` when the write failed or
   * was queued; the outcome is always in `state`.
   *
   * Never rejects.
   */
  async mutate(variables: TVariables): Promise<TData | undefined> {
    try {
      if (this.shouldQueue()) {
        await this.enqueueOffline(variables, undefined);
        return undefined;
      }
      return await this.run(variables);
    } catch {
      // Recorded in state.error
      return undefined;
    }
  }

  /**
   * Run the write and reject with the producer error on failure. A queued
   * write settles when the offline queue replays it or gives up on it.
   */
  mutateAsync(variables: TVariables): Promise<TData> {
    if (!this.shouldQueue()) return this.run(variables);
    return new Promise<TData>((resolve, reject) => {
      void this.enqueueOffline(variables, { resolve, reject }).catch(reject);
    });
  }

  /** Back to idle. Queued entries stay queued but no longer drive the state. */
  reset(): void {
    this.runId++;
    this.cancelBackoff();
    if (!this.disposed) this.stateSubject.next(initialState());
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.runId++;
    this.cancelBackoff();
    for (const follower of this.followers) {
      follower.subscription.unsubscribe();
      follower.waiter?.reject(
        new QueryLaneError({ code: 'QL_X900', message: 'Mutation disposed before its queued write settled' })
      );
    }
    this.followers.clear();
    this.stateSubject.complete();
    this.context.onDispose?.(this);
  }

  // ── Private ──────────────────────────────────────────────────────────

  private cancelBackoff(): void {
    this.backoff.abort();
    this.backoff = new AbortController();
  }

  private shouldQueue(): boolean {
    return this.options.queueWhenOffline === true && !this.context.network.isOnline;
  }

  private async run(variables: TVariables): Promise<TData> {
    this.assertUsable();
    const runId = ++this.runId;
    const startedAt = performance.now();
    this.update(runId, {
      ...initialState<TData, TVariables>(),
      status: 'loading',
      variables,
    });
    this.emit({ type: 'mutation-start' });

    let context: TContext | undefined;
    try {
      context = await this.options.onMutate?.(variables);
      const data = await this.runWithRetry(runId, variables);
      this.succeed(runId, data, variables, context, startedAt);
      return data;
    } catch (caught) {
      const error = toError(caught);
      if (runId !== this.runId && QueryLaneError.isCode(error, 'QL_X900')) throw error;
      this.fail(runId, error, variables, context, startedAt, {});
      throw error;
    }
  }

  /** Retries stop once the run is reset, disposed or superseded */
  private async runWithRetry(runId: number, variables: TVariables): Promise<TData> {
    let failures = 0;
    for (;;) {
      try {
        return await this.producer(variables);
      } catch (error) {
        failures++;
        this.update(runId, { failureCount: failures });
        if (failures > this.maxRetries) throw error;

        const delayMs = computeBackoffDelay(failures, this.retryDelayMs, this.maxRetryDelayMs);
        this.logger.debug('Retrying mutation', {
          mutationType: this.options.mutationType,
          attempt: failures + 1,
          delayMs,
        });
        await sleep(delayMs, this.backoff.signal);
        if (runId !== this.runId) {
          throw new QueryLaneError({
            code: 'QL_X900',
            message: 'Mutation was reset or disposed before its retry',
          });
        }
      }
    }
  }

  private async enqueueOffline(
    variables: TVariables,
    waiter: ReplayWaiter<TData> | undefined
  ): Promise<OfflineMutationEntry> {
    this.assertUsable();
    const typeId = this.options.mutationType;
    if (!typeId) {
      throw new ConfigurationError(['queueWhenOffline is set but mutationType is missing'], {
        code: 'QL_C102',
      });
    }

    const runId = ++this.runId;
    const startedAt = performance.now();
    let context: TContext | undefined;
    let entry: OfflineMutationEntry;
    try {
      context = await this.options.onMutate?.(variables);
      entry = this.context.queue.enqueue(typeId, variables, { priority: this.options.priority });
    } catch (caught) {
      const error = toError(caught);
      this.fail(runId, error, variables, context, startedAt, {});
      throw error;
    }

    this.follow(runId, entry.id, variables, context, waiter);
    this.update(runId, {
      ...initialState<TData, TVariables>(),
      variables,
      isQueued: true,
      queuedEntryId: entry.id,
    });
    this.emit({ type: 'mutation-queued', entryId: entry.id });
    this.logger.info('Mutation queued while offline', { mutationType: typeId, entryId: entry.id });

    const { onQueued } = this.options;
    if (onQueued) this.invokeCallback('onQueued', () => onQueued(variables, entry));
    return entry;
  }

  /** Mirror the queue's handling of one entry into this mutation */
  private follow(
    runId: number,
    entryId: string,
    variables: TVariables,
    context: TContext | undefined,
    waiter: ReplayWaiter<TData> | undefined
  ): void {
    let replayStartedAt = performance.now();

    const handle = (event: OfflineQueueEvent): void => {
      switch (event.type) {
        case 'replaying':
          if (event.entry.id !== entryId) return;
          replayStartedAt = performance.now();
          this.update(runId, { status: 'loading' });
          this.emit({ type: 'mutation-start' });
          return;

        case 'failed':
          if (event.entry.id !== entryId) return;
          this.update(runId, {
            status: 'error',
            error: event.error,
            failureCount: event.entry.attempts,
          });
          return;

        case 'replayed': {
          if (event.entry.id !== entryId) return;
          stop();
          // The handler registered for this mutation type performs this mutation's write
          const data = event.data as TData;
          this.succeed(runId, data, variables, context, replayStartedAt);
          waiter?.resolve(data);
          return;
        }

        case 'dead':
          if (event.entry.id !== entryId) return;
          stop();
          this.fail(runId, event.error, variables, context, replayStartedAt, {
            failureCount: event.entry.attempts,
          });
          waiter?.reject(event.error);
          return;

        case 'removed':
          if (event.entryId !== entryId) return;
          stop();
          this.update(runId, { status: 'idle', isQueued: false, queuedEntryId: undefined });
          waiter?.reject(new QueryLaneError({ code: 'QL_O403', context: { entryId } }));
          return;

        default:
          return;
      }
    };

    const follower: Follower<TData> = {
      subscription: this.context.queue.events$.subscribe(handle),
      waiter,
    };
    const stop = (): void => {
      follower.subscription.unsubscribe();
      this.followers.delete(follower);
    };
    this.followers.add(follower);
  }

  private succeed(
    runId: number,
    data: TData,
    variables: TVariables,
    context: TContext | undefined,
    startedAt: number
  ): void {
    this.update(runId, {
      status: 'success',
      data,
      error: undefined,
      isQueued: false,
      queuedEntryId: undefined,
    });
    this.emit({ type: 'mutation-success', durationMs: elapsedSince(startedAt) });

    const { onSuccess, onSettled } = this.options;
    if (onSuccess) this.invokeCallback('onSuccess', () => onSuccess(data, variables, context));
    if (onSettled) {
      this.invokeCallback('onSettled', () => onSettled(data, undefined, variables, context));
    }
  }

  private fail(
    runId: number,
    error: Error,
    variables: TVariables,
    context: TContext | undefined,
    startedAt: number,
    patch: Partial<MutationState<TData, TVariables>>
  ): void {
    this.update(runId, {
      ...patch,
      status: 'error',
      error,
      variables,
      isQueued: false,
      queuedEntryId: undefined,
    });
    this.emit({ type: 'mutation-error', durationMs: elapsedSince(startedAt), error });
    this.logger.warn('Mutation failed', {
      mutationType: this.options.mutationType,
      error: error.message,
    });

    const { onError, onSettled } = this.options;
    if (onError) this.invokeCallback('onError', () => onError(error, variables, context));
    if (onSettled) {
      this.invokeCallback('onSettled', () => onSettled(undefined, error, variables, context));
    }
  }

  private update(runId: number, patch: Partial<MutationState<TData, TVariables>>): void {
    if (this.disposed || runId !== this.runId) return;
    this.stateSubject.next({ ...this.stateSubject.getValue(), ...patch });
  }

  private emit(init: MutationEventInit): void {
    this.context.emit?.({
      ...init,
      mutationType: this.options.mutationType,
      timestamp: Date.now(),
    });
  }

  private invokeCallback(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error(`${name} callback threw`, error, {
        mutationType: this.options.mutationType,
      });
    }
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new QueryLaneError({ code: 'QL_X900', message: 'Mutation has been disposed' });
    }
  }
}

function elapsedSince(startedAt: number): number {
  return Math.round((performance.now() - startedAt) * 100) / 100;
}
