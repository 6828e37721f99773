/**
 * OfflineQueueManager: durable-ordering queue for mutations issued while
 * offline.
 *
 * Entries replay in priority order (higher first), then in enqueue order.
 * Every entry ends either replayed or dead; both outcomes are published on
 * `events$`.
 *
 * @example
 * ```typescript
 * const registry = new MutationTypeRegistry();
 * registry.register('createPost', (input: NewPost) => api.createPost(input));
 *
 * const queue = new OfflineQueueManager(registry, { network });
 * queue.enqueue('createPost', { title: 'Draft' }, { priority: 2 });
 *
 * network.setOnline(true);
 * const result = await queue.processQueue();
 * // result.replayed === 1
 * ```
 */

import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import {
  InvalidVariablesError,
  QueueExhaustedError,
  UnknownMutationTypeError,
  toError,
  type QueryLaneError,
} from '../errors/querylane-error.js';
import { QueryLaneLogger } from '../observability/logger.js';
import type { NetworkStatus } from '../network/network-status.js';
import { describeNonJson } from '../validation/key-validation.js';
import {
  serializedQueueSchema,
  validateConfig,
  type SerializedQueue,
} from '../validation/schemas.js';
import type { MutationTypeRegistry } from './mutation-registry.js';

// ── Types ──────────────────────────────────────────────────

export interface OfflineMutationEntry {
  readonly id: string;
  readonly typeId: string;
  /** JSON value handed to the type's handler on replay */
  readonly variables: unknown;
  readonly priority: number;
  readonly attempts: number;
  readonly enqueuedAt: number;
  /** Enqueue order, the tie-breaker within a priority */
  readonly sequence: number;
  readonly lastError?: string;
}

export interface DeadMutationEntry extends OfflineMutationEntry {
  readonly error: QueryLaneError;
  readonly diedAt: number;
}

export interface EnqueueOptions {
  /** Higher replays first (default: 0) */
  priority?: number;
}

export interface ProcessQueueOptions {
  /** Entries replayed at the same time (default: the queue's `concurrency`) */
  concurrency?: number;
}

export interface DrainResult {
  replayed: number;
  failed: number;
  dead: number;
  /** Entries still pending when the drain stopped */
  remaining: number;
}

/**
 * Persistence port. The queue serializes itself after every change and reads
 * the stored form back in `load()`.
 */
export interface OfflineQueueStorage {
  load(): Promise<unknown>;
  save(queue: SerializedQueue): Promise<void>;
}

export interface OfflineQueueConfig {
  /** Default replay concurrency (default: 1) */
  concurrency?: number;
  /** Replays only run while this reports online; always online without it */
  network?: NetworkStatus;
  storage?: OfflineQueueStorage;
  logger?: QueryLaneLogger;
}

export interface OfflineQueueStats {
  pending: number;
  dead: number;
  inFlight: number;
  byType: Record<string, number>;
  totalEnqueued: number;
  totalReplayed: number;
  totalDead: number;
  isProcessing: boolean;
}

export type OfflineQueueEvent =
  | { type: 'enqueued'; entry: OfflineMutationEntry }
  | { type: 'replaying'; entry: OfflineMutationEntry }
  | { type: 'replayed'; entry: OfflineMutationEntry; data: unknown }
  | { type: 'failed'; entry: OfflineMutationEntry; error: Error }
  | { type: 'dead'; entry: DeadMutationEntry; error: QueryLaneError }
  | { type: 'removed'; entryId: string }
  | { type: 'drained'; result: DrainResult };

type ReplayOutcome = 'replayed' | 'failed' | 'dead';

// ── Implementation ────────────────────────────────────────

export class OfflineQueueManager {
  private readonly registry: MutationTypeRegistry;
  private readonly concurrency: number;
  private readonly network: NetworkStatus | undefined;
  private readonly storage: OfflineQueueStorage | undefined;
  private readonly logger: QueryLaneLogger;

  private readonly entries = new Map<string, OfflineMutationEntry>();
  private readonly deadEntries = new Map<string, DeadMutationEntry>();
  private readonly inFlight = new Set<string>();
  private readonly destroy$ = new Subject<void>();
  private readonly eventsSubject = new Subject<OfflineQueueEvent>();
  private readonly statsSubject: BehaviorSubject<OfflineQueueStats>;

  private sequence = 0;
  private totalEnqueued = 0;
  private totalReplayed = 0;
  private totalDead = 0;
  private draining: Promise<DrainResult> | null = null;
  private destroyed = false;
  private saveChain: Promise<void> = Promise.resolve();

  /** Observable of queue events. */
  readonly events$: Observable<OfflineQueueEvent>;
  /** Observable of queue statistics. */
  readonly stats$: Observable<OfflineQueueStats>;

  constructor(registry: MutationTypeRegistry, config: OfflineQueueConfig = {}) {
    this.registry = registry;
    this.concurrency = config.concurrency ?? 1;
    this.network = config.network;
    this.storage = config.storage;
    this.logger = config.logger ?? new QueryLaneLogger({ module: 'querylane:offline-queue' });

    this.statsSubject = new BehaviorSubject<OfflineQueueStats>(this.buildStats());
    this.events$ = this.eventsSubject.asObservable().pipe(takeUntil(this.destroy$));
    this.stats$ = this.statsSubject.asObservable().pipe(takeUntil(this.destroy$));
  }

  get length(): number {
    return this.entries.size;
  }

  get isProcessing(): boolean {
    return this.draining !== null;
  }

  /**
   * Queue a mutation for replay.
   *
   * @throws InvalidVariablesError when `variables` is not a plain JSON value
   */
  enqueue(typeId: string, variables: unknown, options: EnqueueOptions = {}): OfflineMutationEntry {
    const problem = describeNonJson(variables);
    if (problem !== null) {
      throw new InvalidVariablesError(typeId, problem);
    }

    const sequence = ++this.sequence;
    const entry: OfflineMutationEntry = {
      id: `oq_${sequence}_${Date.now()}`,
      typeId,
      variables,
      priority: options.priority ?? 0,
      attempts: 0,
      enqueuedAt: Date.now(),
      sequence,
    };

    this.entries.set(entry.id, entry);
    this.totalEnqueued++;
    this.logger.debug('Mutation queued', { id: entry.id, typeId, priority: entry.priority });
    this.eventsSubject.next({ type: 'enqueued', entry });
    this.changed();
    return entry;
  }

  /**
   * Replay pending entries while online. Calls made while a drain is running
   * share it. A failed entry is not attempted again within the same drain.
   */
  processQueue(options: ProcessQueueOptions = {}): Promise<DrainResult> {
    if (this.draining) return this.draining;
    return this.startDrain(options.concurrency ?? this.concurrency, () => true);
  }

  /** Replay only entries of one type, after any running drain finishes */
  async processQueueByType(typeId: string, options: ProcessQueueOptions = {}): Promise<DrainResult> {
    while (this.draining) {
      await this.draining;
    }
    return this.startDrain(
      options.concurrency ?? this.concurrency,
      (entry) => entry.typeId === typeId
    );
  }

  /** Pending entries in replay order */
  getEntries(): OfflineMutationEntry[] {
    return Array.from(this.entries.values()).sort(compareEntries);
  }

  getEntriesByType(typeId: string): OfflineMutationEntry[] {
    return this.getEntries().filter((entry) => entry.typeId === typeId);
  }

  getEntry(id: string): OfflineMutationEntry | undefined {
    return this.entries.get(id);
  }

  /** Pending entry count per mutation type */
  getQueueStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const entry of this.entries.values()) {
      stats[entry.typeId] = (stats[entry.typeId] ?? 0) + 1;
    }
    return stats;
  }

  getStats(): OfflineQueueStats {
    return this.statsSubject.getValue();
  }

  getDeadEntries(): DeadMutationEntry[] {
    return Array.from(this.deadEntries.values()).sort(compareEntries);
  }

  /**
   * Move a dead entry back into the queue with its attempts reset. It keeps
   * its id and goes behind the entries already waiting at its priority.
   */
  retryDead(id: string): OfflineMutationEntry | undefined {
    const dead = this.deadEntries.get(id);
    if (!dead) return undefined;

    this.deadEntries.delete(id);
    const entry: OfflineMutationEntry = {
      id: dead.id,
      typeId: dead.typeId,
      variables: dead.variables,
      priority: dead.priority,
      attempts: 0,
      enqueuedAt: dead.enqueuedAt,
      sequence: ++this.sequence,
    };
    this.entries.set(id, entry);
    this.logger.info('Dead mutation re-queued', { id, typeId: entry.typeId });
    this.eventsSubject.next({ type: 'enqueued', entry });
    this.changed();
    return entry;
  }

  /** @returns the number of dead entries dropped */
  clearDead(): number {
    const count = this.deadEntries.size;
    this.deadEntries.clear();
    if (count > 0) this.changed();
    return count;
  }

  /**
   * Drop a pending entry. An entry that is replaying right now still
   * finishes, but its result is not recorded.
   */
  remove(id: string): boolean {
    if (!this.entries.delete(id)) return false;
    this.eventsSubject.next({ type: 'removed', entryId: id });
    this.changed();
    return true;
  }

  /** Drop every pending entry. Dead entries are kept. */
  clear(): void {
    const ids = Array.from(this.entries.keys());
    this.entries.clear();
    for (const entryId of ids) {
      this.eventsSubject.next({ type: 'removed', entryId });
    }
    this.changed();
  }

  /** Persistable form of the pending entries, in replay order */
  serialize(): SerializedQueue {
    return {
      version: 1,
      entries: this.getEntries().map((entry) => ({
        id: entry.id,
        typeId: entry.typeId,
        variables: entry.variables,
        priority: entry.priority,
        attempts: entry.attempts,
        enqueuedAt: entry.enqueuedAt,
      })),
    };
  }

  /**
   * Add entries from a serialized queue. Entries whose id is already pending
   * are skipped; the rest keep their persisted order.
   *
   * @returns the number of entries added
   * @throws ConfigurationError when the data does not match the serialized form
   */
  restore(data: unknown): number {
    const parsed = validateConfig(serializedQueueSchema, data, { source: 'offline-queue' });

    let added = 0;
    for (const stored of parsed.entries) {
      const problem = describeNonJson(stored.variables);
      if (problem !== null) {
        throw new InvalidVariablesError(stored.typeId, problem);
      }

      const sequence = ++this.sequence;
      const id = stored.id ?? `oq_${sequence}_${stored.enqueuedAt}`;
      if (this.entries.has(id)) continue;

      this.entries.set(id, {
        id,
        typeId: stored.typeId,
        variables: stored.variables,
        priority: stored.priority,
        attempts: stored.attempts,
        enqueuedAt: stored.enqueuedAt,
        sequence,
      });
      added++;
    }

    if (added > 0) {
      this.logger.info('Offline queue restored', { added });
      this.changed();
    }
    return added;
  }

  /** Read the storage port back into the queue */
  async load(): Promise<number> {
    if (!this.storage) return 0;
    const stored = await this.storage.load();
    if (stored === undefined || stored === null) return 0;
    return this.restore(stored);
  }

  /** Resolves once every pending save has reached the storage port */
  flush(): Promise<void> {
    return this.saveChain;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.eventsSubject.complete();
    this.statsSubject.complete();
  }

  // ── Private ──────────────────────────────────────────────

  private isOnline(): boolean {
    return this.network?.isOnline ?? true;
  }

  private startDrain(
    concurrency: number,
    filter: (entry: OfflineMutationEntry) => boolean
  ): Promise<DrainResult> {
    const run = this.drain(Math.max(1, concurrency), filter).finally(() => {
      if (this.draining === run) {
        this.draining = null;
        this.emitStats();
      }
    });
    this.draining = run;
    this.emitStats();
    return run;
  }

  private async drain(
    concurrency: number,
    filter: (entry: OfflineMutationEntry) => boolean
  ): Promise<DrainResult> {
    const end = this.logger.time('Offline queue drain');
    const attempted = new Set<string>();
    const result: DrainResult = { replayed: 0, failed: 0, dead: 0, remaining: 0 };

    const next = (): OfflineMutationEntry | undefined => {
      if (!this.isOnline()) return undefined;
      return this.getEntries().find(
        (entry) => !attempted.has(entry.id) && !this.inFlight.has(entry.id) && filter(entry)
      );
    };

    const worker = async (): Promise<void> => {
      for (let entry = next(); entry; entry = next()) {
        attempted.add(entry.id);
        const outcome = await this.replay(entry);
        result[outcome]++;
      }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    result.remaining = this.entries.size;
    end({ ...result });
    this.eventsSubject.next({ type: 'drained', result: { ...result } });
    return result;
  }

  private async replay(entry: OfflineMutationEntry): Promise<ReplayOutcome> {
    const type = this.registry.get(entry.typeId);
    if (!type) {
      this.moveToDead(entry, new UnknownMutationTypeError(entry.typeId));
      return 'dead';
    }

    this.inFlight.add(entry.id);
    this.eventsSubject.next({ type: 'replaying', entry });

    try {
      const data = await type.handler(entry.variables);
      if (this.entries.delete(entry.id)) {
        this.totalReplayed++;
        this.eventsSubject.next({ type: 'replayed', entry, data });
        this.changed();
      }
      return 'replayed';
    } catch (caught) {
      const error = toError(caught);
      if (!this.entries.has(entry.id)) return 'failed';

      const updated: OfflineMutationEntry = {
        ...entry,
        attempts: entry.attempts + 1,
        lastError: error.message,
      };

      if (updated.attempts >= type.maxAttempts) {
        this.moveToDead(
          updated,
          new QueueExhaustedError(updated.id, updated.typeId, updated.attempts, error)
        );
        return 'dead';
      }

      this.entries.set(updated.id, updated);
      this.logger.warn('Queued mutation failed', {
        id: updated.id,
        typeId: updated.typeId,
        attempts: updated.attempts,
        maxAttempts: type.maxAttempts,
        error: error.message,
      });
      this.eventsSubject.next({ type: 'failed', entry: updated, error });
      this.changed();
      return 'failed';
    } finally {
      this.inFlight.delete(entry.id);
    }
  }

  private moveToDead(entry: OfflineMutationEntry, error: QueryLaneError): void {
    const dead: DeadMutationEntry = { ...entry, error, diedAt: Date.now() };
    this.entries.delete(entry.id);
    this.deadEntries.set(entry.id, dead);
    this.totalDead++;
    this.logger.error('Queued mutation moved to dead entries', error, {
      id: entry.id,
      typeId: entry.typeId,
    });
    this.eventsSubject.next({ type: 'dead', entry: dead, error });
    this.changed();
  }

  private changed(): void {
    this.emitStats();
    this.persist();
  }

  private persist(): void {
    const storage = this.storage;
    if (!storage) return;
    const snapshot = this.serialize();
    this.saveChain = this.saveChain
      .then(() => storage.save(snapshot))
      .catch((error: unknown) => {
        this.logger.error('Failed to persist offline queue', error, {
          entries: snapshot.entries.length,
        });
      });
  }

  private buildStats(): OfflineQueueStats {
    return {
      pending: this.entries.size,
      dead: this.deadEntries.size,
      inFlight: this.inFlight.size,
      byType: this.getQueueStats(),
      totalEnqueued: this.totalEnqueued,
      totalReplayed: this.totalReplayed,
      totalDead: this.totalDead,
      isProcessing: this.draining !== null,
    };
  }

  private emitStats(): void {
    if (this.destroyed) return;
    this.statsSubject.next(this.buildStats());
  }
}

function compareEntries(a: OfflineMutationEntry, b: OfflineMutationEntry): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  return a.sequence - b.sequence;
}
