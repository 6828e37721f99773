import type { CacheEntry, EvictionPolicyName } from '../types.js';

/**
 * Strategy that picks which unreferenced entry the store removes when it is
 * over a limit.
 *
 * Policies keep no state of their own: the bookkeeping lives on the entries,
 * so a store can switch policy at runtime and existing entries are ranked
 * correctly by the new one.
 */
export interface EvictionPolicy {
  readonly name: EvictionPolicyName | (string & {});

  /**
   * Choose a victim among the candidates, or undefined when there is none.
   * The store only passes entries with refCount 0.
   */
  select(candidates: Iterable<CacheEntry>): string | undefined;

  /** Record a read */
  onAccess(entry: CacheEntry, now: number, tick: number): void;

  /** Record a first write */
  onInsert(entry: CacheEntry, now: number, tick: number): void;
}

/**
 * Shared bookkeeping for the built-in policies. Subclasses only decide the
 * ordering.
 */
export abstract class BaseEvictionPolicy implements EvictionPolicy {
  abstract readonly name: EvictionPolicyName;

  /** Negative when `a` should be evicted before `b` */
  protected abstract compare(a: CacheEntry, b: CacheEntry): number;

  select(candidates: Iterable<CacheEntry>): string | undefined {
    let victim: CacheEntry | undefined;
    for (const entry of candidates) {
      if (!victim || this.compare(entry, victim) < 0) {
        victim = entry;
      }
    }
    return victim?.key;
  }

  onAccess(entry: CacheEntry, now: number, tick: number): void {
    entry.lastAccessedAt = now;
    entry.accessCount++;
    entry.accessOrder = tick;
  }

  onInsert(entry: CacheEntry, now: number, tick: number): void {
    entry.createdAt = now;
    entry.lastAccessedAt = now;
    entry.insertOrder = tick;
    entry.accessOrder = tick;
  }
}
