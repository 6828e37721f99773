import type { CacheEntry } from '../types.js';
import { BaseEvictionPolicy } from './eviction-policy.js';

/** Least recently used: oldest `lastAccessedAt` goes first */
export class LruEvictionPolicy extends BaseEvictionPolicy {
  readonly name = 'lru' as const;

  protected compare(a: CacheEntry, b: CacheEntry): number {
    return a.lastAccessedAt - b.lastAccessedAt || a.accessOrder - b.accessOrder;
  }
}
