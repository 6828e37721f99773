import type { CacheEntry } from '../types.js';
import { BaseEvictionPolicy } from './eviction-policy.js';

/**
 * Least frequently used: lowest `accessCount`, then least recently used.
 */
export class LfuEvictionPolicy extends BaseEvictionPolicy {
  readonly name = 'lfu' as const;

  protected compare(a: CacheEntry, b: CacheEntry): number {
    return (
      a.accessCount - b.accessCount ||
      a.lastAccessedAt - b.lastAccessedAt ||
      a.accessOrder - b.accessOrder
    );
  }
}
