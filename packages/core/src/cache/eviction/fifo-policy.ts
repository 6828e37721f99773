import type { CacheEntry } from '../types.js';
import { BaseEvictionPolicy } from './eviction-policy.js';

/** First in, first out. Reads do not change the order. */
export class FifoEvictionPolicy extends BaseEvictionPolicy {
  readonly name = 'fifo' as const;

  protected compare(a: CacheEntry, b: CacheEntry): number {
    return a.createdAt - b.createdAt || a.insertOrder - b.insertOrder;
  }
}
