import type { EvictionPolicyName } from '../types.js';
import { FifoEvictionPolicy } from './fifo-policy.js';
import { LfuEvictionPolicy } from './lfu-policy.js';
import { LruEvictionPolicy } from './lru-policy.js';
import type { EvictionPolicy } from './eviction-policy.js';

export { BaseEvictionPolicy, type EvictionPolicy } from './eviction-policy.js';
export { FifoEvictionPolicy } from './fifo-policy.js';
export { LfuEvictionPolicy } from './lfu-policy.js';
export { LruEvictionPolicy } from './lru-policy.js';

/**
 * Create a built-in eviction policy by name.
 */
export function createEvictionPolicy(name: EvictionPolicyName): EvictionPolicy {
  switch (name) {
    case 'lru':
      return new LruEvictionPolicy();
    case 'lfu':
      return new LfuEvictionPolicy();
    case 'fifo':
      return new FifoEvictionPolicy();
  }
}

/** Accept either a policy name or a custom policy object */
export function resolveEvictionPolicy(policy: EvictionPolicyName | EvictionPolicy): EvictionPolicy {
  return typeof policy === 'string' ? createEvictionPolicy(policy) : policy;
}
