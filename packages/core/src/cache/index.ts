export { CacheStore } from './cache-store.js';
export {
  checkEntryConsistency,
  estimateSize,
  isEntryExpired,
  isEntryFresh,
  snapshotEntry,
} from './cache-entry.js';
export { CacheMetricsTracker } from './cache-metrics.js';
export {
  BaseEvictionPolicy,
  FifoEvictionPolicy,
  LfuEvictionPolicy,
  LruEvictionPolicy,
  createEvictionPolicy,
  resolveEvictionPolicy,
  type EvictionPolicy,
} from './eviction/index.js';
export {
  DEFAULT_CACHE_CONFIG,
  type CacheChangeEvent,
  type CacheChangeReason,
  type CacheEntry,
  type CacheEntryMetadata,
  type CacheInfo,
  type CacheMetrics,
  type CacheStoreConfig,
  type EvictionPolicyName,
  type FetchTimingSummary,
} from './types.js';
