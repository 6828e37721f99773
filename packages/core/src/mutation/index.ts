export {
  DEFAULT_MAX_ATTEMPTS,
  MutationTypeRegistry,
  type MutationHandler,
  type MutationTypeOptions,
  type RegisteredMutationType,
} from './mutation-registry.js';

export {
  OfflineQueueManager,
  type DeadMutationEntry,
  type DrainResult,
  type EnqueueOptions,
  type OfflineMutationEntry,
  type OfflineQueueConfig,
  type OfflineQueueEvent,
  type OfflineQueueStats,
  type OfflineQueueStorage,
  type ProcessQueueOptions,
} from './offline-queue.js';

export { Mutation } from './mutation.js';

export type {
  MutationContext,
  MutationFn,
  MutationLifecycleEvent,
  MutationOptions,
  MutationState,
  MutationStatus,
} from './types.js';
