import type { QueryLaneLogger } from '../observability/logger.js';
import type { NetworkStatus } from '../network/network-status.js';
import type { OfflineMutationEntry, OfflineQueueManager } from './offline-queue.js';

export type MutationStatus = 'idle' | 'loading' | 'success' | 'error';

export type MutationFn<TData, TVariables> = (variables: TVariables) => Promise<TData>;

export interface MutationState<TData, TVariables> {
  status: MutationStatus;
  data: TData | undefined;
  error: Error | undefined;
  variables: TVariables | undefined;
  /** Waiting in the offline queue */
  isQueued: boolean;
  failureCount: number;
  /** Offline queue entry this mutation is following */
  queuedEntryId: string | undefined;
}

export interface MutationOptions<TData, TVariables, TContext = unknown> {
  /** Registry id used to replay the mutation from the offline queue */
  mutationType?: string;
  /** Retries after the first online failure (default: 0) */
  maxRetries?: number;
  /** Base delay of the exponential backoff (default: 1000) */
  retryDelayMs?: number;
  /** Backoff ceiling (default: 30000) */
  maxRetryDelayMs?: number;
  /** Offline queue priority, higher replays first (default: 0) */
  priority?: number;
  /** Queue instead of executing while offline (default: false) */
  queueWhenOffline?: boolean;

  /** Runs before the write; its result is handed to the other callbacks */
  onMutate?: (variables: TVariables) => TContext | Promise<TContext>;
  onSuccess?: (data: TData, variables: TVariables, context: TContext | undefined) => void;
  onError?: (error: Error, variables: TVariables, context: TContext | undefined) => void;
  onSettled?: (
    data: TData | undefined,
    error: Error | undefined,
    variables: TVariables,
    context: TContext | undefined
  ) => void;
  onQueued?: (variables: TVariables, entry: OfflineMutationEntry) => void;
}

export type MutationLifecycleEvent =
  | { type: 'mutation-start'; mutationType: string | undefined; timestamp: number }
  | {
      type: 'mutation-success';
      mutationType: string | undefined;
      timestamp: number;
      durationMs: number;
    }
  | {
      type: 'mutation-error';
      mutationType: string | undefined;
      timestamp: number;
      durationMs: number;
      error: Error;
    }
  | {
      type: 'mutation-queued';
      mutationType: string | undefined;
      timestamp: number;
      entryId: string;
    };

export interface MutationContext {
  queue: OfflineQueueManager;
  network: NetworkStatus;
  logger: QueryLaneLogger;
  emit?: (event: MutationLifecycleEvent) => void;
  /** Called once when a mutation is disposed */
  onDispose?: (mutation: { dispose(): void }) => void;
}
