export { BaseQuery } from './base-query.js';
export {
  InfiniteQuery,
  type InfiniteData,
  type InfiniteQueryFn,
  type InfiniteQueryOptions,
  type InfiniteQueryState,
  type Page,
  type PageParamFn,
  type PageStatus,
} from './infinite-query.js';
export {
  cursorPagination,
  pageNumberPagination,
  type CursorPaginationOptions,
  type PageNumberPaginationOptions,
  type PaginationStrategy,
} from './pagination.js';
export { Query, type InvalidateOptions } from './query.js';
export {
  KEY_SEPARATOR,
  createQueryKeyFactory,
  keyHasPrefix,
  queryKey,
  type QueryKeyPart,
} from './query-key.js';
export { RequestDeduplicator } from './request-deduplicator.js';
export type {
  QueryContext,
  QueryFn,
  QueryKind,
  QueryLifecycleEvent,
  QueryMetrics,
  QueryOptions,
  QueryState,
  QueryStatus,
} from './types.js';
