/**
 * Ready-made page parameter strategies for infinite queries.
 *
 * @example
 * ```typescript
 * client.getInfiniteQuery('users', (page: number) => api.listUsers(page, 20), {
 *   ...pageNumberPagination<User[]>({ pageSize: 20 }),
 *   maxPages: 10,
 * });
 * ```
 */

import type { Page, PageParamFn } from './infinite-query.js';

export interface PaginationStrategy<TData, TParam> {
  initialPageParam: TParam;
  getNextPageParam: PageParamFn<TData, TParam>;
  getPreviousPageParam?: PageParamFn<TData, TParam>;
}

export interface CursorPaginationOptions<TData, TCursor> {
  /** Cursor for the first page, e.g. an empty string */
  initialCursor: TCursor;
  /** Cursor of the page after this one, or null/undefined at the end */
  getNextCursor: (pageData: TData) => TCursor | null | undefined;
  /** Cursor of the page before this one */
  getPreviousCursor?: (pageData: TData) => TCursor | null | undefined;
}

/** Cursor pagination: each page names the cursor of its neighbours */
export function cursorPagination<TData, TCursor>(
  options: CursorPaginationOptions<TData, TCursor>
): PaginationStrategy<TData, TCursor> {
  const { getNextCursor, getPreviousCursor } = options;
  return {
    initialPageParam: options.initialCursor,
    getNextPageParam: (_pages, lastPageData) =>
      lastPageData === undefined ? undefined : getNextCursor(lastPageData),
    getPreviousPageParam: getPreviousCursor
      ? (_pages, firstPageData) =>
          firstPageData === undefined ? undefined : getPreviousCursor(firstPageData)
      : undefined,
  };
}

export interface PageNumberPaginationOptions<TData> {
  /** Number of the first page (default: 1) */
  startAt?: number;
  pageSize: number;
  /** Allow fetching pages before the first loaded one (default: false) */
  hasPrevious?: boolean;
  /**
   * Whether a page is the last one (default: array data shorter than
   * `pageSize`; non-array data never ends)
   */
  isLastPage?: (pageData: TData, pageSize: number) => boolean;
}

/**
 * Page-number pagination. Neighbour numbers are derived from the params of
 * the loaded pages, so trimming by `maxPages` does not shift them.
 */
export function pageNumberPagination<TData>(
  options: PageNumberPaginationOptions<TData>
): PaginationStrategy<TData, number> {
  const startAt = options.startAt ?? 1;
  const { pageSize } = options;
  const isLastPage = options.isLastPage ?? defaultIsLastPage;

  return {
    initialPageParam: startAt,
    getNextPageParam: (pages, lastPageData) => {
      const last = lastLoaded(pages);
      if (!last || lastPageData === undefined) return startAt;
      return isLastPage(lastPageData, pageSize) ? undefined : last.param + 1;
    },
    getPreviousPageParam: options.hasPrevious
      ? (pages) => {
          const first = pages.find((page) => page.status === 'success');
          if (!first) return undefined;
          const previous = first.param - 1;
          return previous >= startAt ? previous : undefined;
        }
      : undefined,
  };
}

function lastLoaded<TData>(pages: ReadonlyArray<Page<TData, number>>): Page<TData, number> | undefined {
  return [...pages].reverse().find((page) => page.status === 'success');
}

function defaultIsLastPage(pageData: unknown, pageSize: number): boolean {
  return Array.isArray(pageData) && pageData.length < pageSize;
}
