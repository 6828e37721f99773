import { isEntryFresh } from '../cache/cache-entry.js';
import type { CacheEntryMetadata } from '../cache/types.js';
import { ConfigurationError, toError } from '../errors/querylane-error.js';
import { BaseQuery } from './base-query.js';
import type { QueryContext, QueryOptions, QueryStatus } from './types.js';

export type PageStatus = 'loading' | 'success' | 'error';

/** One fetched page of an infinite query */
export interface Page<TData, TParam> {
  readonly param: TParam;
  readonly data: TData | undefined;
  readonly error: Error | undefined;
  readonly status: PageStatus;
  readonly fetchedAt: number | undefined;
}

/** What an infinite query keeps in the cache store */
export interface InfiniteData<TData, TParam> {
  pages: ReadonlyArray<Page<TData, TParam>>;
}

export interface InfiniteQueryState<TData, TParam> {
  pages: ReadonlyArray<Page<TData, TParam>>;
  status: QueryStatus;
  isFetching: boolean;
  isFetchingNextPage: boolean;
  isFetchingPreviousPage: boolean;
  hasNextPage: boolean;
  hasPreviousPage: boolean;
  /** Error of the most recent failed page request */
  error: Error | undefined;
  dataUpdatedAt: number | undefined;
  isInvalidated: boolean;
}

/** `undefined` or `null` means there are no more pages in that direction */
export type PageParamFn<TData, TParam> = (
  pages: ReadonlyArray<Page<TData, TParam>>,
  edgePageData: TData | undefined
) => TParam | null | undefined;

export type InfiniteQueryFn<TData, TParam> = (param: TParam) => Promise<TData>;

export interface InfiniteQueryOptions<TData, TParam>
  extends QueryOptions<InfiniteData<TData, TParam>> {
  /**
   * Parameter for the page after the last one. Called with no pages for the
   * first page unless `initialPageParam` is set. Required.
   */
  getNextPageParam?: PageParamFn<TData, TParam>;
  /** Parameter for the page before the first one */
  getPreviousPageParam?: PageParamFn<TData, TParam>;
  /** Parameter for the first page */
  initialPageParam?: TParam;
  /** Page cap; the far end is trimmed on overflow */
  maxPages?: number;
}

/**
 * Query over an ordered list of pages.
 *
 * Each page is fetched, fails and recovers on its own: a failed page never
 * touches its siblings, and `refetchPage(index)` reruns one page in place.
 *
 * @example
 * ```typescript
 * const feed = client.getInfiniteQuery(
 *   'feed',
 *   (cursor: string | undefined) => api.getFeed(cursor),
 *   {
 *     getNextPageParam: (_pages, last) => last?.nextCursor,
 *     maxPages: 5,
 *   }
 * );
 *
 * await feed.fetchNextPage();
 * feed.state.pages.map((page) => page.data);
 * ```
 */
export class InfiniteQuery<TData, TParam> extends BaseQuery<InfiniteQueryState<TData, TParam>> {
  readonly kind = 'infinite' as const;

  private readonly producer: InfiniteQueryFn<TData, TParam>;
  private readonly options: InfiniteQueryOptions<TData, TParam>;
  private readonly getNextPageParam: PageParamFn<TData, TParam>;
  private readonly staleTime: number;
  private readonly cacheTime: number;
  private enabled: boolean;
  private generation = 0;
  private readonly pageRefetches = new Map<Page<TData, TParam>, Promise<void>>();
  private fullRefetch: Promise<void> | null = null;

  constructor(
    key: string,
    producer: InfiniteQueryFn<TData, TParam>,
    options: InfiniteQueryOptions<TData, TParam>,
    context: QueryContext,
    defaults: { staleTime: number; cacheTime: number }
  ) {
    const getNextPageParam = options.getNextPageParam;
    if (typeof getNextPageParam !== 'function') {
      throw new ConfigurationError(['getNextPageParam must be a function'], {
        code: 'QL_C101',
        context: { key },
      });
    }

    const cached = context.store.has(key)
      ? context.store.inspectEntry<InfiniteData<TData, TParam>>(key)
      : undefined;
    const pages = settledPages(cached?.data?.pages ?? []);

    super(key, context, {
      pages,
      status: pages.length > 0 ? summarizeStatus(pages) : 'idle',
      isFetching: false,
      isFetchingNextPage: false,
      isFetchingPreviousPage: false,
      hasNextPage: pages.length === 0,
      hasPreviousPage: false,
      error: undefined,
      dataUpdatedAt: pages.length > 0 ? cached?.updatedAt : undefined,
      isInvalidated: cached?.isInvalidated ?? false,
    });

    this.producer = producer;
    this.options = options;
    this.getNextPageParam = getNextPageParam;
    this.staleTime = options.staleTime ?? defaults.staleTime;
    this.cacheTime = options.cacheTime ?? defaults.cacheTime;
    this.enabled = options.enabled ?? true;

    if (pages.length > 0) {
      this.setState(this.edgeFlags(pages));
    }
  }

  get state(): InfiniteQueryState<TData, TParam> {
    return this.currentState;
  }

  get hasNextPage(): boolean {
    return this.currentState.hasNextPage;
  }

  get hasPreviousPage(): boolean {
    return this.currentState.hasPreviousPage;
  }

  /**
   * Append the next page. An explicit `param` wins over `getNextPageParam`.
   * With no explicit param and a failed tail page, the tail is retried in
   * place. No-op while a next-page fetch is running.
   */
  async fetchNextPage(param?: TParam): Promise<void> {
    if (!this.canExecute() || this.currentState.isFetchingNextPage) return;

    const pages = this.currentState.pages;
    const tail = pages.at(-1);
    const retryTail = param === undefined && tail?.status === 'error';
    const nextParam = param !== undefined ? param : retryTail && tail ? tail.param : this.nextParam(pages);

    if (nextParam === undefined || nextParam === null) {
      this.setState({ hasNextPage: false });
      return;
    }

    const loading = loadingPage<TData, TParam>(nextParam);
    const withLoading = retryTail ? [...pages.slice(0, -1), loading] : [...pages, loading];
    this.setState({
      pages: withLoading,
      status: pages.length === 0 ? 'loading' : this.currentState.status,
      isFetching: true,
      isFetchingNextPage: true,
    });

    await this.loadPage(loading, 'next');
  }

  /**
   * Prepend the page before the first one. Requires `getPreviousPageParam`.
   * No-op while a previous-page fetch is running.
   */
  async fetchPreviousPage(): Promise<void> {
    if (!this.canExecute() || this.currentState.isFetchingPreviousPage) return;

    const pages = this.currentState.pages;
    const previousParam = this.previousParam(pages);
    if (previousParam === undefined || previousParam === null) {
      this.setState({ hasPreviousPage: false });
      return;
    }

    const loading = loadingPage<TData, TParam>(previousParam);
    this.setState({
      pages: [loading, ...pages],
      status: pages.length === 0 ? 'loading' : this.currentState.status,
      isFetching: true,
      isFetchingPreviousPage: true,
    });

    await this.loadPage(loading, 'previous');
  }

  /**
   * Rerun one page in place. Sibling pages are untouched and the page keeps
   * its previous data if the rerun fails. Concurrent calls for the same page
   * share one request; out-of-range indexes are ignored.
   */
  refetchPage(index: number): Promise<void> {
    const page = this.currentState.pages[index];
    if (!this.canExecute() || !page) return Promise.resolve();

    const existing = this.pageRefetches.get(page);
    if (existing) return existing;

    const promise = this.rerunPage(page).finally(() => {
      this.pageRefetches.delete(page);
    });
    this.pageRefetches.set(page, promise);
    return promise;
  }

  /** Rerun every page in place, in order. Concurrent calls share one pass. */
  refetch(): Promise<void> {
    if (!this.canExecute()) return Promise.resolve();
    if (this.fullRefetch) return this.fullRefetch;

    const promise = this.refetchAll().finally(() => {
      this.fullRefetch = null;
    });
    this.fullRefetch = promise;
    return promise;
  }

  /** Drop every page and return to idle. In-flight results are discarded. */
  reset(): void {
    this.generation++;
    this.pageRefetches.clear();
    this.store.set(this.key, { pages: [] }, this.cacheMetadata());
    this.setState({
      pages: [],
      status: 'idle',
      isFetching: false,
      isFetchingNextPage: false,
      isFetchingPreviousPage: false,
      hasNextPage: true,
      hasPreviousPage: false,
      error: undefined,
      dataUpdatedAt: undefined,
      isInvalidated: false,
    });
  }

  /** Mark the pages for refetch; listeners get one right away */
  invalidate(options: { refetchActive?: boolean } = {}): void {
    this.store.invalidate(this.key);
    this.setState({ isInvalidated: true });
    this.emit({ type: 'invalidated' });

    if ((options.refetchActive ?? true) && this.listenerCount > 0) {
      this.runInBackground(this.refetch(), 'Refetch after invalidation');
    }
  }

  setEnabled(enabled: boolean): void {
    if (this.enabled === enabled) return;
    this.enabled = enabled;
    if (enabled && this.listenerCount > 0) {
      this.onMount();
    }
  }

  // ── Protected ────────────────────────────────────────────────────────

  protected onMount(): void {
    const entry = this.store.get<InfiniteData<TData, TParam>>(this.key);
    const cachedPages = settledPages(entry?.data?.pages ?? []);
    if (entry && cachedPages.length > 0 && entry.updatedAt !== this.currentState.dataUpdatedAt) {
      this.setState({
        pages: cachedPages,
        status: summarizeStatus(cachedPages),
        dataUpdatedAt: entry.updatedAt,
        isInvalidated: entry.isInvalidated,
        ...this.edgeFlags(cachedPages),
      });
    }
    if (!this.canExecute()) return;

    if (this.currentState.pages.length === 0) {
      this.runInBackground(this.fetchNextPage(), 'First page fetch');
    } else if (!entry || !isEntryFresh(entry, Date.now()) || this.options.refetchOnMount) {
      this.runInBackground(this.refetch(), 'Refetch on mount');
    }
  }

  protected cacheMetadata(): CacheEntryMetadata {
    return {
      staleTime: this.staleTime,
      cacheTime: this.cacheTime,
      isSecure: this.options.isSecure,
      maxAge: this.options.maxAge,
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private canExecute(): boolean {
    return this.enabled && !this.disposed;
  }

  private nextParam(pages: ReadonlyArray<Page<TData, TParam>>): TParam | null | undefined {
    if (pages.length === 0) {
      return this.options.initialPageParam !== undefined
        ? this.options.initialPageParam
        : this.getNextPageParam([], undefined);
    }
    const last = [...pages].reverse().find((page) => page.status === 'success');
    if (!last) return undefined;
    return this.getNextPageParam(pages, last.data);
  }

  private previousParam(pages: ReadonlyArray<Page<TData, TParam>>): TParam | null | undefined {
    const getPreviousPageParam = this.options.getPreviousPageParam;
    if (!getPreviousPageParam || pages.length === 0) return undefined;
    const first = pages.find((page) => page.status === 'success');
    if (!first) return undefined;
    return getPreviousPageParam(pages, first.data);
  }

  private edgeFlags(
    pages: ReadonlyArray<Page<TData, TParam>>
  ): Pick<InfiniteQueryState<TData, TParam>, 'hasNextPage' | 'hasPreviousPage'> {
    const tail = pages.at(-1);
    const head = pages[0];
    const getPreviousPageParam = this.options.getPreviousPageParam;

    let hasNextPage = true;
    if (tail?.status === 'success') {
      const next = this.getNextPageParam(pages, tail.data);
      hasNextPage = next !== undefined && next !== null;
    }

    let hasPreviousPage = false;
    if (getPreviousPageParam && head?.status === 'success') {
      const previous = getPreviousPageParam(pages, head.data);
      hasPreviousPage = previous !== undefined && previous !== null;
    }

    return { hasNextPage, hasPreviousPage };
  }

  /** Fetch a page appended or prepended in loading state and settle it */
  private async loadPage(loading: Page<TData, TParam>, direction: 'next' | 'previous'): Promise<void> {
    const generation = this.generation;
    this.emit({ type: 'fetch-start' });

    let settled: Page<TData, TParam>;
    try {
      const data = await this.timeProducer(() => this.producer(loading.param));
      settled = successPage(loading.param, data);
    } catch (caught) {
      settled = errorPage<TData, TParam>(loading.param, toError(caught), undefined);
    }

    if (generation !== this.generation || this.disposed) {
      this.logger.debug('Discarding page from a reset query', { key: this.key });
      return;
    }

    const replaced = this.currentState.pages.map((page) => (page === loading ? settled : page));
    const pages = this.trim(replaced, direction);
    this.commit(
      pages,
      settled,
      direction === 'next' ? { isFetchingNextPage: false } : { isFetchingPreviousPage: false }
    );
  }

  private async rerunPage(page: Page<TData, TParam>): Promise<void> {
    const generation = this.generation;
    this.setState({ isFetching: true });
    this.emit({ type: 'fetch-start' });

    let settled: Page<TData, TParam>;
    try {
      const data = await this.timeProducer(() => this.producer(page.param));
      settled = successPage(page.param, data);
    } catch (caught) {
      settled = errorPage(page.param, toError(caught), page.data);
    }

    this.pageRefetches.delete(page);
    if (generation !== this.generation || this.disposed) return;
    if (!this.currentState.pages.includes(page)) {
      this.logger.debug('Discarding refetch of a trimmed page', { key: this.key });
      this.setState({ isFetching: this.isBusy() });
      return;
    }

    const pages = this.currentState.pages.map((current) => (current === page ? settled : current));
    this.commit(pages, settled, {});
  }

  private async refetchAll(): Promise<void> {
    for (const page of [...this.currentState.pages]) {
      if (this.disposed) return;
      if (page.status === 'loading') continue;
      await this.refetchPage(this.currentState.pages.indexOf(page));
    }
  }

  /** Trim to `maxPages` from the end opposite to where the page was added */
  private trim(
    pages: Array<Page<TData, TParam>>,
    direction: 'next' | 'previous'
  ): Array<Page<TData, TParam>> {
    const maxPages = this.options.maxPages;
    if (maxPages === undefined || pages.length <= maxPages) return pages;
    return direction === 'next' ? pages.slice(pages.length - maxPages) : pages.slice(0, maxPages);
  }

  private commit(
    pages: Array<Page<TData, TParam>>,
    settled: Page<TData, TParam>,
    flags: Partial<InfiniteQueryState<TData, TParam>>
  ): void {
    const succeeded = settled.status === 'success';
    const entry = succeeded
      ? this.store.set(this.key, { pages: settledPages(pages) }, this.cacheMetadata())
      : undefined;

    this.setState({
      ...flags,
      pages,
      status: summarizeStatus(pages),
      error: succeeded ? latestError(pages) : settled.error,
      dataUpdatedAt: entry?.updatedAt ?? this.currentState.dataUpdatedAt,
      isInvalidated: succeeded ? false : this.currentState.isInvalidated,
      ...this.edgeFlags(pages),
    });
    this.setState({ isFetching: this.isBusy() });

    if (!succeeded) {
      this.logger.warn('Page fetch failed', { key: this.key, error: settled.error?.message });
    }

    const { onSuccess, onError, onSettled } = this.options;
    const data: InfiniteData<TData, TParam> = { pages };
    if (succeeded) {
      if (onSuccess) this.invokeCallback('onSuccess', () => onSuccess(data));
      if (onSettled) this.invokeCallback('onSettled', () => onSettled(data, undefined));
    } else {
      const error = settled.error ?? new Error('Page fetch failed');
      if (onError) this.invokeCallback('onError', () => onError(error));
      if (onSettled) this.invokeCallback('onSettled', () => onSettled(data, error));
    }
  }

  private isBusy(): boolean {
    const state = this.currentState;
    return (
      state.isFetchingNextPage ||
      state.isFetchingPreviousPage ||
      this.pageRefetches.size > 0 ||
      state.pages.some((page) => page.status === 'loading')
    );
  }
}

function loadingPage<TData, TParam>(param: TParam): Page<TData, TParam> {
  return { param, data: undefined, error: undefined, status: 'loading', fetchedAt: undefined };
}

function successPage<TData, TParam>(param: TParam, data: TData): Page<TData, TParam> {
  return { param, data, error: undefined, status: 'success', fetchedAt: Date.now() };
}

function errorPage<TData, TParam>(
  param: TParam,
  error: Error,
  previousData: TData | undefined
): Page<TData, TParam> {
  return { param, data: previousData, error, status: 'error', fetchedAt: Date.now() };
}

/** Pages that can be restored; a loading page belongs to the instance fetching it */
function settledPages<TData, TParam>(
  pages: ReadonlyArray<Page<TData, TParam>>
): Array<Page<TData, TParam>> {
  return pages.filter((page) => page.status !== 'loading');
}

function latestError<TData, TParam>(pages: ReadonlyArray<Page<TData, TParam>>): Error | undefined {
  return [...pages].reverse().find((page) => page.status === 'error')?.error;
}

function summarizeStatus<TData, TParam>(pages: ReadonlyArray<Page<TData, TParam>>): QueryStatus {
  if (pages.length === 0) return 'idle';
  if (pages.some((page) => page.status === 'success' || page.data !== undefined)) return 'success';
  if (pages.some((page) => page.status === 'error')) return 'error';
  return 'loading';
}
