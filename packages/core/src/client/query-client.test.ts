import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError, InvalidKeyError } from '../errors/querylane-error.js';
import type { SerializedQueue } from '../validation/schemas.js';
import { QueryClient, type QueryClientEvent } from './query-client.js';

interface User {
  id: number;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const flushPromises = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('QueryClient', () => {
  let client: QueryClient;

  beforeEach(() => {
    client = new QueryClient();
  });

  afterEach(() => {
    client.destroy();
    vi.useRealTimers();
  });

  describe('configuration', () => {
    it('should reject invalid configuration', () => {
      expect(() => new QueryClient({ maxEntries: 0 })).toThrow(ConfigurationError);
      expect(() => new QueryClient({ queue: { concurrency: -1 } })).toThrow(ConfigurationError);
    });

    it('should pass cache limits to the store', () => {
      const configured = new QueryClient({ maxEntries: 10, maxCacheSize: 2048, evictionPolicy: 'fifo' });
      expect(configured.getCacheInfo()).toMatchObject({
        maxEntries: 10,
        maxCacheSize: 2048,
        policy: 'fifo',
        entryCount: 0,
      });
      configured.destroy();
    });
  });

  describe('queries', () => {
    it('should hand out one instance per key', () => {
      const a = client.getQuery('user:1', async () => ({ id: 1 }));
      const b = client.getQuery('user:1', async () => ({ id: 2 }));
      expect(a).toBe(b);
      expect(client.getQueryByKey('user:1')).toBe(a);
    });

    it('should share one producer call across callers', async () => {
      const producer = vi.fn(async (): Promise<User> => ({ id: 1 }));
      const results = await Promise.all(
        Array.from({ length: 5 }, () => client.getQuery('user:1', producer).fetch())
      );

      expect(producer).toHaveBeenCalledTimes(1);
      expect(results).toEqual(Array.from({ length: 5 }, () => ({ id: 1 })));
    });

    it('should reject malformed keys and options', () => {
      expect(() => client.getQuery('has space', async () => 1)).toThrow(InvalidKeyError);
      expect(() => client.getQuery('k', async () => 1, { staleTime: -1 })).toThrow(ConfigurationError);
    });

    it('should not mix regular and infinite queries on one key', () => {
      client.getQuery('feed', async () => []);
      expect(() =>
        client.getInfiniteQuery('feed', async (page: number) => [page], {
          getNextPageParam: () => undefined,
        })
      ).toThrow(expect.objectContaining({ code: 'QL_C103' }));
      expect(client.getInfiniteQueryByKey('feed')).toBeUndefined();
    });

    it('should require getNextPageParam for infinite queries', () => {
      expect(() => client.getInfiniteQuery('feed', async (page: number) => [page], {})).toThrow(
        expect.objectContaining({ code: 'QL_C101' })
      );
    });

    it('should drop an idle instance after the grace period and keep the data', async () => {
      vi.useFakeTimers();
      const query = client.getQuery('user:1', async (): Promise<User> => ({ id: 1 }));
      const subscription = query.subscribe(() => undefined);
      await query.fetch();
      subscription.unsubscribe();

      vi.advanceTimersByTime(4999);
      expect(query.isDisposed).toBe(false);
      vi.advanceTimersByTime(1);

      expect(query.isDisposed).toBe(true);
      expect(client.getQueryByKey('user:1')).toBeUndefined();
      expect(client.getQueryData('user:1')).toEqual({ id: 1 });

      const next = client.getQuery('user:1', async (): Promise<User> => ({ id: 1 }));
      expect(next).not.toBe(query);
      expect(next.state).toMatchObject({ status: 'success', data: { id: 1 } });
    });

    it('should keep an instance whose listener returns within the grace period', async () => {
      vi.useFakeTimers();
      const producer = vi.fn(async (): Promise<User> => ({ id: 1 }));
      const query = client.getQuery('user:1', producer);
      const first = query.subscribe(() => undefined);
      await query.fetch();
      first.unsubscribe();
      vi.advanceTimersByTime(4000);

      const seen: Array<User | undefined> = [];
      const second = query.subscribe((state) => seen.push(state.data));
      vi.advanceTimersByTime(5000);

      expect(query.isDisposed).toBe(false);
      expect(client.getQueryByKey('user:1')).toBe(query);
      expect(seen[0]).toEqual({ id: 1 });
      expect(await query.refetch()).toEqual({ id: 1 });
      expect(producer).toHaveBeenCalledTimes(3);
      second.unsubscribe();
    });

    it('should honour a custom idle grace period', async () => {
      const eager = new QueryClient({ idleDisposeMs: 0 });
      const query = eager.getQuery('user:1', async (): Promise<User> => ({ id: 1 }));
      query.subscribe(() => undefined).unsubscribe();

      expect(query.isDisposed).toBe(true);
      eager.destroy();
    });

    it('should run the u1 scenario', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-05-01T00:00:00Z'));
      const producer = vi.fn(async (): Promise<User> => ({ id: 1 }));
      const options = { staleTime: 1000, cacheTime: 5000 };

      expect(await client.getQuery('u1', producer, options).fetch()).toEqual({ id: 1 });

      vi.advanceTimersByTime(500);
      expect(await client.getQuery('u1', producer, options).fetch()).toEqual({ id: 1 });
      expect(producer).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(1000);
      expect(await client.getQuery('u1', producer, options).fetch()).toEqual({ id: 1 });
      expect(await client.getQuery('u1', producer, options).fetch()).toEqual({ id: 1 });
      expect(producer).toHaveBeenCalledTimes(2);
    });
  });

  describe('invalidation', () => {
    it('should invalidate keys by prefix and keep their data', () => {
      client.setQueryData('user:1', { id: 1 });
      client.setQueryData('user:2', { id: 2 });
      client.setQueryData('post:1', { id: 3 });

      expect(client.invalidateQueriesWithPrefix('user:')).toEqual(['user:1', 'user:2']);
      expect(client.inspectEntry('user:1')).toMatchObject({ isInvalidated: true, data: { id: 1 } });
      expect(client.inspectEntry('post:1')?.isInvalidated).toBe(false);
    });

    it('should refetch an active query', async () => {
      const producer = vi
        .fn<() => Promise<User>>()
        .mockResolvedValueOnce({ id: 1 })
        .mockResolvedValueOnce({ id: 2 });
      const query = client.getQuery('user:1', producer, { staleTime: 60_000 });
      const subscription = query.subscribe(() => undefined);
      await flushPromises();

      expect(client.invalidateQuery('user:1')).toBe(true);
      await flushPromises();

      expect(producer).toHaveBeenCalledTimes(2);
      expect(query.state.data).toEqual({ id: 2 });
      subscription.unsubscribe();
    });

    it('should report keys with nothing to invalidate', () => {
      client.setQueryData('a', 1);
      expect(client.invalidateQueries(['a', 'missing'])).toEqual(['a']);
      expect(client.invalidateQuery('missing')).toBe(false);
    });

    it('should invalidate by predicate', () => {
      client.setQueryData('todos:open', []);
      client.setQueryData('todos:done', []);
      expect(client.invalidateQueriesWhere((key) => key.endsWith(':done'))).toEqual(['todos:done']);
    });
  });

  describe('prefetching', () => {
    it('should warm the cache without keeping an instance', async () => {
      const producer = vi.fn(async (): Promise<User> => ({ id: 5 }));
      await client.prefetchQuery('user:5', producer, { staleTime: 60_000 });
      await client.prefetchQuery('user:5', producer, { staleTime: 60_000 });

      expect(producer).toHaveBeenCalledTimes(1);
      expect(client.getQueryData('user:5')).toEqual({ id: 5 });
      expect(client.getQueryByKey('user:5')).toBeUndefined();
    });

    it('should reject with the producer error', async () => {
      await expect(
        client.prefetchQuery('user:5', () => Promise.reject(new Error('404')))
      ).rejects.toThrow('404');
    });

    it('should run every prefetch and reject with the first failure', async () => {
      const outcome = client.prefetchQueries([
        { key: 'a', producer: () => Promise.reject(new Error('first')) },
        { key: 'b', producer: async () => 'b-data' },
        { key: 'c', producer: () => Promise.reject(new Error('second')) },
      ]);

      await expect(outcome).rejects.toThrow('first');
      expect(client.getQueryData('b')).toBe('b-data');
    });
  });

  describe('direct cache access', () => {
    it('should write through updaters and read without touching metrics', () => {
      client.setQueryData<number[]>('ids', [1]);
      client.setQueryData<number[]>('ids', (previous) => [...(previous ?? []), 2]);

      expect(client.getQueryData('ids')).toEqual([1, 2]);
      expect(client.getQueryData('missing')).toBeUndefined();
      expect(client.getCacheInfo().metrics).toMatchObject({ hits: 0, misses: 0 });
    });

    it('should write through a registered query', () => {
      const query = client.getQuery<number>('count', async () => 0);
      client.setQueryData('count', 5);
      expect(query.state).toMatchObject({ status: 'success', data: 5 });
    });

    it('should remove a query and its entry', async () => {
      const query = client.getQuery('user:1', async (): Promise<User> => ({ id: 1 }));
      await query.fetch();

      expect(client.removeQuery('user:1')).toBe(true);
      expect(query.isDisposed).toBe(true);
      expect(client.getCacheKeys()).toEqual([]);
      expect(client.removeQuery('user:1')).toBe(false);
    });

    it('should clear everything', async () => {
      const query = client.getQuery('user:1', async (): Promise<User> => ({ id: 1 }));
      await query.fetch();
      client.setQueryData('other', 1);

      client.clear();
      expect(query.isDisposed).toBe(true);
      expect(client.getCacheKeys()).toEqual([]);
    });

    it('should clear secure entries even while subscribed', async () => {
      const token = client.getQuery('session:token', async () => 'test-secret', {
        isSecure: true,
        maxAge: 60_000,
      });
      token.subscribe(() => undefined);
      await flushPromises();
      client.setQueryData('todos', []);

      expect(client.clearSecureCache()).toEqual(['session:token']);
      expect(token.isDisposed).toBe(true);
      expect(client.getCacheKeys()).toEqual(['todos']);
    });

    it('should require maxAge for secure queries', () => {
      expect(() => client.getQuery('session:token', async () => 'test-secret', { isSecure: true })).toThrow(
        ConfigurationError
      );
    });

    it('should evict through the configured policy', () => {
      const small = new QueryClient({ maxEntries: 2, evictionPolicy: 'lru' });
      small.setQueryData('a', 1);
      small.setQueryData('b', 2);
      small.setQueryData('c', 3);

      expect(small.getCacheKeys()).toEqual(['b', 'c']);
      small.setEvictionPolicy('lfu');
      expect(small.getCacheInfo().policy).toBe('lfu');
      small.destroy();
    });

    it('should collect expired entries on demand', () => {
      vi.useFakeTimers();
      const expiring = new QueryClient({ defaultCacheTime: 1000 });
      expiring.setQueryData('a', 1);
      vi.advanceTimersByTime(1001);

      expect(expiring.collectGarbage()).toBe(1);
      expiring.destroy();
    });
  });

  describe('results that settle after teardown', () => {
    it('should not write back after removeQuery', async () => {
      const gate = deferred<User>();
      const query = client.getQuery('user:1', () => gate.promise);
      const pending = query.fetch();

      expect(client.removeQuery('user:1')).toBe(true);
      gate.resolve({ id: 1 });

      expect(await pending).toBeUndefined();
      expect(client.getCacheKeys()).toEqual([]);
    });

    it('should not write back after clear', async () => {
      const gate = deferred<User>();
      const pending = client.getQuery('user:1', () => gate.promise).fetch();

      client.clear();
      gate.resolve({ id: 1 });

      expect(await pending).toBeUndefined();
      expect(client.getCacheKeys()).toEqual([]);
    });

    it('should not bring secure data back after clearSecureCache', async () => {
      const gate = deferred<string>();
      const token = client.getQuery('session:token', () => gate.promise, {
        isSecure: true,
        maxAge: 60_000,
      });
      const subscription = token.subscribe(() => undefined);
      client.setQueryData('todos', []);

      expect(client.clearSecureCache()).toEqual(['session:token']);
      gate.resolve('test-secret');
      await flushPromises();

      expect(client.getCacheKeys()).toEqual(['todos']);
      expect(client.getQueryData('session:token')).toBeUndefined();
      subscription.unsubscribe();
    });

    it('should let a new instance fetch while the removed one is still in flight', async () => {
      const stale = deferred<User>();
      const first = client.getQuery('user:1', () => stale.promise);
      const abandoned = first.fetch();
      client.removeQuery('user:1');

      const producer = vi.fn(async (): Promise<User> => ({ id: 2 }));
      expect(await client.getQuery('user:1', producer).fetch()).toEqual({ id: 2 });
      expect(producer).toHaveBeenCalledTimes(1);

      stale.resolve({ id: 1 });
      await abandoned;
      expect(client.getQueryData('user:1')).toEqual({ id: 2 });
    });
  });

  describe('mutations and the offline queue', () => {
    it('should queue offline and replay when back online', async () => {
      const offline = new QueryClient({ online: false });
      const handler = vi.fn(async (input: { title: string }) => ({ id: 7, ...input }));
      offline.registerMutationType('addTodo', handler);
      const addTodo = offline.getMutation((input: { title: string }) => handler(input), {
        mutationType: 'addTodo',
        queueWhenOffline: true,
      });

      await addTodo.mutate({ title: 'Buy milk' });
      expect(addTodo.state.isQueued).toBe(true);
      expect(offline.getQueueStats()).toEqual({ addTodo: 1 });
      expect(handler).not.toHaveBeenCalled();

      offline.setOnline(true);
      expect(offline.queue.isProcessing).toBe(true);
      await offline.processQueue();

      expect(handler).toHaveBeenCalledTimes(1);
      expect(addTodo.state).toMatchObject({ status: 'success', data: { id: 7, title: 'Buy milk' } });
      expect(offline.getQueueStats()).toEqual({});
      offline.destroy();
    });

    it('should forget mutations once they are disposed', () => {
      const mutation = client.getMutation(async (n: number) => n);
      mutation.dispose();
      const dispose = vi.spyOn(mutation, 'dispose');

      client.destroy();
      expect(dispose).not.toHaveBeenCalled();
    });

    it('should follow the network flag', () => {
      expect(client.isOnline).toBe(true);
      client.setOnline(false);
      expect(client.isOnline).toBe(false);
    });

    it('should apply the queue defaults', () => {
      const configured = new QueryClient({ queue: { defaultMaxAttempts: 2 } });
      configured.registerMutationType('a', async () => undefined);
      expect(configured.mutationTypes.get('a')?.maxAttempts).toBe(2);
      configured.destroy();
    });

    it('should persist through the configured storage', async () => {
      const saved: SerializedQueue[] = [];
      const persisted = new QueryClient({
        online: false,
        queue: {
          storage: {
            load: async () => undefined,
            save: async (queue) => {
              saved.push(queue);
            },
          },
        },
      });

      persisted.queue.enqueue('addTodo', { title: 'x' });
      await persisted.queue.flush();
      expect(saved[0]?.entries[0]).toMatchObject({ typeId: 'addTodo', variables: { title: 'x' } });
      persisted.destroy();
    });
  });

  describe('events', () => {
    it('should publish query and mutation lifecycle events', async () => {
      const events: QueryClientEvent[] = [];
      client.events$.subscribe((event) => events.push(event));

      await client.getQuery('k', async () => 1).fetch();
      await client.getMutation(async (n: number) => n * 2, { mutationType: 'double' }).mutate(2);

      expect(events.map((event) => event.type)).toEqual([
        'fetch-start',
        'fetch-success',
        'mutation-start',
        'mutation-success',
      ]);
    });
  });

  describe('destroy', () => {
    it('should dispose everything and refuse further use', async () => {
      const query = client.getQuery('k', async () => 1);
      const mutation = client.getMutation(async (n: number) => n);
      client.destroy();

      expect(query.isDisposed).toBe(true);
      expect(mutation.isDisposed).toBe(true);
      expect(() => client.getQuery('k', async () => 1)).toThrow(
        expect.objectContaining({ code: 'QL_X900' })
      );
      await expect(client.prefetchQuery('k', async () => 1)).rejects.toMatchObject({ code: 'QL_X900' });
      client.destroy();
    });
  });
});
