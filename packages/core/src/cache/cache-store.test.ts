import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, type LogEntry } from '../observability/logger.js';
import { CacheStore } from './cache-store.js';
import { LruEvictionPolicy } from './eviction/index.js';
import type { CacheChangeEvent, CacheEntry } from './types.js';

describe('CacheStore', () => {
  let store: CacheStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T00:00:00Z'));
  });

  afterEach(() => {
    store.destroy();
    vi.useRealTimers();
  });

  describe('reads and writes', () => {
    it('should return what was written', () => {
      store = new CacheStore();
      store.set('todos', [{ id: 1 }], { staleTime: 5000 });

      const entry = store.get<Array<{ id: number }>>('todos');
      expect(entry?.data).toEqual([{ id: 1 }]);
      expect(entry?.hasData).toBe(true);
      expect(entry?.staleTime).toBe(5000);
    });

    it('should hand out frozen copies', () => {
      store = new CacheStore();
      store.set('todos', 1);
      const entry = store.get('todos');
      expect(Object.isFrozen(entry)).toBe(true);
    });

    it('should count hits and misses', () => {
      store = new CacheStore();
      store.set('a', 1);
      store.get('a');
      store.get('missing');

      expect(store.metrics).toMatchObject({ hits: 1, misses: 1, hitRate: 0.5 });
    });

    it('should report a zero hit rate before any access', () => {
      store = new CacheStore();
      expect(store.getInfo().metrics.hitRate).toBe(0);
    });

    it('should not touch metrics from has() or inspectEntry()', () => {
      store = new CacheStore();
      store.set('a', 1);
      store.has('a');
      store.inspectEntry('a');
      expect(store.metrics).toMatchObject({ hits: 0, misses: 0 });
      expect(store.inspectEntry('a')?.accessCount).toBe(0);
    });

    it('should keep createdAt, accessCount and refCount on overwrite', () => {
      store = new CacheStore();
      store.set('a', 1);
      const createdAt = store.inspectEntry('a')?.createdAt;
      store.get('a');
      store.retain('a');

      vi.advanceTimersByTime(1000);
      store.set('a', 2);

      const entry = store.inspectEntry('a');
      expect(entry?.data).toBe(2);
      expect(entry?.createdAt).toBe(createdAt);
      expect(entry?.updatedAt).toBe(Date.now());
      expect(entry?.accessCount).toBe(1);
      expect(entry?.refCount).toBe(1);
    });

    it('should apply the default stale and cache times', () => {
      store = new CacheStore({ defaultStaleTime: 100, defaultCacheTime: 200 });
      store.set('a', 1);
      expect(store.inspectEntry('a')).toMatchObject({ staleTime: 100, cacheTime: 200 });
    });

    it('should track the estimated size', () => {
      store = new CacheStore();
      store.set('a', 'abcd');
      store.set('b', 'xy');
      expect(store.getInfo().sizeBytes).toBe(12);

      store.remove('a');
      expect(store.getInfo().sizeBytes).toBe(4);
    });

    it('should list keys and describe itself', () => {
      store = new CacheStore({ maxEntries: 10, maxCacheSize: 1000, evictionPolicy: 'fifo' });
      store.set('a', 1);
      store.set('b', 2);
      expect(store.getKeys()).toEqual(['a', 'b']);
      expect(store.getInfo()).toMatchObject({
        entryCount: 2,
        sizeBytes: 16,
        maxEntries: 10,
        maxCacheSize: 1000,
        policy: 'fifo',
      });
    });
  });

  describe('eviction', () => {
    it('should evict the least recently used entry', () => {
      store = new CacheStore({ maxEntries: 3, evictionPolicy: 'lru' });
      store.set('A', 'a');
      store.set('B', 'b');
      store.set('C', 'c');
      store.get('A');
      store.set('D', 'd');

      expect(store.getKeys().sort()).toEqual(['A', 'C', 'D']);
      expect(store.metrics.evictions).toBe(1);
    });

    it('should evict the oldest insert under FIFO regardless of access', () => {
      store = new CacheStore({ maxEntries: 3, evictionPolicy: 'fifo' });
      store.set('A', 'a');
      store.set('B', 'b');
      store.set('C', 'c');
      store.get('A');
      store.set('D', 'd');

      expect(store.getKeys().sort()).toEqual(['B', 'C', 'D']);
    });

    it('should evict the least frequently used entry under LFU', () => {
      store = new CacheStore({ maxEntries: 3, evictionPolicy: 'lfu' });
      store.set('A', 'a');
      store.set('B', 'b');
      store.set('C', 'c');
      store.get('A');
      store.get('A');
      store.get('C');
      store.set('D', 'd');

      expect(store.getKeys().sort()).toEqual(['A', 'C', 'D']);
    });

    it('should evict by size until under maxCacheSize', () => {
      store = new CacheStore({ maxCacheSize: 25 });
      store.set('a', 'xxxxx');
      store.set('b', 'yyyyy');
      store.set('c', 'zzzzz');

      expect(store.getKeys()).toEqual(['b', 'c']);
      expect(store.getInfo().sizeBytes).toBe(20);
    });

    it('should never evict referenced entries and count the pressure', () => {
      store = new CacheStore({ maxEntries: 1 });
      store.set('a', 1);
      store.retain('a');
      store.set('b', 2);

      expect(store.getKeys()).toEqual(['a', 'b']);
      expect(store.metrics.evictionPressure).toBe(1);
    });

    it('should evict once the reference is released', () => {
      store = new CacheStore({ maxEntries: 1 });
      store.set('a', 1);
      store.retain('a');
      store.set('b', 2);
      store.release('a');

      expect(store.getKeys()).toEqual(['b']);
    });

    it('should switch policy at runtime', () => {
      store = new CacheStore({ maxEntries: 3, evictionPolicy: 'lru' });
      store.set('A', 'a');
      store.set('B', 'b');
      store.set('C', 'c');
      store.get('A');

      store.setEvictionPolicy('fifo');
      store.set('D', 'd');

      expect(store.policyName).toBe('fifo');
      expect(store.getKeys().sort()).toEqual(['B', 'C', 'D']);
    });

    it('should count pressure when a custom policy throws', () => {
      const entries: LogEntry[] = [];
      const failing = new (class extends LruEvictionPolicy {
        override select(): string | undefined {
          throw new Error('policy bug');
        }
      })();
      store = new CacheStore({
        maxEntries: 1,
        evictionPolicy: failing,
        logger: createLogger({ handler: (entry) => entries.push(entry) }),
      });
      store.set('a', 1);
      store.set('b', 2);

      expect(store.getKeys()).toEqual(['a', 'b']);
      expect(store.metrics.evictionPressure).toBe(1);
      expect(entries.some((entry) => entry.message === 'Eviction policy failed')).toBe(true);
    });
  });

  describe('reference counting and expiry', () => {
    it('should retain an unreferenced entry until cacheTime has passed', () => {
      store = new CacheStore();
      store.set('user:1', { name: 'Ada' }, { cacheTime: 10_000 });
      store.retain('user:1');
      store.release('user:1');

      vi.advanceTimersByTime(9000);
      expect(store.has('user:1')).toBe(true);

      vi.advanceTimersByTime(2000);
      expect(store.has('user:1')).toBe(false);
      expect(store.getKeys()).toEqual([]);
    });

    it('should never expire a referenced entry', () => {
      store = new CacheStore();
      store.set('a', 1, { cacheTime: 1000 });
      store.retain('a');

      vi.advanceTimersByTime(60_000);
      expect(store.get('a')?.data).toBe(1);
    });

    it('should count a read as activity', () => {
      store = new CacheStore();
      store.set('a', 1, { cacheTime: 1000 });
      vi.advanceTimersByTime(800);
      store.get('a');
      vi.advanceTimersByTime(800);
      expect(store.has('a')).toBe(true);
    });

    it('should create a placeholder for early subscribers and drop it on release', () => {
      store = new CacheStore();
      expect(store.retain('pending')).toBe(1);
      expect(store.inspectEntry('pending')).toMatchObject({ hasData: false, refCount: 1 });
      expect(store.has('pending')).toBe(false);

      expect(store.release('pending')).toBe(0);
      expect(store.inspectEntry('pending')).toBeUndefined();
    });

    it('should keep the reference count when data arrives for a placeholder', () => {
      store = new CacheStore();
      store.retain('a');
      store.set('a', 'data');
      expect(store.inspectEntry('a')).toMatchObject({ hasData: true, refCount: 1 });
    });

    it('should stamp releasedAt when the count reaches zero', () => {
      store = new CacheStore();
      store.set('a', 1);
      store.retain('a');
      store.retain('a');
      store.release('a');
      expect(store.inspectEntry('a')?.releasedAt).toBeUndefined();
      store.release('a');
      expect(store.inspectEntry('a')?.releasedAt).toBe(Date.now());
    });

    it('should collect expired entries', () => {
      store = new CacheStore();
      store.set('short', 1, { cacheTime: 100 });
      store.set('long', 2, { cacheTime: 10_000 });
      vi.advanceTimersByTime(200);

      expect(store.collectGarbage()).toBe(1);
      expect(store.getKeys()).toEqual(['long']);
    });

    it('should collect on an interval when configured', () => {
      store = new CacheStore({ gcIntervalMs: 1000 });
      store.set('a', 1, { cacheTime: 500 });

      vi.advanceTimersByTime(1000);
      expect(store.size).toBe(0);
    });
  });

  describe('secure entries', () => {
    it('should clear secure entries even when referenced', () => {
      store = new CacheStore();
      store.set('token', 'test-secret', { isSecure: true });
      store.set('todos', []);
      store.retain('token');

      expect(store.clearSecureEntries()).toEqual(['token']);
      expect(store.getKeys()).toEqual(['todos']);
    });

    it('should expire secure entries at maxAge even when referenced', () => {
      store = new CacheStore();
      store.set('token', 'test-secret', { isSecure: true, maxAge: 1000 });
      store.retain('token');

      vi.advanceTimersByTime(999);
      expect(store.has('token')).toBe(true);
      vi.advanceTimersByTime(1);
      expect(store.has('token')).toBe(false);
    });

    it('should ignore maxAge for non-secure entries', () => {
      store = new CacheStore();
      store.set('a', 1, { maxAge: 10 });
      expect(store.inspectEntry('a')?.expiresAt).toBeUndefined();
    });
  });

  describe('invalidation', () => {
    it('should flag the entry and keep its data', () => {
      store = new CacheStore();
      store.set('a', 1);
      expect(store.invalidate('a')).toBe(true);
      expect(store.inspectEntry('a')).toMatchObject({ data: 1, isInvalidated: true });

      store.set('a', 2);
      expect(store.inspectEntry('a')?.isInvalidated).toBe(false);
    });

    it('should not invalidate missing entries', () => {
      store = new CacheStore();
      expect(store.invalidate('missing')).toBe(false);
    });

    it('should invalidate by predicate', () => {
      store = new CacheStore();
      store.set('user:1', 1);
      store.set('user:2', 2);
      store.set('post:1', 3);

      const keys = store.invalidateWhere((entry: Readonly<CacheEntry>) => entry.key.startsWith('user:'));
      expect(keys).toEqual(['user:1', 'user:2']);
      expect(store.inspectEntry('post:1')?.isInvalidated).toBe(false);
    });
  });

  describe('consistency', () => {
    it('should drop an inconsistent entry and leave the others alone', () => {
      const entries: LogEntry[] = [];
      const corrupting = new (class extends LruEvictionPolicy {
        override onInsert(entry: CacheEntry, now: number, tick: number): void {
          super.onInsert(entry, now, tick);
          if (entry.key === 'bad') entry.createdAt = Number.NaN;
        }
      })();
      store = new CacheStore({
        evictionPolicy: corrupting,
        logger: createLogger({ handler: (entry) => entries.push(entry) }),
      });
      store.set('good', 1);
      store.set('bad', 2);

      expect(store.get('bad')).toBeUndefined();
      expect(store.get('good')?.data).toBe(1);
      expect(store.getKeys()).toEqual(['good']);
      expect(store.metrics).toMatchObject({ droppedEntries: 1, misses: 1, hits: 1 });
      expect(entries[0]?.message).toBe('Dropping inconsistent cache entry');
      expect(entries[0]?.context?.['error']).toMatchObject({ name: 'CacheEntryError' });
    });
  });

  describe('clearing and change events', () => {
    it('should clear entries but keep metrics', () => {
      store = new CacheStore();
      store.set('a', 1);
      store.get('a');
      store.clear();

      expect(store.size).toBe(0);
      expect(store.getInfo().sizeBytes).toBe(0);
      expect(store.metrics.hits).toBe(1);
    });

    it('should publish changes', () => {
      store = new CacheStore({ maxEntries: 1 });
      const events: CacheChangeEvent[] = [];
      store.changes$.subscribe((event) => events.push(event));

      store.set('a', 1);
      store.set('b', 2);
      store.invalidate('b');
      store.remove('b');
      store.clear();

      expect(events.map((event) => [event.type, event.key])).toEqual([
        ['set', 'a'],
        ['set', 'b'],
        ['evict', 'a'],
        ['invalidate', 'b'],
        ['remove', 'b'],
        ['clear', undefined],
      ]);
    });

    it('should complete the change stream on destroy', () => {
      store = new CacheStore();
      let completed = false;
      store.changes$.subscribe({ complete: () => (completed = true) });
      store.destroy();
      expect(completed).toBe(true);
    });
  });

  describe('fetch timings', () => {
    it('should summarise recorded fetch durations', () => {
      store = new CacheStore();
      store.recordFetch(10);
      store.recordFetch(30);
      expect(store.metrics.fetch).toEqual({ count: 2, avgMs: 20, p95Ms: 30 });
    });
  });
});
