import type { CacheEntry } from './types.js';

const OBJECT_OVERHEAD_BYTES = 16;

/**
 * Rough in-memory size of a value, used for the `maxCacheSize` limit.
 * Strings count two bytes per UTF-16 unit; shared or circular references are
 * counted once.
 */
export function estimateSize(value: unknown): number {
  return sizeOf(value, new WeakSet<object>());
}

function sizeOf(value: unknown, seen: WeakSet<object>): number {
  switch (typeof value) {
    case 'undefined':
      return 0;
    case 'boolean':
      return 4;
    case 'number':
      return 8;
    case 'bigint':
      return 16;
    case 'string':
      return value.length * 2;
    case 'object':
      break;
    default:
      return 8;
  }

  if (value === null) return 0;
  if (seen.has(value)) return 0;
  seen.add(value);

  if (value instanceof ArrayBuffer) return value.byteLength;
  if (ArrayBuffer.isView(value)) return value.byteLength;
  if (value instanceof Date) return 8;

  let total = OBJECT_OVERHEAD_BYTES;
  if (Array.isArray(value)) {
    for (const item of value) total += sizeOf(item, seen);
    return total;
  }
  if (value instanceof Map) {
    for (const [k, v] of value) total += sizeOf(k, seen) + sizeOf(v, seen);
    return total;
  }
  if (value instanceof Set) {
    for (const item of value) total += sizeOf(item, seen);
    return total;
  }
  for (const [field, child] of Object.entries(value)) {
    total += field.length * 2 + sizeOf(child, seen);
  }
  return total;
}

/** Fresh while younger than staleTime and not invalidated */
export function isEntryFresh(entry: CacheEntry, now: number): boolean {
  return entry.hasData && !entry.isInvalidated && now - entry.updatedAt < entry.staleTime;
}

/**
 * An unreferenced entry expires `cacheTime` after it was last read, written
 * or released. Secure entries with `maxAge` also expire at `expiresAt`,
 * referenced or not.
 */
export function isEntryExpired(entry: CacheEntry, now: number): boolean {
  if (entry.expiresAt !== undefined && now >= entry.expiresAt) {
    return true;
  }
  if (entry.refCount > 0) return false;
  const lastTouched = Math.max(entry.lastAccessedAt, entry.updatedAt, entry.releasedAt ?? 0);
  return now - lastTouched > entry.cacheTime;
}

/** Returns a description of the first broken field, or null */
export function checkEntryConsistency(entry: CacheEntry): string | null {
  const timestamps: Array<[string, number]> = [
    ['createdAt', entry.createdAt],
    ['lastAccessedAt', entry.lastAccessedAt],
    ['updatedAt', entry.updatedAt],
  ];
  for (const [field, value] of timestamps) {
    if (!Number.isFinite(value)) return `${field} is not a finite timestamp`;
  }

  const counters: Array<[string, number]> = [
    ['accessCount', entry.accessCount],
    ['refCount', entry.refCount],
    ['staleTime', entry.staleTime],
    ['cacheTime', entry.cacheTime],
    ['sizeBytes', entry.sizeBytes],
  ];
  for (const [field, value] of counters) {
    if (Number.isNaN(value) || value < 0) return `${field} is negative or NaN`;
  }

  if (!entry.hasData && entry.data !== undefined) {
    return 'placeholder entry carries data';
  }
  return null;
}

/** Detached copy of an entry for callers outside the store */
export function snapshotEntry<T>(entry: CacheEntry<T>): Readonly<CacheEntry<T>> {
  return Object.freeze({ ...entry });
}
