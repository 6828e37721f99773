import { assertQueryKey } from '../validation/key-validation.js';

/** Separator between key segments */
export const KEY_SEPARATOR = ':';

export type QueryKeyPart = string | number | boolean;

/**
 * Build a validated key from segments.
 *
 * @example
 * ```typescript
 * queryKey('user', 42, 'posts'); // 'user:42:posts'
 * ```
 */
export function queryKey(base: string, ...parts: QueryKeyPart[]): string {
  const key = [base, ...parts.map(String)].join(KEY_SEPARATOR);
  assertQueryKey(key);
  return key;
}

/**
 * Key builder bound to one scope, so related keys share a prefix that
 * `invalidateQueriesWithPrefix` can target.
 *
 * @example
 * ```typescript
 * const todoKeys = createQueryKeyFactory('todos');
 * todoKeys.all; // 'todos'
 * todoKeys.key('list', 'open'); // 'todos:list:open'
 * client.invalidateQueriesWithPrefix(todoKeys.all);
 * ```
 */
export function createQueryKeyFactory(scope: string): {
  readonly all: string;
  key: (...parts: QueryKeyPart[]) => string;
} {
  assertQueryKey(scope);
  return {
    all: scope,
    key: (...parts) => queryKey(scope, ...parts),
  };
}

/** Prefix match used by prefix invalidation */
export function keyHasPrefix(key: string, prefix: string): boolean {
  return key.startsWith(prefix);
}
