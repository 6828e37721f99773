/**
 * Query key validation.
 *
 * Keys are the identity of a cache entry, so they are restricted to a
 * conservative character set that survives logging and persistence.
 *
 * @module validation
 */

import { InvalidKeyError } from '../errors/querylane-error.js';

/** Validation result */
export interface InputValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

const QUERY_KEY_PATTERN = /^[a-zA-Z0-9:_\-./]+$/;
const MAX_KEY_LENGTH = 255;

/** Validate a query key */
export function validateQueryKey(key: unknown): InputValidationResult {
  const errors: string[] = [];
  if (typeof key !== 'string') {
    return { valid: false, errors: ['Query key must be a string'] };
  }
  if (key.length === 0) {
    errors.push('Query key cannot be empty');
  } else if (key.length > MAX_KEY_LENGTH) {
    errors.push(`Query key too long (${key.length} chars, max ${MAX_KEY_LENGTH})`);
  } else if (!QUERY_KEY_PATTERN.test(key)) {
    errors.push(
      'Query key may only contain letters, digits, colon, hyphen, underscore, dot or slash'
    );
  }
  return { valid: errors.length === 0, errors };
}

/** Assert a query key is valid, throwing InvalidKeyError if not */
export function assertQueryKey(key: unknown): asserts key is string {
  const result = validateQueryKey(key);
  if (!result.valid) {
    throw new InvalidKeyError(key, result.errors.join('; '));
  }
}

/**
 * Describe why a value cannot be stored as JSON, or return null when it can.
 * Rejects functions, symbols, bigints, non-finite numbers, class instances
 * (other than arrays and plain objects) and cycles.
 */
export function describeNonJson(value: unknown): string | null {
  return walk(value, '$', new WeakSet<object>());
}

function walk(value: unknown, path: string, seen: WeakSet<object>): string | null {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return null;
    case 'number':
      return Number.isFinite(value) ? null : `${path} is not a finite number`;
    case 'object':
      break;
    case 'undefined':
      return `${path} is undefined`;
    default:
      return `${path} is a ${typeof value}`;
  }

  if (seen.has(value)) return `${path} is a circular reference`;

  if (Array.isArray(value)) {
    seen.add(value);
    for (let i = 0; i < value.length; i++) {
      const problem = walk(value[i], `${path}[${i}]`, seen);
      if (problem) return problem;
    }
    seen.delete(value);
    return null;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return `${path} is not a plain object`;
  }

  seen.add(value);
  for (const [field, child] of Object.entries(value)) {
    const problem = walk(child, `${path}.${field}`, seen);
    if (problem) return problem;
  }
  seen.delete(value);
  return null;
}
