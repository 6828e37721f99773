/**
 * QueryLane Error Codes
 *
 * Error codes are structured as QL_[CATEGORY][NUMBER]:
 * - C: Configuration errors (C100-C199)
 * - K: Query key errors (K200-K299)
 * - E: Cache entry errors (E300-E399)
 * - O: Offline queue errors (O400-O499)
 * - B: Circuit breaker errors (B500-B599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Configuration errors (C100-C199)
  QL_C100: {
    code: 'QL_C100',
    message: 'Invalid configuration',
    suggestion: 'Check the reported issues against the documented option types and ranges.',
  },
  QL_C101: {
    code: 'QL_C101',
    message: 'Infinite query requires getNextPageParam',
    suggestion: 'Pass a getNextPageParam(pages, lastPageData) function in the infinite query options.',
  },
  QL_C102: {
    code: 'QL_C102',
    message: 'Offline queuing requires a mutation type',
    suggestion:
      'Set mutationType when using queueWhenOffline so the queued entry can be replayed after a restart.',
  },
  QL_C103: {
    code: 'QL_C103',
    message: 'Key is owned by a different query kind',
    suggestion: 'Use distinct keys for regular and infinite queries.',
  },

  // Query key errors (K200-K299)
  QL_K200: {
    code: 'QL_K200',
    message: 'Invalid query key',
    suggestion:
      'Keys must be 1-255 characters of letters, digits, colon, hyphen, underscore, dot or slash.',
  },

  // Cache entry errors (E300-E399)
  QL_E300: {
    code: 'QL_E300',
    message: 'Inconsistent cache entry',
    suggestion: 'The entry was dropped and will be refetched on next access.',
  },

  // Offline queue errors (O400-O499)
  QL_O400: {
    code: 'QL_O400',
    message: 'Queued mutation exceeded its retry ceiling',
    suggestion: 'Inspect the dead entries and call retryDead() once the cause is fixed.',
  },
  QL_O401: {
    code: 'QL_O401',
    message: 'No handler registered for mutation type',
    suggestion: 'Register the mutation type with registerMutationType() before processing the queue.',
  },
  QL_O402: {
    code: 'QL_O402',
    message: 'Mutation variables are not serializable',
    suggestion: 'Queued variables must be plain JSON values (no functions, class instances or cycles).',
  },
  QL_O403: {
    code: 'QL_O403',
    message: 'Queued mutation was removed before it replayed',
    suggestion: 'The entry was dropped with remove() or clear(); enqueue it again if it is still needed.',
  },

  // Circuit breaker errors (B500-B599)
  QL_B500: {
    code: 'QL_B500',
    message: 'Circuit breaker is open',
    suggestion: 'The producer failed repeatedly; requests resume after the reset timeout.',
  },

  // Internal errors (X900-X999)
  QL_X900: {
    code: 'QL_X900',
    message: 'Internal error',
    suggestion: 'This is unexpected. Please report it with the error context.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'configuration' | 'key' | 'cache' | 'queue' | 'circuit' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(3);
  switch (letter) {
    case 'C':
      return 'configuration';
    case 'K':
      return 'key';
    case 'E':
      return 'cache';
    case 'O':
      return 'queue';
    case 'B':
      return 'circuit';
    default:
      return 'internal';
  }
}

/**
 * Get error info for a code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
