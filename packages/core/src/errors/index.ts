/**
 * QueryLane Error System
 *
 * Engine-raised failures carry a code, a category, a suggestion and a context
 * object. Producer failures are stored in query and mutation state as thrown.
 *
 * @example
 * ```typescript
 * import { QueryLaneError } from '@querylane/core';
 *
 * queue.events$.subscribe((event) => {
 *   if (event.type === 'dead' && QueryLaneError.isCode(event.error, 'QL_O400')) {
 *     console.log(event.error.format());
 *   }
 * });
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CacheEntryError,
  CircuitOpenError,
  ConfigurationError,
  InvalidKeyError,
  InvalidVariablesError,
  QueryLaneError,
  QueueExhaustedError,
  UnknownMutationTypeError,
  ensureQueryLaneError,
  toError,
  type QueryLaneErrorOptions,
  type SerializedQueryLaneError,
} from './querylane-error.js';
