/**
 * QueryLaneError - Enhanced error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a QueryLaneError
 */
export interface QueryLaneErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a QueryLaneError
 */
export interface SerializedQueryLaneError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedQueryLaneError | { name: string; message: string; stack?: string };
}

/**
 * Base class for every error the engine raises itself.
 *
 * Errors thrown by caller-supplied producers are never wrapped in this class:
 * they reach query and mutation state exactly as thrown.
 *
 * @example
 * ```typescript
 * try {
 *   client.getInfiniteQuery('feed', fetchFeed, {});
 * } catch (error) {
 *   if (QueryLaneError.isCode(error, 'QL_C101')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class QueryLaneError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: QueryLaneErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'QueryLaneError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryLaneError);
    }
  }

  /**
   * Create a QueryLaneError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): QueryLaneError {
    return new QueryLaneError({ code, context });
  }

  /**
   * Wrap an existing error with a QueryLaneError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): QueryLaneError {
    return new QueryLaneError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isQueryLaneError(error: unknown): error is QueryLaneError {
    return error instanceof QueryLaneError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return QueryLaneError.isQueryLaneError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return QueryLaneError.isQueryLaneError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedQueryLaneError {
    const result: SerializedQueryLaneError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (QueryLaneError.isQueryLaneError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

type ConfigurationErrorCode = 'QL_C100' | 'QL_C101' | 'QL_C102' | 'QL_C103';

/**
 * Raised at construction time when options or client configuration are invalid.
 */
export class ConfigurationError extends QueryLaneError {
  /** Individual problems found in the configuration */
  readonly issues: readonly string[];

  constructor(
    issues: readonly string[],
    options: { code?: ConfigurationErrorCode; context?: Record<string, unknown> } = {}
  ) {
    const code = options.code ?? 'QL_C100';
    const base = getErrorInfo(code).message;

    super({
      code,
      message: issues.length > 0 ? `${base}: ${issues.join('; ')}` : base,
      context: { ...options.context, issues },
    });

    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Query key rejected by key validation
 */
export class InvalidKeyError extends QueryLaneError {
  readonly key: unknown;

  constructor(key: unknown, reason: string) {
    super({
      code: 'QL_K200',
      message: `Invalid query key ${JSON.stringify(key)}: ${reason}`,
      context: { key, reason },
    });

    this.name = 'InvalidKeyError';
    this.key = key;
  }
}

/**
 * A cache entry failed its consistency check. Only that entry is dropped.
 */
export class CacheEntryError extends QueryLaneError {
  readonly key: string;

  constructor(key: string, reason: string) {
    super({
      code: 'QL_E300',
      message: `Cache entry "${key}" is inconsistent: ${reason}`,
      context: { key, reason },
    });

    this.name = 'CacheEntryError';
    this.key = key;
  }
}

/**
 * Reported through the offline queue's dead-entry signal when a queued
 * mutation used up its attempts. Never thrown at the original caller.
 */
export class QueueExhaustedError extends QueryLaneError {
  readonly entryId: string;
  readonly typeId: string;
  readonly attempts: number;

  constructor(entryId: string, typeId: string, attempts: number, cause?: Error) {
    super({
      code: 'QL_O400',
      message: `Queued mutation "${typeId}" (${entryId}) failed ${attempts} times`,
      context: { entryId, typeId, attempts },
      cause,
    });

    this.name = 'QueueExhaustedError';
    this.entryId = entryId;
    this.typeId = typeId;
    this.attempts = attempts;
  }
}

export class UnknownMutationTypeError extends QueryLaneError {
  readonly typeId: string;

  constructor(typeId: string) {
    super({
      code: 'QL_O401',
      message: `No handler registered for mutation type "${typeId}"`,
      context: { typeId },
    });

    this.name = 'UnknownMutationTypeError';
    this.typeId = typeId;
  }
}

export class InvalidVariablesError extends QueryLaneError {
  readonly typeId: string;

  constructor(typeId: string, reason: string) {
    super({
      code: 'QL_O402',
      message: `Variables for mutation type "${typeId}" cannot be queued: ${reason}`,
      context: { typeId, reason },
    });

    this.name = 'InvalidVariablesError';
    this.typeId = typeId;
  }
}

/**
 * Returned as a query's error when its circuit breaker refuses the request.
 */
export class CircuitOpenError extends QueryLaneError {
  readonly scope: string;
  readonly retryAt: number | null;

  constructor(scope: string, retryAt: number | null) {
    super({
      code: 'QL_B500',
      message: `Circuit "${scope}" is open`,
      context: { scope, retryAt },
    });

    this.name = 'CircuitOpenError';
    this.scope = scope;
    this.retryAt = retryAt;
  }
}

/**
 * Normalize any thrown value to a QueryLaneError, keeping the original as cause.
 */
export function ensureQueryLaneError(
  error: unknown,
  defaultCode: ErrorCode = 'QL_X900'
): QueryLaneError {
  if (QueryLaneError.isQueryLaneError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return QueryLaneError.wrap(error, defaultCode);
  }

  return new QueryLaneError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Coerce an unknown thrown value into an Error without wrapping real errors.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
