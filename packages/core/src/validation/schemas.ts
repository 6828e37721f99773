/**
 * zod schemas for option objects and persisted queue entries.
 *
 * Only the data-shaped fields are checked here; callbacks and producers are
 * typed by the TypeScript signatures of the public API.
 *
 * @module validation
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/querylane-error.js';

const duration = z.number().finite().nonnegative();
const count = z.number().int().nonnegative();
const fn = z.custom<(...args: never[]) => unknown>(
  (value) => typeof value === 'function',
  'Expected a function'
);

/** A custom policy object: `{ name, select, onAccess, onInsert }` */
const evictionPolicyObjectSchema = z
  .object({ name: z.string().min(1), select: fn, onAccess: fn, onInsert: fn })
  .passthrough();

export const circuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().positive().optional(),
  resetTimeoutMs: duration.optional(),
  successThreshold: z.number().int().positive().optional(),
  scope: z.string().min(1).optional(),
});

const queryOptionsShape = z
  .object({
    enabled: z.boolean().optional(),
    staleTime: duration.optional(),
    cacheTime: duration.optional(),
    refetchOnMount: z.boolean().optional(),
    isSecure: z.boolean().optional(),
    maxAge: z.number().finite().positive().optional(),
    circuitBreaker: z.union([z.boolean(), circuitBreakerConfigSchema]).optional(),
  })
  .passthrough();

/** Secure entries must expire on their own */
function requireMaxAgeWhenSecure(
  options: { isSecure?: boolean; maxAge?: number },
  ctx: z.RefinementCtx
): void {
  if (options.isSecure && options.maxAge === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maxAge'],
      message: 'Required when isSecure is set',
    });
  }
}

export const queryOptionsSchema = queryOptionsShape.superRefine(requireMaxAgeWhenSecure);

export const infiniteQueryOptionsSchema = queryOptionsShape
  .extend({ maxPages: z.number().int().positive().optional() })
  .superRefine(requireMaxAgeWhenSecure);

export const mutationOptionsSchema = z
  .object({
    mutationType: z.string().min(1).optional(),
    maxRetries: count.optional(),
    retryDelayMs: duration.optional(),
    maxRetryDelayMs: duration.optional(),
    priority: z.number().int().optional(),
    queueWhenOffline: z.boolean().optional(),
  })
  .passthrough();

export const offlineQueueConfigSchema = z.object({
  concurrency: z.number().int().positive().optional(),
  defaultMaxAttempts: z.number().int().positive().optional(),
});

export const queryClientConfigSchema = z
  .object({
    maxEntries: z.number().int().positive().optional(),
    maxCacheSize: z.number().int().positive().optional(),
    evictionPolicy: z.union([z.enum(['lru', 'lfu', 'fifo']), evictionPolicyObjectSchema]).optional(),
    defaultStaleTime: duration.optional(),
    defaultCacheTime: duration.optional(),
    idleDisposeMs: duration.optional(),
    gcIntervalMs: z.number().finite().positive().optional(),
    online: z.boolean().optional(),
    queue: offlineQueueConfigSchema.optional(),
  })
  .passthrough();

/** Persisted form of one offline mutation entry */
export const serializedQueueEntrySchema = z.object({
  id: z.string().min(1).optional(),
  typeId: z.string().min(1),
  variables: z.unknown(),
  priority: z.number().int(),
  attempts: count,
  enqueuedAt: z.number().finite(),
});

export const serializedQueueSchema = z.object({
  version: z.literal(1),
  entries: z.array(serializedQueueEntrySchema),
});

export type SerializedQueueEntry = z.infer<typeof serializedQueueEntrySchema>;
export type SerializedQueue = z.infer<typeof serializedQueueSchema>;

/** Turn zod issues into readable `path: message` lines */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Check a value against a schema, throwing ConfigurationError with every
 * issue found.
 */
export function validateConfig<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  context?: Record<string, unknown>
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error), { context });
  }
  return result.data;
}
