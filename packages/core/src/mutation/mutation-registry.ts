import { ConfigurationError } from '../errors/querylane-error.js';

/** Replays one queued mutation. Receives the variables exactly as enqueued. */
export type MutationHandler<TVariables = unknown, TData = unknown> = (
  variables: TVariables
) => Promise<TData>;

export interface MutationTypeOptions {
  /** Replay attempts before an entry is dead-lettered (default: the registry's, 5) */
  maxAttempts?: number;
}

export interface RegisteredMutationType {
  readonly typeId: string;
  readonly handler: MutationHandler;
  readonly maxAttempts: number;
}

export const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Maps mutation type ids to the handlers the offline queue replays with.
 * One registry per client; there is no global instance.
 */
export class MutationTypeRegistry {
  private readonly handlers = new Map<string, RegisteredMutationType>();
  private readonly defaultMaxAttempts: number;

  constructor(options: { defaultMaxAttempts?: number } = {}) {
    this.defaultMaxAttempts = options.defaultMaxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  register<TVariables, TData>(
    typeId: string,
    handler: MutationHandler<TVariables, TData>,
    options: MutationTypeOptions = {}
  ): void {
    if (typeId.trim().length === 0) {
      throw new ConfigurationError(['typeId must be a non-empty string'], {
        context: { typeId },
      });
    }
    const maxAttempts = options.maxAttempts ?? this.defaultMaxAttempts;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError([`maxAttempts must be a positive integer, got ${maxAttempts}`], {
        context: { typeId },
      });
    }

    this.handlers.set(typeId, {
      typeId,
      // Variables come back from the queue as the same JSON value that was enqueued
      handler: (variables: unknown) => handler(variables as TVariables),
      maxAttempts,
    });
  }

  get(typeId: string): RegisteredMutationType | undefined {
    return this.handlers.get(typeId);
  }

  has(typeId: string): boolean {
    return this.handlers.has(typeId);
  }

  unregister(typeId: string): boolean {
    return this.handlers.delete(typeId);
  }

  get types(): string[] {
    return Array.from(this.handlers.keys());
  }
}
