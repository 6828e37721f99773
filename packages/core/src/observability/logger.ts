/**
 * Structured logging for the caching engine.
 *
 * Zero-dependency logger with levels, JSON output, per-component context
 * and a global debug toggle. Silent unless a handler, JSON output or debug
 * mode is configured, so library consumers see nothing by default.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface QueryLaneLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: none) */
  readonly handler?: (entry: LogEntry) => void;
  /** Write entries to the console as JSON lines */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for every logger */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger shared by the cache store, queries, mutations and the
 * offline queue. Components receive a child of the client's logger.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@querylane/core';
 *
 * const log = createLogger({ module: 'app', level: 'debug', handler: sendToCollector });
 * const client = new QueryClient({ logger: log });
 *
 * // entries arrive with module 'app:cache', 'app:query', 'app:offline-queue' ...
 * ```
 */
export class QueryLaneLogger {
  private readonly level: LogLevel;
  private readonly module: string;
  private readonly handler?: (entry: LogEntry) => void;
  private readonly json: boolean;

  constructor(config: QueryLaneLoggerConfig = {}) {
    this.level = config.debug ? 'debug' : (config.level ?? 'info');
    this.module = config.module ?? 'querylane';
    this.handler = config.handler;
    this.json = config.json ?? false;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): QueryLaneLogger {
    return new QueryLaneLogger({
      level: this.level,
      module: `${this.module}:${subModule}`,
      handler: this.handler,
      json: this.json,
    });
  }

  get moduleName(): string {
    return this.module;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /** Log at error level. Non-Error values are stringified into the context. */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error === undefined ? {} : { error: describeError(error) }),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   *
   * @example
   * ```typescript
   * const end = logger.time('fetch');
   * await producer();
   * end({ key: 'todos' });
   * ```
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    };

    if (this.handler) {
      this.handler(entry);
      return;
    }

    if (this.json || globalDebug) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

function describeError(error: unknown): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

export function createLogger(config?: QueryLaneLoggerConfig): QueryLaneLogger {
  return new QueryLaneLogger(config);
}
