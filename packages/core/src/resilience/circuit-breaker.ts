/**
 * Circuit breakers guarding query producers.
 *
 * A breaker opens after `failureThreshold` consecutive failures, refuses
 * attempts for `resetTimeoutMs`, then lets trial requests through
 * (half-open) and closes again after `successThreshold` successes.
 *
 * @module resilience
 */

import { Subject, takeUntil, type Observable } from 'rxjs';

/** Circuit breaker state */
export type CircuitState = 'closed' | 'open' | 'half-open';

/** Circuit breaker configuration */
export interface CircuitBreakerConfig {
  /** Failures before opening (default: 5) */
  readonly failureThreshold?: number;
  /** Time in open state before trying half-open (default: 30000ms) */
  readonly resetTimeoutMs?: number;
  /** Successes in half-open to close (default: 2) */
  readonly successThreshold?: number;
  /** Breaker identity; queries sharing a scope share a breaker (default: the query key) */
  readonly scope?: string;
}

export interface CircuitStats {
  readonly scope: string;
  readonly state: CircuitState;
  readonly consecutiveFailures: number;
  readonly consecutiveSuccesses: number;
  readonly totalFailures: number;
  readonly totalSuccesses: number;
  readonly rejectedAttempts: number;
  readonly openedAt: number | null;
}

export type CircuitEvent =
  | { type: 'circuit-open'; scope: string; timestamp: number; error?: string }
  | { type: 'circuit-half-open'; scope: string; timestamp: number }
  | { type: 'circuit-close'; scope: string; timestamp: number }
  | { type: 'circuit-rejected'; scope: string; timestamp: number };

export class CircuitBreaker {
  readonly scope: string;
  private readonly config: Required<Omit<CircuitBreakerConfig, 'scope'>>;
  private readonly emit: (event: CircuitEvent) => void;

  private circuitState: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private rejectedAttempts = 0;
  private openedAt: number | null = null;

  constructor(
    scope: string,
    config: CircuitBreakerConfig = {},
    emit: (event: CircuitEvent) => void = () => undefined
  ) {
    this.scope = scope;
    this.config = {
      failureThreshold: config.failureThreshold ?? 5,
      resetTimeoutMs: config.resetTimeoutMs ?? 30_000,
      successThreshold: config.successThreshold ?? 2,
    };
    this.emit = emit;
  }

  /** Check whether a request may go through. Counts refusals. */
  canAttempt(): boolean {
    if (this.getState() === 'open') {
      this.rejectedAttempts++;
      this.emit({ type: 'circuit-rejected', scope: this.scope, timestamp: Date.now() });
      return false;
    }
    return true;
  }

  recordSuccess(): void {
    this.totalSuccesses++;
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses++;

    if (
      this.circuitState === 'half-open' &&
      this.consecutiveSuccesses >= this.config.successThreshold
    ) {
      this.circuitState = 'closed';
      this.openedAt = null;
      this.emit({ type: 'circuit-close', scope: this.scope, timestamp: Date.now() });
    }
  }

  recordFailure(error?: unknown): void {
    this.totalFailures++;
    this.consecutiveFailures++;
    this.consecutiveSuccesses = 0;

    const tripped =
      this.circuitState === 'half-open' ||
      (this.circuitState === 'closed' && this.consecutiveFailures >= this.config.failureThreshold);

    if (tripped) {
      this.circuitState = 'open';
      this.openedAt = Date.now();
      this.emit({
        type: 'circuit-open',
        scope: this.scope,
        timestamp: this.openedAt,
        error: error instanceof Error ? error.message : undefined,
      });
    }
  }

  /** Current state; an open breaker past its timeout reports half-open */
  getState(): CircuitState {
    if (
      this.circuitState === 'open' &&
      this.openedAt !== null &&
      Date.now() - this.openedAt >= this.config.resetTimeoutMs
    ) {
      this.circuitState = 'half-open';
      this.consecutiveSuccesses = 0;
      this.emit({ type: 'circuit-half-open', scope: this.scope, timestamp: Date.now() });
    }
    return this.circuitState;
  }

  /** When an open breaker will let a trial request through */
  get retryAt(): number | null {
    return this.circuitState === 'open' && this.openedAt !== null
      ? this.openedAt + this.config.resetTimeoutMs
      : null;
  }

  getStats(): CircuitStats {
    return {
      scope: this.scope,
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      consecutiveSuccesses: this.consecutiveSuccesses,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      rejectedAttempts: this.rejectedAttempts,
      openedAt: this.openedAt,
    };
  }

  reset(): void {
    this.circuitState = 'closed';
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses = 0;
    this.openedAt = null;
  }
}

/**
 * One breaker per scope, shared by every query that names the scope.
 *
 * @example
 * ```typescript
 * const registry = new CircuitBreakerRegistry();
 * registry.events$.subscribe((e) => {
 *   if (e.type === 'circuit-open') console.warn(`${e.scope} tripped`);
 * });
 *
 * const breaker = registry.get('users-api', { failureThreshold: 3 });
 * ```
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly destroy$ = new Subject<void>();
  private readonly eventsSubject = new Subject<CircuitEvent>();

  readonly events$: Observable<CircuitEvent>;

  constructor() {
    this.events$ = this.eventsSubject.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Get or create the breaker for a scope. Config only applies on creation. */
  get(scope: string, config: CircuitBreakerConfig = {}): CircuitBreaker {
    let breaker = this.breakers.get(scope);
    if (!breaker) {
      breaker = new CircuitBreaker(scope, config, (event) => this.eventsSubject.next(event));
      this.breakers.set(scope, breaker);
    }
    return breaker;
  }

  has(scope: string): boolean {
    return this.breakers.has(scope);
  }

  getAllStats(): CircuitStats[] {
    return Array.from(this.breakers.values(), (breaker) => breaker.getStats());
  }

  reset(scope?: string): void {
    if (scope) {
      this.breakers.get(scope)?.reset();
      return;
    }
    for (const breaker of this.breakers.values()) breaker.reset();
  }

  destroy(): void {
    this.breakers.clear();
    this.destroy$.next();
    this.destroy$.complete();
    this.eventsSubject.complete();
  }
}
