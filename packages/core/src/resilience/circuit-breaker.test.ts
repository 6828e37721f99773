import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CircuitBreaker, CircuitBreakerRegistry, type CircuitEvent } from './circuit-breaker.js';

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should start closed', () => {
    const breaker = new CircuitBreaker('users');
    expect(breaker.getState()).toBe('closed');
    expect(breaker.canAttempt()).toBe(true);
    expect(breaker.retryAt).toBeNull();
  });

  it('should open after consecutive failures reach the threshold', () => {
    const events: CircuitEvent[] = [];
    const breaker = new CircuitBreaker('users', { failureThreshold: 3 }, (e) => events.push(e));

    breaker.recordFailure(new Error('boom'));
    breaker.recordFailure(new Error('boom'));
    expect(breaker.getState()).toBe('closed');

    breaker.recordFailure(new Error('down'));
    expect(breaker.getState()).toBe('open');
    expect(breaker.retryAt).toBe(Date.now() + 30_000);
    expect(events).toEqual([
      { type: 'circuit-open', scope: 'users', timestamp: Date.now(), error: 'down' },
    ]);
  });

  it('should reset the failure streak on success', () => {
    const breaker = new CircuitBreaker('users', { failureThreshold: 2 });
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();
    expect(breaker.getState()).toBe('closed');
  });

  it('should refuse attempts while open and count them', () => {
    const events: CircuitEvent[] = [];
    const breaker = new CircuitBreaker('users', { failureThreshold: 1 }, (e) => events.push(e));
    breaker.recordFailure();

    expect(breaker.canAttempt()).toBe(false);
    expect(breaker.getStats().rejectedAttempts).toBe(1);
    expect(events.map((e) => e.type)).toEqual(['circuit-open', 'circuit-rejected']);
  });

  it('should go half-open after the reset timeout and close after enough successes', () => {
    const breaker = new CircuitBreaker('users', {
      failureThreshold: 1,
      resetTimeoutMs: 1000,
      successThreshold: 2,
    });
    breaker.recordFailure();

    vi.advanceTimersByTime(999);
    expect(breaker.getState()).toBe('open');
    vi.advanceTimersByTime(1);
    expect(breaker.getState()).toBe('half-open');
    expect(breaker.canAttempt()).toBe(true);

    breaker.recordSuccess();
    expect(breaker.getState()).toBe('half-open');
    breaker.recordSuccess();
    expect(breaker.getState()).toBe('closed');
    expect(breaker.getStats().openedAt).toBeNull();
  });

  it('should reopen on a failure while half-open', () => {
    const breaker = new CircuitBreaker('users', { failureThreshold: 3, resetTimeoutMs: 1000 });
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();
    vi.advanceTimersByTime(1000);
    expect(breaker.getState()).toBe('half-open');

    breaker.recordFailure();
    expect(breaker.getState()).toBe('open');
  });

  it('should report totals and reset', () => {
    const breaker = new CircuitBreaker('users', { failureThreshold: 2 });
    breaker.recordSuccess();
    breaker.recordFailure();
    breaker.recordFailure();

    expect(breaker.getStats()).toMatchObject({
      scope: 'users',
      state: 'open',
      consecutiveFailures: 2,
      totalFailures: 2,
      totalSuccesses: 1,
    });

    breaker.reset();
    expect(breaker.getStats()).toMatchObject({ state: 'closed', consecutiveFailures: 0, openedAt: null });
  });
});

describe('CircuitBreakerRegistry', () => {
  it('should share one breaker per scope', () => {
    const registry = new CircuitBreakerRegistry();
    const a = registry.get('api', { failureThreshold: 1 });
    const b = registry.get('api', { failureThreshold: 10 });

    expect(a).toBe(b);
    b.recordFailure();
    expect(a.getState()).toBe('open');
    registry.destroy();
  });

  it('should publish events from every breaker', () => {
    const registry = new CircuitBreakerRegistry();
    const events: CircuitEvent[] = [];
    registry.events$.subscribe((e) => events.push(e));

    registry.get('a', { failureThreshold: 1 }).recordFailure();
    registry.get('b', { failureThreshold: 1 }).recordFailure();

    expect(events.map((e) => [e.type, e.scope])).toEqual([
      ['circuit-open', 'a'],
      ['circuit-open', 'b'],
    ]);
    registry.destroy();
  });

  it('should reset one scope or all of them', () => {
    const registry = new CircuitBreakerRegistry();
    registry.get('a', { failureThreshold: 1 }).recordFailure();
    registry.get('b', { failureThreshold: 1 }).recordFailure();

    registry.reset('a');
    expect(registry.getAllStats().map((s) => [s.scope, s.state])).toEqual([
      ['a', 'closed'],
      ['b', 'open'],
    ]);

    registry.reset();
    expect(registry.getAllStats().every((s) => s.state === 'closed')).toBe(true);
    expect(registry.has('a')).toBe(true);
    registry.destroy();
    expect(registry.has('a')).toBe(false);
  });
});
