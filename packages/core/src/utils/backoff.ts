/**
 * Exponential backoff: `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`.
 * `attempt` is 1-based; attempts below 1 get no delay.
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  if (attempt < 1) return 0;
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/** Resolve after `ms` milliseconds, or as soon as `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
