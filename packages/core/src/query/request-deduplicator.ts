/**
 * Client-wide map of in-flight requests by query key.
 *
 * Every query instance for a key goes through the same deduplicator, so two
 * subscribers that were handed different objects still share one producer
 * call.
 */
export class RequestDeduplicator {
  private readonly inFlight = new Map<string, Promise<unknown>>();

  /** The in-flight request for a key, if any */
  get<T>(key: string): Promise<T> | undefined {
    // One producer type per key; the owning query wrote this entry.
    return this.inFlight.get(key) as Promise<T> | undefined;
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }

  /**
   * Register a request for a key, replacing any previous one. The entry is
   * removed when the request settles, unless it was replaced meanwhile.
   */
  track<T>(key: string, promise: Promise<T>): Promise<T> {
    this.inFlight.set(key, promise);
    const cleanup = (): void => {
      if (this.inFlight.get(key) === promise) {
        this.inFlight.delete(key);
      }
    };
    void promise.then(cleanup, cleanup);
    return promise;
  }

  /**
   * Join the in-flight request for a key or start a new one. With `replace`
   * a new request always starts and takes over the key.
   */
  run<T>(key: string, fn: () => Promise<T>, options: { replace?: boolean } = {}): Promise<T> {
    const existing = this.get<T>(key);
    if (existing && !options.replace) {
      return existing;
    }
    return this.track(key, fn());
  }

  /** Drop the entry for a key if it is still `promise` */
  forget(key: string, promise: Promise<unknown>): void {
    if (this.inFlight.get(key) === promise) {
      this.inFlight.delete(key);
    }
  }

  get size(): number {
    return this.inFlight.size;
  }

  keys(): string[] {
    return Array.from(this.inFlight.keys());
  }

  /** Forget every in-flight request. The requests themselves keep running. */
  clear(): void {
    this.inFlight.clear();
  }
}
