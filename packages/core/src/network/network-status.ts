import { BehaviorSubject, distinctUntilChanged, skip, type Observable } from 'rxjs';

/**
 * Settable online/offline flag, one per client.
 *
 * The engine does not detect connectivity itself; the host calls `setOnline()` from
 * whatever signal it trusts.
 */
export class NetworkStatus {
  private readonly online$$: BehaviorSubject<boolean>;

  /** Current flag, replayed to new subscribers */
  readonly online$: Observable<boolean>;

  /** Transitions only, without the replayed current value */
  readonly changes$: Observable<boolean>;

  constructor(initiallyOnline = true) {
    this.online$$ = new BehaviorSubject<boolean>(initiallyOnline);
    this.online$ = this.online$$.pipe(distinctUntilChanged());
    this.changes$ = this.online$.pipe(skip(1));
  }

  get isOnline(): boolean {
    return this.online$$.getValue();
  }

  /** @returns whether the flag changed */
  setOnline(online: boolean): boolean {
    if (this.online$$.getValue() === online) return false;
    this.online$$.next(online);
    return true;
  }

  destroy(): void {
    this.online$$.complete();
  }
}
