import type { LockStore } from './types.js';

/**
 * The per-lock wait channel blocked acquirers sleep on.
 *
 * Releases and resets push a token onto it; a waiter wakes as soon as a
 * token arrives, or when its wait times out.
 */
export class SignalChannel {
  constructor(
    private readonly store: LockStore,
    readonly key: string
  ) {}

  /**
   * Blocks until a token is consumed (true) or `timeoutMs` elapses (false).
   * A timeout of 0 waits forever.
   */
  wait(timeoutMs: number): Promise<boolean> {
    return this.store.waitForSignal(this.key, timeoutMs);
  }

  /**
   * How long one wait cycle may block.
   *
   * Bounded by the caller's remaining deadline and by the lock expiry: a
   * holder whose key expires never signals, so a waiter re-checks the
   * holder key at least once per lease. Never returns 0 for a finite bound,
   * since 0 means "wait forever".
   */
  static cycleTimeout(remainingMs?: number, expireMs?: number): number {
    const bounds = [remainingMs, expireMs].filter((ms): ms is number => ms !== undefined);
    if (bounds.length === 0) {
      return 0;
    }
    return Math.max(1, Math.ceil(Math.min(...bounds)));
  }
}
