import { HOLDER_PREFIX, keysFromHolder, type LockKeys } from './keys.js';
import type { ExtendResult, LockStore } from './types.js';

interface Entry {
  value: string;
  expiresAt?: number;
}

interface SignalList {
  length: number;
  expiresAt?: number;
}

interface Waiter {
  resolve: (signalled: boolean) => void;
  timer?: NodeJS.Timeout;
}

/**
 * In-process {@link LockStore}.
 *
 * Coordinates handles living in one Node.js process only; useful for tests
 * and single-process deployments. Expiry is evaluated lazily on access.
 * Blocked waiters are woken in the order they started waiting, mirroring
 * how Redis serves BLPOP clients.
 *
 * @public
 */
export class MemoryLockStore implements LockStore {
  private readonly values = new Map<string, Entry>();
  private readonly signals = new Map<string, SignalList>();
  private readonly waiters = new Map<string, Waiter[]>();

  async setIfAbsent(key: string, value: string, expireMs = 0): Promise<boolean> {
    if (this.liveValue(key) !== undefined) {
      return false;
    }
    this.values.set(key, { value, expiresAt: expireMs > 0 ? Date.now() + expireMs : undefined });
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.liveValue(key)?.value ?? null;
  }

  async releaseIfOwner(keys: LockKeys, id: string, signalExpireMs: number): Promise<boolean> {
    if (this.liveValue(keys.holder)?.value !== id) {
      return false;
    }
    this.values.delete(keys.holder);
    this.signal(keys.signal, signalExpireMs);
    return true;
  }

  async extendIfOwner(key: string, id: string, expireMs: number): Promise<ExtendResult> {
    const entry = this.liveValue(key);
    if (entry?.value !== id) {
      return 'not-owner';
    }
    if (entry.expiresAt === undefined) {
      return 'not-expirable';
    }
    entry.expiresAt = Date.now() + expireMs;
    return 'extended';
  }

  waitForSignal(key: string, timeoutMs: number): Promise<boolean> {
    const list = this.liveSignal(key);
    if (list) {
      list.length -= 1;
      if (list.length === 0) {
        this.signals.delete(key);
      }
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = { resolve };
      if (timeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          this.removeWaiter(key, waiter);
          resolve(false);
        }, timeoutMs);
      }
      const queue = this.waiters.get(key) ?? [];
      queue.push(waiter);
      this.waiters.set(key, queue);
    });
  }

  async reset(keys: LockKeys, signalExpireMs: number): Promise<void> {
    this.values.delete(keys.holder);
    this.signal(keys.signal, signalExpireMs);
  }

  async resetAll(signalExpireMs: number): Promise<number> {
    let removed = 0;
    for (const key of [...this.values.keys()]) {
      const keys = keysFromHolder(key);
      if (keys && this.liveValue(key) !== undefined) {
        await this.reset(keys, signalExpireMs);
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Live keys currently in the store, holder keys first.
   */
  keys(): string[] {
    const holders = [...this.values.keys()].filter(
      (key) => key.startsWith(HOLDER_PREFIX) && this.liveValue(key) !== undefined
    );
    const signals = [...this.signals.keys()].filter((key) => this.liveSignal(key) !== undefined);
    return [...holders, ...signals];
  }

  /**
   * Number of unconsumed tokens on a signal list (LLEN).
   */
  signalLength(key: string): number {
    return this.liveSignal(key)?.length ?? 0;
  }

  /**
   * Remaining time to live of a key in milliseconds: -2 when absent, -1
   * when it has no expiry (PTTL).
   */
  ttl(key: string): number {
    const entry = this.liveValue(key);
    if (!entry) {
      return -2;
    }
    return entry.expiresAt === undefined ? -1 : entry.expiresAt - Date.now();
  }

  /**
   * Drops the list, pushes one token and sets its expiry. A waiting popper
   * takes the token straight away.
   */
  private signal(key: string, expireMs: number): void {
    this.signals.delete(key);

    const waiter = this.waiters.get(key)?.[0];
    if (waiter) {
      this.removeWaiter(key, waiter);
      clearTimeout(waiter.timer);
      waiter.resolve(true);
      return;
    }

    this.signals.set(key, { length: 1, expiresAt: Date.now() + expireMs });
  }

  private removeWaiter(key: string, waiter: Waiter): void {
    const queue = this.waiters.get(key);
    if (!queue) {
      return;
    }
    const index = queue.indexOf(waiter);
    if (index !== -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.waiters.delete(key);
    }
  }

  private liveValue(key: string): Entry | undefined {
    const entry = this.values.get(key);
    if (entry?.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.values.delete(key);
      return undefined;
    }
    return entry;
  }

  private liveSignal(key: string): SignalList | undefined {
    const list = this.signals.get(key);
    if (list?.expiresAt !== undefined && list.expiresAt <= Date.now()) {
      this.signals.delete(key);
      return undefined;
    }
    return list;
  }
}
