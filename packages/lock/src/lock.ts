import {
  AcquireTimeoutError,
  AlreadyAcquiredError,
  ConfigurationError,
  InvalidTimeoutError,
  NotAcquiredError,
  NotExpirableError,
  TimeoutNotUsableError,
  TimeoutTooLargeError,
} from './errors.js';
import { lockKeys, type LockKeys } from './keys.js';
import { lockLogger } from './logger.js';
import { LockRenewer, renewalInterval } from './renewal.js';
import { SignalChannel } from './signal.js';
import { generateToken } from './token.js';
import type { AcquireOptions, LockLogger, LockOptions, LockStore } from './types.js';

/** Default lifetime of an unconsumed wake-up signal. */
export const DEFAULT_SIGNAL_EXPIRE_MS = 1000;

/**
 * A named mutual-exclusion lock shared by every process using the same store.
 *
 * The store is the only source of truth: the holder key records which owner
 * id holds the lock and blocked acquirers sleep on the lock's signal list
 * until a release wakes them.
 *
 * @example
 * ```typescript
 * import { createClient } from 'redis';
 * import { Lock, RedisLockStore } from 'redis-signal-lock';
 *
 * const redis = createClient();
 * await redis.connect();
 *
 * const lock = new Lock(new RedisLockStore(redis), 'invoices', { expireMs: 60000 });
 *
 * if (await lock.acquire({ timeoutMs: 5000 })) {
 *   try {
 *     // Critical section
 *   } finally {
 *     await lock.release();
 *   }
 * }
 * ```
 *
 * @public
 */
export class Lock {
  private readonly keys: LockKeys;
  private readonly channel: SignalChannel;
  private readonly ownerId: string;
  private readonly expireMs: number | undefined;
  private readonly timeoutMs: number | undefined;
  private readonly signalExpireMs: number;
  private readonly logger: LockLogger;
  private readonly renewer: LockRenewer | undefined;
  private isHeld = false;

  /**
   * @param store - Store shared by every process coordinating on this lock.
   * @param name - Critical section identifier.
   * @param options - Owner id, expiry, default timeout and renewal settings.
   *
   * @throws {@link ConfigurationError} When the name or options are invalid.
   */
  constructor(
    private readonly store: LockStore,
    readonly name: string,
    options: LockOptions = {}
  ) {
    if (!store) {
      throw new ConfigurationError('store', store, 'LockStore');
    }
    if (!name || typeof name !== 'string' || name.trim().length === 0) {
      throw new ConfigurationError('name', name, 'non-empty string');
    }
    if (options.id !== undefined && (typeof options.id !== 'string' || options.id.length === 0)) {
      throw new ConfigurationError('id', options.id, 'non-empty string');
    }

    this.keys = lockKeys(name);
    this.channel = new SignalChannel(store, this.keys.signal);
    this.ownerId = options.id ?? generateToken();
    this.expireMs = normalizeDuration('expireMs', options.expireMs);
    this.timeoutMs = normalizeTimeout(options.timeoutMs);
    this.signalExpireMs = options.signalExpireMs ?? DEFAULT_SIGNAL_EXPIRE_MS;
    this.logger = options.logger ?? lockLogger(name);

    if (!Number.isInteger(this.signalExpireMs) || this.signalExpireMs <= 0) {
      throw new ConfigurationError('signalExpireMs', this.signalExpireMs, 'positive integer');
    }

    if (options.autoRenewal) {
      const expireMs = this.expireMs;
      if (expireMs === undefined) {
        throw new ConfigurationError('autoRenewal', options.autoRenewal, 'expireMs to be set');
      }

      const onLockLost = options.onLockLost;
      this.renewer = new LockRenewer({
        name,
        id: this.ownerId,
        intervalMs: renewalInterval(expireMs),
        renew: () => store.extendIfOwner(this.keys.holder, this.ownerId, expireMs),
        logger: this.logger,
        signal: options.signal,
        onLost: (event) => {
          this.isHeld = false;
          onLockLost?.(event);
        },
      });
    }
  }

  /** Owner id written to the holder key on acquisition. */
  get id(): string {
    return this.ownerId;
  }

  /** True only if this handle made the most recent successful acquisition. */
  get held(): boolean {
    return this.isHeld;
  }

  /** True while background renewal is scheduled. */
  get renewing(): boolean {
    return this.renewer?.running ?? false;
  }

  /**
   * Acquires the lock.
   *
   * A non-blocking call makes a single set-if-absent attempt. A blocking
   * call sleeps on the signal channel between attempts and wakes when the
   * holder releases; with a timeout it resolves false once the deadline has
   * passed and a last attempt failed.
   *
   * @returns true if the lock was acquired.
   *
   * @throws {@link AlreadyAcquiredError} When this handle, or another handle with the same id, holds the lock.
   * @throws {@link TimeoutNotUsableError} When `timeoutMs` is given with `blocking: false`.
   * @throws {@link InvalidTimeoutError} When `timeoutMs` is negative or not an integer.
   * @throws {@link TimeoutTooLargeError} When `timeoutMs` exceeds `expireMs` without auto-renewal.
   */
  async acquire(options: AcquireOptions = {}): Promise<boolean> {
    if (this.isHeld) {
      throw new AlreadyAcquiredError(this.name, this.ownerId);
    }

    const blocking = options.blocking ?? true;
    if (!blocking && options.timeoutMs !== undefined) {
      throw new TimeoutNotUsableError(options.timeoutMs);
    }

    const timeoutMs = blocking ? normalizeTimeout(options.timeoutMs ?? this.timeoutMs) : undefined;
    if (
      timeoutMs !== undefined &&
      this.expireMs !== undefined &&
      !this.renewer &&
      timeoutMs > this.expireMs
    ) {
      throw new TimeoutTooLargeError(timeoutMs, this.expireMs);
    }

    this.logger.debug({ key: this.keys.holder }, 'Getting lock');
    const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs;

    while (!(await this.store.setIfAbsent(this.keys.holder, this.ownerId, this.expireMs))) {
      if ((await this.store.get(this.keys.holder)) === this.ownerId) {
        throw new AlreadyAcquiredError(this.name, this.ownerId);
      }

      if (!blocking) {
        this.logger.debug({ key: this.keys.holder }, 'Failed to get lock');
        return false;
      }

      const remainingMs = deadline === undefined ? undefined : deadline - Date.now();
      if (remainingMs !== undefined && remainingMs <= 0) {
        this.logger.debug({ key: this.keys.holder, timeoutMs }, 'Timed out waiting for lock');
        return false;
      }

      await this.channel.wait(SignalChannel.cycleTimeout(remainingMs, this.expireMs));
    }

    this.isHeld = true;
    this.logger.debug({ key: this.keys.holder }, 'Got lock');
    this.renewer?.start();
    return true;
  }

  /**
   * Releases the lock and wakes a blocked acquirer.
   *
   * Works from any handle sharing the holder's id, whether or not it
   * acquired the lock itself. Background renewal is stopped, and any
   * renewal in flight settled, before the holder key is deleted.
   *
   * @throws {@link NotAcquiredError} When the stored holder is absent or has a different id.
   */
  async release(): Promise<void> {
    this.logger.debug({ key: this.keys.holder }, 'Releasing lock');
    await this.renewer?.stop();

    const released = await this.store.releaseIfOwner(this.keys, this.ownerId, this.signalExpireMs);
    this.isHeld = false;
    if (!released) {
      throw new NotAcquiredError(this.name, this.ownerId);
    }
  }

  /**
   * Resets the holder key's expiry, if this id still holds the lock.
   *
   * @param expireMs - New expiry; defaults to the handle's `expireMs`.
   *
   * @throws {@link NotExpirableError} When no expiry is configured or the stored key has none.
   * @throws {@link NotAcquiredError} When the stored holder has a different id.
   */
  async extend(expireMs?: number): Promise<void> {
    const effectiveMs = normalizeDuration('expireMs', expireMs) ?? this.expireMs;
    if (effectiveMs === undefined) {
      throw new NotExpirableError(this.name);
    }

    const result = await this.store.extendIfOwner(this.keys.holder, this.ownerId, effectiveMs);
    if (result === 'not-owner') {
      throw new NotAcquiredError(this.name, this.ownerId);
    }
    if (result === 'not-expirable') {
      throw new NotExpirableError(this.name);
    }
  }

  /**
   * Whether any owner, in any process, currently holds the lock.
   */
  async locked(): Promise<boolean> {
    return (await this.store.get(this.keys.holder)) !== null;
  }

  /**
   * The owner id recorded in the store, or null when the lock is free.
   */
  getOwnerId(): Promise<string | null> {
    return this.store.get(this.keys.holder);
  }

  /**
   * Forcibly deletes the lock whoever holds it, and wakes waiters.
   * Meant for crash recovery; use with care.
   */
  async reset(): Promise<void> {
    await this.renewer?.stop();
    await this.store.reset(this.keys, this.signalExpireMs);
    this.isHeld = false;
    this.logger.info({ key: this.keys.holder }, 'Lock reset');
  }

  /**
   * Runs `fn` while holding the lock, releasing it afterwards even if `fn` throws.
   *
   * @throws {@link AcquireTimeoutError} When the lock could not be acquired within the timeout.
   */
  async withLock<T>(fn: () => Promise<T> | T, options: { timeoutMs?: number } = {}): Promise<T> {
    if (typeof fn !== 'function') {
      throw new ConfigurationError('fn', fn, 'function');
    }

    const acquired = await this.acquire({ timeoutMs: options.timeoutMs });
    if (!acquired) {
      throw new AcquireTimeoutError(this.name, options.timeoutMs ?? this.timeoutMs ?? 0);
    }

    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}

/**
 * Forcibly deletes every lock in the store and wakes their waiters.
 *
 * Each lock is reset atomically on its own, so this is safe alongside live
 * acquire and release traffic. Does nothing when no lock is held.
 *
 * @returns The number of locks removed.
 *
 * @public
 */
export async function resetAll(
  store: LockStore,
  options: { signalExpireMs?: number; logger?: LockLogger } = {}
): Promise<number> {
  const signalExpireMs = options.signalExpireMs ?? DEFAULT_SIGNAL_EXPIRE_MS;
  if (!Number.isInteger(signalExpireMs) || signalExpireMs <= 0) {
    throw new ConfigurationError('signalExpireMs', signalExpireMs, 'positive integer');
  }

  const removed = await store.resetAll(signalExpireMs);
  (options.logger ?? lockLogger('*')).info({ removed }, 'All locks reset');
  return removed;
}

/**
 * 0 and undefined disable a duration; anything else must be a
 * non-negative integer number of milliseconds.
 */
function normalizeDuration(parameter: string, value: number | undefined): number | undefined {
  if (value === undefined || value === 0) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(parameter, value, 'non-negative integer');
  }
  return value;
}

function normalizeTimeout(value: number | undefined): number | undefined {
  if (value === undefined || value === 0) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidTimeoutError(value);
  }
  return value;
}
