import type { Logger } from 'pino';
import type { LockKeys } from './keys.js';

/**
 * Structured logger accepted by {@link Lock}.
 *
 * Any pino `Logger` satisfies it; so does a hand-rolled sink with the same
 * four methods.
 *
 * @public
 */
export type LockLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Reported to {@link LockOptions.onLockLost} when the renewal scheduler stops
 * because the lock can no longer be kept alive.
 *
 * @public
 */
export type LockLostEvent =
  | {
      /** The stored holder no longer matches this handle's id, or lost its expiry */
      reason: 'not-owner' | 'not-expirable';
      name: string;
      id: string;
    }
  | {
      /** The store rejected the renewal call */
      reason: 'store-error';
      name: string;
      id: string;
      error: unknown;
    };

/**
 * Configuration options for a {@link Lock} handle.
 *
 * @public
 */
export interface LockOptions {
  /** Owner id; shared ids let other handles release or extend (default: random token) */
  id?: string;

  /** Holder key expiry in milliseconds; 0 or undefined disables it */
  expireMs?: number;

  /** Default timeout for blocking acquires in milliseconds; 0 or undefined waits forever */
  timeoutMs?: number;

  /** Keep extending the expiry in the background while held (requires expireMs) */
  autoRenewal?: boolean;

  /** Lifetime of a wake-up signal left unconsumed (default: 1000) */
  signalExpireMs?: number;

  /** Structured logger (default: pino child logger bound to the lock name) */
  logger?: LockLogger;

  /** Called when background renewal stops because the lock was lost */
  onLockLost?: (event: LockLostEvent) => void;

  /** Aborting stops background renewal for good, e.g. when the handle is discarded */
  signal?: AbortSignal;
}

/**
 * Per-call options of {@link Lock.acquire}.
 *
 * @public
 */
export interface AcquireOptions {
  /** Wait for the lock to be released (default: true) */
  blocking?: boolean;

  /** Give up after this many milliseconds; only valid when blocking */
  timeoutMs?: number;
}

/**
 * Outcome of an ownership-checked expiry extension.
 *
 * @public
 */
export type ExtendResult = 'extended' | 'not-owner' | 'not-expirable';

/**
 * The store capabilities the lock protocol is built on.
 *
 * Every method that changes more than one key must do so atomically;
 * {@link RedisLockStore} uses Lua scripts, {@link MemoryLockStore} runs
 * each call to completion on the event loop.
 *
 * @public
 */
export interface LockStore {
  /** SET key value NX [PX expireMs]; resolves true when the key was set */
  setIfAbsent(key: string, value: string, expireMs?: number): Promise<boolean>;

  /** Current value of `key`, or null */
  get(key: string): Promise<string | null>;

  /**
   * Compare-and-delete of the holder key. On a match the signal list is
   * cleared, one token pushed onto it and its expiry set to
   * `signalExpireMs`. Resolves false when the holder did not match.
   */
  releaseIfOwner(keys: LockKeys, id: string, signalExpireMs: number): Promise<boolean>;

  /** Re-applies `expireMs` to the holder key only while it still stores `id` */
  extendIfOwner(key: string, id: string, expireMs: number): Promise<ExtendResult>;

  /**
   * Blocking pop on the signal list. Resolves true when a token was
   * consumed, false when `timeoutMs` elapsed first; 0 waits forever.
   */
  waitForSignal(key: string, timeoutMs: number): Promise<boolean>;

  /** Unconditionally deletes the holder key and signals waiters */
  reset(keys: LockKeys, signalExpireMs: number): Promise<void>;

  /** {@link LockStore.reset} for every holder key; resolves how many were removed */
  resetAll(signalExpireMs: number): Promise<number>;
}
