/**
 * @fileoverview Redis-backed distributed mutex for Node.js
 *
 * Independent processes coordinate on a named critical section through a
 * shared store. Blocked acquirers sleep on a per-lock signal list and are
 * woken the moment the holder releases, so waiting never polls.
 *
 * - **Lock**: acquire (blocking, timed or non-blocking), release with
 *   ownership check, extend, and optional auto-renewal of the expiry
 * - **RedisLockStore**: the store backed by a node-redis v5 client
 * - **MemoryLockStore**: an in-process store for tests and single-process use
 * - **resetAll**: forcibly clears every lock, for crash recovery
 *
 * @example Manual acquire/release with auto-renewal
 * ```typescript
 * import { createClient } from 'redis';
 * import { Lock, RedisLockStore } from 'redis-signal-lock';
 *
 * const redis = createClient();
 * await redis.connect();
 *
 * const lock = new Lock(new RedisLockStore(redis), 'nightly-export', {
 *   expireMs: 10000,
 *   autoRenewal: true,
 * });
 *
 * await lock.acquire();
 * try {
 *   await exportEverything(); // may run far longer than 10 seconds
 * } finally {
 *   await lock.release();
 * }
 * ```
 *
 * @example Scoped acquisition
 * ```typescript
 * const total = await lock.withLock(() => recomputeTotals(), { timeoutMs: 5000 });
 * ```
 *
 * @packageDocumentation
 */

export { Lock, resetAll, DEFAULT_SIGNAL_EXPIRE_MS } from './lock.js';
export { RedisLockStore } from './redis-store.js';
export { MemoryLockStore } from './memory-store.js';
export { lockKeys, HOLDER_PREFIX, SIGNAL_PREFIX, type LockKeys } from './keys.js';
export { generateToken } from './token.js';
export type {
  AcquireOptions,
  ExtendResult,
  LockLogger,
  LockLostEvent,
  LockOptions,
  LockStore,
} from './types.js';

export {
  LockError,
  ConfigurationError,
  InvalidTimeoutError,
  TimeoutNotUsableError,
  TimeoutTooLargeError,
  NotExpirableError,
  AlreadyAcquiredError,
  NotAcquiredError,
  AcquireTimeoutError,
} from './errors.js';
