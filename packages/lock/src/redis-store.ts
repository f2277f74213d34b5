import type { RedisClientType } from 'redis';
import { ConfigurationError } from './errors.js';
import { HOLDER_PREFIX, keysFromHolder, type LockKeys } from './keys.js';
import { ACQUIRE_SCRIPT, EXTEND_SCRIPT, RELEASE_SCRIPT, RESET_SCRIPT } from './lua-scripts.js';
import type { ExtendResult, LockStore } from './types.js';

/**
 * Number of keys requested per SCAN round trip during {@link RedisLockStore.resetAll}.
 */
const SCAN_COUNT = 100;

/**
 * {@link LockStore} backed by a single Redis instance through node-redis v5.
 *
 * Multi-key operations run as Lua scripts so each one is atomic on the
 * server. Blocking pops run on a duplicate of the client so a waiting
 * acquirer never stalls other commands sent through the shared connection.
 *
 * Errors thrown by the client are propagated unchanged; nothing is retried.
 *
 * @example
 * ```typescript
 * import { createClient } from 'redis';
 * import { Lock, RedisLockStore } from 'redis-signal-lock';
 *
 * const redis = createClient();
 * await redis.connect();
 *
 * const store = new RedisLockStore(redis);
 * const lock = new Lock(store, 'reports', { expireMs: 30000, autoRenewal: true });
 * ```
 *
 * @public
 */
export class RedisLockStore implements LockStore {
  /**
   * @param redisClient - Connected node-redis client.
   *
   * @throws {@link ConfigurationError} When the client is missing or not ready.
   */
  constructor(private readonly redisClient: RedisClientType) {
    if (!redisClient || !redisClient.isReady) {
      throw new ConfigurationError('redisClient', redisClient, 'connected Redis client');
    }
  }

  async setIfAbsent(key: string, value: string, expireMs = 0): Promise<boolean> {
    const result = await this.redisClient.eval(ACQUIRE_SCRIPT, {
      keys: [key],
      arguments: [value, expireMs.toString()],
    });
    return Number(result) === 1;
  }

  async get(key: string): Promise<string | null> {
    const value = await this.redisClient.get(key);
    return value === null ? null : String(value);
  }

  async releaseIfOwner(keys: LockKeys, id: string, signalExpireMs: number): Promise<boolean> {
    const result = await this.redisClient.eval(RELEASE_SCRIPT, {
      keys: [keys.holder, keys.signal],
      arguments: [id, signalExpireMs.toString()],
    });
    return Number(result) === 1;
  }

  async extendIfOwner(key: string, id: string, expireMs: number): Promise<ExtendResult> {
    const result = Number(
      await this.redisClient.eval(EXTEND_SCRIPT, {
        keys: [key],
        arguments: [id, expireMs.toString()],
      })
    );

    switch (result) {
      case 0:
        return 'extended';
      case 2:
        return 'not-expirable';
      default:
        return 'not-owner';
    }
  }

  async waitForSignal(key: string, timeoutMs: number): Promise<boolean> {
    const connection = this.redisClient.duplicate();

    // A socket drop is emitted as 'error' and never settles the pending pop
    let onError: (error: Error) => void = () => undefined;
    const dropped = new Promise<never>((_, reject) => {
      onError = reject;
    });
    connection.on('error', onError);

    try {
      await Promise.race([connection.connect(), dropped]);
      // BLPOP takes seconds and accepts fractions
      const reply = await Promise.race([connection.blPop(key, timeoutMs / 1000), dropped]);
      return reply !== null;
    } finally {
      connection.destroy();
    }
  }

  async reset(keys: LockKeys, signalExpireMs: number): Promise<void> {
    await this.runReset(keys, signalExpireMs);
  }

  /**
   * Resets every lock found by SCAN. Each key is reset with its own atomic
   * script, so live traffic on other locks is never blocked.
   */
  async resetAll(signalExpireMs: number): Promise<number> {
    let removed = 0;
    let cursor = '0';

    do {
      const reply = await this.redisClient.scan(cursor, {
        MATCH: `${HOLDER_PREFIX}*`,
        COUNT: SCAN_COUNT,
      });
      cursor = String(reply.cursor);

      for (const holderKey of reply.keys) {
        const keys = keysFromHolder(String(holderKey));
        if (keys) {
          removed += await this.runReset(keys, signalExpireMs);
        }
      }
    } while (cursor !== '0');

    return removed;
  }

  private async runReset(keys: LockKeys, signalExpireMs: number): Promise<number> {
    const result = await this.redisClient.eval(RESET_SCRIPT, {
      keys: [keys.holder, keys.signal],
      arguments: [signalExpireMs.toString()],
    });
    return Number(result);
  }
}
