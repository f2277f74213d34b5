import { EventEmitter } from 'node:events';
import type { RedisClientType } from 'redis';
import { ConfigurationError } from './errors.js';
import { lockKeys } from './keys.js';
import { RedisLockStore } from './redis-store.js';

const keys = lockKeys('test-key');

// Only the methods the store calls are mocked
function createMockRedisClient(isReady = true) {
  const blocking = Object.assign(new EventEmitter(), {
    connect: vi.fn().mockResolvedValue(undefined),
    blPop: vi.fn(),
    destroy: vi.fn(),
  });
  const mocks = {
    eval: vi.fn(),
    get: vi.fn(),
    scan: vi.fn(),
    duplicate: vi.fn(() => blocking),
  };
  const client = { isReady, ...mocks } as unknown as RedisClientType;
  return { client, mocks, blocking };
}

describe('RedisLockStore', () => {
  describe('constructor', () => {
    it('should create instance with a connected client', () => {
      const { client } = createMockRedisClient();
      expect(new RedisLockStore(client)).toBeInstanceOf(RedisLockStore);
    });

    it('should throw ConfigurationError when the client is missing or not ready', () => {
      expect(() => new RedisLockStore(null as unknown as RedisClientType)).toThrow(ConfigurationError);
      expect(() => new RedisLockStore(createMockRedisClient(false).client)).toThrow(
        'Invalid redisClient: expected connected Redis client'
      );
    });
  });

  describe('setIfAbsent', () => {
    it('should run SET NX with the expiry in milliseconds', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.eval.mockResolvedValue(1);

      const store = new RedisLockStore(client);

      expect(await store.setIfAbsent(keys.holder, 'owner-1', 5000)).toBe(true);
      expect(mocks.eval).toHaveBeenCalledWith(
        expect.stringContaining('redis.call("SET", KEYS[1], ARGV[1], "NX", "PX", ttl)'),
        { keys: ['lock:test-key'], arguments: ['owner-1', '5000'] }
      );
    });

    it('should pass 0 when the lock has no expiry', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.eval.mockResolvedValue(1);

      await new RedisLockStore(client).setIfAbsent(keys.holder, 'owner-1');

      expect(mocks.eval).toHaveBeenCalledWith(expect.any(String), {
        keys: ['lock:test-key'],
        arguments: ['owner-1', '0'],
      });
    });

    it('should report a held key', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.eval.mockResolvedValue(0);

      expect(await new RedisLockStore(client).setIfAbsent(keys.holder, 'owner-1', 5000)).toBe(false);
    });
  });

  describe('get', () => {
    it('should return the stored owner id or null', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.get.mockResolvedValueOnce('owner-1').mockResolvedValueOnce(null);

      const store = new RedisLockStore(client);

      expect(await store.get(keys.holder)).toBe('owner-1');
      expect(await store.get(keys.holder)).toBeNull();
      expect(mocks.get).toHaveBeenCalledWith('lock:test-key');
    });
  });

  describe('releaseIfOwner', () => {
    it('should compare, delete and signal in one script', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.eval.mockResolvedValue(1);

      expect(await new RedisLockStore(client).releaseIfOwner(keys, 'owner-1', 1000)).toBe(true);

      const [script, options] = mocks.eval.mock.calls[0] ?? [];
      expect(script).toContain('redis.call("GET", KEYS[1]) == ARGV[1]');
      expect(script).toContain('redis.call("LPUSH", KEYS[2], 1)');
      expect(script).toContain('redis.call("PEXPIRE", KEYS[2], ARGV[2])');
      expect(options).toEqual({
        keys: ['lock:test-key', 'lock-signal:test-key'],
        arguments: ['owner-1', '1000'],
      });
    });

    it('should report an ownership mismatch', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.eval.mockResolvedValue(0);

      expect(await new RedisLockStore(client).releaseIfOwner(keys, 'intruder', 1000)).toBe(false);
    });
  });

  describe('extendIfOwner', () => {
    it('should map the script result', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.eval.mockResolvedValueOnce(0).mockResolvedValueOnce(1).mockResolvedValueOnce(2);

      const store = new RedisLockStore(client);

      expect(await store.extendIfOwner(keys.holder, 'owner-1', 3000)).toBe('extended');
      expect(await store.extendIfOwner(keys.holder, 'owner-1', 3000)).toBe('not-owner');
      expect(await store.extendIfOwner(keys.holder, 'owner-1', 3000)).toBe('not-expirable');
      expect(mocks.eval).toHaveBeenLastCalledWith(
        expect.stringContaining('redis.call("PEXPIRE", KEYS[1], ARGV[2])'),
        { keys: ['lock:test-key'], arguments: ['owner-1', '3000'] }
      );
    });
  });

  describe('waitForSignal', () => {
    it('should block on a duplicated connection with the timeout in seconds', async () => {
      const { client, mocks, blocking } = createMockRedisClient();
      blocking.blPop.mockResolvedValue({ key: keys.signal, element: '1' });

      expect(await new RedisLockStore(client).waitForSignal(keys.signal, 250)).toBe(true);

      expect(mocks.duplicate).toHaveBeenCalledTimes(1);
      expect(blocking.connect).toHaveBeenCalledTimes(1);
      expect(blocking.blPop).toHaveBeenCalledWith('lock-signal:test-key', 0.25);
      expect(blocking.destroy).toHaveBeenCalledTimes(1);
    });

    it('should report a timeout', async () => {
      const { client, blocking } = createMockRedisClient();
      blocking.blPop.mockResolvedValue(null);

      expect(await new RedisLockStore(client).waitForSignal(keys.signal, 0)).toBe(false);
      expect(blocking.blPop).toHaveBeenCalledWith('lock-signal:test-key', 0);
    });

    it('should close the duplicated connection when the pop fails', async () => {
      const { client, blocking } = createMockRedisClient();
      const redisError = new Error('Connection lost');
      blocking.blPop.mockRejectedValue(redisError);

      await expect(new RedisLockStore(client).waitForSignal(keys.signal, 100)).rejects.toBe(redisError);
      expect(blocking.destroy).toHaveBeenCalledTimes(1);
    });

    it('should reject when the socket drops while blocked', async () => {
      const { client, blocking } = createMockRedisClient();
      blocking.blPop.mockReturnValue(new Promise(() => undefined));
      const socketError = new Error('Socket closed unexpectedly');

      const waiting = new RedisLockStore(client).waitForSignal(keys.signal, 0);
      await vi.waitFor(() => expect(blocking.blPop).toHaveBeenCalled());
      blocking.emit('error', socketError);

      await expect(waiting).rejects.toBe(socketError);
      expect(blocking.destroy).toHaveBeenCalledTimes(1);
    });

    it('should reject when the duplicated connection fails to connect', async () => {
      const { client, blocking } = createMockRedisClient();
      blocking.connect.mockReturnValue(new Promise(() => undefined));
      const connectError = new Error('connect ECONNREFUSED 127.0.0.1:6379');

      const waiting = new RedisLockStore(client).waitForSignal(keys.signal, 100);
      await vi.waitFor(() => expect(blocking.connect).toHaveBeenCalled());
      blocking.emit('error', connectError);

      await expect(waiting).rejects.toBe(connectError);
      expect(blocking.blPop).not.toHaveBeenCalled();
      expect(blocking.destroy).toHaveBeenCalledTimes(1);
    });
  });

  describe('reset', () => {
    it('should delete and signal regardless of owner', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.eval.mockResolvedValue(1);

      await new RedisLockStore(client).reset(keys, 1000);

      expect(mocks.eval).toHaveBeenCalledWith(
        expect.stringContaining('return redis.call("DEL", KEYS[1])'),
        { keys: ['lock:test-key', 'lock-signal:test-key'], arguments: ['1000'] }
      );
    });
  });

  describe('resetAll', () => {
    it('should walk the keyspace and reset each lock', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.scan
        .mockResolvedValueOnce({ cursor: '17', keys: ['lock:a'] })
        .mockResolvedValueOnce({ cursor: '0', keys: ['lock:b'] });
      // lock:b expired between SCAN and the reset
      mocks.eval.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

      expect(await new RedisLockStore(client).resetAll(1000)).toBe(1);

      expect(mocks.scan).toHaveBeenNthCalledWith(1, '0', { MATCH: 'lock:*', COUNT: 100 });
      expect(mocks.scan).toHaveBeenNthCalledWith(2, '17', { MATCH: 'lock:*', COUNT: 100 });
      expect(mocks.eval).toHaveBeenNthCalledWith(1, expect.any(String), {
        keys: ['lock:a', 'lock-signal:a'],
        arguments: ['1000'],
      });
      expect(mocks.eval).toHaveBeenNthCalledWith(2, expect.any(String), {
        keys: ['lock:b', 'lock-signal:b'],
        arguments: ['1000'],
      });
    });

    it('should do nothing on an empty keyspace', async () => {
      const { client, mocks } = createMockRedisClient();
      mocks.scan.mockResolvedValue({ cursor: '0', keys: [] });

      expect(await new RedisLockStore(client).resetAll(1000)).toBe(0);
      expect(mocks.eval).not.toHaveBeenCalled();
    });
  });

  describe('errors', () => {
    it('should propagate client errors unchanged', async () => {
      const { client, mocks } = createMockRedisClient();
      const redisError = new Error('Redis connection failed');
      mocks.eval.mockRejectedValue(redisError);

      const store = new RedisLockStore(client);

      await expect(store.setIfAbsent(keys.holder, 'owner-1')).rejects.toBe(redisError);
      await expect(store.releaseIfOwner(keys, 'owner-1', 1000)).rejects.toBe(redisError);
    });
  });
});
