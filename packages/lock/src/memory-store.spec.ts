import { setTimeout as sleep } from 'node:timers/promises';
import { lockKeys } from './keys.js';
import { MemoryLockStore } from './memory-store.js';

const keys = lockKeys('orders');

describe('MemoryLockStore', () => {
  describe('setIfAbsent', () => {
    it('should only set a missing key', async () => {
      const store = new MemoryLockStore();

      expect(await store.setIfAbsent(keys.holder, 'a')).toBe(true);
      expect(await store.setIfAbsent(keys.holder, 'b')).toBe(false);
      expect(await store.get(keys.holder)).toBe('a');
      expect(store.ttl(keys.holder)).toBe(-1);
    });

    it('should expire the key after the given time', async () => {
      const store = new MemoryLockStore();

      await store.setIfAbsent(keys.holder, 'a', 50);
      await sleep(80);

      expect(await store.get(keys.holder)).toBeNull();
      expect(store.ttl(keys.holder)).toBe(-2);
      expect(await store.setIfAbsent(keys.holder, 'b', 50)).toBe(true);
    });
  });

  describe('releaseIfOwner', () => {
    it('should delete the holder key and push one token for the matching id', async () => {
      const store = new MemoryLockStore();
      await store.setIfAbsent(keys.holder, 'a');

      expect(await store.releaseIfOwner(keys, 'a', 1000)).toBe(true);
      expect(await store.get(keys.holder)).toBeNull();
      expect(store.signalLength(keys.signal)).toBe(1);
    });

    it('should change nothing for another id', async () => {
      const store = new MemoryLockStore();
      await store.setIfAbsent(keys.holder, 'a');

      expect(await store.releaseIfOwner(keys, 'b', 1000)).toBe(false);
      expect(await store.get(keys.holder)).toBe('a');
      expect(store.keys()).toEqual([keys.holder]);
    });
  });

  describe('extendIfOwner', () => {
    it('should distinguish extended, foreign and persistent keys', async () => {
      const store = new MemoryLockStore();
      await store.setIfAbsent('lock:ttl', 'a', 100);
      await store.setIfAbsent('lock:persistent', 'a');

      expect(await store.extendIfOwner('lock:ttl', 'a', 5000)).toBe('extended');
      expect(store.ttl('lock:ttl')).toBeGreaterThan(100);
      expect(await store.extendIfOwner('lock:ttl', 'b', 5000)).toBe('not-owner');
      expect(await store.extendIfOwner('lock:missing', 'a', 5000)).toBe('not-owner');
      expect(await store.extendIfOwner('lock:persistent', 'a', 5000)).toBe('not-expirable');
    });
  });

  describe('waitForSignal', () => {
    it('should consume a waiting token immediately', async () => {
      const store = new MemoryLockStore();
      await store.reset(keys, 1000);

      expect(await store.waitForSignal(keys.signal, 10)).toBe(true);
      expect(store.signalLength(keys.signal)).toBe(0);
    });

    it('should resolve false when nothing arrives in time', async () => {
      const store = new MemoryLockStore();

      expect(await store.waitForSignal(keys.signal, 30)).toBe(false);
    });

    it('should hand a pushed token to the longest waiting popper', async () => {
      const store = new MemoryLockStore();
      const woken: string[] = [];

      const first = store.waitForSignal(keys.signal, 0).then(() => woken.push('first'));
      const second = store.waitForSignal(keys.signal, 200).then((signalled) => {
        woken.push(signalled ? 'second' : 'second-timeout');
      });

      await store.reset(keys, 1000);
      await first;
      expect(woken).toEqual(['first']);
      expect(store.signalLength(keys.signal)).toBe(0);

      await store.reset(keys, 1000);
      await second;
      expect(woken).toEqual(['first', 'second']);
    });
  });

  describe('resetAll', () => {
    it('should only touch keys under the holder prefix', async () => {
      const store = new MemoryLockStore();
      await store.setIfAbsent('lock:a', '1');
      await store.setIfAbsent('lock:b', '2');
      await store.setIfAbsent('session:c', '3');

      expect(await store.resetAll(1000)).toBe(2);
      expect(await store.get('session:c')).toBe('3');
      expect(store.keys()).toEqual(['lock-signal:a', 'lock-signal:b']);
    });
  });
});
