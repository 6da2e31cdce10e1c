import { createKeyedMutex, type KeyedMutexInstance } from '@/lib/mutex';

describe('KeyedMutex', () => {
  let mutex: KeyedMutexInstance;

  beforeEach(() => {
    mutex = createKeyedMutex({ defaultTimeout: 1000 });
  });

  describe('basic locking', () => {
    test('should acquire and release lock', async () => {
      const release = await mutex.acquire('111122223333-prod-eks-1');
      await expect(mutex.acquire('111122223333-prod-eks-1', 20)).rejects.toThrow('Mutex timeout');

      release();
      const again = await mutex.acquire('111122223333-prod-eks-1', 20);
      again();
    });

    test('should prevent concurrent access to same key', async () => {
      const results: number[] = [];
      const release1 = await mutex.acquire('key1');

      const promise2 = mutex.acquire('key1').then((release) => {
        results.push(2);
        release();
      });

      results.push(1);
      release1();

      await promise2;

      expect(results).toEqual([1, 2]);
    });

    test('should allow concurrent access to different keys', async () => {
      const release1 = await mutex.acquire('key1');
      const release2 = await mutex.acquire('key2', 20);

      release1();
      release2();
    });
  });

  describe('timeout behavior', () => {
    test('should timeout if lock not acquired', async () => {
      const release1 = await mutex.acquire('timeout-key');

      await expect(mutex.acquire('timeout-key', 50)).rejects.toThrow(
        'Mutex timeout for key: timeout-key',
      );

      release1();
    });

    test('should hand the lock on after a waiter timed out', async () => {
      const release1 = await mutex.acquire('timeout-queue');

      await expect(mutex.acquire('timeout-queue', 20)).rejects.toThrow('Mutex timeout');

      release1();
      const release2 = await mutex.acquire('timeout-queue', 20);
      release2();
    });
  });

  describe('withLock helper', () => {
    test('should hold the lock while the function runs', async () => {
      let executed = false;

      await mutex.withLock('with-lock-key', async () => {
        await expect(mutex.acquire('with-lock-key', 20)).rejects.toThrow('Mutex timeout');
        executed = true;
      });

      expect(executed).toBe(true);
      const release = await mutex.acquire('with-lock-key', 20);
      release();
    });

    test('should release lock even on error', async () => {
      await expect(
        mutex.withLock('error-key', async () => {
          throw new Error('Test error');
        }),
      ).rejects.toThrow('Test error');

      const release = await mutex.acquire('error-key', 20);
      release();
    });

    test('should return function result', async () => {
      const result = await mutex.withLock('result-key', async () => 'test-result');

      expect(result).toBe('test-result');
    });
  });

  describe('queue management', () => {
    test('should hand the lock to waiters in arrival order', async () => {
      const order: number[] = [];
      const release1 = await mutex.acquire('queue-key');

      const promises = [2, 3, 4].map((n) =>
        mutex.acquire('queue-key').then((release) => {
          order.push(n);
          release();
        }),
      );

      order.push(1);
      release1();

      await Promise.all(promises);

      expect(order).toEqual([1, 2, 3, 4]);
    });

    test('should never run two holders of the same key at once', async () => {
      let inside = 0;
      let maxInside = 0;

      await Promise.all(
        Array.from({ length: 10 }, () =>
          mutex.withLock('serial-key', async () => {
            inside++;
            maxInside = Math.max(maxInside, inside);
            await new Promise((resolve) => setImmediate(resolve));
            inside--;
          }),
        ),
      );

      expect(maxInside).toBe(1);
    });
  });

  describe('error cases', () => {
    test('should prevent double release', async () => {
      const release = await mutex.acquire('double-release');
      release();

      expect(() => release()).toThrow('Lock release attempted by non-holder');
    });
  });
});
