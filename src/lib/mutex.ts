import { randomUUID } from 'node:crypto';

interface Waiter {
  wake: () => void;
}

interface MutexState {
  locked: boolean;
  queue: Waiter[];
  holderId?: string;
}

interface KeyedMutexOptions {
  defaultTimeout: number;
}

export interface KeyedMutexInstance {
  acquire(key: string, timeoutMs?: number): Promise<() => void>;
  withLock<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T>;
}

/**
 * Creates a keyed mutex for preventing concurrent access to resources.
 * Each key has its own lock queue, allowing concurrent access to different resources.
 *
 * Used to single-flight kubeconfig generation: two units targeting the same
 * `{accountId}-{clusterName}` within one run never regenerate the file at once.
 */
export const createKeyedMutex = (options?: Partial<KeyedMutexOptions>): KeyedMutexInstance => {
  const locks = new Map<string, MutexState>();
  const config: KeyedMutexOptions = {
    defaultTimeout: 30000,
    ...options,
  };

  const waitForTurn = (lock: MutexState, deadline: number): Promise<void> =>
    new Promise<void>((resolve) => {
      const remainingTime = deadline - Date.now();
      if (remainingTime <= 0) {
        resolve();
        return;
      }

      // Woken either by the releasing holder or by the deadline, whichever comes first
      const waiter: Waiter = {
        wake: () => {
          clearTimeout(timeoutId);
          resolve();
        },
      };
      const timeoutId = setTimeout(() => {
        const idx = lock.queue.indexOf(waiter);
        if (idx >= 0) {
          lock.queue.splice(idx, 1);
        }
        resolve();
      }, remainingTime);

      lock.queue.push(waiter);
    });

  const acquire = async (key: string, timeoutMs?: number): Promise<() => void> => {
    const timeout = timeoutMs ?? config.defaultTimeout;
    const holderId = randomUUID();

    let lock = locks.get(key);
    if (!lock) {
      lock = { locked: false, queue: [] };
      locks.set(key, lock);
    }
    const deadline = Date.now() + timeout;

    while (lock.locked) {
      if (Date.now() >= deadline) {
        throw new Error(`Mutex timeout for key: ${key} (waited ${timeout}ms)`);
      }
      await waitForTurn(lock, deadline);
    }

    lock.locked = true;
    lock.holderId = holderId;
    const held = lock;

    return (): void => {
      if (held.holderId !== holderId) {
        throw new Error(`Lock release attempted by non-holder for key: ${key}`);
      }

      held.locked = false;
      delete held.holderId;

      const next = held.queue.shift();
      if (next) {
        next.wake();
      } else if (locks.get(key) === held) {
        locks.delete(key);
      }
    };
  };

  const withLock = async <T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> => {
    const release = await acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  };

  return {
    acquire,
    withLock,
  };
};
