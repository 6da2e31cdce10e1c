/**
 * Bounded worker pool for async tasks.
 *
 * Every task is accepted immediately (`submit` never blocks the caller); at
 * most `size` of them run at any moment and the rest wait in FIFO order.
 * A pool is meant to live for a single fan-out and be dropped afterwards.
 */

export interface WorkerPool {
  submit<T>(task: () => Promise<T>): Promise<T>;
  /** Tasks currently running */
  active(): number;
  /** Tasks accepted but not yet started */
  pending(): number;
}

export function createWorkerPool(size: number): WorkerPool {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
  }

  const queue: Array<() => void> = [];
  let running = 0;

  const startNext = (): void => {
    while (running < size) {
      const next = queue.shift();
      if (!next) return;
      running++;
      next();
    }
  };

  const submit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        // Wrapping in an async call turns a synchronous throw into a rejection
        void (async () => task())()
          .then(resolve, reject)
          .finally(() => {
            running--;
            startNext();
          });
      });
      startNext();
    });

  return {
    submit,
    active: () => running,
    pending: () => queue.length,
  };
}
