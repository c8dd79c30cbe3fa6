export type Limiter = {
  run: <T>(task: () => Promise<T>) => Promise<T>;
  readonly active: number;
  readonly pending: number;
};

/**
 * Counting semaphore: at most `max` tasks run at once, the rest queue in
 * arrival order. A slot is released however the task settles.
 */
export function createLimiter(max: number): Limiter {
  if (!Number.isInteger(max) || max < 1) {
    throw new RangeError(`concurrency limit must be a positive integer, got ${max}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    active--;
    const next = queue.shift();
    if (next) next();
  };

  const acquire = () =>
    new Promise<void>(resolve => {
      const start = () => {
        active++;
        resolve();
      };
      if (active < max) start();
      else queue.push(start);
    });

  return {
    async run<T>(task: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await task();
      } finally {
        release();
      }
    },
    get active() {
      return active;
    },
    get pending() {
      return queue.length;
    },
  };
}
