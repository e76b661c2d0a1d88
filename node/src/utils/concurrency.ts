/**
 * pLimit
 *
 * Limits the number of async operations running at once. Queued thunks start
 * in submission order as running ones settle.
 */
export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

export function pLimit(concurrency: number): Limiter {
  if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }

  const queue: Array<() => void> = [];
  let activeCount = 0;

  const next = () => {
    activeCount--;
    queue.shift()?.();
  };

  return async <T>(fn: () => Promise<T>): Promise<T> => {
    const execute = async () => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) {
      return execute();
    }
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  };
}
