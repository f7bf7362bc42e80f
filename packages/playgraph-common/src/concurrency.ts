/**
 * Runs `worker` over `items` with at most `concurrency` invocations in flight.
 * Every item is attempted; the first failure is rethrown once all workers drain.
 */
export async function runConcurrent<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  if (items.length === 0) {
    return;
  }
  const limit = Math.max(1, Math.min(concurrency, items.length));
  let nextIndex = 0;
  const failures: unknown[] = [];

  const takeNext = (): number | null => {
    if (nextIndex >= items.length) {
      return null;
    }
    const current = nextIndex;
    nextIndex += 1;
    return current;
  };

  const runners = Array.from({ length: limit }, async () => {
    // let every runner start before any of them claims work
    await Promise.resolve();

    while (true) {
      const current = takeNext();
      if (current === null) {
        return;
      }
      try {
        await worker(items[current]);
      } catch (error) {
        failures.push(error);
      }
    }
  });

  await Promise.all(runners);
  if (failures.length > 0) {
    throw failures[0];
  }
}

export type ConcurrencyLimit = <T>(task: () => Promise<T>) => Promise<T>;

/** Wraps tasks so that no more than `concurrency` of them run at once, FIFO. */
export function createConcurrencyLimit(concurrency: number): ConcurrencyLimit {
  const limit = Math.max(1, Math.floor(concurrency));
  const waiting: Array<() => void> = [];
  let active = 0;

  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      // the slot passes straight to the next waiter
      next();
      return;
    }
    active -= 1;
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active >= limit) {
      await new Promise<void>((resolve) => {
        waiting.push(resolve);
      });
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}
