// utils/workerPool.ts

export interface PoolFailure<T> {
  item: T;
  error: unknown;
}

/**
 * Run `worker` over `items` with at most `size` calls in flight. A rejected
 * call is recorded and the pool moves on; nothing is cancelled.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T, workerId: number) => Promise<R>
): Promise<{ results: R[]; failures: PoolFailure<T>[] }> {
  const results: R[] = [];
  const failures: PoolFailure<T>[] = [];
  let next = 0;

  const run = async (workerId: number) => {
    while (next < items.length) {
      const i = next++;
      const item = items[i];
      if (item === undefined) continue;

      try {
        results[i] = await worker(item, workerId);
      } catch (error) {
        failures.push({ item, error });
      }
    }
  };

  const count = Math.max(1, Math.min(size, items.length));
  await Promise.all(Array.from({ length: count }, (_, id) => run(id + 1)));

  return { results: results.filter((r) => r !== undefined), failures };
}
