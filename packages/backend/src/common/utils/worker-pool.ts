/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * The pool size is fixed up front and does not grow with the item count.
 * Results keep the order of `items`. A worker that throws rejects the run,
 * so callers that must not abort should settle errors inside the worker.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const size = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: size }, () => lane()));
  return results;
}

export class TimeoutError extends Error {
  constructor(readonly ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Races `task` against a timer. The task itself keeps running after a
 * timeout; only the caller stops waiting for it.
 */
export function withTimeout<T>(task: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(ms)), ms);
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}
