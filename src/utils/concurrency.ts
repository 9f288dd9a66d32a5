/**
 * Bounded-concurrency worker pool.
 *
 * Runs up to `concurrency` tasks at once, returning results in input order.
 * When `signal` aborts, no further tasks start; tasks already running are
 * awaited before the abort reason is thrown, so callers can release shared
 * resources (the episode store) only after every worker has stopped.
 * A task that throws has the same effect, and its error is rethrown.
 */

export interface PoolOptions {
  /** Max concurrent tasks */
  concurrency: number;
  onProgress?: (completed: number, total: number) => void;
  /** Stops scheduling new tasks when aborted */
  signal?: AbortSignal;
}

export async function pooledMap<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<R[]> {
  const { concurrency, onProgress, signal } = options;
  if (items.length === 0) return [];

  const results: R[] = new Array(items.length);
  let nextIndex = 0;
  let completed = 0;
  let failed = false;

  async function worker(): Promise<void> {
    while (nextIndex < items.length && !failed) {
      signal?.throwIfAborted();
      const idx = nextIndex++;

      try {
        results[idx] = await fn(items[idx], idx);
      } catch (err) {
        failed = true;
        throw err;
      }
      completed++;
      onProgress?.(completed, items.length);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));

  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }
  return results;
}
