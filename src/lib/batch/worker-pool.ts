export interface WorkerPoolOptions<T, R> {
  /** Number of workers; capped at the item count */
  concurrency: number;
  worker: (item: T, position: number) => Promise<R>;
  /** Result sink. Called once per item, never concurrently. */
  onResult: (result: R, item: T, position: number) => void;
}

/**
 * Fixed-size pool over a shared work queue. Each worker claims the next
 * position synchronously before awaiting, so no item is handed out twice.
 * Resolves once every claimed item has reached the sink.
 *
 * A rejected worker call stops further dispatch and rejects the pool;
 * callers that need full drain must hand in a worker that always resolves.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  options: WorkerPoolOptions<T, R>
): Promise<void> {
  const { concurrency, worker, onResult } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Worker pool size must be a positive integer, got ${concurrency}`);
  }

  let cursor = 0;
  let stopped = false;

  const claim = (): number | null => {
    if (stopped || cursor >= items.length) return null;
    return cursor++;
  };

  const workerLoop = async (): Promise<void> => {
    for (let position = claim(); position !== null; position = claim()) {
      const item = items[position];
      try {
        const result = await worker(item, position);
        onResult(result, item, position);
      } catch (err) {
        stopped = true;
        throw err;
      }
    }
  };

  const size = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: size }, () => workerLoop()));
}
