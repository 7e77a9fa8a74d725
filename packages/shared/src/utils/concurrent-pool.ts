/**
 * Options for ConcurrentPool.run
 */
export interface ConcurrentPoolOptions {
  /** Once aborted, workers stop taking new items; in-flight items finish */
  abortSignal?: AbortSignal;
}

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Unlike batch processing where all items in a batch must complete before
 * the next batch starts, the pool keeps N workers active at all times.
 * When a worker finishes, it immediately picks up the next available item.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Spawns up to `concurrency` workers that pull items from a shared queue.
   * Each worker processes one item at a time; when it finishes, it immediately
   * takes the next available item. Results maintain the original item order.
   *
   * Items never started because the abort signal fired stay `undefined` in
   * the returned array.
   *
   * @param items - Array of items to process
   * @param concurrency - Maximum number of concurrent workers
   * @param processFn - Async function to process each item
   * @returns Array of results in the same order as the input items
   */
  static async run<T, R>(
    items: T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options?: ConcurrentPoolOptions,
  ): Promise<Array<R | undefined>> {
    const results: Array<R | undefined> = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !options?.abortSignal?.aborted) {
        const index = nextIndex++;
        results[index] = await processFn(items[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.max(0, Math.min(concurrency, items.length)) },
      () => worker(),
    );
    await Promise.all(workers);
    return results;
  }
}
