export type SettledItem<T, R> = {
  item: T;
  result: PromiseSettledResult<R>;
};

export type PoolRunResult<T, R> = {
  settled: SettledItem<T, R>[];
  /** Items never started because the stop signal fired first. */
  notStarted: T[];
};

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 *
 * `stopSignal` only gates new work: once it fires no further item is
 * started, while calls already in flight are awaited to completion.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  { concurrency, stopSignal }: { concurrency: number; stopSignal?: AbortSignal },
): Promise<PoolRunResult<T, R>> {
  const settled: SettledItem<T, R>[] = [];
  let nextIndex = 0;

  const drain = async (): Promise<void> => {
    while (nextIndex < items.length) {
      if (stopSignal?.aborted) {
        return;
      }
      const item = items[nextIndex];
      nextIndex += 1;
      try {
        const value = await worker(item);
        settled.push({ item, result: { status: "fulfilled", value } });
      } catch (reason) {
        settled.push({ item, result: { status: "rejected", reason } });
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => drain()));

  return { settled, notStarted: items.slice(nextIndex) };
}
