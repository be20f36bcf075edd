export interface MapParallelOptions {
  concurrency: number;
}

/**
 * Runs `fn` over every item with at most `concurrency` calls in flight and
 * resolves with results in input order (result `i` belongs to item `i`).
 *
 * The first rejection rejects the whole call. No new items start after a
 * failure; calls already in flight are left to settle on their own.
 */
export async function mapParallel<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: MapParallelOptions
): Promise<R[]> {
  if (options.concurrency < 1) {
    throw new RangeError(`concurrency must be at least 1, got ${options.concurrency}`);
  }

  const results = new Array<R>(items.length);
  const pending = items.map((item, index) => ({ item, index }));
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed) {
      const next = pending.shift();
      if (!next) {
        return;
      }
      try {
        results[next.index] = await fn(next.item, next.index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  const workerCount = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
