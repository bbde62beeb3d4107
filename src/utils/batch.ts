export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw new RangeError(`Batch size must be at least 1, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export interface BatchOptions {
  batchSize: number;
  /** Pause between two consecutive batches; none after the last one. */
  delayMs?: number;
}

/**
 * Runs `worker` over `items` one batch at a time, all items of a batch
 * concurrently. Results keep input order; a rejected item does not affect
 * its neighbours.
 */
export async function processInBatches<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: BatchOptions
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  const batches = chunk(items, options.batchSize);

  for (let b = 0; b < batches.length; b++) {
    const batch = batches[b] ?? [];
    const offset = b * options.batchSize;
    const settled = await Promise.allSettled(
      batch.map((item, i) => worker(item, offset + i))
    );
    results.push(...settled);

    if (b < batches.length - 1) {
      await sleep(options.delayMs ?? 0);
    }
  }

  return results;
}
