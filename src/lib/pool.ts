export interface MapLimitOptions {
  /** Checked before each item is taken; once true, workers drain and exit. */
  shouldStop?: () => boolean;
}

/**
 * Runs `worker` over `items` with at most `limit` calls pending. Workers pull from a
 * shared cursor, so a slow item never holds back the others.
 */
export async function mapLimit<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  options: MapLimitOptions = {}
): Promise<void> {
  if (items.length === 0) {
    return;
  }
  const concurrency = Math.max(1, Math.min(limit, items.length));
  let index = 0;
  const runners = Array.from({ length: concurrency }, async () => {
    while (index < items.length && !options.shouldStop?.()) {
      const current = index;
      index += 1;
      await worker(items[current], current);
    }
  });
  await Promise.all(runners);
}
