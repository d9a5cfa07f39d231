/**
 * Map over `items` with at most `limit` calls in flight.
 *
 * Results come back in input order regardless of completion order. The
 * first rejection rejects the whole map; workers stop picking up new
 * items once that happens, and the map settles only after the calls
 * already in flight have finished.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(limit, items.length));
  let nextIndex = 0;
  const failures: unknown[] = [];

  async function worker(): Promise<void> {
    while (failures.length === 0 && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error: unknown) {
        failures.push(error);
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
