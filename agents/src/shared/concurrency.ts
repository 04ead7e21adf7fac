/**
 * Map items through an async processor with at most `limit` in flight.
 * Results keep input order regardless of completion order. A non-finite or
 * missing limit runs everything at once.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  limit?: number,
): Promise<R[]> {
  if (limit === undefined || !Number.isFinite(limit) || limit >= items.length) {
    return Promise.all(items.map((item, index) => processor(item, index)));
  }

  const workerCount = Math.max(1, Math.floor(limit));
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const currentIndex = nextIndex++;
      results[currentIndex] = await processor(items[currentIndex], currentIndex);
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
