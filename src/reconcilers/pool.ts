/**
 * Bounded concurrency for per-entry checks
 */

export const DEFAULT_CONCURRENCY = 8;

/**
 * Split array into chunks of specified size
 */
export function chunkArray<T>(array: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

/**
 * Map over items with at most `concurrency` calls in flight
 *
 * Results come back in input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Number.isInteger(concurrency) && concurrency > 0 ? concurrency : DEFAULT_CONCURRENCY;
  const results: R[] = [];
  let processedCount = 0;

  for (const chunk of chunkArray(items, size)) {
    const chunkResults = await Promise.all(chunk.map((item, i) => fn(item, processedCount + i)));
    results.push(...chunkResults);
    processedCount += chunk.length;
  }

  return results;
}
