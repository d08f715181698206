import { ConfigurationError } from './errors';

/**
 * Runs `fn` over `items` on at most `concurrency` concurrent workers.
 *
 * Results keep the index order of `items`. After the first failure no further
 * items are started; items already running are awaited, then that first error
 * is rethrown.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw ConfigurationError.nonPositive('concurrency', concurrency);
  }

  const results = new Array<R>(items.length);
  let next = 0;
  const failures: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error: unknown) {
        failures.push(error);
      }
    }
  };

  const size = Math.min(concurrency, Math.max(1, items.length));
  await Promise.all(Array.from({ length: size }, worker));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
