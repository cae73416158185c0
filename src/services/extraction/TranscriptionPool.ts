import { InvalidInputError } from '../../utils/errors.js';

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight and
 * returns the results in input order. After the first failure no new item is
 * started; calls already in flight are awaited, then the first error is thrown.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidInputError('concurrency must be a positive integer', { concurrency });
  }

  const results: R[] = new Array<R>(items.length);
  let cursor = 0;
  const state: { failure?: { error: unknown } } = {};

  const runWorker = async (): Promise<void> => {
    while (!state.failure && cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, () => runWorker()));

  if (state.failure) {
    throw state.failure.error;
  }

  return results;
}
