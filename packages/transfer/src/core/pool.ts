/**
 * Bounded worker pool
 *
 * Fans items out to at most `concurrency` in-flight workers and waits for
 * every one of them. No retries and no cancellation: the vendor SDKs own
 * those concerns.
 */

import { TransferConfigError } from "./errors.js";

/** Default number of concurrent workers */
export const DEFAULT_CONCURRENCY = 50;

/**
 * Validate a worker count
 *
 * @throws TransferConfigError unless concurrency is a positive integer
 */
export function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new TransferConfigError(
      `Concurrency must be a positive integer, got ${concurrency}`,
    );
  }
}

/**
 * Run a worker over every item with bounded concurrency
 *
 * @param items - Work items
 * @param concurrency - Maximum number of workers in flight
 * @param worker - Async function applied to each item
 * @returns Settled results in input order
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  assertConcurrency(concurrency);

  const results = new Array<PromiseSettledResult<R>>(items.length);
  if (items.length === 0) {
    return results;
  }

  let nextIndex = 0;

  async function runLane(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      try {
        const value = await worker(items[index], index);
        results[index] = { status: "fulfilled", value };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  }

  const lanes = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: lanes }, () => runLane()));

  return results;
}
