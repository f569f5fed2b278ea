/**
 * Worker Pool Scheduler
 * Runs a worker over every item with a bounded number in flight
 */

import PQueue from "p-queue";

export const DEFAULT_CONCURRENCY = 3;

export interface PoolOptions<T, R> {
  concurrency?: number;
  /** Turns a rejected worker call into a result so no item is lost */
  recover: (item: T, error: unknown) => R;
}

/**
 * Run `worker` for every item, at most `concurrency` at a time.
 *
 * Resolves once every item has finished, with one result per item in
 * completion order. Never rejects because of a worker; only a throwing
 * `recover` rejects, after the remaining items have finished.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  options: PoolOptions<T, R>,
): Promise<R[]> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Concurrency must be a positive integer, got ${concurrency}`,
    );
  }

  const queue = new PQueue({ concurrency });
  const results: R[] = [];

  const jobs = items.map((item) =>
    queue.add(async () => {
      let result: R;
      try {
        result = await worker(item);
      } catch (error) {
        result = options.recover(item, error);
      }
      results.push(result);
    }),
  );

  // Wait for every job even if a recover callback throws
  const settled = await Promise.allSettled(jobs);
  const rejected = settled.find(
    (s): s is PromiseRejectedResult => s.status === "rejected",
  );
  if (rejected) {
    throw rejected.reason;
  }
  return results;
}
