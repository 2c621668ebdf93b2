/**
 * Bounded-concurrency task runner for page builds.
 *
 * Tasks run as async lanes on the event loop. Every lane shares the same
 * ObjectStore and ContentCache; interleaving happens at `await` points,
 * which is where builders yield between pages and heavy steps.
 *
 * All lanes share one thread. Subsetting and encoding are synchronous, so
 * more lanes change how page builds interleave, not how fast CPU-bound work
 * finishes.
 */

import { availableParallelism } from "node:os";
import { setImmediate } from "node:timers/promises";

export interface ConcurrencyOptions {
  enableParallelism: boolean;
  workerCount?: number;
}

/**
 * Number of lanes a build should use.
 *
 * Disabled parallelism always means one lane. Otherwise the configured
 * worker count wins, falling back to the host's available parallelism.
 */
export function resolveConcurrency(options: ConcurrencyOptions): number {
  if (!options.enableParallelism) {
    return 1;
  }

  return Math.max(1, options.workerCount ?? availableParallelism());
}

/**
 * Let other lanes run before continuing.
 */
export function yieldToEventLoop(): Promise<void> {
  return setImmediate();
}

/**
 * Run `task` for every item with at most `concurrency` tasks in flight.
 * Lanes are concurrent, not parallel: synchronous work in one task blocks
 * the others until it awaits.
 *
 * Results are returned in input order regardless of completion order. The
 * first failure rejects the run; queued items after it are not started,
 * but tasks already in flight are allowed to settle.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const lane = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;

      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());

  const settled = await Promise.allSettled(lanes);

  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
  }

  return results;
}
