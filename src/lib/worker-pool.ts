import { DEFAULT_FETCH_CONCURRENCY, MAX_FETCH_CONCURRENCY, MIN_FETCH_CONCURRENCY } from "./constants";

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function clampConcurrency(value: unknown): number {
  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed)) {
    return DEFAULT_FETCH_CONCURRENCY;
  }
  return Math.max(MIN_FETCH_CONCURRENCY, Math.min(MAX_FETCH_CONCURRENCY, parsed));
}

/**
 * Runs `task` over every item with at most `concurrency` in flight and waits for
 * all of them. Results keep the input order; failures are captured, not thrown.
 */
export async function settleBounded<I, T>(
  items: readonly I[],
  concurrency: number,
  task: (item: I) => Promise<T>
): Promise<Settled<T>[]> {
  const results = new Array<Settled<T>>(items.length);
  const limit = clampConcurrency(concurrency);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      try {
        results[index] = { ok: true, value: await task(items[index]) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
