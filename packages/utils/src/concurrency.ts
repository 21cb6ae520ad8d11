export interface BoundedRunOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export interface BoundedRunSummary<R> {
  results: R[];
  // Items never started because the signal aborted first
  notStarted: number;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Cancellation is cooperative: the signal is checked before each item is
 * started, never in the middle of one. Results keep input order; `worker`
 * is expected to handle its own failures.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: BoundedRunOptions
): Promise<BoundedRunSummary<R>> {
  const limit = Math.max(1, Math.floor(options.concurrency));
  const results: R[] = [];
  const slots: Array<{ value: R } | undefined> = new Array(items.length);
  let cursor = 0;
  let started = 0;

  const lane = async (): Promise<void> => {
    while (cursor < items.length) {
      if (options.signal?.aborted) {
        return;
      }
      const index = cursor++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      started++;
      slots[index] = { value: await worker(item, index) };
    }
  };

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane());
  await Promise.all(lanes);

  for (const slot of slots) {
    if (slot) {
      results.push(slot.value);
    }
  }

  return { results, notStarted: items.length - started };
}
