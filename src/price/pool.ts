export function workerCount(jobs: number, maxWorkers: number): number {
  if (jobs <= 0) return 0;
  return Math.max(1, Math.min(jobs, maxWorkers));
}

/**
 * Runs `handler` over `items` with at most `maxWorkers` calls in flight.
 * Results keep the order of `items`. A handler that throws rejects the
 * whole run, so callers that must not abort should catch inside it.
 */
export async function runPool<T, R>(
  items: readonly T[],
  maxWorkers: number,
  handler: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await handler(items[index]);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount(items.length, maxWorkers); i += 1) {
    workers.push(worker());
  }
  await Promise.all(workers);
  return results;
}
