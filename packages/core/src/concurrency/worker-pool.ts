/**
 * Bounded parallel execution
 * @module @tidewater/core/concurrency/worker-pool
 */

/**
 * Run `worker` over `values` with at most `concurrency` calls in flight.
 * Every value is attempted; results keep input order.
 */
export async function runWithConcurrency<T, R>(
  values: readonly T[],
  concurrency: number,
  worker: (value: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array<PromiseSettledResult<R>>(values.length);
  if (values.length === 0) {
    return results;
  }

  const workerCount = Math.min(values.length, Math.max(1, Math.floor(concurrency)));
  let next = 0;

  const runners: Promise<void>[] = [];
  for (let runner = 0; runner < workerCount; runner += 1) {
    runners.push(
      (async () => {
        while (next < values.length) {
          const index = next;
          next += 1;
          const value = values[index];
          if (value === undefined) {
            continue;
          }
          try {
            results[index] = { status: 'fulfilled', value: await worker(value, index) };
          } catch (reason) {
            results[index] = { status: 'rejected', reason };
          }
        }
      })(),
    );
  }

  await Promise.all(runners);
  return results;
}
