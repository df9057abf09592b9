/**
 * Runs `handler` over `values` with at most `limit` calls in flight and returns the
 * results in input order. After the first rejection no further values are started;
 * the returned promise settles only once every call in flight has settled, then
 * rejects with the first error unchanged.
 */
export const mapWithConcurrency = async <T, R>(
  values: readonly T[],
  limit: number,
  handler: (value: T) => Promise<R>,
): Promise<readonly R[]> => {
  const effectiveLimit = Math.max(1, Math.floor(limit));
  const workerCount = Math.min(effectiveLimit, values.length);
  const results: R[] = new Array(values.length);
  const failures: unknown[] = [];
  let index = 0;

  const workers: Promise<void>[] = Array.from({ length: workerCount }, async () => {
    // Each iteration advances `index`; workers return once it passes the end
    // or once any worker has failed.
    while (failures.length === 0) {
      const current = index;
      index += 1;
      if (current >= values.length) {
        return;
      }

      const value = values[current];
      if (value === undefined) {
        continue;
      }

      try {
        results[current] = await handler(value);
      } catch (error) {
        failures.push(error);
        return;
      }
    }
  });

  await Promise.allSettled(workers);
  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
};
