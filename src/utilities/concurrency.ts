/**
 * Runs worker over every item with at most `limit` calls in flight and
 * returns the results in input order. The first rejection rejects the whole
 * run; workers already started are left to settle.
 */
export function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  return new Promise<R[]>((resolve, reject) => {
    const total = items.length;
    let activeCount = 0;
    let queueIndex = 0;
    let failed = false;
    const next = () => {
      if (failed) return;
      if (queueIndex >= total) {
        if (activeCount === 0) resolve(results);
        return;
      }
      const index = queueIndex++;
      activeCount++;
      worker(items[index], index)
        .then((result) => {
          results[index] = result;
          activeCount--;
          next();
        })
        .catch((err: unknown) => {
          failed = true;
          reject(err);
        });
    };
    const initial = Math.min(Math.max(1, limit), total);
    if (initial === 0) {
      resolve(results);
      return;
    }
    for (let i = 0; i < initial; i++) {
      next();
    }
  });
}
