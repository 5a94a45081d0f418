/**
 * Maps `items` through `task` with at most `concurrency` tasks in flight. Workers pull from a
 * shared queue; results keep input order.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), items.length));

  const worker = async (): Promise<void> => {
    let next = queue.shift();
    while (next) {
      results[next.index] = await task(next.item, next.index);
      next = queue.shift();
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
};
