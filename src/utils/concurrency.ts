/**
 * Run async tasks with a concurrency limit.
 * Returns results in input order. Failed tasks return their Error.
 */
export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number,
): Promise<Array<T | Error>> {
  const results: Array<T | Error> = new Array<T | Error>(tasks.length);
  let nextIndex = 0;

  async function runNext(): Promise<void> {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      const task = tasks[index];
      if (!task) {
        continue;
      }
      try {
        results[index] = await task();
      } catch (err) {
        results[index] = err instanceof Error ? err : new Error(String(err));
      }
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, tasks.length)) },
    () => runNext(),
  );

  await Promise.all(workers);
  return results;
}
