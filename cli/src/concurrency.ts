/**
 * Bounded worker pool for batch runs.
 *
 * Files share no state, so each is an independent task. At most `limit`
 * run at once; results come back in input order. Once `signal` aborts, no
 * new task starts, and tasks already running are allowed to finish.
 */

export interface PoolResult<T> {
  /** `undefined` for tasks that never started */
  results: (T | undefined)[];
  cancelled: boolean;
}

export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
  signal?: AbortSignal,
): Promise<PoolResult<T>> {
  const results: (T | undefined)[] = new Array<T | undefined>(tasks.length).fill(undefined);
  if (tasks.length === 0) return { results, cancelled: signal?.aborted ?? false };

  let nextIndex = 0;

  async function runNext(): Promise<void> {
    while (nextIndex < tasks.length && !signal?.aborted) {
      const currentIndex = nextIndex++;
      results[currentIndex] = await tasks[currentIndex]();
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, limit), tasks.length) }, () => runNext());
  await Promise.all(workers);

  return { results, cancelled: nextIndex < tasks.length };
}
