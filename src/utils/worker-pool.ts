/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 * Once `shouldStop()` returns true no new item is started; items never
 * started are left out of the returned map.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  shouldStop: () => boolean = () => false
): Promise<Map<number, R>> {
  const results = new Map<number, R>();
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length && !shouldStop()) {
      const index = next++;
      results.set(index, await task(items[index], index));
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
