/**
 * Bounded-concurrency map. A fixed number of workers pull the next item
 * until the list is exhausted. Results keep input order and carry their item,
 * whichever task finishes first. Task failures are captured, never thrown;
 * only an aborted signal rejects.
 */
export type Settled<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; reason: unknown };

export async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Settled<T, R>[]> {
  const results: Settled<T, R>[] = new Array(items.length);
  // Shared iterator: each next() hands out the following entry exactly once
  const pending = items.entries();

  async function worker(): Promise<void> {
    for (const [i, item] of pending) {
      signal?.throwIfAborted();
      try {
        results[i] = { item, status: 'fulfilled', value: await task(item, i) };
      } catch (reason) {
        results[i] = { item, status: 'rejected', reason };
      }
    }
  }

  const workers = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  signal?.throwIfAborted();
  return results;
}
