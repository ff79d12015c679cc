import { mapSettled } from './pool.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapSettled', () => {
  it('keeps input order regardless of completion order', async () => {
    const results = await mapSettled([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([
      { item: 30, status: 'fulfilled', value: 60 },
      { item: 10, status: 'fulfilled', value: 20 },
      { item: 20, status: 'fulfilled', value: 40 },
    ]);
  });

  it('never runs more tasks than the concurrency limit', async () => {
    let running = 0;
    let peak = 0;
    await mapSettled([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    });

    expect(peak).toBe(2);
  });

  it('captures failures without stopping the other tasks', async () => {
    const results = await mapSettled(['a', 'boom', 'c'], 1, async (s) => {
      if (s === 'boom') throw new Error('bad item');
      return s.toUpperCase();
    });

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    const failed = results[1];
    expect(failed?.status === 'rejected' && failed.reason).toBeInstanceOf(Error);
  });

  it('treats a concurrency below one as one', async () => {
    const seen: number[] = [];
    await mapSettled([1, 2, 3], 0, async (n) => {
      seen.push(n);
    });
    expect(seen).toEqual([1, 2, 3]);
  });

  it('returns an empty list for no items', async () => {
    await expect(mapSettled([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects once the signal is aborted', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const run = mapSettled([1, 2, 3], 1, async (n) => {
      started.push(n);
      if (n === 1) controller.abort();
    }, controller.signal);

    await expect(run).rejects.toThrow();
    expect(started).toEqual([1]);
  });
});
