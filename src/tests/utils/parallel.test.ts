import { describe, expect, it, vi } from 'vitest';
import { parallelMap, sleep } from '../../utils/parallel.js';

describe('parallelMap', () => {
  it('should keep input order when later items finish first', async () => {
    const delays = [30, 5, 20, 1];
    const results = await parallelMap(
      delays,
      async (ms, index) => {
        await new Promise((resolve) => setTimeout(resolve, ms));
        return index;
      },
      4
    );
    expect(results).toEqual([0, 1, 2, 3]);
  });

  it('should process items and return results in order', async () => {
    const items = [1, 2, 3, 4, 5];
    const fn = async (n: number) => n * 2;
    const results = await parallelMap(items, fn, 2);
    expect(results).toEqual([2, 4, 6, 8, 10]);
  });

  it('should respect concurrency limits', async () => {
    const items = [100, 100, 100, 100];
    let activeCount = 0;
    let maxActive = 0;

    const fn = async (ms: number) => {
      activeCount++;
      maxActive = Math.max(maxActive, activeCount);
      await new Promise((resolve) => setTimeout(resolve, ms));
      activeCount--;
      return ms;
    };

    const concurrency = 2;
    await parallelMap(items, fn, concurrency);

    expect(maxActive).toBeLessThanOrEqual(concurrency);
  });

  it('should handle empty input array', async () => {
    const results = await parallelMap([], async (x) => x, 2);
    expect(results).toEqual([]);
  });

  it('should handle concurrency <= 0 by defaulting to 1', async () => {
    const items = [1, 2, 3];
    const fn = vi.fn(async (x) => x);

    const results0 = await parallelMap(items, fn, 0);
    expect(results0).toEqual([1, 2, 3]);

    const resultsNeg = await parallelMap(items, fn, -5);
    expect(resultsNeg).toEqual([1, 2, 3]);
  });

  it('should propagate errors and stop processing', async () => {
    const items = [1, 2, 3, 4, 5];
    const fn = async (n: number) => {
      if (n === 3) throw new Error('Failed');
      return n;
    };

    await expect(parallelMap(items, fn, 2)).rejects.toThrow('Failed');
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    try {
      let done = false;
      const pending = sleep(1000).then(() => {
        done = true;
      });
      await vi.advanceTimersByTimeAsync(999);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });

  it('resolves immediately for an already aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
