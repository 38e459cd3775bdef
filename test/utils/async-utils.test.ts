import { describe, it, expect } from 'vitest';
import { chunkArray, mapWithConcurrency } from '../../src/utils/async-utils.js';

describe('chunkArray', () => {
  it('splits into fixed-size chunks with a short tail', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no chunks for an empty array', () => {
    expect(chunkArray([], 3)).toEqual([]);
  });
});

describe('mapWithConcurrency', () => {
  it('preserves input order when later items finish first', async () => {
    const delays = [30, 5, 20, 1];
    const result = await mapWithConcurrency(delays, 4, async (ms, i) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return i;
    });
    expect(result).toEqual([0, 1, 2, 3]);
  });

  it('never exceeds the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      inFlight--;
    });
    expect(peak).toBe(3);
  });

  it('treats concurrency below 1 as 1', async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3], 0, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await Promise.resolve();
      inFlight--;
    });
    expect(peak).toBe(1);
  });

  it('rejects with the first failure', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('fail 2');
        return n;
      }),
    ).rejects.toThrow('fail 2');
  });
});
