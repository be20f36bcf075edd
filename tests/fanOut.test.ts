import { describe, it, expect } from '@jest/globals';
import { mapParallel } from '../src/utils/fanOut';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapParallel', () => {
  it('returns results in input order regardless of completion order', async () => {
    const results = await mapParallel(
      [30, 5, 15, 1],
      async (ms, index) => {
        await delay(ms);
        return `${index}:${ms}`;
      },
      { concurrency: 4 }
    );

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:1']);
  });

  it('never runs more than the configured number of calls at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapParallel(
      Array.from({ length: 7 }, (_, i) => i),
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
      },
      { concurrency: 3 }
    );

    expect(peak).toBe(3);
  });

  it('resolves an empty input without calling fn', async () => {
    let calls = 0;
    const results = await mapParallel(
      [],
      async () => {
        calls++;
      },
      { concurrency: 2 }
    );

    expect(results).toEqual([]);
    expect(calls).toBe(0);
  });

  it('rejects with the first failure and starts nothing afterwards', async () => {
    const started: number[] = [];

    await expect(
      mapParallel(
        [0, 1, 2, 3, 4, 5],
        async (item) => {
          started.push(item);
          await delay(item === 1 ? 1 : 20);
          if (item === 1) {
            throw new Error('section 1 failed');
          }
          return item;
        },
        { concurrency: 2 }
      )
    ).rejects.toThrow('section 1 failed');

    // item 0 was in flight when item 1 failed; item 2 never started
    expect(started).toEqual([0, 1]);
  });

  it('rejects a concurrency below one', async () => {
    await expect(mapParallel([1], async (x) => x, { concurrency: 0 })).rejects.toThrow(
      'concurrency must be at least 1, got 0'
    );
  });
});
