import { setTimeout as delay } from 'node:timers/promises';
import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../src/pool.js';

describe('mapWithConcurrency', () => {
  it('keeps input order when tasks finish out of order', async () => {
    const results = await mapWithConcurrency([30, 0, 10], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });
    expect(results).toEqual(['0:30', '1:0', '2:10']);
  });

  it('never runs more than the limit at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 8 }, (_, i) => i), 2, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(2);
      inFlight -= 1;
    });

    expect(peak).toBe(2);
  });

  it('treats a limit below one as one', async () => {
    expect(await mapWithConcurrency([1, 2], 0, async (n) => n * 2)).toEqual([2, 4]);
  });

  it('returns nothing for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it('rejects when a task rejects', async () => {
    await expect(
      mapWithConcurrency([1], 1, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
  });
});
