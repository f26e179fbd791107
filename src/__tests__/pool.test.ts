/**
 * Concurrency Pool Tests
 */

import { describe, it, expect } from 'vitest';
import { drainQueue, mapPool } from '../utils/pool';

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('mapPool', () => {
  it('should keep results in input order', async () => {
    const results = await mapPool([30, 10, 20], 3, async (value, index) => {
      await new Promise(resolve => setTimeout(resolve, value));
      return `${index}:${value}`;
    });
    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('should never run more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await mapPool(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
    });

    expect(peak).toBe(3);
  });

  it('should handle an empty list', async () => {
    expect(await mapPool([], 4, async () => 1)).toEqual([]);
  });

  it('should reject with the first failure', async () => {
    await expect(
      mapPool([1, 2, 3], 2, async value => {
        if (value === 2) throw new Error('upload failed');
        return value;
      })
    ).rejects.toThrow('upload failed');
  });
});

describe('drainQueue', () => {
  it('should process items enqueued while draining', async () => {
    const processed: number[] = [];

    await drainQueue([1], 2, async (value, enqueue) => {
      processed.push(value);
      if (value < 4) {
        enqueue(value * 2);
        enqueue(value * 2 + 1);
      }
    });

    expect(processed.sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('should resolve immediately for an empty queue', async () => {
    let calls = 0;
    await drainQueue<number>([], 4, async () => {
      calls++;
    });
    expect(calls).toBe(0);
  });

  it('should respect the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await drainQueue([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should reject when a worker fails', async () => {
    await expect(
      drainQueue([1, 2], 1, async value => {
        if (value === 2) throw new Error('integrity');
      })
    ).rejects.toThrow('integrity');
  });
});
