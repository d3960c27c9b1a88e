import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../retry.js';
import { sleep } from '../sleep.js';

describe('backoffDelay', () => {
  it('doubles from the base delay up to the cap', () => {
    const policy = { baseDelayMs: 1000, maxDelayMs: 60_000 };
    const delays = [1, 2, 3, 4, 5, 6, 7, 8].map((attempt) => backoffDelay(policy, attempt));
    expect(delays).toEqual([1000, 2000, 4000, 8000, 16_000, 32_000, 60_000, 60_000]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');
    const waits: number[] = [];

    const result = await withRetry(fn, { attempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }, {
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(waits).toEqual([100]);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    let calls = 0;
    const waits: number[] = [];

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { attempts: 4, baseDelayMs: 1000, maxDelayMs: 3000 },
        {
          sleep: async (ms) => {
            waits.push(ms);
          },
        }
      )
    ).rejects.toThrow('failure 4');

    expect(calls).toBe(4);
    expect(waits).toEqual([1000, 2000, 3000]);
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          controller.abort();
          throw new Error('down');
        },
        { attempts: 5, baseDelayMs: 10, maxDelayMs: 10 },
        { signal: controller.signal }
      )
    ).rejects.toThrow('down');

    expect(calls).toBe(1);
  });
});

describe('sleep', () => {
  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      let done = false;
      const pending = sleep(60_000, controller.signal).then(() => {
        done = true;
      });

      await vi.advanceTimersByTimeAsync(1000);
      expect(done).toBe(false);

      controller.abort();
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});
