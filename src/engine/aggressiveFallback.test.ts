import { describe, it, expect, vi } from 'vitest';
import { runAggressiveFallback } from './aggressiveFallback.js';
import type { ConsistencyResult } from './ConsistencyChecker.js';

const hit: ConsistencyResult = { artist: 'A', title: 'X', confidence: 1, matches: 2, checks: 3 };

describe('runAggressiveFallback()', () => {
  it('returns the first round that agrees', async () => {
    const check = vi.fn<[AbortSignal?], Promise<ConsistencyResult | null>>()
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce(hit);
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

    const result = await runAggressiveFallback({ rounds: 3, roundDelayMs: 2000, check, sleep });

    expect(result).toBe(hit);
    expect(check).toHaveBeenCalledTimes(2);
  });

  it('sleeps before every round and gives up after the last', async () => {
    const order: string[] = [];
    const check = vi.fn(async () => {
      order.push('check');
      return null;
    });
    const sleep = vi.fn(async (ms: number) => {
      order.push(`sleep ${ms}`);
    });

    const result = await runAggressiveFallback({ rounds: 3, roundDelayMs: 2000, check, sleep });

    expect(result).toBeNull();
    expect(order).toEqual(['sleep 2000', 'check', 'sleep 2000', 'check', 'sleep 2000', 'check']);
  });

  it('runs no rounds when rounds is 0', async () => {
    const check = vi.fn(async () => hit);
    expect(await runAggressiveFallback({ rounds: 0, roundDelayMs: 0, check })).toBeNull();
    expect(check).not.toHaveBeenCalled();
  });
});
