import { describe, it, expect } from 'vitest';
import { secondsToMs, withTimeout } from './timing.js';
import { TimeoutError, isAbortError } from '../errors.js';

describe('withTimeout()', () => {
  it('resolves with the call result', async () => {
    expect(await withTimeout('lookup', 1000, undefined, async () => 42)).toBe(42);
  });

  it('rejects with a TimeoutError and aborts the call when it runs long', async () => {
    const seen: AbortSignal[] = [];
    const pending = withTimeout('lookup', 10, undefined, (signal) => {
      seen.push(signal);
      return new Promise<never>(() => {});
    });

    await expect(pending).rejects.toThrow(new TimeoutError('lookup', 10));
    expect(seen).toHaveLength(1);
    expect(seen[0].aborted).toBe(true);
  });

  it('follows the parent signal', async () => {
    const parent = new AbortController();
    const pending = withTimeout('lookup', 10_000, parent.signal, () => new Promise<never>(() => {}));
    parent.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
  });

  it('refuses to start when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    let called = false;

    await expect(withTimeout('lookup', 1000, parent.signal, async () => { called = true; })).rejects.toThrow();
    expect(called).toBe(false);
  });
});

describe('secondsToMs()', () => {
  it('rounds to whole milliseconds', () => {
    expect(secondsToMs(0.1)).toBe(100);
    expect(secondsToMs(2.0004)).toBe(2000);
  });
});
