import { describe, it, expect, vi } from 'vitest';
import { checkConsistency, type ConsistencyOptions } from './ConsistencyChecker.js';
import { RecognitionError } from '../errors.js';
import { ScriptedRecognizer, pcm, track, type RecognitionStep } from '../test/fakes.js';

function setup(script: RecognitionStep[], overrides: Partial<ConsistencyOptions> = {}) {
  const recognizer = new ScriptedRecognizer(script);
  const capture = vi.fn(async () => pcm(0.5));
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const opts: ConsistencyOptions = {
    capture,
    recognize: (clip, signal) => recognizer.identify(clip, signal),
    checks: 3,
    threshold: 2,
    checkDelayMs: 1000,
    sleep,
    ...overrides,
  };
  return { recognizer, capture, sleep, opts };
}

describe('checkConsistency()', () => {
  it('accepts a pair that reaches the threshold and averages its confidence', async () => {
    const { opts } = setup([track('A', 'X', 0.8), track('B', 'Y', 0.9), track('A', 'X', 0.6)]);

    const result = await checkConsistency(opts);

    expect(result).toMatchObject({ artist: 'A', title: 'X', matches: 2, checks: 3 });
    expect(result?.confidence).toBeCloseTo(0.7, 10);
  });

  it('returns null when no pair reaches the threshold', async () => {
    const { opts } = setup([track('A', 'X'), track('B', 'Y'), null]);
    expect(await checkConsistency(opts)).toBeNull();
  });

  it('captures a fresh clip for every check and sleeps only between checks', async () => {
    const { opts, capture, sleep } = setup([null, null, null]);

    await checkConsistency(opts);

    expect(capture).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000, undefined);
  });

  it('counts a failing recognition as no match', async () => {
    const { opts } = setup([new RecognitionError('HTTP 500'), track('A', 'X'), track('A', 'X')]);
    const result = await checkConsistency(opts);
    expect(result?.matches).toBe(2);
  });

  it('ignores sentinel answers', async () => {
    const { opts } = setup([track('Unknown', 'X'), track('A', ''), track('A', 'X')], { threshold: 1 });
    const result = await checkConsistency(opts);
    expect(result).toMatchObject({ artist: 'A', title: 'X', matches: 1 });
  });

  it('drops samples below the confidence threshold', async () => {
    const { opts } = setup([track('A', 'X', 0.2), track('A', 'X', 0.9), track('A', 'X', 0.3)], {
      confidenceThreshold: 0.5,
    });
    expect(await checkConsistency(opts)).toBeNull();
  });

  it('breaks ties in favour of the first pair seen', async () => {
    const { opts } = setup(
      [track('B', 'Y'), track('A', 'X'), track('A', 'X'), track('B', 'Y')],
      { checks: 4, threshold: 2 },
    );
    const result = await checkConsistency(opts);
    expect(result).toMatchObject({ artist: 'B', title: 'Y', matches: 2 });
  });

  it('propagates capture failures', async () => {
    const { opts } = setup([track('A', 'X')], {
      capture: async () => { throw new Error('device gone'); },
    });
    await expect(checkConsistency(opts)).rejects.toThrow('device gone');
  });

  it('stops as soon as the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { opts, capture } = setup([track('A', 'X')], { signal: controller.signal });

    await expect(checkConsistency(opts)).rejects.toThrow();
    expect(capture).not.toHaveBeenCalled();
  });
});
