/**
 * ConsistencyChecker — majority vote across independent recognitions.
 *
 * The recognizer misfires on silence and surface noise, so a track only
 * counts once `threshold` of `checks` temporally distinct samples agree on
 * the same (artist, title).
 */

import type { PcmBuffer } from '../audio/AudioSource.js';
import { describeError, isAbortError } from '../errors.js';
import { isRecognized, type RecognitionResult } from '../recognition/RecognitionService.js';
import { sleep as defaultSleep, type Sleep } from './timing.js';

export interface ConsistencyResult {
  artist: string;
  title: string;
  confidence: number;   // mean over matching samples only
  matches: number;
  checks: number;
}

export interface ConsistencyOptions {
  /** Capture a fresh clip. Device failures propagate to the caller. */
  capture: (signal?: AbortSignal) => Promise<PcmBuffer>;
  /** One recognition attempt. Failures count as "no match". */
  recognize: (clip: PcmBuffer, signal?: AbortSignal) => Promise<RecognitionResult | null>;
  checks: number;
  threshold: number;
  confidenceThreshold?: number;
  checkDelayMs: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  verbose?: boolean;
}

interface Tally {
  artist: string;
  title: string;
  confidences: number[];
}

export async function checkConsistency(opts: ConsistencyOptions): Promise<ConsistencyResult | null> {
  const sleep = opts.sleep ?? defaultSleep;
  const minConfidence = opts.confidenceThreshold ?? 0;
  // Map preserves insertion order: iteration order == first-encountered order
  const tallies = new Map<string, Tally>();

  for (let i = 0; i < opts.checks; i++) {
    opts.signal?.throwIfAborted();
    const clip = await opts.capture(opts.signal);

    let result: RecognitionResult | null = null;
    try {
      result = await opts.recognize(clip, opts.signal);
    } catch (err) {
      if (isAbortError(err) || opts.signal?.aborted) throw err;
      if (opts.verbose) {
        console.log(`[recognize] Check ${i + 1}/${opts.checks} failed: ${describeError(err)}`);
      }
    }

    if (isRecognized(result) && result.confidence >= minConfidence) {
      const key = `${result.artist}\u0000${result.title}`;
      const tally = tallies.get(key);
      if (tally) {
        tally.confidences.push(result.confidence);
      } else {
        tallies.set(key, { artist: result.artist, title: result.title, confidences: [result.confidence] });
      }
      if (opts.verbose) {
        console.log(`[recognize] Check ${i + 1}/${opts.checks}: ${result.title} by ${result.artist} (confidence ${result.confidence.toFixed(2)})`);
      }
    } else if (opts.verbose) {
      console.log(`[recognize] Check ${i + 1}/${opts.checks}: no match`);
    }

    if (i < opts.checks - 1) {
      await sleep(opts.checkDelayMs, opts.signal);
    }
  }

  let best: Tally | null = null;
  for (const tally of tallies.values()) {
    // strict > keeps the earliest pair on equal counts
    if (!best || tally.confidences.length > best.confidences.length) best = tally;
  }

  if (!best || best.confidences.length < opts.threshold) {
    if (opts.verbose && tallies.size > 0) {
      const summary = [...tallies.values()]
        .map(t => `${t.title} by ${t.artist}: ${t.confidences.length}`)
        .join(', ');
      console.log(`[recognize] Inconsistent results (${summary})`);
    }
    return null;
  }

  const confidence = best.confidences.reduce((sum, c) => sum + c, 0) / best.confidences.length;
  return {
    artist: best.artist,
    title: best.title,
    confidence,
    matches: best.confidences.length,
    checks: opts.checks,
  };
}
