/**
 * ScrobbleDeduplicator — decides what to report for a detection.
 *
 * Policy: scrobble immediately when the identified pair changes. A repeat
 * of the last reported pair is "still playing" and costs no network call.
 * A failed report keeps the previous pair as the anchor so the next
 * detection retries it; so does a skipped one while the sink is disabled,
 * so a record still playing when an account is added gets scrobbled.
 */

import { describeError, isAbortError } from '../errors.js';
import type { ScrobbleSink } from '../scrobble/ScrobbleSink.js';
import { formatTrack, sameTrack, type TrackKey } from '../types/session.js';
import { withTimeout } from './timing.js';

export type ReportAction = 'cleared' | 'unchanged' | 'skipped' | 'scrobbled' | 'failed';

export interface ReportOutcome {
  /** Anchor for the next call. */
  lastReported: TrackKey | null;
  /** What should be shown as now playing; null once cleared. */
  nowPlaying: TrackKey | null;
  action: ReportAction;
}

export interface ReportOptions {
  now?: Date;
  timeoutMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_SINK_TIMEOUT_MS = 10_000;

export async function reportDetection(
  sink: ScrobbleSink,
  detected: TrackKey | null,
  lastReported: TrackKey | null,
  opts: ReportOptions = {},
): Promise<ReportOutcome> {
  if (!detected || !detected.artist || !detected.title) {
    return { lastReported, nowPlaying: null, action: 'cleared' };
  }

  const pair: TrackKey = { artist: detected.artist, title: detected.title };
  if (sameTrack(pair, lastReported)) {
    return { lastReported, nowPlaying: pair, action: 'unchanged' };
  }

  if (!sink.enabled) {
    return { lastReported, nowPlaying: pair, action: 'skipped' };
  }

  const timeoutMs = opts.timeoutMs ?? DEFAULT_SINK_TIMEOUT_MS;
  const timestamp = Math.floor((opts.now ?? new Date()).getTime() / 1000);

  try {
    await withTimeout('now-playing update', timeoutMs, opts.signal,
      (signal) => sink.updateNowPlaying(pair.artist, pair.title, signal));
    await withTimeout('scrobble', timeoutMs, opts.signal,
      (signal) => sink.scrobble(pair.artist, pair.title, timestamp, signal));
  } catch (err) {
    if (isAbortError(err) || opts.signal?.aborted) throw err;
    console.warn(`[scrobble] Failed to report ${formatTrack(pair)}: ${describeError(err)}`);
    return { lastReported, nowPlaying: pair, action: 'failed' };
  }

  console.log(`[scrobble] Scrobbled ${formatTrack(pair)}`);
  return { lastReported: pair, nowPlaying: pair, action: 'scrobbled' };
}
