import type { PcmBuffer } from '../audio/AudioSource.js';

export interface RecognitionResult {
  artist: string;
  title: string;
  confidence: number;
}

/**
 * Fingerprint recognition backend. Returns the best guess for a clip, or
 * null when nothing matched. Failures reject with RecognitionError; the
 * call must honour `signal`.
 */
export interface RecognitionService {
  identify(clip: PcmBuffer, signal?: AbortSignal): Promise<RecognitionResult | null>;
}

const SENTINELS = new Set(['', 'unknown', 'none']);

/** True for an artist/title pair that names an actual track. */
export function isRecognized(result: RecognitionResult | null | undefined): result is RecognitionResult {
  if (!result) return false;
  return !isSentinel(result.artist) && !isSentinel(result.title);
}

function isSentinel(value: string | null | undefined): boolean {
  if (typeof value !== 'string') return true;
  return SENTINELS.has(value.trim().toLowerCase());
}
