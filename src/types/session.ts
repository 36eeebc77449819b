/**
 * Session data model — what the detection loop produces and what
 * listeners (terminal UI, WebSocket clients) get to see.
 *
 * Everything here is plain data: snapshots are deep-copied before they
 * leave the SessionManager, so listeners can never mutate session state.
 */

// ── Tracks ───────────────────────────────────────────────────────

/** Identity of a track for deduplication: the (artist, title) pair. */
export interface TrackKey {
  artist: string;
  title: string;
}

export interface TrackMetadata {
  album: { name: string; year: string | null } | null;
  durationSec: number | null;
  tags: string[];
  listeners: number | null;
  playcount: number | null;
}

export interface Track extends TrackKey {
  readonly artist: string;
  readonly title: string;
  readonly confidence: number;   // 0..1, mean over the agreeing samples
  readonly detectedAt: string;   // ISO timestamp
  readonly metadata?: TrackMetadata;
}

export function sameTrack(a: TrackKey | null | undefined, b: TrackKey | null | undefined): boolean {
  if (!a || !b) return false;
  return a.artist === b.artist && a.title === b.title;
}

export function formatTrack(key: TrackKey): string {
  return `${key.title} by ${key.artist}`;
}

// ── Activity (standby hysteresis) ────────────────────────────────

export type ActivityMode = 'active' | 'standby';

export interface ActivityState {
  mode: ActivityMode;
  consecutiveBelowThreshold: number;
  consecutiveAboveThreshold: number;
}

// ── Status ───────────────────────────────────────────────────────

export interface DebugInfo {
  audioLevel: number;
  activity: ActivityMode;
  lastDetectionAt: string | null;
  detectionCount: number;
  noMatchStreak: number;
  lastError: string | null;
}

export interface SessionStatus {
  running: boolean;
  currentDevice: number | null;
  currentTrack: Track | null;
  debug: DebugInfo;
}

// ── Listeners ────────────────────────────────────────────────────

export type TrackListener = (track: Track | null) => void | Promise<void>;
export type StatusListener = (status: SessionStatus) => void | Promise<void>;

/** Detach a previously registered listener. */
export type Unsubscribe = () => void;
