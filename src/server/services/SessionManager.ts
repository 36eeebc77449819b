/**
 * SessionManager — owns the listening session.
 *
 * Idle ⇄ Running. start() spawns a single run loop over one opened audio
 * handle; stop() flips the running flag and clears the track, aborts any
 * in-flight external call and waits for the loop to release the device. start/stop are
 * serialised, so two concurrent start() calls cannot both see Idle.
 *
 * Each cycle: level sample → LevelMonitor → (Standby: poll again) →
 * ConsistencyChecker → AggressiveFallback after repeated misses →
 * ScrobbleDeduplicator → listener fan-out.
 *
 * The run loop is the only writer of status/activity; listeners receive
 * deep copies through their own bounded queues.
 */

import { captureClip, type AudioHandle, type AudioSource } from '../../audio/AudioSource.js';
import type { AppConfig, AudioConfig, DetectionConfig, LevelConfig } from '../../config/schema.js';
import { measureLevel } from '../../dsp/level.js';
import { checkConsistency, type ConsistencyResult } from '../../engine/ConsistencyChecker.js';
import { createActivityState, updateActivity } from '../../engine/LevelMonitor.js';
import { runAggressiveFallback } from '../../engine/aggressiveFallback.js';
import { reportDetection } from '../../engine/scrobbleDedup.js';
import { secondsToMs, sleep as defaultSleep, withTimeout, type Sleep } from '../../engine/timing.js';
import { DeviceError, FatalSessionError, describeError, isAbortError } from '../../errors.js';
import type { RecognitionService } from '../../recognition/RecognitionService.js';
import type { ScrobbleSink, TrackMetadataProvider } from '../../scrobble/ScrobbleSink.js';
import {
  formatTrack,
  sameTrack,
  type ActivityState,
  type DebugInfo,
  type SessionStatus,
  type StatusListener,
  type Track,
  type TrackKey,
  type TrackListener,
  type TrackMetadata,
  type Unsubscribe,
} from '../../types/session.js';
import { ListenerQueue } from './ListenerQueue.js';

export interface SessionConfig {
  audio: AudioConfig;
  level: LevelConfig;
  detection: DetectionConfig;
  listenerQueueSize: number;
  verbose: boolean;
}

export function sessionConfigFrom(config: AppConfig): SessionConfig {
  return {
    audio: config.audio,
    level: config.level,
    detection: config.detection,
    listenerQueueSize: config.server.listenerQueueSize,
    verbose: config.logging.verbose,
  };
}

export interface SessionManagerDeps {
  audio: AudioSource;
  recognizer: RecognitionService;
  sink: ScrobbleSink;
  metadata?: TrackMetadataProvider;
  config: SessionConfig;
  sleep?: Sleep;
  now?: () => Date;
}

type Detection =
  | { kind: 'match'; result: ConsistencyResult }
  | { kind: 'miss' }      // below the aggressive threshold: keep what is shown
  | { kind: 'lost' };     // fallback exhausted: the record has stopped

function initialDebug(): DebugInfo {
  return {
    audioLevel: 0,
    activity: 'standby',
    lastDetectionAt: null,
    detectionCount: 0,
    noMatchStreak: 0,
    lastError: null,
  };
}

export class SessionManager {
  private readonly config: SessionConfig;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  private status: SessionStatus = {
    running: false,
    currentDevice: null,
    currentTrack: null,
    debug: initialDebug(),
  };
  private activity: ActivityState = createActivityState();

  // Run loop
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private lifecycle: Promise<unknown> = Promise.resolve();

  // Detection state (written by the run loop only)
  private noMatchStreak = 0;
  private lastReported: TrackKey | null = null;

  // Listeners
  private trackQueues = new Set<ListenerQueue<Track | null>>();
  private statusQueues = new Set<ListenerQueue<SessionStatus>>();

  constructor(private readonly deps: SessionManagerDeps) {
    this.config = deps.config;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  // ── Lifecycle ────────────────────────────────────────────────

  /** Start listening on `deviceId`. False when a session is already running. */
  start(deviceId: number): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.status.running) {
        console.warn('[session] Cannot start: already running');
        return false;
      }
      // A loop that died on a fatal error may still be closing its device
      if (this.loop) {
        await this.loop;
        this.loop = null;
      }

      console.log(`[session] Starting on device ${deviceId}`);
      this.activity = createActivityState('standby');
      this.noMatchStreak = 0;
      this.status = {
        running: true,
        currentDevice: deviceId,
        currentTrack: null,
        debug: initialDebug(),
      };

      const abort = new AbortController();
      this.abort = abort;
      this.loop = this.run(deviceId, abort.signal);
      this.notifyStatus();
      return true;
    });
  }

  /** Stop the session. False when idle. Resolves once the device is released. */
  stop(): Promise<boolean> {
    return this.exclusive(async () => {
      if (!this.status.running) return false;

      console.log('[session] Stopping');
      this.status.running = false;
      this.status.currentTrack = null;
      this.notifyTrack();
      this.abort?.abort();
      if (this.loop) {
        await this.loop;
        this.loop = null;
      }
      this.abort = null;

      this.notifyStatus();
      return true;
    });
  }

  get isRunning(): boolean {
    return this.status.running;
  }

  getStatus(): SessionStatus {
    return structuredClone(this.status);
  }

  getActivity(): ActivityState {
    return { ...this.activity };
  }

  // ── Listeners ────────────────────────────────────────────────

  onTrackChanged(listener: TrackListener): Unsubscribe {
    const queue = new ListenerQueue<Track | null>(listener, this.config.listenerQueueSize, 'track listener');
    this.trackQueues.add(queue);
    return () => {
      queue.close();
      this.trackQueues.delete(queue);
    };
  }

  onStatusChanged(listener: StatusListener): Unsubscribe {
    const queue = new ListenerQueue<SessionStatus>(listener, this.config.listenerQueueSize, 'status listener');
    this.statusQueues.add(queue);
    return () => {
      queue.close();
      this.statusQueues.delete(queue);
    };
  }

  /** Resolves when every listener has been handed everything queued so far. */
  async flushListeners(): Promise<void> {
    await Promise.all([...this.trackQueues, ...this.statusQueues].map(q => q.drained()));
  }

  get listenerCount(): number {
    return this.trackQueues.size + this.statusQueues.size;
  }

  // ── Run loop ─────────────────────────────────────────────────

  private async run(deviceId: number, signal: AbortSignal): Promise<void> {
    const { detection } = this.config;
    let handle: AudioHandle | null = null;
    let deviceFailures = 0;

    try {
      while (this.status.running && !signal.aborted) {
        try {
          if (!handle) handle = await this.deps.audio.open(deviceId);
          await this.cycle(handle, signal);
          deviceFailures = 0;
        } catch (err) {
          if (isAbortError(err) || signal.aborted) break;
          if (err instanceof FatalSessionError) throw err;

          if (err instanceof DeviceError) {
            deviceFailures++;
            if (deviceFailures > detection.maxReopenAttempts) {
              throw new FatalSessionError(
                `Audio device ${deviceId} failed ${deviceFailures} times in a row: ${err.message}`,
                { cause: err },
              );
            }
            console.warn(`[audio] ${err.message}; reopening device ${deviceId} (attempt ${deviceFailures}/${detection.maxReopenAttempts})`);
            if (handle) {
              await this.closeHandle(handle);
              handle = null;
            }
          } else {
            console.error(`[session] Cycle failed: ${describeError(err)}`);
          }

          this.status.debug.lastError = describeError(err);
          this.notifyStatus();
          await this.sleep(secondsToMs(detection.errorBackoffSeconds), signal);
        }
      }
    } catch (err) {
      if (!isAbortError(err) && !signal.aborted) {
        console.error(`[session] Fatal error: ${describeError(err)}`);
        const hadTrack = this.status.currentTrack !== null;
        this.status.running = false;
        this.status.currentTrack = null;
        this.status.debug.lastError = describeError(err);
        if (hadTrack) this.notifyTrack();
        this.notifyStatus();
      }
    } finally {
      if (handle) await this.closeHandle(handle);
    }
  }

  private async cycle(handle: AudioHandle, signal: AbortSignal): Promise<void> {
    const { audio, level, detection, verbose } = this.config;

    const levelFrames = Math.max(1, Math.round(audio.sampleRate * audio.levelCheckSeconds));
    const sample = await handle.read(levelFrames, signal);
    const audioLevel = measureLevel(sample, level.metric);
    const update = updateActivity(this.activity, audioLevel, level);
    this.activity = update.state;
    this.status.debug.audioLevel = audioLevel;
    this.status.debug.activity = update.state.mode;

    if (update.changed) {
      console.log(update.state.mode === 'standby'
        ? '[session] Entering standby - no audio detected'
        : '[session] Leaving standby - audio activity detected');
    }
    if (verbose) {
      console.log(`[session] Audio level: ${audioLevel.toFixed(3)} (${update.state.mode})`);
    }

    if (this.activity.mode === 'standby') {
      this.notifyStatus();
      await this.sleep(secondsToMs(detection.standbyPollSeconds), signal);
      return;
    }

    const found = await this.identify(handle, signal);
    await this.applyDetection(found, signal);
    this.notifyStatus();
    await this.sleep(secondsToMs(detection.cycleIntervalSeconds), signal);
  }

  private async identify(handle: AudioHandle, signal: AbortSignal): Promise<Detection> {
    const { audio, detection, verbose } = this.config;
    const recognitionTimeoutMs = secondsToMs(detection.recognitionTimeoutSeconds);

    this.status.debug.lastDetectionAt = this.now().toISOString();
    this.status.debug.detectionCount++;

    const runCheck = (s?: AbortSignal) => checkConsistency({
      capture: (sig) => captureClip(handle, {
        sampleRate: audio.sampleRate,
        chunkSize: audio.chunkSize,
        seconds: audio.recordSeconds,
      }, sig),
      recognize: (clip, sig) => withTimeout('recognition', recognitionTimeoutMs, sig,
        (callSignal) => this.deps.recognizer.identify(clip, callSignal)),
      checks: detection.consistencyChecks,
      threshold: detection.consistencyThreshold,
      confidenceThreshold: detection.confidenceThreshold,
      checkDelayMs: secondsToMs(detection.checkDelaySeconds),
      signal: s,
      sleep: this.sleep,
      verbose,
    });

    let result = await runCheck(signal);
    if (result) {
      this.setNoMatchStreak(0);
      return { kind: 'match', result };
    }

    this.setNoMatchStreak(this.noMatchStreak + 1);
    if (this.noMatchStreak < detection.aggressiveAfterMisses) {
      return { kind: 'miss' };
    }

    console.log('[session] No song detected, trying aggressive detection');
    result = await runAggressiveFallback({
      rounds: detection.aggressiveCheckCount,
      roundDelayMs: secondsToMs(detection.aggressiveCheckIntervalSeconds),
      check: runCheck,
      signal,
      sleep: this.sleep,
      verbose,
    });
    this.setNoMatchStreak(0);
    return result ? { kind: 'match', result } : { kind: 'lost' };
  }

  private async applyDetection(found: Detection, signal: AbortSignal): Promise<void> {
    if (found.kind === 'miss') return;

    const detected: TrackKey | null = found.kind === 'match'
      ? { artist: found.result.artist, title: found.result.title }
      : null;

    const outcome = await reportDetection(this.deps.sink, detected, this.lastReported, {
      now: this.now(),
      timeoutMs: secondsToMs(this.config.detection.sinkTimeoutSeconds),
      signal,
    });
    this.lastReported = outcome.lastReported;
    signal.throwIfAborted();

    if (!outcome.nowPlaying || found.kind !== 'match') {
      if (this.status.currentTrack) {
        console.log('[session] No valid song detected');
        this.status.currentTrack = null;
        this.notifyTrack();
      }
      return;
    }

    if (sameTrack(this.status.currentTrack, outcome.nowPlaying)) {
      if (this.config.verbose) {
        console.log(`[session] Still playing: ${formatTrack(outcome.nowPlaying)}`);
      }
      return;
    }

    const metadata = await this.lookupMetadata(outcome.nowPlaying, signal);
    signal.throwIfAborted();
    const track: Track = {
      artist: found.result.artist,
      title: found.result.title,
      confidence: found.result.confidence,
      detectedAt: this.now().toISOString(),
      ...(metadata ? { metadata } : {}),
    };
    this.status.currentTrack = track;
    console.log(`[session] Now playing: ${formatTrack(track)}`);
    this.notifyTrack();
  }

  private async lookupMetadata(key: TrackKey, signal: AbortSignal): Promise<TrackMetadata | null> {
    const provider = this.deps.metadata;
    if (!provider) return null;
    try {
      return await withTimeout('metadata lookup', secondsToMs(this.config.detection.sinkTimeoutSeconds), signal,
        (s) => provider.lookup(key.artist, key.title, s));
    } catch (err) {
      if (isAbortError(err) || signal.aborted) throw err;
      console.warn(`[session] Metadata lookup failed for ${formatTrack(key)}: ${describeError(err)}`);
      return null;
    }
  }

  // ── Internal helpers ─────────────────────────────────────────

  private setNoMatchStreak(value: number) {
    this.noMatchStreak = value;
    this.status.debug.noMatchStreak = value;
  }

  private async closeHandle(handle: AudioHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      console.warn(`[audio] Failed to close device: ${describeError(err)}`);
    }
  }

  private notifyTrack() {
    const track = this.status.currentTrack;
    for (const queue of this.trackQueues) {
      if (!queue.push(track ? structuredClone(track) : null)) {
        console.warn(`[session] Track listener queue full, dropped oldest update (${queue.dropped} dropped)`);
      }
    }
  }

  private notifyStatus() {
    for (const queue of this.statusQueues) {
      if (!queue.push(this.getStatus())) {
        console.warn(`[session] Status listener queue full, dropped oldest update (${queue.dropped} dropped)`);
      }
    }
  }

  /** Serialise lifecycle operations. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.lifecycle.then(fn);
    this.lifecycle = next.catch(() => undefined);
    return next;
  }
}
