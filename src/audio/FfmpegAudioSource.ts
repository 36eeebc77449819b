/**
 * FfmpegAudioSource — captures an input device through an ffmpeg child
 * process streaming raw mono PCM on stdout.
 *
 * One handle == one ffmpeg process. Once ffmpeg exits, every pending and
 * future read rejects with STREAM_CLOSED; the session reopens the device.
 *
 * ffmpeg keeps writing while nobody reads (sleeps, recognition calls), so
 * the handle only holds the most recent audio: anything older than the
 * backlog window is dropped, and a read always starts close to "now".
 */

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { DeviceError } from '../errors.js';
import type { AudioConfig } from '../config/schema.js';
import type { AudioHandle, AudioSource, PcmBuffer } from './AudioSource.js';

const START_STABILITY_DELAY_MS = 300;
const STOP_GRACE_MS = 2000;
/** Backlog kept between reads, in chunks. */
const BACKLOG_CHUNKS = 2;

const normalizeCaptureError = (raw: string): string => {
  const detail = raw.trim();

  if (/Permission denied|Operation not permitted/i.test(detail)) {
    return 'Permission denied opening the audio device (is the user in the "audio" group?)';
  }
  if (/No such file|No such device|cannot open audio device|Device or resource busy/i.test(detail)) {
    return `Audio device is unavailable: ${detail.split('\n').pop() ?? detail}`;
  }
  return detail ? `Audio capture failed: ${detail}` : 'Audio capture failed';
};

export function buildFfmpegArgs(config: AudioConfig, deviceId: number): string[] {
  const input = config.deviceTemplate.replace('{id}', String(deviceId));
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', config.inputFormat,
    '-channels', String(config.channels),
    '-sample_rate', String(config.sampleRate),
    '-i', input,
    '-ac', '1',
    '-ar', String(config.sampleRate),
    '-f', config.format === 'f32' ? 'f32le' : 's16le',
    'pipe:1',
  ];
}

/** The parts of the ffmpeg child process a capture handle drives. */
export interface CaptureProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  onExit(listener: (code: number | null) => void): void;
  onError(listener: (err: Error) => void): void;
  kill(signal: NodeJS.Signals): void;
}

export class FfmpegAudioSource implements AudioSource {
  constructor(private readonly config: AudioConfig) {}

  async open(deviceId: number): Promise<AudioHandle> {
    const args = buildFfmpegArgs(this.config, deviceId);
    const proc = spawn(this.config.ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const handle = new FfmpegCaptureHandle({
      stdout: proc.stdout,
      stderr: proc.stderr,
      onExit: (listener) => { proc.on('close', listener); },
      onError: (listener) => { proc.on('error', listener); },
      kill: (signal) => { proc.kill(signal); },
    }, this.config);
    await handle.ready();
    console.log(`[audio] Capturing device ${deviceId} (${this.config.sampleRate} Hz, ${this.config.format})`);
    return handle;
  }
}

export class FfmpegCaptureHandle implements AudioHandle {
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private droppedBytes = 0;
  private stderrLog = '';
  private exited = false;
  private exitError: DeviceError | null = null;
  private wake: (() => void) | null = null;
  private wantedBytes = 0;
  private readonly bytesPerSample: number;
  private readonly backlogBytes: number;
  private readonly exitedPromise: Promise<void>;

  constructor(
    private readonly proc: CaptureProcess,
    private readonly config: AudioConfig,
  ) {
    this.bytesPerSample = config.format === 'f32' ? 4 : 2;
    this.backlogBytes = config.chunkSize * BACKLOG_CHUNKS * this.bytesPerSample;

    let markExited: () => void = () => {};
    this.exitedPromise = new Promise<void>((resolve) => { markExited = resolve; });

    proc.stdout.on('data', (chunk: Buffer) => {
      this.pending.push(chunk);
      this.pendingBytes += chunk.length;
      this.trimBacklog();
      this.signalWaiter();
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      this.stderrLog += chunk.toString();
    });
    proc.onExit((code) => {
      this.exited = true;
      this.exitError = new DeviceError('STREAM_CLOSED',
        normalizeCaptureError(`${this.stderrLog}\nffmpeg exited with code ${code}`));
      this.signalWaiter();
      markExited();
    });
    proc.onError((err) => {
      this.exited = true;
      this.exitError = new DeviceError('DEVICE_OPEN', `Could not start ffmpeg: ${err.message}`, { cause: err });
      this.signalWaiter();
      markExited();
    });
  }

  /** Bytes of audio waiting to be read. */
  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  /** Bytes of stale audio dropped so far. */
  get dropped(): number {
    return this.droppedBytes;
  }

  /** Resolves once ffmpeg has survived its first moments; rejects with DEVICE_OPEN otherwise. */
  async ready(): Promise<void> {
    await new Promise<void>((resolve) => setTimeout(resolve, START_STABILITY_DELAY_MS));
    if (this.exited) {
      throw new DeviceError('DEVICE_OPEN', this.exitError?.message ?? normalizeCaptureError(this.stderrLog));
    }
  }

  async read(frames: number, signal?: AbortSignal): Promise<PcmBuffer> {
    const wanted = frames * this.bytesPerSample;

    this.wantedBytes = wanted;
    try {
      while (this.pendingBytes < wanted) {
        if (this.exitError) throw this.exitError;
        signal?.throwIfAborted();
        await this.waitForData(signal);
      }
    } finally {
      this.wantedBytes = 0;
    }

    const bytes = this.take(wanted);
    if (this.config.format === 'f32') {
      const samples = new Float32Array(frames);
      for (let i = 0; i < frames; i++) samples[i] = bytes.readFloatLE(i * 4);
      return { format: 'f32', sampleRate: this.config.sampleRate, samples };
    }
    const samples = new Int16Array(frames);
    for (let i = 0; i < frames; i++) samples[i] = bytes.readInt16LE(i * 2);
    return { format: 's16', sampleRate: this.config.sampleRate, samples };
  }

  async close(): Promise<void> {
    if (!this.exited) {
      const killTimer = setTimeout(() => this.proc.kill('SIGKILL'), STOP_GRACE_MS);
      this.proc.kill('SIGINT');
      await this.exitedPromise;
      clearTimeout(killTimer);
    }
    this.pending = [];
    this.pendingBytes = 0;
  }

  // ── Internal helpers ─────────────────────────────────────────

  private waitForData(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.wake = null;
        reject(signal?.reason);
      };
      this.wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private signalWaiter() {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /** Drop the oldest whole samples beyond the backlog window (or the read in progress). */
  private trimBacklog() {
    const limit = Math.max(this.backlogBytes, this.wantedBytes);
    if (this.pendingBytes <= limit) return;
    const excess = this.pendingBytes - limit;
    const drop = Math.ceil(excess / this.bytesPerSample) * this.bytesPerSample;
    this.take(drop);
    this.droppedBytes += drop;
  }

  private take(byteCount: number): Buffer {
    const all = this.pending.length === 1 ? this.pending[0] : Buffer.concat(this.pending, this.pendingBytes);
    const out = Buffer.from(all.subarray(0, byteCount));
    const rest = all.subarray(byteCount);
    this.pending = rest.length > 0 ? [rest] : [];
    this.pendingBytes = rest.length;
    return out;
  }
}
