/**
 * In-process stand-ins for the external collaborators: a scripted audio
 * device, a scripted recognizer and a recording scrobble sink.
 */

import type { AudioHandle, AudioSource, PcmBuffer } from '../audio/AudioSource.js';
import { DeviceError } from '../errors.js';
import type { RecognitionResult, RecognitionService } from '../recognition/RecognitionService.js';
import type { ScrobbleSink } from '../scrobble/ScrobbleSink.js';

export function pcm(level: number, frames = 1, sampleRate = 10): PcmBuffer {
  return { format: 'f32', sampleRate, samples: new Float32Array(frames).fill(level) };
}

export type ReadStep = number | 'fail';

/**
 * Each read takes the next step of the script: a number fills the buffer
 * with that level, 'fail' rejects with a DeviceError. Once the script runs
 * out the last step repeats.
 */
export class ScriptedAudioSource implements AudioSource {
  reads = 0;
  opens = 0;
  closes = 0;
  failOpen = false;
  /** How long close() takes to release the device. */
  closeDelayMs = 0;

  constructor(private script: ReadStep[], private readonly sampleRate = 10) {}

  async open(): Promise<AudioHandle> {
    this.opens++;
    if (this.failOpen) throw new DeviceError('DEVICE_OPEN', 'no such device');
    return {
      read: async (frames: number, signal?: AbortSignal) => {
        signal?.throwIfAborted();
        const step = this.script[Math.min(this.reads, this.script.length - 1)];
        this.reads++;
        if (step === 'fail') throw new DeviceError('STREAM_CLOSED', 'stream closed');
        return pcm(step, frames, this.sampleRate);
      },
      close: async () => {
        if (this.closeDelayMs > 0) await new Promise<void>((resolve) => setTimeout(resolve, this.closeDelayMs));
        this.closes++;
      },
    };
  }
}

export type RecognitionStep = RecognitionResult | null | Error;

/** Returns scripted answers in order; once exhausted, keeps answering `fallback`. */
export class ScriptedRecognizer implements RecognitionService {
  calls = 0;
  /** `source.reads` at the moment of each identify() call, when a source is attached. */
  readsAtCall: number[] = [];

  constructor(
    private readonly script: RecognitionStep[],
    private readonly fallback: RecognitionStep = null,
    private readonly source?: ScriptedAudioSource,
  ) {}

  async identify(_clip: PcmBuffer, signal?: AbortSignal): Promise<RecognitionResult | null> {
    signal?.throwIfAborted();
    const step = this.calls < this.script.length ? this.script[this.calls] : this.fallback;
    this.calls++;
    if (this.source) this.readsAtCall.push(this.source.reads);
    if (step instanceof Error) throw step;
    return step;
  }
}

export interface SinkCall {
  kind: 'nowPlaying' | 'scrobble';
  artist: string;
  title: string;
  timestamp?: number;
}

export class RecordingSink implements ScrobbleSink {
  calls: SinkCall[] = [];
  failWith: Error | null = null;
  enabled = true;

  async updateNowPlaying(artist: string, title: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.calls.push({ kind: 'nowPlaying', artist, title });
  }

  async scrobble(artist: string, title: string, timestamp: number): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.calls.push({ kind: 'scrobble', artist, title, timestamp });
  }
}

export const track = (artist: string, title: string, confidence = 1): RecognitionResult =>
  ({ artist, title, confidence });
