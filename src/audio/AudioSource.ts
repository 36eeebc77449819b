/**
 * Audio capture contract. A source is opened once per session and read
 * in fixed-size frame counts; all buffers are mono.
 */

export type SampleFormat = 'f32' | 's16';

export type PcmBuffer =
  | { format: 'f32'; sampleRate: number; samples: Float32Array }
  | { format: 's16'; sampleRate: number; samples: Int16Array };

export interface AudioHandle {
  /** Read exactly `frames` mono frames. Rejects with DeviceError. */
  read(frames: number, signal?: AbortSignal): Promise<PcmBuffer>;
  close(): Promise<void>;
}

export interface AudioSource {
  open(deviceId: number): Promise<AudioHandle>;
}

export interface CaptureOptions {
  sampleRate: number;
  chunkSize: number;
  seconds: number;
}

/** Number of chunk reads that make up a clip of `seconds`. At least one. */
export function chunksPerClip(opts: CaptureOptions): number {
  return Math.max(1, Math.floor((opts.sampleRate / opts.chunkSize) * opts.seconds));
}

/** Capture a clip by reading whole chunks, the way a blocking stream is drained. */
export async function captureClip(
  handle: AudioHandle,
  opts: CaptureOptions,
  signal?: AbortSignal,
): Promise<PcmBuffer> {
  const count = chunksPerClip(opts);
  const parts: PcmBuffer[] = [];
  for (let i = 0; i < count; i++) {
    signal?.throwIfAborted();
    parts.push(await handle.read(opts.chunkSize, signal));
  }
  return concatPcm(parts);
}

export function concatPcm(parts: PcmBuffer[]): PcmBuffer {
  if (parts.length === 0) {
    throw new Error('concatPcm: no buffers');
  }
  const first = parts[0];
  const total = parts.reduce((sum, p) => sum + p.samples.length, 0);

  if (first.format === 'f32') {
    const out = new Float32Array(total);
    let offset = 0;
    for (const p of parts) {
      if (p.format !== 'f32') throw new Error('concatPcm: mixed sample formats');
      out.set(p.samples, offset);
      offset += p.samples.length;
    }
    return { format: 'f32', sampleRate: first.sampleRate, samples: out };
  }

  const out = new Int16Array(total);
  let offset = 0;
  for (const p of parts) {
    if (p.format !== 's16') throw new Error('concatPcm: mixed sample formats');
    out.set(p.samples, offset);
    offset += p.samples.length;
  }
  return { format: 's16', sampleRate: first.sampleRate, samples: out };
}

export function durationSec(buffer: PcmBuffer): number {
  return buffer.samples.length / buffer.sampleRate;
}
