import wavefile from 'wavefile';
const { WaveFile } = wavefile;
import type { PcmBuffer } from './AudioSource.js';

/** Float samples → 16-bit, clamped to [-1, 1] first. */
export function toInt16(samples: Float32Array): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    out[i] = Math.round(s * 32767);
  }
  return out;
}

/** Encode a mono clip as a 16-bit PCM WAV file (what recognition services expect). */
export function encodeWav(buffer: PcmBuffer): Buffer {
  const samples = buffer.format === 'f32' ? toInt16(buffer.samples) : buffer.samples;
  const wav = new WaveFile();
  wav.fromScratch(1, buffer.sampleRate, '16', samples);
  return Buffer.from(wav.toBuffer());
}
