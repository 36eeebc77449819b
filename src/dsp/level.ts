import type { PcmBuffer } from '../audio/AudioSource.js';

export type LevelMetric = 'peak' | 'rms';

export function peakAmplitude(samples: Float32Array | Int16Array): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const abs = Math.abs(samples[i]);
    if (abs > peak) peak = abs;
  }
  return peak;
}

export function rmsEnergy(samples: Float32Array | Int16Array): number {
  if (samples.length === 0) return 0;
  let sumSq = 0;
  for (let i = 0; i < samples.length; i++) {
    sumSq += samples[i] * samples[i];
  }
  return Math.sqrt(sumSq / samples.length);
}

/**
 * Loudness of a buffer in its native units: normalised floats for f32,
 * integer sample values for s16. Thresholds must be configured to match.
 */
export function measureLevel(buffer: PcmBuffer, metric: LevelMetric): number {
  return metric === 'peak' ? peakAmplitude(buffer.samples) : rmsEnergy(buffer.samples);
}
