import { PcmAudio } from '../lib/audio/pcm-audio';
import type { PcmFormat } from '../lib/audio/types';

export const RATE = 8000;
export const MONO: PcmFormat = { sampleRate: RATE, channels: 1 };
export const STEREO: PcmFormat = { sampleRate: RATE, channels: 2 };

/** Half of full scale, -6 dBFS */
export const LOUD = 16384;

/**
 * Constant-level audio: every sample equals `value`, so window RMS is exact
 */
export function level(ms: number, value: number = LOUD, format: PcmFormat = MONO): PcmAudio {
  const frames = Math.round((ms * format.sampleRate) / 1000);
  return new PcmAudio(new Int16Array(frames * format.channels).fill(value), format);
}

export function silence(ms: number, format: PcmFormat = MONO): PcmAudio {
  return PcmAudio.silent(ms, format);
}

export function tone(ms: number, amplitude: number = 0.5, frequency: number = 440, format: PcmFormat = MONO): PcmAudio {
  const frames = Math.round((ms * format.sampleRate) / 1000);
  const samples = new Int16Array(frames * format.channels);
  for (let frame = 0; frame < frames; frame++) {
    const value = Math.round(Math.sin((2 * Math.PI * frequency * frame) / format.sampleRate) * amplitude * 32767);
    samples.fill(value, frame * format.channels, (frame + 1) * format.channels);
  }
  return new PcmAudio(samples, format);
}

export function join(...parts: PcmAudio[]): PcmAudio {
  return PcmAudio.concat(...parts);
}

export function durations(parts: readonly PcmAudio[]): number[] {
  return parts.map((part) => part.durationMs);
}
