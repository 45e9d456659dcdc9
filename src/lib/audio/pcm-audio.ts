/**
 * Immutable interleaved 16-bit PCM buffer.
 *
 * All offsets are milliseconds and every operation returns a new
 * instance, so pipeline stages can pass buffers around freely.
 */

import { AudioFormatMismatchError } from './errors';
import type { PcmFormat } from './types';

export const FULL_SCALE = 32768;

export class PcmAudio {
  readonly sampleRate: number;
  readonly channels: number;
  private readonly samples: Int16Array;

  constructor(samples: Int16Array, format: PcmFormat) {
    if (!Number.isInteger(format.channels) || format.channels < 1) {
      throw new RangeError(`Invalid channel count: ${format.channels}`);
    }
    if (!(format.sampleRate > 0)) {
      throw new RangeError(`Invalid sample rate: ${format.sampleRate}`);
    }
    this.sampleRate = format.sampleRate;
    this.channels = format.channels;
    // Drop a trailing partial frame
    const whole = samples.length - (samples.length % format.channels);
    this.samples = whole === samples.length ? samples : samples.subarray(0, whole);
  }

  /**
   * A buffer of digital silence
   */
  static silent(durationMs: number, format: PcmFormat): PcmAudio {
    const frames = Math.max(0, Math.round((durationMs * format.sampleRate) / 1000));
    return new PcmAudio(new Int16Array(frames * format.channels), format);
  }

  static empty(format: PcmFormat): PcmAudio {
    return new PcmAudio(new Int16Array(0), format);
  }

  /**
   * Join buffers end to end. All parts must share one format.
   */
  static concat(...parts: PcmAudio[]): PcmAudio {
    const [first] = parts;
    if (!first) {
      throw new RangeError('concat needs at least one buffer');
    }
    for (const part of parts) {
      if (!first.sameFormat(part)) {
        throw new AudioFormatMismatchError(
          `Cannot join ${part.sampleRate}Hz/${part.channels}ch audio to ${first.sampleRate}Hz/${first.channels}ch audio`
        );
      }
    }

    const totalLength = parts.reduce((sum, part) => sum + part.samples.length, 0);
    const merged = new Int16Array(totalLength);
    let offset = 0;
    for (const part of parts) {
      merged.set(part.samples, offset);
      offset += part.samples.length;
    }
    return new PcmAudio(merged, first.format);
  }

  get format(): PcmFormat {
    return { sampleRate: this.sampleRate, channels: this.channels };
  }

  get frameCount(): number {
    return this.samples.length / this.channels;
  }

  get durationMs(): number {
    return (this.frameCount * 1000) / this.sampleRate;
  }

  get isEmpty(): boolean {
    return this.samples.length === 0;
  }

  /**
   * Copy of the interleaved samples
   */
  toInt16Array(): Int16Array {
    return this.samples.slice();
  }

  sameFormat(other: PcmAudio): boolean {
    return this.sampleRate === other.sampleRate && this.channels === other.channels;
  }

  /**
   * Frame index for a millisecond offset, clamped to the buffer
   */
  frameAt(ms: number): number {
    const frame = Math.round((ms * this.sampleRate) / 1000);
    return Math.min(this.frameCount, Math.max(0, frame));
  }

  slice(startMs: number, endMs: number = this.durationMs): PcmAudio {
    return this.sliceFrames(this.frameAt(startMs), this.frameAt(endMs));
  }

  sliceFrames(startFrame: number, endFrame: number): PcmAudio {
    const start = Math.min(this.frameCount, Math.max(0, startFrame));
    const end = Math.min(this.frameCount, Math.max(start, endFrame));
    return new PcmAudio(this.samples.subarray(start * this.channels, end * this.channels), this.format);
  }

  append(other: PcmAudio): PcmAudio {
    return PcmAudio.concat(this, other);
  }

  /**
   * Pad with trailing silence up to `targetMs`. Never truncates.
   */
  padTo(targetMs: number): PcmAudio {
    const missing = PcmAudio.silent(targetMs, this.format).frameCount - this.frameCount;
    if (missing <= 0) {
      return this;
    }
    return this.append(new PcmAudio(new Int16Array(missing * this.channels), this.format));
  }

  /**
   * Linear gain ramp from silence up to full level over the first `durationMs`
   */
  fadeIn(durationMs: number): PcmAudio {
    const rampFrames = Math.min(this.frameCount, this.frameAt(durationMs));
    if (rampFrames === 0) {
      return this;
    }
    return this.applyGain(0, rampFrames, (frame) => frame / rampFrames);
  }

  /**
   * Linear gain ramp from full level down to silence over the last `durationMs`
   */
  fadeOut(durationMs: number): PcmAudio {
    const rampFrames = Math.min(this.frameCount, this.frameAt(durationMs));
    if (rampFrames === 0) {
      return this;
    }
    return this.applyGain(this.frameCount - rampFrames, rampFrames, (frame) => 1 - (frame + 1) / rampFrames);
  }

  /**
   * Root-mean-square amplitude over all samples, normalized to full scale (0..1)
   */
  rms(): number {
    if (this.samples.length === 0) {
      return 0;
    }
    let sum = 0;
    for (let i = 0; i < this.samples.length; i++) {
      const value = this.samples[i] / FULL_SCALE;
      sum += value * value;
    }
    return Math.sqrt(sum / this.samples.length);
  }

  /**
   * Level relative to full scale; `-Infinity` for digital silence
   */
  get dBFS(): number {
    return amplitudeToDb(this.rms());
  }

  /**
   * Sum of squared raw samples across the channels of one frame
   */
  frameEnergy(frame: number): number {
    const base = frame * this.channels;
    let energy = 0;
    for (let ch = 0; ch < this.channels; ch++) {
      const value = this.samples[base + ch];
      energy += value * value;
    }
    return energy;
  }

  private applyGain(startFrame: number, frames: number, gainAt: (frame: number) => number): PcmAudio {
    const out = this.samples.slice();
    for (let frame = 0; frame < frames; frame++) {
      const gain = gainAt(frame);
      const base = (startFrame + frame) * this.channels;
      for (let ch = 0; ch < this.channels; ch++) {
        out[base + ch] = Math.round(out[base + ch] * gain);
      }
    }
    return new PcmAudio(out, this.format);
  }
}

export function dbToAmplitude(db: number): number {
  return Math.pow(10, db / 20);
}

export function amplitudeToDb(amplitude: number): number {
  return amplitude === 0 ? -Infinity : 20 * Math.log10(amplitude);
}
