import { describe, it, expect } from 'vitest';
import { AudioFormatMismatchError } from './errors';
import { PcmAudio, amplitudeToDb, dbToAmplitude } from './pcm-audio';
import { LOUD, MONO, STEREO, level, silence } from '../../test-utils/audio';

describe('PcmAudio', () => {
  it('derives duration from frames and sample rate', () => {
    const audio = level(250);
    expect(audio.frameCount).toBe(2000);
    expect(audio.durationMs).toBe(250);
  });

  it('drops a trailing partial frame', () => {
    const audio = new PcmAudio(new Int16Array(5), STEREO);
    expect(audio.frameCount).toBe(2);
  });

  it('rejects a zero channel count', () => {
    expect(() => new PcmAudio(new Int16Array(4), { sampleRate: 8000, channels: 0 })).toThrow(RangeError);
  });

  describe('slice', () => {
    it('cuts by millisecond offsets', () => {
      const part = level(250).slice(100, 200);
      expect(part.durationMs).toBe(100);
      expect(part.frameCount).toBe(800);
    });

    it('clamps offsets to the buffer', () => {
      expect(level(250).slice(-50, 10_000).durationMs).toBe(250);
      expect(level(250).slice(300).isEmpty).toBe(true);
    });

    it('keeps channels together', () => {
      const audio = new PcmAudio(Int16Array.from([1, 2, 3, 4, 5, 6]), STEREO);
      expect(Array.from(audio.sliceFrames(1, 2).toInt16Array())).toEqual([3, 4]);
    });
  });

  describe('concat', () => {
    it('adds durations', () => {
      const joined = PcmAudio.concat(level(100), silence(50), level(25));
      expect(joined.durationMs).toBe(175);
    });

    it('refuses mixed formats', () => {
      expect(() => level(10).append(level(10, LOUD, STEREO))).toThrow(AudioFormatMismatchError);
    });
  });

  describe('fades', () => {
    it('ramps up from silence at the head', () => {
      const samples = level(100).fadeIn(10).toInt16Array();
      expect(samples[0]).toBe(0);
      expect(samples[40]).toBe(8192);
      expect(samples[80]).toBe(LOUD);
    });

    it('ramps down to silence at the tail', () => {
      const samples = level(100).fadeOut(10).toInt16Array();
      expect(samples[samples.length - 1]).toBe(0);
      expect(samples[samples.length - 80]).toBe(16179);
      expect(samples[samples.length - 81]).toBe(LOUD);
    });

    it('limits the ramp to the buffer length', () => {
      const samples = level(5).fadeIn(10).toInt16Array();
      expect(samples[0]).toBe(0);
      expect(samples[20]).toBe(8192);
    });

    it('returns the same buffer for a zero-length fade', () => {
      const audio = level(20);
      expect(audio.fadeIn(0)).toBe(audio);
      expect(audio.fadeOut(0)).toBe(audio);
    });

    it('does not modify the source buffer', () => {
      const audio = level(20);
      audio.fadeOut(10);
      expect(audio.toInt16Array()[159]).toBe(LOUD);
    });
  });

  describe('levels', () => {
    it('measures RMS against full scale', () => {
      expect(level(100).rms()).toBe(0.5);
      expect(level(100).dBFS).toBeCloseTo(-6.0206, 4);
    });

    it('reports digital silence as -Infinity dBFS', () => {
      expect(silence(100).rms()).toBe(0);
      expect(silence(100).dBFS).toBe(-Infinity);
    });

    it('sums squared samples over the channels of a frame', () => {
      const audio = new PcmAudio(Int16Array.from([3, -4, 100, 0]), STEREO);
      expect(audio.frameEnergy(0)).toBe(25);
      expect(audio.frameEnergy(1)).toBe(10_000);
    });

    it('converts between decibels and amplitude', () => {
      expect(dbToAmplitude(-40)).toBeCloseTo(0.01, 10);
      expect(amplitudeToDb(0.1)).toBeCloseTo(-20, 10);
    });
  });

  describe('padTo', () => {
    it('appends silence up to the target', () => {
      const padded = level(250).padTo(400);
      expect(padded.durationMs).toBe(400);
      expect(padded.toInt16Array()[2500]).toBe(0);
    });

    it('never truncates', () => {
      const audio = level(250);
      expect(audio.padTo(100)).toBe(audio);
    });
  });

  it('builds silence in the requested format', () => {
    const gap = PcmAudio.silent(100, MONO);
    expect(gap.frameCount).toBe(800);
    expect(gap.format).toEqual(MONO);
  });
});
