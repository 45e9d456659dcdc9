import { describe, it, expect } from 'vitest';
import { PcmAudio } from '../audio/pcm-audio';
import { detectNonSilent, detectSilence, splitOnSilence } from './silence-segmenter';
import { LOUD, MONO, STEREO, durations, join, level, silence, tone } from '../../test-utils/audio';

// 164 / 32768 ≈ -46 dBFS: silent at -40, audible at -60
const QUIET = 164;

describe('detectSilence', () => {
  it('finds a pause between two sounds', () => {
    const audio = join(level(1000), silence(500), level(800));
    expect(detectSilence(audio, { minSilenceLen: 300, silenceThresh: -40 })).toEqual([
      { start: 1000, end: 1500 },
    ]);
  });

  it('ignores pauses shorter than minSilenceLen', () => {
    const audio = join(level(500), silence(200), level(500));
    expect(detectSilence(audio, { minSilenceLen: 300 })).toEqual([]);
  });

  it('extends a trailing silent range to the end of the buffer', () => {
    const audio = join(level(400), silence(600));
    expect(detectSilence(audio, { minSilenceLen: 300 })).toEqual([{ start: 400, end: 1000 }]);
  });

  it('returns nothing for audio shorter than minSilenceLen', () => {
    expect(detectSilence(silence(200), { minSilenceLen: 300 })).toEqual([]);
  });
});

describe('detectNonSilent', () => {
  it('returns the spans between silences', () => {
    const audio = join(level(1000), silence(500), level(800));
    expect(detectNonSilent(audio)).toEqual([
      { start: 0, end: 1000 },
      { start: 1500, end: 2300 },
    ]);
  });

  it('drops leading and trailing silence', () => {
    const audio = join(silence(400), level(1000), silence(400));
    expect(detectNonSilent(audio)).toEqual([{ start: 400, end: 1400 }]);
  });
});

describe('splitOnSilence', () => {
  it('returns an empty list for all-silent input', () => {
    expect(splitOnSilence(silence(2000))).toEqual([]);
  });

  it('returns an empty list for empty input', () => {
    expect(splitOnSilence(PcmAudio.empty(MONO))).toEqual([]);
  });

  it('returns the whole input when there is no qualifying silence', () => {
    const audio = join(level(500), silence(200), level(500));
    expect(durations(splitOnSilence(audio))).toEqual([1200]);
  });

  it('keeps no silence at segment edges', () => {
    const phrases = splitOnSilence(join(level(1000), silence(500), level(800)));
    expect(durations(phrases)).toEqual([1000, 800]);
    for (const phrase of phrases) {
      const samples = phrase.toInt16Array();
      expect(samples[0]).not.toBe(0);
      expect(samples[samples.length - 1]).not.toBe(0);
    }
  });

  it('applies the threshold in dBFS', () => {
    const audio = join(level(500), level(500, QUIET), level(500));
    expect(durations(splitOnSilence(audio, { silenceThresh: -40 }))).toEqual([500, 500]);
    expect(durations(splitOnSilence(audio, { silenceThresh: -60 }))).toEqual([1500]);
  });

  it('keeps the channel layout', () => {
    const audio = join(level(600, LOUD, STEREO), silence(400, STEREO), level(600, LOUD, STEREO));
    const phrases = splitOnSilence(audio);
    expect(durations(phrases)).toEqual([600, 600]);
    expect(phrases[0].channels).toBe(2);
  });

  it('trims phrase edges whose windows fall under the threshold', () => {
    // Level 1000 is ~-30 dBFS. A 300 ms window holding k ms of it has
    // RMS 1000 * sqrt(k / 300), at or under 327.68 (-40 dBFS) for k <= 32.
    const audio = join(level(600, 1000, STEREO), silence(400, STEREO), level(600, 1000, STEREO));
    expect(detectSilence(audio)).toEqual([{ start: 568, end: 1032 }]);
    expect(durations(splitOnSilence(audio))).toEqual([568, 568]);
  });

  it('slides the window over a long buffer', () => {
    const audio = join(silence(20_000), level(1000), silence(40_000), level(500), silence(1000));
    expect(detectNonSilent(audio)).toEqual([
      { start: 20_000, end: 21_000 },
      { start: 61_000, end: 61_500 },
    ]);
  });

  it('never returns more audio than it was given', () => {
    const audio = join(tone(700), silence(350), tone(120), silence(900), tone(1600, 0.2), silence(310));
    const phrases = splitOnSilence(audio);
    const total = phrases.reduce((sum, phrase) => sum + phrase.durationMs, 0);
    expect(phrases.length).toBe(3);
    expect(total).toBeLessThanOrEqual(audio.durationMs);
  });
});
