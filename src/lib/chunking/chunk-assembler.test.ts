import { describe, it, expect } from 'vitest';
import { assembleChunks, fadeMerge, padToLength } from './chunk-assembler';
import { LOUD, durations, level } from '../../test-utils/audio';

const options = { minSec: 1, maxSec: 5, idealPadSec: 4, fadeMs: 10, gapMs: 100 };

function chunkDurations(segmentMs: number[], overrides: Partial<typeof options> = {}) {
  const chunks = assembleChunks(segmentMs.map((ms) => level(ms)), { ...options, ...overrides });
  return chunks.map((chunk) => ({ ms: chunk.audio.durationMs, padded: chunk.padded }));
}

describe('assembleChunks', () => {
  it('returns nothing for no segments', () => {
    expect(assembleChunks([], options)).toEqual([]);
  });

  it('merges short segments with a gap between each', () => {
    expect(chunkDurations([200, 200, 200, 200, 200])).toEqual([{ ms: 1400, padded: false }]);
  });

  it('pads a lone short trailing segment to the ideal length', () => {
    expect(chunkDurations([300])).toEqual([{ ms: 4000, padded: true }]);
  });

  it('keeps merging once the buffer is past the minimum', () => {
    expect(chunkDurations([4000, 300])).toEqual([{ ms: 4400, padded: false }]);
  });

  it('merges up to exactly the maximum', () => {
    expect(chunkDurations([2450, 2450])).toEqual([{ ms: 5000, padded: false }]);
  });

  it('flushes when a merge would pass the maximum', () => {
    expect(chunkDurations([4000, 1000])).toEqual([
      { ms: 4000, padded: false },
      { ms: 1000, padded: false },
    ]);
  });

  it('pads a short buffer that cannot take the next segment', () => {
    expect(chunkDurations([600, 4800])).toEqual([
      { ms: 4000, padded: true },
      { ms: 4800, padded: false },
    ]);
  });

  it('does not look ahead to rebalance', () => {
    expect(chunkDurations([900, 4500, 900, 4500])).toEqual([
      { ms: 4000, padded: true },
      { ms: 4500, padded: false },
      { ms: 4000, padded: true },
      { ms: 4500, padded: false },
    ]);
  });

  it('defaults the padding target to four seconds', () => {
    const chunks = assembleChunks([level(300)], { minSec: 1, maxSec: 5, fadeMs: 10, gapMs: 100 });
    expect(durations(chunks.map((chunk) => chunk.audio))).toEqual([4000]);
  });

  it('pads with true silence', () => {
    const [chunk] = assembleChunks([level(300)], options);
    const samples = chunk.audio.toInt16Array();
    expect(samples[0]).toBe(LOUD);
    expect(samples.subarray(2400).every((sample) => sample === 0)).toBe(true);
  });

  it('keeps the duration invariants over a mixed sequence', () => {
    const segments = [250, 4900, 120, 700, 3300, 5000, 80, 1600, 2200, 400].map((ms) => level(ms));
    const chunks = assembleChunks(segments, options);

    for (const chunk of chunks) {
      const ms = chunk.audio.durationMs;
      if (chunk.padded) {
        expect(ms).toBe(4000);
      } else {
        expect(ms).toBeGreaterThanOrEqual(1000);
        expect(ms).toBeLessThanOrEqual(5100);
      }
    }
  });
});

describe('fadeMerge', () => {
  it('fades the join and inserts silence between the parts', () => {
    const merged = fadeMerge(level(200), level(200), 10, 100);
    const samples = merged.toInt16Array();

    expect(merged.durationMs).toBe(500);
    expect(samples[0]).toBe(LOUD);
    expect(samples[1599]).toBe(0);
    expect(samples.subarray(1600, 2400).every((sample) => sample === 0)).toBe(true);
    expect(samples[2400]).toBe(0);
    expect(samples[2480]).toBe(LOUD);
    expect(samples[samples.length - 1]).toBe(LOUD);
  });
});

describe('padToLength', () => {
  it('never truncates', () => {
    const audio = level(4500);
    expect(padToLength(audio, 4000)).toBe(audio);
  });
});
