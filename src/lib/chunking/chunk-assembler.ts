import { PcmAudio } from '../audio/pcm-audio';
import type { AssembleOptions, AssembledChunk } from '../audio/types';

export const DEFAULT_IDEAL_PAD_SEC = 4;

/**
 * Join two pieces with a fade on each side and `gapMs` of silence between
 */
export function fadeMerge(first: PcmAudio, second: PcmAudio, fadeMs: number, gapMs: number): PcmAudio {
  const gap = PcmAudio.silent(gapMs, first.format);
  return PcmAudio.concat(first.fadeOut(fadeMs), gap, second.fadeIn(fadeMs));
}

/**
 * Append silence up to `targetMs`; longer audio is left alone
 */
export function padToLength(audio: PcmAudio, targetMs: number): PcmAudio {
  return audio.padTo(targetMs);
}

/**
 * Greedily pack segments into chunks of `[minSec, maxSec]` seconds.
 *
 * One forward pass with a single accumulator: the next segment is merged
 * in whenever the result (gap included) still fits in `maxSec`, otherwise
 * the accumulator is flushed. A flushed chunk shorter than `minSec` is
 * padded with silence to `idealPadSec`.
 */
export function assembleChunks(segments: readonly PcmAudio[], options: AssembleOptions): AssembledChunk[] {
  const { minSec, maxSec, idealPadSec = DEFAULT_IDEAL_PAD_SEC, fadeMs, gapMs } = options;
  const minMs = minSec * 1000;
  const maxMs = maxSec * 1000;
  const padMs = idealPadSec * 1000;

  const result: AssembledChunk[] = [];
  let buffer: PcmAudio | null = null;

  const flush = (audio: PcmAudio): void => {
    if (audio.durationMs < minMs) {
      const padded = padToLength(audio, padMs);
      result.push({ audio: padded, padded: padded !== audio });
    } else {
      result.push({ audio, padded: false });
    }
  };

  for (const segment of segments) {
    if (buffer === null || buffer.isEmpty) {
      buffer = segment;
      continue;
    }

    if (buffer.durationMs + segment.durationMs + gapMs <= maxMs) {
      buffer = fadeMerge(buffer, segment, fadeMs, gapMs);
    } else {
      flush(buffer);
      buffer = segment;
    }
  }

  if (buffer !== null && !buffer.isEmpty) {
    flush(buffer);
  }

  return result;
}
