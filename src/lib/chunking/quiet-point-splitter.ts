import type { PcmAudio } from '../audio/pcm-audio';
import type { QuietSplitOptions } from '../audio/types';

export const QUIET_SPLIT_DEFAULTS = {
  searchRangeMs: 1000,
  stepMs: 50,
} as const;

/**
 * Pick a cut position (ms) near the middle of `audio`.
 *
 * Scans `searchRangeMs` around the midpoint in `stepMs` windows and
 * returns the centre of the quietest one. The earliest window wins ties.
 * Audio no longer than the search range is cut at its midpoint.
 */
export function findQuietPoint(
  audio: PcmAudio,
  searchRangeMs: number = QUIET_SPLIT_DEFAULTS.searchRangeMs,
  stepMs: number = QUIET_SPLIT_DEFAULTS.stepMs
): number {
  const length = audio.durationMs;
  const mid = Math.floor(length / 2);
  if (length <= searchRangeMs) {
    return mid;
  }

  const half = Math.floor(searchRangeMs / 2);
  const searchStart = Math.max(0, mid - half);
  const searchEnd = Math.min(length, mid + half);

  let minRms = Infinity;
  let best = mid;
  for (let i = searchStart; i < searchEnd; i += stepMs) {
    const rms = audio.slice(i, i + stepMs).rms();
    if (rms < minRms) {
      minRms = rms;
      best = i + Math.floor(stepMs / 2);
    }
  }

  return best;
}

/**
 * Split `segment` into pieces no longer than `maxLenMs`, cutting at quiet
 * points and fading both sides of every cut.
 *
 * A segment that already fits is returned as is. Pieces come out in time
 * order; a left half that is still too long is fully split before the
 * right half is touched.
 */
export function splitAtQuietPoints(segment: PcmAudio, options: QuietSplitOptions): PcmAudio[] {
  const {
    maxLenMs,
    fadeMs,
    searchRangeMs = QUIET_SPLIT_DEFAULTS.searchRangeMs,
    stepMs = QUIET_SPLIT_DEFAULTS.stepMs,
  } = options;

  if (segment.durationMs <= maxLenMs) {
    return [segment];
  }

  const result: PcmAudio[] = [];
  // Pending pieces, next one on top
  const stack: PcmAudio[] = [segment];

  while (stack.length > 0) {
    const piece = stack.pop();
    if (!piece) {
      break;
    }
    if (piece.durationMs <= maxLenMs || piece.frameCount < 2) {
      result.push(piece);
      continue;
    }

    // Keep at least one frame on each side so every cut makes progress
    const cutFrame = Math.min(piece.frameCount - 1, Math.max(1, piece.frameAt(findQuietPoint(piece, searchRangeMs, stepMs))));
    const left = piece.sliceFrames(0, cutFrame).fadeOut(fadeMs);
    const right = piece.sliceFrames(cutFrame, piece.frameCount).fadeIn(fadeMs);

    stack.push(right, left);
  }

  return result;
}
