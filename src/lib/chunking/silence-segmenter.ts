import { FULL_SCALE, dbToAmplitude, type PcmAudio } from '../audio/pcm-audio';
import type { SilenceOptions, TimeRange } from '../audio/types';

// Slide step of the silence window, in milliseconds
const SEEK_STEP_MS = 1;

export const SILENCE_DEFAULTS: SilenceOptions = {
  minSilenceLen: 300,
  silenceThresh: -40,
};

/**
 * Find runs of at least `minSilenceLen` ms whose RMS stays at or below
 * `silenceThresh` dBFS.
 *
 * A window of `minSilenceLen` ms slides over the audio one millisecond at
 * a time, keeping a running sum of raw squared samples. Silent windows
 * that touch or overlap are merged into one range.
 */
export function detectSilence(audio: PcmAudio, options: Partial<SilenceOptions> = {}): TimeRange[] {
  const { minSilenceLen, silenceThresh } = { ...SILENCE_DEFAULTS, ...options };
  const durationMs = audio.durationMs;

  if (durationMs < minSilenceLen || audio.isEmpty) {
    return [];
  }

  const threshold = dbToAmplitude(silenceThresh) * FULL_SCALE;
  const lastStart = Math.floor(durationMs - minSilenceLen);

  // Energy of frames [from, to), moved forward with the window
  let from = 0;
  let to = 0;
  let energy = 0;

  const isSilentWindow = (startMs: number): boolean => {
    const windowFrom = audio.frameAt(startMs);
    const windowTo = audio.frameAt(startMs + minSilenceLen);
    while (to < windowTo) {
      energy += audio.frameEnergy(to++);
    }
    while (from < windowFrom) {
      energy -= audio.frameEnergy(from++);
    }
    if (to <= from) {
      return true;
    }
    return Math.sqrt(energy / ((to - from) * audio.channels)) <= threshold;
  };

  const ranges: TimeRange[] = [];
  let rangeStart = -1;
  let prev = -1;

  for (let start = 0; start <= lastStart; start += SEEK_STEP_MS) {
    if (!isSilentWindow(start)) {
      continue;
    }

    if (rangeStart < 0) {
      rangeStart = start;
    } else {
      const continuous = start === prev + SEEK_STEP_MS;
      const hasGap = start > prev + minSilenceLen;
      if (!continuous && hasGap) {
        ranges.push({ start: rangeStart, end: prev + minSilenceLen });
        rangeStart = start;
      }
    }
    prev = start;
  }

  if (rangeStart >= 0) {
    // The final window reaches the end of the buffer
    const end = prev === lastStart ? durationMs : prev + minSilenceLen;
    ranges.push({ start: rangeStart, end });
  }

  return ranges;
}

/**
 * Complement of `detectSilence`: the spans that carry sound
 */
export function detectNonSilent(audio: PcmAudio, options: Partial<SilenceOptions> = {}): TimeRange[] {
  const durationMs = audio.durationMs;
  if (audio.isEmpty) {
    return [];
  }

  const silent = detectSilence(audio, options);
  if (silent.length === 0) {
    return [{ start: 0, end: durationMs }];
  }

  const [first] = silent;
  if (first.start === 0 && first.end >= durationMs) {
    return [];
  }

  const ranges: TimeRange[] = [];
  let prevEnd = 0;
  for (const range of silent) {
    ranges.push({ start: prevEnd, end: range.start });
    prevEnd = range.end;
  }
  if (prevEnd < durationMs) {
    ranges.push({ start: prevEnd, end: durationMs });
  }

  if (ranges[0].start === 0 && ranges[0].end === 0) {
    ranges.shift();
  }

  return ranges;
}

/**
 * Cut the audio into phrases on silence, dropping the silence itself.
 * An all-silent or empty buffer yields no phrases.
 */
export function splitOnSilence(audio: PcmAudio, options: Partial<SilenceOptions> = {}): PcmAudio[] {
  return detectNonSilent(audio, options).map((range) => audio.slice(range.start, range.end));
}
