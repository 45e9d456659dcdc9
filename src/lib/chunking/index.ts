/**
 * Chunking pipeline re-exports
 */

export {
  SILENCE_DEFAULTS,
  detectSilence,
  detectNonSilent,
  splitOnSilence,
} from './silence-segmenter';

export {
  QUIET_SPLIT_DEFAULTS,
  findQuietPoint,
  splitAtQuietPoints,
} from './quiet-point-splitter';

export {
  DEFAULT_IDEAL_PAD_SEC,
  fadeMerge,
  padToLength,
  assembleChunks,
} from './chunk-assembler';
