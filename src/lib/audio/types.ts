/**
 * Audio processing types and interfaces
 */

import type { PcmAudio } from './pcm-audio';

export interface WAVInfo {
  audioFormat: number;
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  blockAlign: number;
  dataOffset: number;
  dataSize: number;
  totalSamples: number;
  samplesPerChannel: number;
}

export interface PcmFormat {
  sampleRate: number;
  channels: number;
}

/**
 * Half-open millisecond range `[start, end)` within a buffer
 */
export interface TimeRange {
  start: number;
  end: number;
}

export interface SilenceOptions {
  /** Minimum silent run, in milliseconds, that counts as a boundary */
  minSilenceLen: number;
  /** dBFS at or below which a window counts as silent */
  silenceThresh: number;
}

export interface QuietSplitOptions {
  maxLenMs: number;
  fadeMs: number;
  searchRangeMs?: number;
  stepMs?: number;
}

export interface AssembleOptions {
  minSec: number;
  maxSec: number;
  idealPadSec?: number;
  fadeMs: number;
  gapMs: number;
}

export interface AssembledChunk {
  audio: PcmAudio;
  padded: boolean;
}

export interface ExportChunk extends AssembledChunk {
  index: number;
  durationMs: number;
}

export interface ChunkStats {
  originalDurationMs: number;
  phraseCount: number;
  segmentCount: number;
  chunkCount: number;
  paddedCount: number;
  outputDurationMs: number;
  processingTimeMs: number;
}

export interface ChunkResult {
  format: PcmFormat;
  chunks: ExportChunk[];
  stats: ChunkStats;
}
