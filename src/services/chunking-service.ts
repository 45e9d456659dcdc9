/**
 * Chunking service: silence segmentation, quiet-point splitting and chunk
 * assembly for one audio file
 */

import { AudioService } from '../lib/audio/audio-service';
import type { PcmAudio } from '../lib/audio/pcm-audio';
import type { ChunkResult, ExportChunk } from '../lib/audio/types';
import { assembleChunks, splitAtQuietPoints, splitOnSilence } from '../lib/chunking/index';
import type { ChunkingConfig, SplitResponse } from '../types/chunking';

const PART_INDEX_WIDTH = 3;

export class ChunkingService {
  /**
   * Run the pipeline over one buffer and return the final chunks in order.
   * Pure and synchronous; an all-silent buffer yields no chunks.
   */
  static process(audio: PcmAudio, config: ChunkingConfig): PcmAudio[] {
    return this.run(audio, config).chunks.map((chunk) => chunk.audio);
  }

  /**
   * Same as `process`, with per-chunk metadata and pipeline statistics
   */
  static run(audio: PcmAudio, config: ChunkingConfig): ChunkResult {
    const startTime = Date.now();
    const maxLenMs = config.maxSec * 1000;

    // 1) Phrases on silence
    const phrases = splitOnSilence(audio, {
      minSilenceLen: config.minSilenceLen,
      silenceThresh: config.silenceThresh,
    });

    // 2) Oversized phrases split at quiet points
    const segments = phrases.flatMap((phrase) =>
      phrase.durationMs > maxLenMs
        ? splitAtQuietPoints(phrase, {
            maxLenMs,
            fadeMs: config.fadeMs,
            searchRangeMs: config.searchRangeMs,
            stepMs: config.searchStepMs,
          })
        : [phrase]
    );

    // 3) Short pieces merged or padded
    const assembled = assembleChunks(segments, {
      minSec: config.minSec,
      maxSec: config.maxSec,
      idealPadSec: config.idealPadSec,
      fadeMs: config.fadeMs,
      gapMs: config.gapMs,
    });

    const chunks: ExportChunk[] = assembled.map((chunk, i) => ({
      ...chunk,
      index: i + 1,
      durationMs: chunk.audio.durationMs,
    }));

    return {
      format: audio.format,
      chunks,
      stats: {
        originalDurationMs: audio.durationMs,
        phraseCount: phrases.length,
        segmentCount: segments.length,
        chunkCount: chunks.length,
        paddedCount: chunks.filter((chunk) => chunk.padded).length,
        outputDurationMs: chunks.reduce((sum, chunk) => sum + chunk.durationMs, 0),
        processingTimeMs: Date.now() - startTime,
      },
    };
  }

  /**
   * Decode a WAV file and chunk it. Throws `InvalidAudioInputError` for
   * bytes that are not 16-bit PCM WAV.
   */
  static processWav(bytes: ArrayBuffer | Uint8Array, config: ChunkingConfig, filename: string = 'audio'): ChunkResult {
    const buffer = bytes instanceof Uint8Array ? AudioService.toArrayBuffer(bytes) : bytes;
    const audio = AudioService.decodeWAV(buffer);
    const result = this.run(audio, config);

    console.log(`Chunked ${filename}:`, {
      sampleRate: audio.sampleRate,
      channels: audio.channels,
      duration: `${(result.stats.originalDurationMs / 1000).toFixed(2)}s`,
      phrases: result.stats.phraseCount,
      segments: result.stats.segmentCount,
      chunks: result.stats.chunkCount,
      padded: result.stats.paddedCount,
      processingTime: `${result.stats.processingTimeMs}ms`,
    });

    return result;
  }

  static encodeChunk(chunk: ExportChunk): ArrayBuffer {
    return AudioService.createWAVBuffer(chunk.audio);
  }

  /**
   * API payload for a chunked file; chunk audio is base64 WAV when requested
   */
  static toSplitResponse(
    result: ChunkResult,
    filename: string,
    config: ChunkingConfig,
    includeAudio: boolean
  ): SplitResponse {
    const base = this.baseName(filename);
    return {
      success: true,
      filename,
      sampleRate: result.format.sampleRate,
      channels: result.format.channels,
      chunks: result.chunks.map((chunk) => ({
        index: chunk.index,
        name: this.chunkFileName(base, chunk.index),
        durationMs: chunk.durationMs,
        padded: chunk.padded,
        ...(includeAudio && {
          audio: AudioService.arrayBufferToBase64(this.encodeChunk(chunk))
        }),
      })),
      stats: result.stats,
      config,
    };
  }

  /**
   * Output name for a chunk: `<base>_partNNN.<ext>` with a 1-based index
   */
  static chunkFileName(base: string, index: number, ext: string = 'wav'): string {
    return `${base}_part${String(index).padStart(PART_INDEX_WIDTH, '0')}.${ext}`;
  }

  /**
   * File name without directory or extension
   */
  static baseName(filename: string): string {
    const name = filename.split(/[\\/]/).pop() ?? filename;
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(0, dot) : name;
  }
}
