/**
 * Audio service for WAV decoding and encoding
 */

import { InvalidAudioInputError } from './errors';
import { PcmAudio } from './pcm-audio';
import type { WAVInfo } from './types';

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
const HEADER_SIZE = 44;

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset), view.getUint8(offset + 1),
    view.getUint8(offset + 2), view.getUint8(offset + 3)
  );
}

function writeTag(view: DataView, offset: number, tag: string): void {
  for (let i = 0; i < 4; i++) {
    view.setUint8(offset + i, tag.charCodeAt(i));
  }
}

export class AudioService {

  /**
   * Convert base64 audio data to ArrayBuffer
   */
  static base64ToArrayBuffer(base64Data: string): ArrayBuffer {
    // Remove data URL prefix if present (e.g., "data:audio/wav;base64,")
    const commaIndex = base64Data.indexOf(',');
    const base64String = (commaIndex >= 0 ? base64Data.slice(commaIndex + 1) : base64Data).trim();

    if (!/^[A-Za-z0-9+/\s]*={0,2}$/.test(base64String)) {
      throw new InvalidAudioInputError('Invalid audio data: not valid base64');
    }

    return AudioService.toArrayBuffer(Buffer.from(base64String, 'base64'));
  }

  /**
   * Convert ArrayBuffer to base64
   */
  static arrayBufferToBase64(buffer: ArrayBuffer): string {
    return Buffer.from(buffer).toString('base64');
  }

  /**
   * Copy a Node buffer (or any byte view) into a standalone ArrayBuffer
   */
  static toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    return copy;
  }

  /**
   * Parse WAV file header
   */
  static parseWAVHeader(buffer: ArrayBuffer): WAVInfo {
    if (buffer.byteLength < 12) {
      throw new InvalidAudioInputError('Invalid WAV file: too short for a RIFF header');
    }
    const view = new DataView(buffer);

    if (readTag(view, 0) !== 'RIFF') {
      throw new InvalidAudioInputError('Invalid WAV file: missing RIFF header');
    }
    if (readTag(view, 8) !== 'WAVE') {
      throw new InvalidAudioInputError('Invalid WAV file: not WAVE format');
    }

    let offset = 12;
    let dataOffset = -1;
    let dataSize = 0;
    let audioFormat = 0;
    let sampleRate = 0;
    let channels = 0;
    let bitsPerSample = 0;
    let blockAlign = 0;
    let sawFormat = false;

    // Parse chunks
    while (offset + 8 <= buffer.byteLength) {
      const chunkId = readTag(view, offset);
      const chunkSize = view.getUint32(offset + 4, true);

      if (chunkId === 'fmt ') {
        if (chunkSize < 16 || offset + 24 > buffer.byteLength) {
          throw new InvalidAudioInputError('Invalid WAV file: truncated fmt chunk');
        }
        audioFormat = view.getUint16(offset + 8, true);
        channels = view.getUint16(offset + 10, true);
        sampleRate = view.getUint32(offset + 12, true);
        blockAlign = view.getUint16(offset + 20, true);
        bitsPerSample = view.getUint16(offset + 22, true);
        sawFormat = true;

        if (audioFormat !== WAVE_FORMAT_PCM && audioFormat !== WAVE_FORMAT_EXTENSIBLE) {
          throw new InvalidAudioInputError('Unsupported WAV format: only PCM is supported');
        }
        if (bitsPerSample !== 16) {
          throw new InvalidAudioInputError('Unsupported bit depth: only 16-bit is supported');
        }
        if (channels === 0 || sampleRate === 0) {
          throw new InvalidAudioInputError('Invalid WAV file: zero channels or sample rate');
        }
      } else if (chunkId === 'data') {
        dataOffset = offset + 8;
        // Tolerate writers that leave the size unset or overstate it
        dataSize = Math.min(chunkSize, buffer.byteLength - dataOffset);
        break;
      }

      offset += 8 + chunkSize;
      // Align to even byte boundary
      if (chunkSize % 2 === 1) {
        offset++;
      }
    }

    if (!sawFormat) {
      throw new InvalidAudioInputError('Invalid WAV file: no fmt chunk found');
    }
    if (dataOffset === -1) {
      throw new InvalidAudioInputError('Invalid WAV file: no data chunk found');
    }

    const frameBytes = channels * (bitsPerSample / 8);
    dataSize -= dataSize % frameBytes;

    return {
      audioFormat,
      sampleRate,
      channels,
      bitsPerSample,
      blockAlign,
      dataOffset,
      dataSize,
      totalSamples: dataSize / (bitsPerSample / 8),
      samplesPerChannel: dataSize / frameBytes
    };
  }

  /**
   * Decode a WAV file, keeping every channel interleaved
   */
  static decodeWAV(buffer: ArrayBuffer): PcmAudio {
    const wavInfo = AudioService.parseWAVHeader(buffer);
    const view = new DataView(buffer, wavInfo.dataOffset, wavInfo.dataSize);
    const samples = new Int16Array(wavInfo.totalSamples);
    for (let i = 0; i < samples.length; i++) {
      samples[i] = view.getInt16(i * 2, true);
    }
    return new PcmAudio(samples, { sampleRate: wavInfo.sampleRate, channels: wavInfo.channels });
  }

  /**
   * Create WAV file buffer from audio data
   */
  static createWAVBuffer(audio: PcmAudio): ArrayBuffer {
    const bitsPerSample = 16;
    const bytesPerSample = bitsPerSample / 8;
    const samples = audio.toInt16Array();
    const dataSize = samples.length * bytesPerSample;
    const totalSize = HEADER_SIZE + dataSize;

    const buffer = new ArrayBuffer(totalSize);
    const view = new DataView(buffer);

    // RIFF header
    writeTag(view, 0, 'RIFF');
    view.setUint32(4, totalSize - 8, true);
    writeTag(view, 8, 'WAVE');

    // fmt chunk
    writeTag(view, 12, 'fmt ');
    view.setUint32(16, 16, true);
    view.setUint16(20, WAVE_FORMAT_PCM, true);
    view.setUint16(22, audio.channels, true);
    view.setUint32(24, audio.sampleRate, true);
    view.setUint32(28, audio.sampleRate * audio.channels * bytesPerSample, true); // byte rate
    view.setUint16(32, audio.channels * bytesPerSample, true); // block align
    view.setUint16(34, bitsPerSample, true);

    // data chunk
    writeTag(view, 36, 'data');
    view.setUint32(40, dataSize, true);

    for (let i = 0; i < samples.length; i++) {
      view.setInt16(HEADER_SIZE + i * 2, samples[i], true);
    }

    return buffer;
  }
}
