import { describe, it, expect } from 'vitest';
import { AudioService } from './audio-service';
import { InvalidAudioInputError } from './errors';
import { PcmAudio } from './pcm-audio';

function bufferOf(bytes: number[]): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

function ascii(tag: string): number[] {
  return Array.from(tag, (ch) => ch.charCodeAt(0));
}

function u32(value: number): number[] {
  return [value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff, (value >>> 24) & 0xff];
}

function u16(value: number): number[] {
  return [value & 0xff, (value >> 8) & 0xff];
}

function fmtChunk(format: number, channels: number, sampleRate: number, bits: number): number[] {
  const blockAlign = channels * (bits / 8);
  return [
    ...ascii('fmt '), ...u32(16),
    ...u16(format), ...u16(channels), ...u32(sampleRate),
    ...u32(sampleRate * blockAlign), ...u16(blockAlign), ...u16(bits),
  ];
}

/**
 * Assemble a RIFF/WAVE file from raw chunk bytes
 */
function riff(...chunks: number[][]): ArrayBuffer {
  const body = chunks.flat();
  return bufferOf([...ascii('RIFF'), ...u32(body.length + 4), ...ascii('WAVE'), ...body]);
}

describe('AudioService', () => {
  describe('createWAVBuffer / decodeWAV', () => {
    it('writes a 44-byte header followed by little-endian samples', () => {
      const audio = new PcmAudio(Int16Array.from([1, -2, 300, -32768]), { sampleRate: 22050, channels: 2 });
      const wav = AudioService.createWAVBuffer(audio);

      expect(wav.byteLength).toBe(52);
      const info = AudioService.parseWAVHeader(wav);
      expect(info).toMatchObject({
        audioFormat: 1,
        sampleRate: 22050,
        channels: 2,
        bitsPerSample: 16,
        blockAlign: 4,
        dataOffset: 44,
        dataSize: 8,
        totalSamples: 4,
        samplesPerChannel: 2,
      });
      expect(Array.from(new Uint8Array(wav, 44, 4))).toEqual([1, 0, 0xfe, 0xff]);
    });

    it('decodes what it encodes, keeping every channel', () => {
      const audio = new PcmAudio(Int16Array.from([10, 20, 30, 40, 50, 60]), { sampleRate: 16000, channels: 3 });
      const decoded = AudioService.decodeWAV(AudioService.createWAVBuffer(audio));

      expect(decoded.format).toEqual({ sampleRate: 16000, channels: 3 });
      expect(Array.from(decoded.toInt16Array())).toEqual([10, 20, 30, 40, 50, 60]);
    });
  });

  describe('parseWAVHeader', () => {
    it('skips unknown chunks, including odd-sized ones', () => {
      const wav = riff(
        fmtChunk(1, 1, 8000, 16),
        [...ascii('LIST'), ...u32(3), 1, 2, 3, 0],
        [...ascii('data'), ...u32(4), ...u16(7), ...u16(9)]
      );

      const decoded = AudioService.decodeWAV(wav);
      expect(Array.from(decoded.toInt16Array())).toEqual([7, 9]);
    });

    it('clamps a data size that runs past the end of the file', () => {
      const wav = riff(fmtChunk(1, 1, 8000, 16), [...ascii('data'), ...u32(1000), ...u16(5), ...u16(6)]);
      expect(AudioService.parseWAVHeader(wav).dataSize).toBe(4);
    });

    it('rejects data that is not RIFF', () => {
      const bytes = bufferOf(ascii('RIFX0000WAVEfmt '));
      expect(() => AudioService.parseWAVHeader(bytes)).toThrow('Invalid WAV file: missing RIFF header');
    });

    it('rejects buffers too short for a header', () => {
      expect(() => AudioService.parseWAVHeader(new ArrayBuffer(5))).toThrow(InvalidAudioInputError);
    });

    it('rejects compressed formats', () => {
      const wav = riff(fmtChunk(3, 1, 8000, 16), [...ascii('data'), ...u32(0)]);
      expect(() => AudioService.parseWAVHeader(wav)).toThrow('Unsupported WAV format: only PCM is supported');
    });

    it('rejects bit depths other than 16', () => {
      const wav = riff(fmtChunk(1, 1, 8000, 8), [...ascii('data'), ...u32(0)]);
      expect(() => AudioService.parseWAVHeader(wav)).toThrow('Unsupported bit depth: only 16-bit is supported');
    });

    it('requires a data chunk', () => {
      const wav = riff(fmtChunk(1, 1, 8000, 16));
      expect(() => AudioService.parseWAVHeader(wav)).toThrow('Invalid WAV file: no data chunk found');
    });

    it('requires a fmt chunk', () => {
      const wav = riff([...ascii('data'), ...u32(2), 0, 0]);
      expect(() => AudioService.parseWAVHeader(wav)).toThrow('Invalid WAV file: no fmt chunk found');
    });
  });

  describe('base64', () => {
    it('accepts plain base64 and data URLs', () => {
      const bytes = AudioService.arrayBufferToBase64(bufferOf([1, 2, 3]));
      expect(bytes).toBe('AQID');

      const decoded = AudioService.base64ToArrayBuffer(`data:audio/wav;base64,${bytes}`);
      expect(Array.from(new Uint8Array(decoded))).toEqual([1, 2, 3]);
    });

    it('rejects text that is not base64', () => {
      expect(() => AudioService.base64ToArrayBuffer('not audio!')).toThrow(InvalidAudioInputError);
    });
  });
});
