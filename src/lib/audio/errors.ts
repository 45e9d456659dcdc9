/**
 * Error types raised by the audio and chunking layers
 */

export type ChunkerErrorCode = 'INVALID_AUDIO_FORMAT' | 'FORMAT_MISMATCH' | 'INVALID_CONFIG';

export class ChunkerError extends Error {
  readonly code: ChunkerErrorCode;

  constructor(code: ChunkerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The bytes could not be read as a 16-bit PCM WAV file
 */
export class InvalidAudioInputError extends ChunkerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_AUDIO_FORMAT', message, options);
  }
}

export class AudioFormatMismatchError extends ChunkerError {
  constructor(message: string) {
    super('FORMAT_MISMATCH', message);
  }
}

export class ConfigError extends ChunkerError {
  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid chunking config: ${issues.join('; ')}`);
  }
}

export function isChunkerError(error: unknown): error is ChunkerError {
  return error instanceof ChunkerError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
