import { z } from 'zod';

// Option validators shared by the full config and per-request overrides
const optionFields = {
  minSilenceLen: z.number().int().min(1).describe('Minimum silent run, in ms, that splits phrases'),
  silenceThresh: z.number().max(0).describe('Silence threshold in dBFS (e.g. -40, or -60 for quiet recordings)'),
  minSec: z.number().positive().describe('Minimum chunk duration in seconds before padding is forced'),
  maxSec: z.number().positive().describe('Maximum chunk duration in seconds'),
  idealPadSec: z.number().positive().describe('Length in seconds that short chunks are padded to'),
  fadeMs: z.number().min(0).describe('Fade length in ms at every cut or merge'),
  gapMs: z.number().min(0).describe('Silence in ms inserted between merged segments'),
  searchRangeMs: z.number().positive().describe('Window in ms searched around the midpoint for a quiet cut'),
  searchStepMs: z.number().positive().describe('Step in ms of the quiet-point scan'),
};

export const ChunkingConfigSchema = z.object({
  minSilenceLen: optionFields.minSilenceLen.default(300),
  silenceThresh: optionFields.silenceThresh.default(-40),
  minSec: optionFields.minSec.default(1),
  maxSec: optionFields.maxSec.default(5),
  idealPadSec: optionFields.idealPadSec.default(4),
  fadeMs: optionFields.fadeMs.default(10),
  gapMs: optionFields.gapMs.default(100),
  searchRangeMs: optionFields.searchRangeMs.default(1000),
  searchStepMs: optionFields.searchStepMs.default(50),
}).refine((config) => config.maxSec >= config.minSec, {
  message: 'maxSec must be at least minSec',
  path: ['maxSec'],
});

export const ChunkingOverridesSchema = z.object(optionFields).partial();

// Request schemas
export const SplitRequestSchema = ChunkingOverridesSchema.extend({
  audio: z.string().min(1).describe('Base64 encoded 16-bit PCM WAV data'),
  filename: z.string().optional().describe('Original file name, used to name the chunks'),
  includeAudio: z.boolean().default(true).describe('Return each chunk as base64 WAV'),
});

// Multipart form values arrive as strings
export const FormOverridesSchema = z.object({
  minSilenceLen: z.coerce.number().int().min(1).optional(),
  silenceThresh: z.coerce.number().max(0).optional(),
  minSec: z.coerce.number().positive().optional(),
  maxSec: z.coerce.number().positive().optional(),
  idealPadSec: z.coerce.number().positive().optional(),
  fadeMs: z.coerce.number().min(0).optional(),
  gapMs: z.coerce.number().min(0).optional(),
  searchRangeMs: z.coerce.number().positive().optional(),
  searchStepMs: z.coerce.number().positive().optional(),
  filename: z.string().optional().describe('Overrides the uploaded file name'),
  includeAudio: z.enum(['true', 'false']).default('true').describe('Return each chunk as base64 WAV'),
});

// Response schemas
export const ChunkInfoSchema = z.object({
  index: z.number().int().describe('1-based chunk position'),
  name: z.string().describe('Output file name, e.g. speech_part001.wav'),
  durationMs: z.number().describe('Chunk duration in milliseconds'),
  padded: z.boolean().describe('Whether trailing silence was added'),
  audio: z.string().optional().describe('Base64 encoded WAV chunk'),
});

export const ChunkStatsSchema = z.object({
  originalDurationMs: z.number(),
  phraseCount: z.number(),
  segmentCount: z.number(),
  chunkCount: z.number(),
  paddedCount: z.number(),
  outputDurationMs: z.number(),
  processingTimeMs: z.number(),
});

export const SplitResponseSchema = z.object({
  success: z.boolean(),
  filename: z.string(),
  sampleRate: z.number(),
  channels: z.number(),
  chunks: z.array(ChunkInfoSchema),
  stats: ChunkStatsSchema,
  config: ChunkingOverridesSchema.required(),
});

export const ErrorResponseSchema = z.object({
  success: z.boolean(),
  error: z.string(),
  details: z.string().optional(),
  code: z.string().optional(),
});

// Type exports
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type ChunkingOverrides = z.infer<typeof ChunkingOverridesSchema>;
export type SplitResponse = z.infer<typeof SplitResponseSchema>;
