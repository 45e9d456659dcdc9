/**
 * Chunking API: split WAV audio into bounded-duration chunks
 */

import { OpenAPIHono, createRoute, z } from '@hono/zod-openapi';
import type { Context } from 'hono';
import { AudioService } from '../../lib/audio/audio-service';
import { errorMessage, isChunkerError } from '../../lib/audio/errors';
import { loadChunkingDefaults, resolveChunkingConfig } from '../../lib/config';
import { ChunkingService } from '../../services/chunking-service';
import {
  ChunkingOverridesSchema,
  ErrorResponseSchema,
  FormOverridesSchema,
  SplitRequestSchema,
  SplitResponseSchema,
  type ChunkingOverrides,
} from '../../types/chunking';

const app = new OpenAPIHono({
  defaultHook: (result, c) => {
    if (!result.success) {
      return c.json({
        success: false,
        error: 'Invalid request',
        details: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        code: 'INVALID_REQUEST'
      }, 400);
    }
  },
});

const UploadRequestSchema = FormOverridesSchema.extend({
  file: z
    .custom<Blob>((value) => value instanceof Blob, { message: 'file must be an uploaded WAV file' })
    .openapi({
      type: 'string',
      format: 'binary',
      description: '16-bit PCM WAV file'
    }),
}).openapi('ChunkUploadRequest');

const errorResponses = {
  400: {
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
    description: 'Bad request - invalid audio data or options',
  },
  500: {
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
    description: 'Internal server error',
  },
};

function chunkAudio(
  c: Context,
  bytes: ArrayBuffer,
  filename: string,
  overrides: ChunkingOverrides,
  includeAudio: boolean
) {
  try {
    const config = resolveChunkingConfig(overrides, loadChunkingDefaults());
    const result = ChunkingService.processWav(bytes, config, filename);
    return c.json(ChunkingService.toSplitResponse(result, filename, config, includeAudio), 200);
  } catch (error) {
    console.error(`Chunking failed for ${filename}:`, error);

    if (isChunkerError(error)) {
      return c.json({
        success: false,
        error: 'Invalid input',
        details: error.message,
        code: error.code
      }, 400);
    }
    return c.json({
      success: false,
      error: 'Processing failed',
      details: errorMessage(error),
      code: 'PROCESSING_ERROR'
    }, 500);
  }
}

const splitRoute = createRoute({
  method: 'post',
  path: '/split',
  tags: ['Chunking'],
  summary: 'Split base64 WAV audio into chunks',
  description: `
  Cuts the audio on silence, splits phrases longer than maxSec at quiet
  points and merges or pads short pieces so every chunk lasts between
  minSec and maxSec seconds. Chunks shorter than minSec are padded with
  silence to idealPadSec.

  **Requirements:**
  - Audio format: WAV, 16-bit PCM, any sample rate and channel count
  `,
  request: {
    body: {
      content: {
        'application/json': {
          schema: SplitRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: SplitResponseSchema,
        },
      },
      description: 'Chunks in playback order',
    },
    ...errorResponses,
  },
});

app.openapi(splitRoute, (c) => {
  const { audio, filename = 'audio.wav', includeAudio, ...options } = c.req.valid('json');

  let bytes: ArrayBuffer;
  try {
    bytes = AudioService.base64ToArrayBuffer(audio);
  } catch (error) {
    return c.json({
      success: false,
      error: 'Invalid input',
      details: errorMessage(error),
      code: 'INVALID_AUDIO_FORMAT'
    }, 400);
  }

  return chunkAudio(c, bytes, filename, options, includeAudio);
});

const uploadRoute = createRoute({
  method: 'post',
  path: '/upload',
  tags: ['Chunking'],
  summary: 'Split an uploaded WAV file into chunks',
  description: 'Multipart upload variant of /split. Options are sent as form fields.',
  request: {
    body: {
      content: {
        'multipart/form-data': {
          schema: UploadRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: SplitResponseSchema,
        },
      },
      description: 'Chunks in playback order',
    },
    ...errorResponses,
  },
});

app.openapi(uploadRoute, async (c) => {
  const { file, filename, includeAudio, ...options } = c.req.valid('form');
  const uploadedName = 'name' in file && typeof file.name === 'string' ? file.name : undefined;
  const name = filename ?? uploadedName ?? 'audio.wav';

  console.log(`Processing upload: ${name}, size: ${file.size} bytes`);
  const bytes = await file.arrayBuffer();

  return chunkAudio(c, bytes, name, options, includeAudio === 'true');
});

const configRoute = createRoute({
  method: 'get',
  path: '/config',
  tags: ['Chunking'],
  summary: 'Default chunking options',
  responses: {
    200: {
      content: {
        'application/json': {
          schema: ChunkingOverridesSchema.required(),
        },
      },
      description: 'Options applied when a request leaves them out',
    },
    500: errorResponses[500],
  },
});

app.openapi(configRoute, (c) => {
  try {
    return c.json(loadChunkingDefaults(), 200);
  } catch (error) {
    return c.json({
      success: false,
      error: 'Invalid server configuration',
      details: errorMessage(error),
      code: isChunkerError(error) ? error.code : 'PROCESSING_ERROR'
    }, 500);
  }
});

export default app;
