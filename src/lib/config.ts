/**
 * Runtime configuration from the environment and per-request overrides
 */

import { availableParallelism } from 'node:os';
import type { ZodError } from 'zod';
import { ChunkingConfigSchema, type ChunkingConfig, type ChunkingOverrides } from '../types/chunking';
import { ConfigError } from './audio/errors';

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  apiUrl: string;
  maxUploadBytes: number;
}

function numberFromEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError([`${name}: expected a number, got "${value}"`]);
  }
  return parsed;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = numberFromEnv('PORT', env.PORT) ?? 3000;
  const maxUploadMb = numberFromEnv('MAX_UPLOAD_MB', env.MAX_UPLOAD_MB) ?? 50;

  return {
    port,
    corsOrigin: env.CORS_ORIGIN || '*',
    apiUrl: env.API_URL || `http://localhost:${port}`,
    maxUploadBytes: Math.floor(maxUploadMb * 1024 * 1024),
  };
}

/**
 * Chunking defaults, with the silence threshold overridable through
 * `CHUNKER_SILENCE_THRESH`
 */
export function loadChunkingDefaults(env: NodeJS.ProcessEnv = process.env): ChunkingConfig {
  const silenceThresh = numberFromEnv('CHUNKER_SILENCE_THRESH', env.CHUNKER_SILENCE_THRESH);
  return resolveChunkingConfig({ silenceThresh }, ChunkingConfigSchema.parse({}));
}

/**
 * Merge overrides onto defaults and validate the result
 */
export function resolveChunkingConfig(
  overrides: ChunkingOverrides = {},
  defaults: ChunkingConfig = loadChunkingDefaults()
): ChunkingConfig {
  const provided = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = ChunkingConfigSchema.safeParse({ ...defaults, ...provided });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parallel file count for batch runs: `CHUNKER_WORKERS` or one per CPU
 */
export function defaultWorkerCount(env: NodeJS.ProcessEnv = process.env): number {
  const workers = numberFromEnv('CHUNKER_WORKERS', env.CHUNKER_WORKERS);
  if (workers !== undefined && workers >= 1) {
    return Math.floor(workers);
  }
  return Math.max(1, availableParallelism());
}
