/**
 * Batch chunking CLI
 *
 * Usage: tsx src/cli.ts --input_dir <dir> --output_dir <dir> [options]
 * Splits every .wav in input_dir into <name>_partNNN.wav chunks.
 */

import 'dotenv/config';
import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { errorMessage } from './lib/audio/errors';
import { defaultWorkerCount, loadChunkingDefaults, resolveChunkingConfig } from './lib/config';
import { BatchProcessor } from './services/batch-processor';
import type { ChunkingConfig, ChunkingOverrides } from './types/chunking';

const USAGE = `Usage: tsx src/cli.ts --input_dir <dir> --output_dir <dir> [options]

Options:
  --min_silence_len <ms>   minimum silent run that splits phrases (300)
  --silence_thresh=<dBFS>  silence threshold (-40)
  --min_sec <s>            minimum chunk duration (1)
  --max_sec <s>            maximum chunk duration (5)
  --fade_ms <ms>           fade at every cut or merge (10)
  --gap_ms <ms>            silence between merged segments (100)
  --workers <n>            files processed in parallel (CPU count)
`;

export interface CliOptions {
  inputDir: string;
  outputDir: string;
  workers: number;
  overrides: ChunkingOverrides;
}

function optionalNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      input_dir: { type: 'string' },
      output_dir: { type: 'string' },
      min_silence_len: { type: 'string' },
      silence_thresh: { type: 'string' },
      min_sec: { type: 'string' },
      max_sec: { type: 'string' },
      fade_ms: { type: 'string' },
      gap_ms: { type: 'string' },
      workers: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  if (!values.input_dir || !values.output_dir) {
    throw new Error('--input_dir and --output_dir are required');
  }

  const workers = optionalNumber('workers', values.workers);

  return {
    inputDir: values.input_dir,
    outputDir: values.output_dir,
    workers: workers !== undefined && workers >= 1 ? Math.floor(workers) : defaultWorkerCount(env),
    overrides: {
      minSilenceLen: optionalNumber('min_silence_len', values.min_silence_len),
      silenceThresh: optionalNumber('silence_thresh', values.silence_thresh),
      minSec: optionalNumber('min_sec', values.min_sec),
      maxSec: optionalNumber('max_sec', values.max_sec),
      fadeMs: optionalNumber('fade_ms', values.fade_ms),
      gapMs: optionalNumber('gap_ms', values.gap_ms),
    },
  };
}

async function main(): Promise<number> {
  let options: CliOptions;
  let config: ChunkingConfig;
  try {
    options = parseCliArgs(process.argv.slice(2));
    config = resolveChunkingConfig(options.overrides, loadChunkingDefaults());
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  const files = await BatchProcessor.listWavFiles(options.inputDir);
  if (files.length === 0) {
    console.warn(`No .wav files found in ${options.inputDir}`);
    return 0;
  }

  console.log(`Processing ${files.length} file(s) with ${options.workers} worker(s)`);
  const processor = new BatchProcessor({
    outputDir: options.outputDir,
    config,
    maxParallel: options.workers,
  });
  const results = await processor.processFiles(files).finally(() => processor.close());

  const failed = results.filter((result) => result.error !== undefined);
  const chunkTotal = results.reduce((sum, result) => sum + result.chunkCount, 0);
  console.log(`Done: ${chunkTotal} chunk(s) from ${results.length - failed.length} file(s), ${failed.length} failed`);

  return failed.length > 0 ? 1 : 0;
}

/**
 * Whether `moduleUrl` is the script Node was started with. The script
 * path is resolved through symlinks and URL-encoded the way
 * `import.meta.url` is.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  const resolved = existsSync(scriptPath) ? realpathSync(scriptPath) : scriptPath;
  return moduleUrl === pathToFileURL(resolved).href;
}

if (isMainModule(import.meta.url, process.argv[1])) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Batch run failed:', errorMessage(error));
      process.exitCode = 1;
    });
}
