/**
 * Batch processing of WAV files with a bounded number of files in flight.
 * Chunking runs on worker threads, one file per worker.
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { errorMessage } from '../lib/audio/errors';
import type { ChunkingConfig } from '../types/chunking';
import { ChunkWorkerPool, type FileChunker } from './chunk-pool';
import { ChunkingService } from './chunking-service';

/**
 * File access used by the processor; swapped for an in-memory one in tests
 */
export interface BatchFileSystem {
  readFile(path: string): Promise<Uint8Array>;
  writeFile(path: string, data: Uint8Array): Promise<void>;
  mkdir(path: string): Promise<void>;
  readdir(path: string): Promise<string[]>;
}

export const nodeFileSystem: BatchFileSystem = {
  readFile: (path) => readFile(path),
  writeFile: (path, data) => writeFile(path, data),
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
  readdir: (path) => readdir(path),
};

/**
 * Callbacks for tracking processing progress
 */
export interface BatchCallbacks {
  onStart: (inputPath: string) => void;
  onChunkExported: (outputPath: string, durationMs: number) => void;
  onComplete: (result: FileResult) => void;
  onError: (inputPath: string, error: unknown) => void;
}

/**
 * Result of processing a single file
 */
export interface FileResult {
  inputPath: string;
  outputPaths: string[];
  chunkCount: number;
  error?: string;
}

export interface ProcessorOptions {
  outputDir: string;
  config: ChunkingConfig;
  maxParallel?: number;
  fileSystem?: BatchFileSystem;
  /** Defaults to a worker pool of `maxParallel` threads */
  chunker?: FileChunker;
  callbacks?: Partial<BatchCallbacks>;
}

const defaultCallbacks: BatchCallbacks = {
  onStart: () => {},
  onChunkExported: (outputPath, durationMs) => {
    console.log(`Exported: ${outputPath} (length=${Math.round(durationMs)} ms)`);
  },
  onComplete: () => {},
  onError: (inputPath, error) => {
    console.error(`Failed to process ${inputPath}:`, errorMessage(error));
  },
};

export class BatchProcessor {
  private readonly outputDir: string;
  private readonly config: ChunkingConfig;
  private readonly maxParallel: number;
  private readonly fs: BatchFileSystem;
  private readonly chunker: FileChunker;
  private readonly callbacks: BatchCallbacks;

  constructor(options: ProcessorOptions) {
    this.outputDir = options.outputDir;
    this.config = options.config;
    this.maxParallel = Math.max(1, Math.floor(options.maxParallel ?? 1));
    this.fs = options.fileSystem ?? nodeFileSystem;
    this.chunker = options.chunker ?? new ChunkWorkerPool(this.maxParallel);
    this.callbacks = { ...defaultCallbacks, ...options.callbacks };
  }

  /**
   * `.wav` files (any case) directly inside `dir`, sorted by name
   */
  static async listWavFiles(dir: string, fileSystem: BatchFileSystem = nodeFileSystem): Promise<string[]> {
    const entries = await fileSystem.readdir(dir);
    return entries
      .filter((name) => extname(name).toLowerCase() === '.wav')
      .sort()
      .map((name) => join(dir, name));
  }

  /**
   * Process every file, at most `maxParallel` at a time. Results keep the
   * order of `inputPaths`; a failed file is reported and skipped.
   */
  async processFiles(inputPaths: string[]): Promise<FileResult[]> {
    const results: FileResult[] = [];
    const active = new Map<number, Promise<number>>();
    let next = 0;

    while (next < inputPaths.length || active.size > 0) {
      // Start new workers up to maxParallel
      while (next < inputPaths.length && active.size < this.maxParallel) {
        const index = next++;
        const worker = this.processFile(inputPaths[index]).then((result) => {
          results[index] = result;
          return index;
        });
        active.set(index, worker);
      }

      // Wait for at least one worker to complete
      const finished = await Promise.race(active.values());
      active.delete(finished);
    }

    return results;
  }

  /**
   * Stop the chunker's worker threads
   */
  close(): Promise<void> {
    return this.chunker.close();
  }

  /**
   * Chunk one file and write `<base>_partNNN.wav` files. Never rejects;
   * failures come back in `error`.
   */
  async processFile(inputPath: string): Promise<FileResult> {
    this.callbacks.onStart(inputPath);
    const base = ChunkingService.baseName(basename(inputPath));
    const outputPaths: string[] = [];

    try {
      const bytes = await this.fs.readFile(inputPath);
      const { chunks } = await this.chunker.chunkWav(bytes, this.config, inputPath);

      await this.fs.mkdir(this.outputDir);
      for (const chunk of chunks) {
        const outputPath = join(this.outputDir, ChunkingService.chunkFileName(base, chunk.index));
        await this.fs.writeFile(outputPath, chunk.wav);
        outputPaths.push(outputPath);
        this.callbacks.onChunkExported(outputPath, chunk.durationMs);
      }

      const fileResult: FileResult = { inputPath, outputPaths, chunkCount: outputPaths.length };
      this.callbacks.onComplete(fileResult);
      return fileResult;
    } catch (error) {
      this.callbacks.onError(inputPath, error);
      return { inputPath, outputPaths, chunkCount: outputPaths.length, error: errorMessage(error) };
    }
  }
}
