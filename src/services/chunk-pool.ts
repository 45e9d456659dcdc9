/**
 * Runs WAV chunking off the main thread, one file per worker at a time
 */

import { Worker, threadId } from 'node:worker_threads';
import type { ChunkingConfig } from '../types/chunking';
import { ChunkingService } from './chunking-service';

const WORKER_URL = new URL('./chunk-worker.ts', import.meta.url);

export interface EncodedChunk {
  index: number;
  durationMs: number;
  padded: boolean;
  wav: Uint8Array;
}

export interface ChunkedFile {
  /** Thread that ran the pipeline */
  threadId: number;
  chunks: EncodedChunk[];
}

/**
 * Turns the bytes of one WAV file into encoded chunks
 */
export interface FileChunker {
  chunkWav(bytes: Uint8Array, config: ChunkingConfig, filename: string): Promise<ChunkedFile>;
  close(): Promise<void>;
}

export interface ChunkTask {
  id: number;
  bytes: Uint8Array;
  config: ChunkingConfig;
  filename: string;
}

export interface WorkerChunk {
  index: number;
  durationMs: number;
  padded: boolean;
  wav: ArrayBuffer;
}

export type ChunkReply =
  | { type: 'result'; id: number; threadId: number; chunks: WorkerChunk[] }
  | { type: 'error'; id: number; message: string };

/**
 * Decode, chunk and re-encode one file on the calling thread
 */
export function chunkWavFile(bytes: Uint8Array, config: ChunkingConfig, filename: string): WorkerChunk[] {
  return ChunkingService.processWav(bytes, config, filename).chunks.map((chunk) => ({
    index: chunk.index,
    durationMs: chunk.durationMs,
    padded: chunk.padded,
    wav: ChunkingService.encodeChunk(chunk),
  }));
}

function toEncoded(chunk: WorkerChunk): EncodedChunk {
  return { ...chunk, wav: new Uint8Array(chunk.wav) };
}

export const inlineChunker: FileChunker = {
  chunkWav: async (bytes, config, filename) => ({
    threadId,
    chunks: chunkWavFile(bytes, config, filename).map(toEncoded),
  }),
  close: async () => {},
};

// Workers load the TypeScript sources through tsx unless the parent
// already runs under it, in which case they inherit its flags
function workerExecArgv(): string[] | undefined {
  return process.execArgv.some((arg) => arg.includes('tsx')) ? undefined : ['--import', 'tsx'];
}

interface PendingTask {
  task: ChunkTask;
  resolve: (file: ChunkedFile) => void;
  reject: (error: Error) => void;
}

/**
 * Fixed-size pool of chunking workers. Workers start on demand and stay
 * up until `close`.
 */
export class ChunkWorkerPool implements FileChunker {
  private readonly size: number;
  private readonly workers = new Set<Worker>();
  private readonly idle: Worker[] = [];
  private readonly running = new Map<Worker, PendingTask>();
  private readonly queue: PendingTask[] = [];
  private nextId = 0;
  private closed = false;

  constructor(size: number, private readonly workerUrl: URL = WORKER_URL) {
    this.size = Math.max(1, Math.floor(size));
  }

  chunkWav(bytes: Uint8Array, config: ChunkingConfig, filename: string): Promise<ChunkedFile> {
    if (this.closed) {
      return Promise.reject(new Error('Chunk worker pool is closed'));
    }
    return new Promise((resolve, reject) => {
      this.queue.push({ task: { id: this.nextId++, bytes, config, filename }, resolve, reject });
      this.dispatch();
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const pending of this.queue.splice(0)) {
      pending.reject(new Error('Chunk worker pool is closed'));
    }
    const workers = [...this.workers];
    this.workers.clear();
    this.idle.length = 0;
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      const worker = this.idle.pop() ?? (this.workers.size < this.size ? this.spawn() : undefined);
      if (!worker) {
        return;
      }
      const pending = this.queue.shift();
      if (!pending) {
        this.idle.push(worker);
        return;
      }
      this.running.set(worker, pending);
      worker.postMessage(pending.task);
    }
  }

  private spawn(): Worker {
    const worker = new Worker(this.workerUrl, { execArgv: workerExecArgv() });
    worker.on('message', (reply: ChunkReply) => this.settle(worker, reply));
    worker.on('error', (error) => this.fail(worker, error));
    worker.on('exit', (code) => this.fail(worker, new Error(`Chunk worker exited with code ${code}`)));
    this.workers.add(worker);
    return worker;
  }

  private settle(worker: Worker, reply: ChunkReply): void {
    const pending = this.running.get(worker);
    this.running.delete(worker);
    if (this.workers.has(worker)) {
      this.idle.push(worker);
    }

    if (pending) {
      if (reply.type === 'result') {
        pending.resolve({ threadId: reply.threadId, chunks: reply.chunks.map(toEncoded) });
      } else {
        pending.reject(new Error(reply.message));
      }
    }
    this.dispatch();
  }

  // A crashed worker fails its task and is replaced on the next dispatch
  private fail(worker: Worker, error: Error): void {
    const pending = this.running.get(worker);
    this.running.delete(worker);
    this.workers.delete(worker);
    const idleIndex = this.idle.indexOf(worker);
    if (idleIndex >= 0) {
      this.idle.splice(idleIndex, 1);
    }

    pending?.reject(error);
    if (!this.closed) {
      this.dispatch();
    }
  }
}
