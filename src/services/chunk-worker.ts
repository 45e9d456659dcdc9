/**
 * Worker thread entry for ChunkWorkerPool
 */

import { parentPort, threadId } from 'node:worker_threads';
import { errorMessage } from '../lib/audio/errors';
import { chunkWavFile, type ChunkReply, type ChunkTask } from './chunk-pool';

const port = parentPort;
if (!port) {
  throw new Error('chunk-worker must run in a worker thread');
}

port.on('message', (task: ChunkTask) => {
  try {
    const chunks = chunkWavFile(task.bytes, task.config, task.filename);
    const reply: ChunkReply = { type: 'result', id: task.id, threadId, chunks };
    port.postMessage(reply, chunks.map((chunk) => chunk.wav));
  } catch (error) {
    const reply: ChunkReply = { type: 'error', id: task.id, message: errorMessage(error) };
    port.postMessage(reply);
  }
});
