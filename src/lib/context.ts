import type { ChunkingConfig } from "../types/chunking";
import { loadChunkingDefaults } from "./config";

export async function createContext() {
  return {
    chunkingDefaults: loadChunkingDefaults(),
  } satisfies { chunkingDefaults: ChunkingConfig };
}

export type Context = Awaited<ReturnType<typeof createContext>>;
