import { AudioService } from "../lib/audio/audio-service";
import { resolveChunkingConfig } from "../lib/config";
import { publicProcedure, toORPCError } from "../lib/orpc";
import { ChunkingService } from "../services/chunking-service";
import { SplitRequestSchema } from "../types/chunking";

export const chunksRouter = {
  defaults: publicProcedure.handler(({ context }) => {
    return context.chunkingDefaults;
  }),

  split: publicProcedure
    .input(SplitRequestSchema)
    .handler(({ input, context }) => {
      const { audio, filename = "audio.wav", includeAudio, ...options } = input;
      try {
        const config = resolveChunkingConfig(options, context.chunkingDefaults);
        const bytes = AudioService.base64ToArrayBuffer(audio);
        const result = ChunkingService.processWav(bytes, config, filename);
        return ChunkingService.toSplitResponse(result, filename, config, includeAudio);
      } catch (error) {
        throw toORPCError(error);
      }
    }),
};
