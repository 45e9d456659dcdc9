import { publicProcedure } from "../lib/orpc";
import { chunksRouter } from "./chunks";

export const appRouter = {
  healthCheck: publicProcedure.handler(() => {
    return "OK";
  }),
  chunks: chunksRouter,
};
