import { ORPCError, os } from "@orpc/server";
import { isChunkerError } from "./audio/errors";
import type { Context } from "./context";

export const o = os.$context<Context>();

export const publicProcedure = o;

/**
 * Rethrow chunker input errors as BAD_REQUEST so RPC clients see the cause
 */
export function toORPCError(error: unknown): unknown {
  if (isChunkerError(error)) {
    return new ORPCError("BAD_REQUEST", {
      message: error.message,
      data: { code: error.code },
    });
  }
  return error;
}
