import { RPCHandler } from "@orpc/server/fetch";
import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { ServerConfig } from "./lib/config";
import { createContext } from "./lib/context";
import { createOpenAPIApp } from "./lib/openapi";
import { appRouter } from "./routers/index";

export function createApp(config: ServerConfig) {
  const app = new Hono();

  app.use(logger());
  app.use("/*", cors({
    origin: config.corsOrigin,
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type", "Authorization"],
  }));
  app.use("/api/*", bodyLimit({
    maxSize: config.maxUploadBytes,
    onError: (c) => c.json({
      success: false,
      error: "Payload too large",
      details: `Request body exceeds ${config.maxUploadBytes} bytes`,
      code: "PAYLOAD_TOO_LARGE",
    }, 413),
  }));
  app.use("/rpc/*", bodyLimit({ maxSize: config.maxUploadBytes }));

  // OpenAPI app for chunking routes
  app.route("/", createOpenAPIApp(config));

  // RPC routes
  const handler = new RPCHandler(appRouter);
  app.use("/rpc/*", async (c, next) => {
    const context = await createContext();
    const { matched, response } = await handler.handle(c.req.raw, {
      prefix: "/rpc",
      context: context,
    });

    if (matched) {
      return c.newResponse(response.body, response);
    }
    await next();
  });

  // Health check
  app.get("/health", (c) => {
    return c.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      services: {
        chunking: "operational",
        rpc: "operational"
      }
    });
  });

  return app;
}
