import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadServerConfig } from "./lib/config";

const config = loadServerConfig();
const app = createApp(config);

serve({
  fetch: app.fetch,
  port: config.port,
}, (info) => {
  console.log(`Server is running on http://localhost:${info.port}`);
  console.log(`Chunking API endpoints: http://localhost:${info.port}/api/v1/chunks`);
  console.log(`RPC endpoints: http://localhost:${info.port}/rpc`);
  console.log(`Swagger UI: http://localhost:${info.port}/ui`);
  console.log(`OpenAPI spec: http://localhost:${info.port}/doc`);
});
