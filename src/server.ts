import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { logger } from "hono/logger";
import { fileURLToPath } from "node:url";
import { loadDispatcherConfig } from "./config/config-manager.js";
import { createDispatchPipeline, type DispatchPipeline } from "./dispatcher/pipeline.js";
import { createDispatchRoutes } from "./routes/dispatch.js";

/**
 * Build the HTTP app for a pipeline
 */
export function createApp(pipeline: DispatchPipeline, options: { logRequests?: boolean } = {}): Hono {
  const app = new Hono();

  // Logging middleware
  if (options.logRequests ?? true) {
    app.use("*", logger());
  }

  // Mount API routes
  app.route("/api", createDispatchRoutes(pipeline));

  return app;
}

/**
 * Load configuration and start listening
 */
export function startServer(options: { configPath?: string; port?: number } = {}): void {
  const loaded = loadDispatcherConfig(options.configPath);
  const pipeline = createDispatchPipeline(loaded);
  const app = createApp(pipeline);
  const port = options.port ?? loaded.config.server.port;

  console.log(`Starting intent dispatcher on port ${port}...`);

  serve(
    {
      fetch: app.fetch,
      port,
    },
    (info) => {
      console.log(`Intent dispatcher running at http://localhost:${info.port}`);
    }
  );
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer();
}
