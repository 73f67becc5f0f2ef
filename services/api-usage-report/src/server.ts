import { serve } from "@hono/node-server";
import { Hono } from "hono";
import type { Config } from "./config";
import { errorMessage } from "./errors";
import { health } from "./routes/health";
import { createUsageRoute } from "./routes/usage";
import type { RunDependencies } from "./run";

export function createApp(config: Config, deps: RunDependencies = {}): Hono {
  const app = new Hono();

  app.route("/", health);
  app.route("/", createUsageRoute(config, deps));

  app.onError((err, c) => {
    console.error("Unhandled error:", err);
    return c.json({ error: errorMessage(err) }, 500);
  });

  return app;
}

export function startServer(config: Config): void {
  const app = createApp(config);
  serve({ fetch: app.fetch, port: config.PORT });
  console.log(`API usage report listening on :${config.PORT}`);

  process.on("SIGTERM", () => {
    console.log("SIGTERM received, shutting down");
    process.exit(0);
  });
}
