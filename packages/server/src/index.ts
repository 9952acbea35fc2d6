import { serve } from "@hono/node-server";
import { createRequire } from "node:module";
import { loadConfig, ROOT_PATH_ENV } from "@docclaims/core/config";
import { createServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const rootPath = process.env[ROOT_PATH_ENV];
  const config = await loadConfig({ rootPath });
  const context = await createServer(config, { rootPath });
  const { app, logger } = context;

  const server = serve(
    { fetch: app.fetch, port: config.server.port },
    (info) => {
      logger.info(
        {
          port: info.port,
          version: pkg.version,
          resolvers: context.resolvers.map((r) => r.id),
        },
        "HTTP server started",
      );
    },
  );

  async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    server.close(() => {
      // Ledger writes are synchronous, so nothing is in flight once requests drain
      context
        .cleanup()
        .then(() => {
          logger.info("Server stopped");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, "Cleanup failed");
          process.exit(1);
        });
    });

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
