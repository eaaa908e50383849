import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { runMigrations } from "./db/migrate.js";
import { closePool, getPool, getServices } from "./services.js";

// Log unhandled rejections and keep serving.
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Uncaught exceptions leave the process in an undefined state: log and exit.
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  process.exit(1);
};

async function main(): Promise<void> {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  await runMigrations(getPool());
  logger.info("Database migrations applied");

  const app = createApp(getServices(), { uiOrigins: config.uiOrigins, pageSize: config.pageSize });
  const server = serve({ fetch: app.fetch, port: config.port }, () => {
    logger.info(`pressroom-platform listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Failed to close database pool", { err });
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

if (process.env.NODE_ENV !== "test") {
  main().catch((err: unknown) => {
    logger.error("Failed to start", { err });
    process.exit(1);
  });
}
