/**
 * @tally/node: Entry point.
 *
 * Loads config, bootstraps the Hono app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, toEngineConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      engine: toEngineConfig(config),
      logRun: (entry) => {
        logger.info(entry, "Reconciliation run");
      },
    },
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  logger.info(
    {
      tolerance: service.engineConfig.tolerance,
      defaultDecimals: service.engineConfig.defaultDecimals,
      roundingMode: service.engineConfig.roundingMode,
      detectors: service.engineConfig.detectors.length,
    },
    "Engine configured",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Tally node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
