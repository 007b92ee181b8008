/**
 * @consolidator/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the store, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { InMemoryFinancialStore, JsonFileFinancialStore } from "@consolidator/store";
import type { FinancialStore } from "@consolidator/store";
import { loadConfig, reportOptionsFromConfig } from "./config.js";
import { createApp } from "./app.js";
import { pinoRequestLog } from "./middleware/logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let store: FinancialStore;
  if (config.DATA_FILE !== undefined) {
    store = new JsonFileFinancialStore({ filePath: config.DATA_FILE });
    logger.info({ dataFile: config.DATA_FILE }, "Using JSON file store");
  } else {
    store = new InMemoryFinancialStore();
    logger.warn("DATA_FILE not set; data is kept in memory only");
  }

  const report = reportOptionsFromConfig(config);
  logger.info(
    { dualStream: report.dualStream, maxPeriods: report.maxPeriods },
    "Report options loaded",
  );

  const { app } = createApp({
    serviceConfig: { store, report, logger },
    logFn: pinoRequestLog(logger),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Consolidator started");

  // Graceful shutdown
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
