/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { ConsolidatorService } from "./services/consolidator-service.js";
import type { ConsolidatorServiceConfig } from "./services/consolidator-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createReportRoutes } from "./routes/reports.js";
import { createEntityRoutes } from "./routes/entities.js";
import { createChartOfAccountsRoutes } from "./routes/chart-of-accounts.js";
import { createFactRoutes } from "./routes/facts.js";
import { createBackupRoutes } from "./routes/backups.js";
import { createCommentRoutes } from "./routes/comments.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: ConsolidatorServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ConsolidatorService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new ConsolidatorService(options.serviceConfig);
  const logger = options.serviceConfig.logger;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(
    createErrorHandler((err) => {
      logger.error({ err }, "Unhandled error");
    }),
  );
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/reports", createReportRoutes());
  app.route("/api/v1/entities", createEntityRoutes());
  app.route("/api/v1/chart-of-accounts", createChartOfAccountsRoutes());
  app.route("/api/v1/facts", createFactRoutes());
  app.route("/api/v1/backups", createBackupRoutes());
  app.route("/api/v1/comments", createCommentRoutes());

  return { app, service };
}
