/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (the store answers reads)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ConsolidatorService } from "../services/consolidator-service.js";

export function createHealthRoutes(service: ConsolidatorService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    const body = {
      status: ready ? "ready" : "not_ready",
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
