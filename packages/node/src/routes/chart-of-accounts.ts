/**
 * Chart-of-accounts routes.
 *
 * GET  /api/v1/chart-of-accounts        — Dimension records in sort order
 * POST /api/v1/chart-of-accounts/upload — Replace or merge from a decoded table
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ChartUploadSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createChartOfAccountsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listChart() });
  });

  routes.post("/upload", validateBody(ChartUploadSchema), (c) => {
    const result = c.get("service").uploadChart(c.get("validatedBody"));
    return c.json({ data: result }, result.created > 0 ? 201 : 200);
  });

  return routes;
}
