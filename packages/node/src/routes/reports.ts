/**
 * Report routes.
 *
 * GET /api/v1/reports/profit-and-loss — P&L pivot
 * GET /api/v1/reports/balance-sheet   — Balance Sheet pivot
 *
 * Query: from_month, from_year, to_month, to_year, data_type, debug.
 * Responses carry the cells' comment summary and an ETag; a matching
 * If-None-Match yields 304.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { ReportResponse } from "../services/consolidator-service.js";
import type { AppEnv } from "../types/api-contract.js";
import { ReportQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { computeETag, matchesIfNoneMatch } from "../middleware/etag.js";

function reportResponse(c: Context, result: ReportResponse): Response {
  const etag = computeETag(result);
  c.header("ETag", etag);
  if (matchesIfNoneMatch(c, etag)) {
    return c.body(null, 304);
  }
  return c.json(result);
}

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/profit-and-loss", validateQuery(ReportQuerySchema), (c) => {
    const service = c.get("service");
    return reportResponse(c, service.profitAndLoss(c.get("validatedQuery")));
  });

  routes.get("/balance-sheet", validateQuery(ReportQuerySchema), (c) => {
    const service = c.get("service");
    return reportResponse(c, service.balanceSheet(c.get("validatedQuery")));
  });

  return routes;
}
