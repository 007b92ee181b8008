/**
 * Financial data routes.
 *
 * POST /api/v1/facts/upload — Load one entity's monthly amounts
 *
 * 201 when records were written; 200 for "no_data" and for
 * "confirmation_needed", which asks the caller to resend with
 * `confirmOverwrite: true`.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FactsUploadSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createFactRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/upload", validateBody(FactsUploadSchema), (c) => {
    const result = c.get("service").uploadFacts(c.get("validatedBody"));
    return c.json({ data: result }, result.status === "success" ? 201 : 200);
  });

  return routes;
}
