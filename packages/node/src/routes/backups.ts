/**
 * Backup routes.
 *
 * GET  /api/v1/backups             — Backup summaries, newest first
 * POST /api/v1/backups/:id/restore — Put a backup's facts back
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RestoreBackupSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createBackupRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listBackups() });
  });

  routes.post("/:id/restore", validateBody(RestoreBackupSchema), (c) => {
    const result = c.get("service").restore(c.req.param("id"), c.get("validatedBody"));
    return c.json({ data: result });
  });

  return routes;
}
