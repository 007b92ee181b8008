/**
 * Entity routes.
 *
 * GET  /api/v1/entities — List reporting entities (name order)
 * POST /api/v1/entities — Register an entity
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateEntitySchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createEntityRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listEntities() });
  });

  routes.post("/", validateBody(CreateEntitySchema), (c) => {
    const entity = c.get("service").createEntity(c.get("validatedBody"));
    return c.json({ data: entity }, 201);
  });

  return routes;
}
