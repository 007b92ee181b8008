/**
 * Comment routes.
 *
 * GET    /api/v1/comments?row_key=&column_key= — One cell's thread, oldest first
 * POST   /api/v1/comments                      — Comment on a cell or reply
 * PATCH  /api/v1/comments/:id                  — Edit the message or resolve
 * DELETE /api/v1/comments/:id                  — Remove a comment and its replies
 *
 * Every response carries the cell's summary after the change.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CommentQuerySchema, CreateCommentSchema, UpdateCommentSchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createCommentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(CommentQuerySchema), (c) => {
    return c.json({ data: c.get("service").listComments(c.get("validatedQuery")) });
  });

  routes.post("/", validateBody(CreateCommentSchema), (c) => {
    const result = c.get("service").createComment(c.get("validatedBody"));
    return c.json({ data: result }, 201);
  });

  routes.patch("/:id", validateBody(UpdateCommentSchema), (c) => {
    const result = c.get("service").updateComment(c.req.param("id"), c.get("validatedBody"));
    return c.json({ data: result });
  });

  routes.delete("/:id", (c) => {
    return c.json({ data: c.get("service").deleteComment(c.req.param("id")) });
  });

  return routes;
}
