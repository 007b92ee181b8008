/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ConsolidatorService } from "../services/consolidator-service.js";

/**
 * Hono environment type for the consolidation service.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Service bound to the store (set by the app factory) */
    service: ConsolidatorService;
  };
}
