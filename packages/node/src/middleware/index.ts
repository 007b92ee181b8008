/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export { computeETag, matchesIfNoneMatch } from "./etag.js";
