/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (StoreError, IngestError, ReportError,
 * AmountError) to HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 422 | 500;

export const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Ingest errors
  UNKNOWN_ENTITY: 404,
  UNKNOWN_BACKUP: 404,
  INVALID_TABLE: 400,
  NO_PERIOD_COLUMNS: 400,
  AGGREGATE_ACTUALS: 422,
  CORRUPT_BACKUP: 409,

  // Store errors
  DUPLICATE_ENTITY: 409,
  DUPLICATE_FACT: 409,
  DUPLICATE_BACKUP: 409,
  DUPLICATE_ACCOUNT_CODE: 409,
  INVALID_ENTITY: 400,
  INVALID_FACT: 400,
  INVALID_DIMENSION: 400,
  INVALID_COMMENT: 400,
  UNKNOWN_COMMENT: 404,
  DUPLICATE_COMMENT: 409,

  // Amount errors
  INVALID_AMOUNT: 400,
  INVALID_PERIOD: 400,
};

function domainCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 *
 * `onUnexpected` sees every error that becomes a 500.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const code = domainCode(err);
    const status = code !== undefined ? STATUS_MAP[code] : undefined;

    if (code === undefined || status === undefined) {
      onUnexpected?.(err);
      // Don't leak internal details
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message), status);
  };
}
