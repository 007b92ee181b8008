/**
 * ETag utilities for report responses.
 *
 * The tag is derived from the RFC 8785 canonical JSON of the body, so an
 * unchanged report keeps its tag across requests and processes.
 */

import { createHash } from "node:crypto";
import type { Context } from "hono";
import { canonicalize } from "json-canonicalize";

/**
 * Compute an ETag for a JSON-serializable object.
 */
export function computeETag(obj: unknown): string {
  const hash = createHash("sha256").update(canonicalize(obj)).digest("hex").slice(0, 16);
  return `"${hash}"`;
}

/**
 * True when the request's If-None-Match lists the tag (or "*").
 */
export function matchesIfNoneMatch(c: Context, etag: string): boolean {
  const header = c.req.header("If-None-Match");
  if (header === undefined) {
    return false;
  }
  return header
    .split(",")
    .map((tag) => tag.trim().replace(/^W\//, ""))
    .some((tag) => tag === "*" || tag === etag);
}
