/**
 * @consolidator/report — Comment summaries.
 *
 * Counts the comments attached to the cells of a rendered report. A cell
 * is addressed by its row's rowKey and its column's field name; the
 * summary key joins the two as `<rowKey>||<field>`.
 */

import type { CellComment } from "@consolidator/types";
import type { ReportResult } from "./types.js";

export interface CellCommentSummary {
  readonly total: number;

  /** Comments not yet resolved */
  readonly open: number;

  /** Latest updatedAt in the cell, or null when it has no comments */
  readonly latest: string | null;
}

export type CommentSummary = Readonly<Record<string, CellCommentSummary>>;

export function commentCellKey(rowKey: string, columnKey: string): string {
  return `${rowKey}||${columnKey}`;
}

/**
 * Summary of one cell's comments.
 */
export function summarizeCell(comments: readonly CellComment[]): CellCommentSummary {
  let open = 0;
  let latest: string | null = null;
  for (const comment of comments) {
    if (!comment.resolved) open++;
    if (latest === null || comment.updatedAt > latest) latest = comment.updatedAt;
  }
  return { total: comments.length, open, latest };
}

/**
 * Per-cell summaries for the cells of `result`. Comments on rows or
 * columns the report does not show are left out.
 */
export function summarizeComments(
  result: Pick<ReportResult, "columnDefs" | "rowData">,
  comments: readonly CellComment[],
): CommentSummary {
  const rowKeys = new Set(result.rowData.map((row) => row.rowKey));
  const fields = new Set(result.columnDefs.map((col) => col.field));

  const byCell = new Map<string, CellComment[]>();
  for (const comment of comments) {
    if (!rowKeys.has(comment.rowKey) || !fields.has(comment.columnKey)) continue;
    const key = commentCellKey(comment.rowKey, comment.columnKey);
    const cell = byCell.get(key);
    if (cell === undefined) byCell.set(key, [comment]);
    else cell.push(comment);
  }

  const summary: Record<string, CellCommentSummary> = {};
  for (const [key, cell] of byCell) summary[key] = summarizeCell(cell);
  return summary;
}
