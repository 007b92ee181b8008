/**
 * Cell helpers shared by the uploads.
 */

import type { TableCell } from "./types.js";

export function isBlankCell(cell: TableCell): boolean {
  if (cell === null || cell === undefined) return true;
  if (typeof cell === "number") return Number.isNaN(cell);
  if (typeof cell === "string") return cell.trim() === "";
  return false;
}

/** Display text of a cell, for messages. */
export function cellText(cell: TableCell): string {
  if (isBlankCell(cell)) return "";
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? "" : cell.toISOString().slice(0, 10);
  }
  return String(cell).trim();
}

/**
 * Account code of a cell. Integral numbers lose their fraction
 * (4000.0 → "4000"); strings are trimmed; blanks give "".
 */
export function accountCodeOf(cell: TableCell): string {
  if (typeof cell === "number") {
    if (!Number.isFinite(cell)) return "";
    return Number.isInteger(cell) ? cell.toFixed(0) : String(cell);
  }
  if (cell instanceof Date) return "";
  return cellText(cell);
}

/** Spreadsheet row number of a data row: the header is row 1. */
export function rowNumber(index: number): number {
  return index + 2;
}
