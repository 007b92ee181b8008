/**
 * @consolidator/ingest — Chart of accounts upload.
 *
 * Columns: sort order, account code, account name, account type,
 * parent category, sub-category.
 *
 * Rules:
 * - Blank rows and rows without a name are skipped
 * - A row without a code, or typed "", HEADER or TOTAL, is a header
 * - Leaf types accept the aliases used by accounting-package exports
 * - Replace mode clears the chart first; merge mode rejects known codes
 */

import { isAccountCategory } from "@consolidator/types";
import type { AccountCategory, AccountDimension } from "@consolidator/types";
import type { FinancialStore } from "@consolidator/store";
import { accountCodeOf, cellText, isBlankCell, rowNumber } from "./cells.js";
import type { ChartOfAccountsResult, ChartOfAccountsUpload, TableCell } from "./types.js";
import { IngestError } from "./types.js";

const CHART_COLUMNS = 6;

const HEADER_TYPES: ReadonlySet<string> = new Set(["", "HEADER", "TOTAL"]);

/** Export-specific account types and the category each one means */
export const ACCOUNT_TYPE_ALIASES: Readonly<Record<string, AccountCategory>> = {
  REVENUE: "INCOME",
  "COST OF GOODS SOLD": "EXPENSE",
  COGS: "EXPENSE",
  BANK: "ASSET",
  "FIXED ASSET": "ASSET",
  "OTHER CURRENT ASSET": "ASSET",
  "OTHER ASSET": "ASSET",
  "OTHER CURRENT LIABILITY": "LIABILITY",
  "OTHER CURRENT LIABILITIES": "LIABILITY",
};

/**
 * Map an account type from an upload to a category, case-insensitively.
 * Returns undefined for unrecognized types.
 */
export function normalizeAccountType(raw: string): AccountCategory | undefined {
  const upper = raw.trim().toUpperCase().replace(/\s+/g, " ");
  if (isAccountCategory(upper)) return upper;
  return ACCOUNT_TYPE_ALIASES[upper];
}

function parseSortOrder(cell: TableCell): number | undefined {
  if (isBlankCell(cell)) return 0;
  if (typeof cell === "number") return Number.isInteger(cell) ? cell : undefined;
  if (typeof cell !== "string") return undefined;
  const text = cell.trim();
  if (!/^-?\d+(\.0*)?$/.test(text)) return undefined;
  return Number.parseInt(text, 10);
}

type RowOutcome =
  | { readonly kind: "skip" }
  | { readonly kind: "error"; readonly message: string }
  | { readonly kind: "record"; readonly record: AccountDimension };

function readRow(row: readonly TableCell[]): RowOutcome {
  if (row.every(isBlankCell)) return { kind: "skip" };

  const name = cellText(row[2]);
  if (name === "") return { kind: "skip" };

  const sortOrder = parseSortOrder(row[0]);
  if (sortOrder === undefined) {
    return { kind: "error", message: `Sort order '${cellText(row[0])}' is not an integer` };
  }

  const code = accountCodeOf(row[1]);
  const rawType = cellText(row[3]);
  const isHeader = code === "" || HEADER_TYPES.has(rawType.toUpperCase());

  let accountType: AccountCategory | null = null;
  if (!isHeader) {
    const normalized = normalizeAccountType(rawType);
    if (normalized === undefined) {
      return { kind: "error", message: `Account type '${rawType}' is not recognized` };
    }
    accountType = normalized;
  }

  return {
    kind: "record",
    record: {
      accountCode: code === "" ? null : code,
      accountName: name,
      accountType,
      parentCategory: cellText(row[4]),
      subCategory: cellText(row[5]),
      sortOrder,
      isHeader,
    },
  };
}

/**
 * Load chart-of-accounts rows from a decoded table.
 */
export function uploadChartOfAccounts(
  store: FinancialStore,
  upload: ChartOfAccountsUpload,
): ChartOfAccountsResult {
  if (upload.table.header.length < CHART_COLUMNS) {
    throw new IngestError(
      "INVALID_TABLE",
      `Table must have at least ${String(CHART_COLUMNS)} columns. Found ${String(upload.table.header.length)} columns.`,
    );
  }

  const replace = upload.replaceExisting;
  const records: AccountDimension[] = [];
  const rowErrors: string[] = [];
  const seen = new Set<string>();

  upload.table.rows.forEach((row, index) => {
    const prefix = `Row ${String(rowNumber(index))}:`;
    const outcome = readRow(row);
    if (outcome.kind === "skip") return;
    if (outcome.kind === "error") {
      rowErrors.push(`${prefix} ${outcome.message}`);
      return;
    }

    const code = outcome.record.accountCode;
    if (code !== null) {
      if (!replace && store.dimensions.findByCode(code) !== undefined) {
        rowErrors.push(`${prefix} Account Code '${code}' already exists`);
        return;
      }
      if (seen.has(code)) {
        rowErrors.push(`${prefix} Account Code '${code}' appears more than once`);
        return;
      }
      seen.add(code);
    }
    records.push(outcome.record);
  });

  const removed = store.transaction((tx) => {
    if (replace) {
      const before = tx.dimensions.list().length;
      tx.dimensions.replaceAll(records);
      return before;
    }
    for (const record of records) tx.dimensions.add(record);
    return 0;
  });

  const created = records.length;
  let message =
    created === 0
      ? "No Chart of Accounts records were loaded."
      : replace
        ? `Replaced Chart of Accounts with ${String(created)} records.`
        : `Added ${String(created)} records.`;
  if (rowErrors.length > 0) {
    message += ` Encountered ${String(rowErrors.length)} errors.`;
  }

  return { mode: replace ? "replace" : "merge", created, removed, rowErrors, message };
}
