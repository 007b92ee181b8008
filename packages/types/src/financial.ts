/**
 * Financial Types
 *
 * Core records for per-company monthly reporting.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Periods are ISO dates pinned to the first day of their month
 * - Facts are unique per (entity, account, period, data type)
 */

/**
 * Which stream a fact belongs to.
 */
export type DataType = "actual" | "budget" | "forecast";

/**
 * Account classification used to partition the chart of accounts.
 * INCOME and EXPENSE feed the P&L; ASSET, LIABILITY, EQUITY the Balance Sheet.
 */
export type AccountCategory =
  | "INCOME"
  | "EXPENSE"
  | "ASSET"
  | "LIABILITY"
  | "EQUITY";

/**
 * A reporting company or business unit.
 */
export interface Entity {
  /** Unique short code (e.g., "F2001") */
  readonly code: string;

  /** Display name */
  readonly name: string;

  /**
   * Budget-only virtual entity. Never holds actual-stream facts;
   * its budget/forecast facts represent a consolidated view.
   */
  readonly isAggregate: boolean;
}

/**
 * A chart-of-accounts row.
 *
 * Leaf accounts carry a code and a category. Structural headers carry
 * neither and exist only for display grouping.
 */
export interface AccountDimension {
  readonly accountCode: string | null;
  readonly accountName: string;
  readonly accountType: AccountCategory | null;
  readonly parentCategory: string;
  readonly subCategory: string;

  /** Display position; lower sorts first */
  readonly sortOrder: number;

  readonly isHeader: boolean;
}

/**
 * One monetary data point.
 */
export interface FactRecord {
  readonly entityCode: string;
  readonly accountCode: string;

  /** ISO date, first day of month (e.g., "2024-01-01") */
  readonly period: string;

  /** Decimal string with two fractional digits (e.g., "-1234.50") */
  readonly amount: string;

  readonly dataType: DataType;
}

/**
 * Snapshot of facts taken immediately before a destructive overwrite.
 * Only used for manual restore.
 */
export interface BackupRecord {
  readonly id: string;
  readonly entityCode: string;
  readonly dataType: DataType;

  /** Periods whose facts were (partly) overwritten */
  readonly periods: readonly string[];

  readonly records: readonly FactRecord[];

  /** Who triggered the overwrite */
  readonly user: string;

  readonly description: string;

  /** ISO 8601 timestamp */
  readonly createdAt: string;

  /** SHA-256 of the canonical JSON of `records` */
  readonly digest: string;
}

/**
 * A note attached to one report cell, addressed by the row's rowKey and
 * the column's field name. Replies point at their parent.
 */
export interface CellComment {
  readonly id: string;

  /** Comment this one replies to; null for the opening comment */
  readonly parentId: string | null;

  readonly rowKey: string;
  readonly columnKey: string;

  /** Display labels captured when the comment was written */
  readonly rowLabel: string;
  readonly columnLabel: string;

  readonly message: string;
  readonly resolved: boolean;
  readonly user: string;

  /** ISO 8601 timestamps */
  readonly createdAt: string;
  readonly updatedAt: string;
}
