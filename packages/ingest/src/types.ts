/**
 * @consolidator/ingest — Core types.
 *
 * Upload inputs and results. Tables arrive already decoded into cells;
 * reading CSV or spreadsheet files happens before this layer.
 *
 * Design principles:
 * - Problems with single rows or columns are reported as values
 * - Problems with the upload as a whole throw IngestError
 * - Every write runs inside one store transaction
 */

import type { DataType } from "@consolidator/types";

// =============================================================================
// Errors
// =============================================================================

export type IngestErrorCode =
  | "UNKNOWN_ENTITY"
  | "INVALID_TABLE"
  | "NO_PERIOD_COLUMNS"
  | "AGGREGATE_ACTUALS"
  | "UNKNOWN_BACKUP"
  | "CORRUPT_BACKUP";

export class IngestError extends Error {
  constructor(
    public readonly code: IngestErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "IngestError";
  }
}

// =============================================================================
// Tables
// =============================================================================

export type TableCell = string | number | boolean | Date | null | undefined;

export interface Table {
  readonly header: readonly TableCell[];
  readonly rows: readonly (readonly TableCell[])[];
}

// =============================================================================
// Financial data upload
// =============================================================================

export interface FinancialDataUpload {
  readonly entityCode: string;
  readonly dataType: DataType;

  /** First column: account code; every further column: one period */
  readonly table: Table;

  /** Required to replace facts in periods that already hold data */
  readonly confirmOverwrite?: boolean;

  /** Recorded on the backup */
  readonly user: string;

  readonly now: Date;
}

export interface ColumnReport {
  /** Zero-based column index in the table */
  readonly column: number;
  readonly header: string;

  /** Parsed period, or null when the header is not a period */
  readonly period: string | null;
}

export type FinancialDataResult =
  | {
      readonly status: "confirmation_needed";
      readonly existingPeriods: readonly string[];
      readonly message: string;
    }
  | {
      readonly status: "success" | "no_data";
      readonly created: number;

      /** Periods of the upload's period columns, ascending */
      readonly periods: readonly string[];

      /** Periods that held data before the upload */
      readonly existingPeriods: readonly string[];

      /** Set when replaced facts were backed up */
      readonly backupId?: string;

      readonly rowErrors: readonly string[];
      readonly columnErrors: readonly string[];
      readonly message: string;
    };

// =============================================================================
// Chart of accounts upload
// =============================================================================

export interface ChartOfAccountsUpload {
  /**
   * Columns: sort order, account code, account name, account type,
   * parent category, sub-category
   */
  readonly table: Table;

  /** Clear the chart before loading; otherwise merge */
  readonly replaceExisting: boolean;
}

export interface ChartOfAccountsResult {
  readonly mode: "replace" | "merge";
  readonly created: number;

  /** Records removed by replace mode */
  readonly removed: number;

  readonly rowErrors: readonly string[];
  readonly message: string;
}

// =============================================================================
// Restore
// =============================================================================

export interface RestoreRequest {
  readonly backupId: string;
  readonly user: string;
  readonly now: Date;
}

export interface RestoreResult {
  readonly backupId: string;
  readonly restored: number;

  /** Backup of the facts the restore replaced, when there were any */
  readonly safetyBackupId?: string;
}
