/**
 * @consolidator/report — Core types.
 *
 * Inputs, configuration and output shape of the report aggregation
 * engine.
 *
 * Design principles:
 * - Configuration is an explicit object, never ambient state
 * - Output is plain JSON: arrays for ordering, numbers or null per cell
 * - Column field names exist only in the serialized output
 */

import type { DataType, Entity, AccountDimension, FactRecord } from "@consolidator/types";
import type { DimensionQuery, FactFilter } from "@consolidator/store";

// =============================================================================
// Errors
// =============================================================================

export type ReportErrorCode = "INVALID_OUTLINE" | "INVALID_OPTIONS";

export class ReportError extends Error {
  constructor(
    public readonly code: ReportErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ReportError";
  }
}

// =============================================================================
// Inputs
// =============================================================================

export type ReportKind = "profit_and_loss" | "balance_sheet";

/**
 * Month/year bounds arrive as raw user input; invalid values mean
 * "no bound" rather than an error.
 */
export interface ReportRequest {
  readonly fromMonth?: string | number;
  readonly fromYear?: string | number;
  readonly toMonth?: string | number;
  readonly toYear?: string | number;
  readonly dataType: DataType;
}

export interface ReportOptions {
  /**
   * Read actuals per entity and budget/forecast from the aggregate
   * entity, shown as a separate consolidated column.
   */
  readonly dualStream: boolean;

  /** Sub-category labels that lead the group order, in this order */
  readonly subCategoryOrder?: readonly string[];

  /** Selects the expense group after which Gross Profit is inserted */
  readonly grossProfitAfter?: (subCategory: string) => boolean;

  /** Upper bound on resolved months. Default: 120 */
  readonly maxPeriods?: number;

  /** Append NET INCOME YTD and NET INCOME Cumulative rows to the P&L */
  readonly runningTotals?: boolean;

  readonly includeDebugInfo?: boolean;
}

/**
 * Read-only views of the stores the engine consumes.
 */
export interface ReportSource {
  readonly entities: { list(): readonly Entity[] };
  readonly dimensions: { list(query?: DimensionQuery): readonly AccountDimension[] };
  readonly facts: {
    query(filter: FactFilter): readonly FactRecord[];
    listPeriods(filter: FactFilter): readonly string[];
  };
}

// =============================================================================
// Rows
// =============================================================================

export type RowType =
  | "section_header"
  | "parent_header"
  | "sub_header"
  | "account"
  | "sub_total"
  | "total"
  | "parent_total"
  | "net_income"
  | "metric"
  | "check_row";

/**
 * Where a running total starts again from zero: never, or at the first
 * selected month of each calendar year.
 */
export type RunningReset = "never" | "year";

/**
 * How a row's values derive from facts or from earlier rows.
 * Referenced row ids must precede the referencing row.
 */
export type RowFormula =
  | { readonly kind: "none" }
  | { readonly kind: "leaf"; readonly accountCode: string }
  | { readonly kind: "sum"; readonly of: readonly string[] }
  | {
      readonly kind: "difference";
      readonly minuend: string;
      readonly subtrahends: readonly string[];
    }
  | { readonly kind: "running"; readonly of: string; readonly reset: RunningReset };

/**
 * One row of the report outline, before any values are computed.
 */
export interface OutlineRow {
  readonly id: string;
  readonly type: RowType;
  readonly name: string;

  /** Empty for every row except accounts */
  readonly accountCode: string;

  readonly sortOrder: number;
  readonly section: string;
  readonly level: number;

  /** Slug shared by a group's header, accounts and subtotal */
  readonly styleToken: string;

  readonly formula: RowFormula;
}

// =============================================================================
// Output
// =============================================================================

export type ColType =
  | "company"
  | "total"
  | "budget"
  | "grand_company"
  | "grand_overall"
  | "grand_budget";

export interface ColumnDef {
  readonly field: string;
  readonly headerName: string;
  readonly colType: ColType;

  /** "2024-01" for per-period columns */
  readonly periodKey?: string;

  /** Entity code for company and grand_company columns */
  readonly companyCode?: string;

  readonly hide: boolean;
}

export interface RowMeta {
  readonly account_code: string;
  readonly account_name: string;
  readonly rowType: RowType;
  readonly sort_order: number;
  readonly section: string;
  readonly level: number;
  readonly styleToken: string;

  /** Stable identifier: `<rowType>__<code or token>__<sort_order>` */
  readonly rowKey: string;
}

/** Row metadata plus one cell per column field. */
export type GridRow = RowMeta & { readonly [field: string]: string | number | null };

export interface AvailableRange {
  /** First period holding data, "YYYY-MM-DD" */
  readonly start: string;

  /** Last period holding data, "YYYY-MM-DD" */
  readonly end: string;
}

export interface DebugInfo {
  readonly report: ReportKind;
  readonly data_type: DataType;
  readonly dual_stream: boolean;
  readonly periods_count: number;
  readonly periods: readonly string[];
  readonly entity_codes: readonly string[];
  readonly aggregate_entity: string | null;
  readonly dimension_count: number;
  readonly fact_count: number;
  readonly budget_fact_count: number;
}

export interface ReportResult {
  readonly columnDefs: readonly ColumnDef[];
  readonly rowData: readonly GridRow[];
  readonly error?: string;
  readonly available_range?: AvailableRange;
  readonly debug_info?: DebugInfo;
}
