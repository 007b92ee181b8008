/**
 * @consolidator/report — Report Serializer.
 *
 * Flattens computed rows into grid JSON: a column-definition list and
 * one flat object per row. This is the only place field names such as
 * "Jan-24_F2001" are produced, and the only place bigints become numbers.
 *
 * Column order:
 *   per period: one column per entity, TOTAL, [Budget]
 *   then: Grand Total per entity, Grand Total, [Grand Total Budget]
 * Budget columns exist only for budget/forecast reports.
 *
 * Grand totals of running-total rows hold the value of the last month,
 * not a sum over months.
 */

import { periodKey, periodLabel, sumAmounts, toNumber } from "@consolidator/amounts";
import type { DataType, Entity } from "@consolidator/types";
import type { ComputedRow } from "./rollup.js";
import { activeColumns } from "./rollup.js";
import type { ColumnDef, DebugInfo, GridRow, ReportResult, RowMeta, RowType } from "./types.js";
import { slugify } from "./slug.js";

/** Row types that carry the consolidated budget in dual-stream mode */
const BUDGET_ROW_TYPES: ReadonlySet<RowType> = new Set<RowType>([
  "sub_total",
  "total",
  "parent_total",
  "net_income",
  "metric",
]);

export const TOTAL_KEY = "TOTAL";
export const BUDGET_KEY = "Budget";

// ─── Field names ─────────────────────────────────────────────────────────

export function periodField(period: string, key: string): string {
  return `${periodLabel(period)}_${key}`;
}

export function grandTotalField(key: string): string {
  return `grand_total_${key}`;
}

// ─── Cells ───────────────────────────────────────────────────────────────

/** Zero is shown as an empty cell; arithmetic has already used true zero. */
function cell(value: bigint): number | null {
  return value === 0n ? null : toNumber(value);
}

/**
 * Stable row identifier: `<rowType>__<code, style token or slug>__<sort_order>`.
 */
export function rowKey(row: {
  readonly type: RowType;
  readonly accountCode: string;
  readonly styleToken: string;
  readonly name: string;
  readonly sortOrder: number;
}): string {
  const codePart = row.accountCode || row.styleToken || slugify(row.name) || "row";
  return `${row.type}__${codePart}__${String(row.sortOrder)}`;
}

// ─── Serialization ───────────────────────────────────────────────────────

export interface SerializeInput {
  readonly periods: readonly string[];

  /** Reporting entities, in column order */
  readonly entities: readonly Entity[];

  readonly rows: readonly ComputedRow[];
  readonly dataType: DataType;
  readonly dualStream: boolean;
  readonly debugInfo?: DebugInfo;
}

export function serializeColumns(
  periods: readonly string[],
  entities: readonly Entity[],
  rows: readonly ComputedRow[],
  dataType: DataType,
): ColumnDef[] {
  const showBudget = dataType !== "actual";
  const active = activeColumns(rows, periods.length, entities.length);
  const columns: ColumnDef[] = [];

  periods.forEach((period, p) => {
    const label = periodLabel(period);
    const key = periodKey(period);
    entities.forEach((entity, e) => {
      columns.push({
        field: periodField(period, entity.code),
        headerName: `${label} ${entity.code}`,
        colType: "company",
        periodKey: key,
        companyCode: entity.code,
        hide: active[p]?.[e] !== true,
      });
    });
    columns.push({
      field: periodField(period, TOTAL_KEY),
      headerName: `${label} TOTAL`,
      colType: "total",
      periodKey: key,
      hide: false,
    });
    if (showBudget) {
      columns.push({
        field: periodField(period, BUDGET_KEY),
        headerName: `${label} Budget`,
        colType: "budget",
        periodKey: key,
        hide: false,
      });
    }
  });

  entities.forEach((entity, e) => {
    columns.push({
      field: grandTotalField(entity.code),
      headerName: `Grand Total ${entity.code}`,
      colType: "grand_company",
      companyCode: entity.code,
      hide: !active.some((line) => line[e] === true),
    });
  });
  columns.push({
    field: grandTotalField(TOTAL_KEY),
    headerName: "Grand Total",
    colType: "grand_overall",
    hide: false,
  });
  if (showBudget) {
    columns.push({
      field: grandTotalField(BUDGET_KEY),
      headerName: "Grand Total Budget",
      colType: "grand_budget",
      hide: false,
    });
  }

  return columns;
}

function serializeRow(
  computed: ComputedRow,
  periods: readonly string[],
  entities: readonly Entity[],
  showBudget: boolean,
  surfaceBudget: boolean,
): GridRow {
  const { row, values, budget } = computed;
  const meta: RowMeta = {
    account_code: row.accountCode,
    account_name: row.name,
    rowType: row.type,
    sort_order: row.sortOrder,
    section: row.section,
    level: row.level,
    styleToken: row.styleToken,
    rowKey: rowKey(row),
  };

  const cells: Record<string, number | null> = {};
  const budgetCells: bigint[] = [];

  periods.forEach((period, p) => {
    entities.forEach((entity, e) => {
      cells[periodField(period, entity.code)] = cell(values.get(p, e));
    });
    cells[periodField(period, TOTAL_KEY)] = cell(values.periodTotal(p));
    if (showBudget) {
      const amount = surfaceBudget ? (budget[p] ?? 0n) : 0n;
      budgetCells.push(amount);
      cells[periodField(period, BUDGET_KEY)] = cell(amount);
    }
  });

  const closing = row.formula.kind === "running";
  const last = periods.length - 1;
  entities.forEach((entity, e) => {
    cells[grandTotalField(entity.code)] = cell(
      closing ? values.get(last, e) : values.entityTotal(e),
    );
  });
  cells[grandTotalField(TOTAL_KEY)] = cell(
    closing ? values.periodTotal(last) : values.grandTotal(),
  );
  if (showBudget) {
    cells[grandTotalField(BUDGET_KEY)] = cell(
      closing ? (budgetCells[last] ?? 0n) : sumAmounts(budgetCells),
    );
  }

  return Object.assign({ ...meta }, cells);
}

/**
 * Build the final report JSON.
 */
export function serializeReport(input: SerializeInput): ReportResult {
  const { periods, entities, rows, dataType, dualStream } = input;
  const showBudget = dataType !== "actual";

  const columnDefs = serializeColumns(periods, entities, rows, dataType);
  const rowData = rows.map((computed) =>
    serializeRow(
      computed,
      periods,
      entities,
      showBudget,
      showBudget && dualStream && BUDGET_ROW_TYPES.has(computed.row.type),
    ),
  );

  return input.debugInfo !== undefined
    ? { columnDefs, rowData, debug_info: input.debugInfo }
    : { columnDefs, rowData };
}
