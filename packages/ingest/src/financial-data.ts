/**
 * @consolidator/ingest — Financial data upload.
 *
 * One table per (entity, data type): the first column holds account
 * codes, every further column one month.
 *
 * Rules:
 * - Periods that already hold data need explicit confirmation
 * - Only facts of the uploaded account codes in those periods are
 *   replaced, and they are backed up first
 * - Unparseable values are absent, never zero
 * - Backup, delete and insert are one transaction
 */

import { cleanNumberValue, parsePeriodHeader, periodLabel, roundAmount } from "@consolidator/amounts";
import type { FactRecord } from "@consolidator/types";
import type { FinancialStore } from "@consolidator/store";
import { createBackupRecord, uploadBackupDescription } from "./backup.js";
import { accountCodeOf, cellText, rowNumber } from "./cells.js";
import type { ColumnReport, FinancialDataResult, FinancialDataUpload, Table } from "./types.js";
import { IngestError } from "./types.js";

interface PeriodColumn {
  readonly column: number;
  readonly period: string;
}

interface ParsedRows {
  readonly facts: readonly FactRecord[];
  readonly accountCodes: readonly string[];
  readonly rowErrors: readonly string[];
}

/**
 * Parse every header cell after the first as a period.
 */
export function readPeriodColumns(header: Table["header"]): ColumnReport[] {
  return header.slice(1).map((cell, i) => ({
    column: i + 1,
    header: cellText(cell),
    period: parsePeriodHeader(cell),
  }));
}

function describeColumns(reports: readonly ColumnReport[]): string {
  return reports
    .map((r) => `"${r.header}" → ${r.period === null ? "not a period" : r.period}`)
    .join(" | ");
}

/**
 * Keep the first column of each period; report the others.
 */
function selectPeriodColumns(reports: readonly ColumnReport[]): {
  columns: PeriodColumn[];
  columnErrors: string[];
} {
  const columns: PeriodColumn[] = [];
  const columnErrors: string[] = [];
  const seen = new Set<string>();
  for (const report of reports) {
    if (report.period === null) {
      columnErrors.push(`Column "${report.header}" is not a recognized period`);
    } else if (seen.has(report.period)) {
      columnErrors.push(
        `Column "${report.header}" repeats period ${periodLabel(report.period)}`,
      );
    } else {
      seen.add(report.period);
      columns.push({ column: report.column, period: report.period });
    }
  }
  return { columns, columnErrors };
}

function parseRows(
  store: FinancialStore,
  upload: FinancialDataUpload,
  columns: readonly PeriodColumn[],
): ParsedRows {
  const facts: FactRecord[] = [];
  const accountCodes: string[] = [];
  const rowErrors: string[] = [];
  const seen = new Set<string>();

  upload.table.rows.forEach((row, index) => {
    const code = accountCodeOf(row[0]);
    if (code === "") return;

    if (store.dimensions.findByCode(code) === undefined) {
      rowErrors.push(
        `Row ${String(rowNumber(index))}: Account code '${code}' not found in Chart of Accounts`,
      );
      return;
    }
    if (seen.has(code)) {
      rowErrors.push(
        `Row ${String(rowNumber(index))}: Account code '${code}' appears more than once`,
      );
      return;
    }
    seen.add(code);
    accountCodes.push(code);

    for (const { column, period } of columns) {
      const cleaned = cleanNumberValue(row[column]);
      if (cleaned === null) continue;
      facts.push({
        entityCode: upload.entityCode,
        accountCode: code,
        period,
        amount: roundAmount(cleaned),
        dataType: upload.dataType,
      });
    }
  });

  return { facts, accountCodes, rowErrors };
}

function summarize(
  created: number,
  periodCount: number,
  backedUp: boolean,
  errorCount: number,
): string {
  if (created === 0) {
    return "No valid data was uploaded. Please check the file format.";
  }
  let message = `Uploaded ${String(created)} records for ${String(periodCount)} periods.`;
  if (backedUp) message += " Backup created for overwritten data.";
  if (errorCount > 0) message += ` Encountered ${String(errorCount)} errors.`;
  return message;
}

/**
 * Load one entity's monthly amounts from a decoded table.
 */
export function uploadFinancialData(
  store: FinancialStore,
  upload: FinancialDataUpload,
): FinancialDataResult {
  const entity = store.entities.get(upload.entityCode);
  if (entity === undefined) {
    throw new IngestError("UNKNOWN_ENTITY", `Entity "${upload.entityCode}" not found`);
  }
  if (entity.isAggregate && upload.dataType === "actual") {
    throw new IngestError(
      "AGGREGATE_ACTUALS",
      `Entity "${entity.code}" is budget-only and cannot hold actual data`,
    );
  }
  if (upload.table.header.length < 2) {
    throw new IngestError(
      "INVALID_TABLE",
      "Table must have at least 2 columns: account code and at least one period",
    );
  }

  const reports = readPeriodColumns(upload.table.header);
  const { columns, columnErrors } = selectPeriodColumns(reports);
  if (columns.length === 0) {
    throw new IngestError(
      "NO_PERIOD_COLUMNS",
      `No valid period columns found. Use headers such as "Jan-24" or "2024-01". Columns: ${describeColumns(reports)}`,
    );
  }

  const periods = columns.map((c) => c.period).sort();
  const existingPeriods = periods.filter((period) =>
    store.facts.has({
      entityCodes: [entity.code],
      dataType: upload.dataType,
      periods: [period],
    }),
  );

  if (existingPeriods.length > 0 && upload.confirmOverwrite !== true) {
    return {
      status: "confirmation_needed",
      existingPeriods,
      message: `Data already exists for periods: ${existingPeriods.map(periodLabel).join(", ")}. Confirm to overwrite it.`,
    };
  }

  const parsed = parseRows(store, upload, columns);

  const backupId = store.transaction((tx) => {
    let id: string | undefined;
    if (existingPeriods.length > 0 && parsed.accountCodes.length > 0) {
      const replaced = tx.facts.delete({
        entityCodes: [entity.code],
        dataType: upload.dataType,
        periods: existingPeriods,
        accountCodes: parsed.accountCodes,
      });
      if (replaced.length > 0) {
        id = tx.backups.create(
          createBackupRecord({
            entityCode: entity.code,
            dataType: upload.dataType,
            periods: existingPeriods,
            records: replaced,
            user: upload.user,
            description: uploadBackupDescription(upload.now),
            now: upload.now,
          }),
        ).id;
      }
    }
    for (const fact of parsed.facts) tx.facts.insert(fact);
    return id;
  });

  const created = parsed.facts.length;
  const base = {
    created,
    periods,
    existingPeriods,
    rowErrors: parsed.rowErrors,
    columnErrors,
    message: summarize(
      created,
      periods.length,
      backupId !== undefined,
      parsed.rowErrors.length + columnErrors.length,
    ),
  };
  return backupId !== undefined
    ? { status: created > 0 ? "success" : "no_data", ...base, backupId }
    : { status: created > 0 ? "success" : "no_data", ...base };
}
