/**
 * Shared fixtures for report tests.
 */

import type { AccountDimension, DataType, Entity, FactRecord } from "@consolidator/types";
import { InMemoryFinancialStore } from "@consolidator/store";
import type { GridRow, ReportResult } from "../src/types.js";

export function account(
  accountCode: string,
  accountName: string,
  accountType: AccountDimension["accountType"],
  subCategory: string,
  sortOrder: number,
): AccountDimension {
  return {
    accountCode,
    accountName,
    accountType,
    parentCategory: "",
    subCategory,
    sortOrder,
    isHeader: false,
  };
}

export function header(accountName: string, sortOrder: number): AccountDimension {
  return {
    accountCode: null,
    accountName,
    accountType: null,
    parentCategory: "",
    subCategory: "",
    sortOrder,
    isHeader: true,
  };
}

export function fact(
  entityCode: string,
  accountCode: string,
  period: string,
  amount: string,
  dataType: DataType = "actual",
): FactRecord {
  return { entityCode, accountCode, period, amount, dataType };
}

export const ENTITIES: readonly Entity[] = [
  { code: "F2001", name: "Alpha Finance", isAggregate: false },
  { code: "F2002", name: "Beta Finance", isAggregate: false },
  { code: "BUD", name: "Consolidated Budget", isAggregate: true },
];

/**
 * Revenue (4000, 4100), Cost of Funds and Fees (5000),
 * Operating Expenses (6000), plus a structural header.
 */
export const PL_CHART: readonly AccountDimension[] = [
  header("Income Statement", 1),
  account("4000", "Sales", "INCOME", "Revenue", 10),
  account("4100", "Interest Income", "INCOME", "Revenue", 20),
  account("5000", "Bank Fees", "EXPENSE", "Cost of Funds and Fees", 30),
  account("6000", "Rent", "EXPENSE", "Operating Expenses", 40),
];

export const BS_CHART: readonly AccountDimension[] = [
  account("1000", "Cash", "ASSET", "Current Assets", 100),
  account("2000", "Payables", "LIABILITY", "Current Liabilities", 200),
  account("3000", "Retained Earnings", "EQUITY", "Equity", 300),
];

export function buildStore(
  facts: readonly FactRecord[],
  dimensions: readonly AccountDimension[] = [...PL_CHART, ...BS_CHART],
  entities: readonly Entity[] = ENTITIES,
): InMemoryFinancialStore {
  const store = new InMemoryFinancialStore();
  store.transaction((tx) => {
    for (const entity of entities) tx.entities.add(entity);
    for (const record of dimensions) tx.dimensions.add(record);
    for (const f of facts) tx.facts.insert(f);
  });
  return store;
}

/** The single row with the given name; fails the test when absent or repeated. */
export function rowNamed(result: ReportResult, name: string): GridRow {
  const matches = result.rowData.filter((r) => r.account_name === name);
  if (matches.length !== 1) {
    throw new Error(`Expected one row named "${name}", found ${String(matches.length)}`);
  }
  const [row] = matches;
  if (row === undefined) throw new Error(`Row "${name}" missing`);
  return row;
}

/** Pick the given fields of a row, for compact assertions. */
export function cells(row: GridRow, fields: readonly string[]): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const field of fields) picked[field] = row[field];
  return picked;
}
