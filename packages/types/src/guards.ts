/**
 * Runtime Type Guards
 *
 * Narrowing functions for consolidation domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized store files, uploads).
 */

import type {
  AccountCategory,
  AccountDimension,
  BackupRecord,
  CellComment,
  DataType,
  Entity,
  FactRecord,
} from "./financial.js";

// =============================================================================
// Enumerations
// =============================================================================

const DATA_TYPES = new Set<string>(["actual", "budget", "forecast"]);
const ACCOUNT_CATEGORIES = new Set<string>([
  "INCOME",
  "EXPENSE",
  "ASSET",
  "LIABILITY",
  "EQUITY",
]);

const PERIOD_PATTERN = /^20\d{2}-(0[1-9]|1[0-2])-01$/;
const AMOUNT_PATTERN = /^-?\d+\.\d{2}$/;

export function isDataType(value: unknown): value is DataType {
  return typeof value === "string" && DATA_TYPES.has(value);
}

export function isAccountCategory(value: unknown): value is AccountCategory {
  return typeof value === "string" && ACCOUNT_CATEGORIES.has(value);
}

/**
 * True for an ISO date on the first day of a month ("2024-01-01") in the
 * years 2000–2099, the span that two-digit column labels name uniquely.
 */
export function isPeriod(value: unknown): value is string {
  return typeof value === "string" && PERIOD_PATTERN.test(value);
}

// =============================================================================
// Records
// =============================================================================

export function isEntity(value: unknown): value is Entity {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.code === "string" &&
    v.code.length > 0 &&
    typeof v.name === "string" &&
    typeof v.isAggregate === "boolean"
  );
}

export function isAccountDimension(value: unknown): value is AccountDimension {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    (v.accountCode === null || typeof v.accountCode === "string") &&
    typeof v.accountName === "string" &&
    (v.accountType === null || isAccountCategory(v.accountType)) &&
    typeof v.parentCategory === "string" &&
    typeof v.subCategory === "string" &&
    typeof v.sortOrder === "number" &&
    Number.isInteger(v.sortOrder) &&
    typeof v.isHeader === "boolean"
  );
}

export function isFactRecord(value: unknown): value is FactRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.entityCode === "string" &&
    v.entityCode.length > 0 &&
    typeof v.accountCode === "string" &&
    v.accountCode.length > 0 &&
    isPeriod(v.period) &&
    typeof v.amount === "string" &&
    AMOUNT_PATTERN.test(v.amount) &&
    isDataType(v.dataType)
  );
}

export function isBackupRecord(value: unknown): value is BackupRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.entityCode === "string" &&
    isDataType(v.dataType) &&
    Array.isArray(v.periods) &&
    v.periods.every(isPeriod) &&
    Array.isArray(v.records) &&
    v.records.every(isFactRecord) &&
    typeof v.user === "string" &&
    typeof v.description === "string" &&
    typeof v.createdAt === "string" &&
    typeof v.digest === "string"
  );
}

export function isCellComment(value: unknown): value is CellComment {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    (v.parentId === null || typeof v.parentId === "string") &&
    typeof v.rowKey === "string" &&
    v.rowKey.length > 0 &&
    typeof v.columnKey === "string" &&
    v.columnKey.length > 0 &&
    typeof v.rowLabel === "string" &&
    typeof v.columnLabel === "string" &&
    typeof v.message === "string" &&
    v.message.trim().length > 0 &&
    typeof v.resolved === "boolean" &&
    typeof v.user === "string" &&
    typeof v.createdAt === "string" &&
    typeof v.updatedAt === "string"
  );
}

/**
 * A leaf account: non-empty code and a recognized category.
 * Only leaves take part in roll-ups.
 */
export function isLeafAccount(
  record: AccountDimension,
): record is AccountDimension & { accountCode: string; accountType: AccountCategory } {
  return (
    record.accountCode !== null &&
    record.accountCode.trim() !== "" &&
    record.accountType !== null
  );
}
