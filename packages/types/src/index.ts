/**
 * @consolidator/types — Shared domain types for the consolidation stack.
 *
 * These types are used across all packages:
 * - Reporting entities (companies and the budget-only aggregate)
 * - Chart-of-accounts dimension records
 * - Monthly fact records and overwrite backups
 * - Comments on report cells
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  DataType,
  AccountCategory,
  Entity,
  AccountDimension,
  FactRecord,
  BackupRecord,
  CellComment,
} from "./financial.js";

// Runtime type guards
export {
  isDataType,
  isAccountCategory,
  isPeriod,
  isEntity,
  isAccountDimension,
  isFactRecord,
  isBackupRecord,
  isCellComment,
  isLeafAccount,
} from "./guards.js";
