/**
 * @consolidator/ingest — Uploads into the financial store.
 *
 * - Monthly financial data per entity, with backup-before-overwrite
 * - Chart of accounts, replaced or merged
 * - Restore of a backup
 */

export type {
  IngestErrorCode,
  TableCell,
  Table,
  FinancialDataUpload,
  ColumnReport,
  FinancialDataResult,
  ChartOfAccountsUpload,
  ChartOfAccountsResult,
  RestoreRequest,
  RestoreResult,
} from "./types.js";
export { IngestError } from "./types.js";

export { accountCodeOf, cellText, isBlankCell } from "./cells.js";

export { uploadFinancialData, readPeriodColumns } from "./financial-data.js";

export {
  uploadChartOfAccounts,
  normalizeAccountType,
  ACCOUNT_TYPE_ALIASES,
} from "./chart-of-accounts.js";

export { computeRecordsDigest, createBackupRecord, restoreBackup } from "./backup.js";
export type { BackupInput } from "./backup.js";
