/**
 * @consolidator/report — Report aggregation engine.
 *
 * Renders Profit & Loss and Balance Sheet pivots from chart-of-accounts
 * dimensions and monthly facts:
 * - Period/Company Resolver (which months, which entities)
 * - Hierarchy Builder (sub-category groups and derived rows)
 * - Fact Indexer (exact period → entity → account lookups)
 * - Roll-up Calculator (subtotals, totals, differences, running totals,
 *   budget stream)
 * - Report Serializer (column definitions and flat rows)
 * - Comment summaries per report cell
 */

export type {
  ReportErrorCode,
  ReportKind,
  ReportRequest,
  ReportOptions,
  ReportSource,
  RowType,
  RowFormula,
  RunningReset,
  OutlineRow,
  ColType,
  ColumnDef,
  RowMeta,
  GridRow,
  AvailableRange,
  DebugInfo,
  ReportResult,
} from "./types.js";
export { ReportError } from "./types.js";

export { slugify } from "./slug.js";

export {
  UNCATEGORIZED,
  defaultGrossProfitAfter,
  orderLabels,
  selectLeaves,
  groupAccounts,
  buildProfitAndLossOutline,
  buildBalanceSheetOutline,
  outlineAccountCodes,
} from "./hierarchy.js";
export type {
  LeafAccount,
  SubCategoryGroup,
  ProfitAndLossOutlineOptions,
  BalanceSheetOutlineOptions,
} from "./hierarchy.js";

export { DEFAULT_MAX_PERIODS, resolveScope } from "./resolver.js";
export type { ResolvedScope, Resolution, ResolveInput } from "./resolver.js";

export { FactIndex, indexFacts } from "./fact-index.js";
export type { IndexScope } from "./fact-index.js";

export { ValueGrid, computeRollup, activeColumns, runningRestarts } from "./rollup.js";
export type { ComputedRow, RollupInput } from "./rollup.js";

export {
  TOTAL_KEY,
  BUDGET_KEY,
  periodField,
  grandTotalField,
  rowKey,
  serializeColumns,
  serializeReport,
} from "./serializer.js";
export type { SerializeInput } from "./serializer.js";

export { commentCellKey, summarizeCell, summarizeComments } from "./comments.js";
export type { CellCommentSummary, CommentSummary } from "./comments.js";

export {
  REPORT_ACCOUNT_TYPES,
  generateReport,
  generateProfitAndLoss,
  generateBalanceSheet,
} from "./engine.js";
