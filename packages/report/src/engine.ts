/**
 * @consolidator/report — Engine entry points.
 *
 * request + stores → pivot JSON. The pipeline is:
 *
 *   dimensions → outline → account universe
 *   → resolved periods/entities → fact index → roll-up → serializer
 *
 * The engine keeps no state between calls: the same request against an
 * unchanged store yields the same output.
 */

import type { AccountCategory } from "@consolidator/types";
import { indexFacts } from "./fact-index.js";
import { buildBalanceSheetOutline, buildProfitAndLossOutline, outlineAccountCodes } from "./hierarchy.js";
import { DEFAULT_MAX_PERIODS, resolveScope } from "./resolver.js";
import { computeRollup } from "./rollup.js";
import { serializeReport } from "./serializer.js";
import type {
  DebugInfo,
  OutlineRow,
  ReportKind,
  ReportOptions,
  ReportRequest,
  ReportResult,
  ReportSource,
} from "./types.js";
import { ReportError } from "./types.js";

export const REPORT_ACCOUNT_TYPES: Record<ReportKind, readonly AccountCategory[]> = {
  profit_and_loss: ["INCOME", "EXPENSE"],
  balance_sheet: ["ASSET", "LIABILITY", "EQUITY"],
};

function validateOptions(options: ReportOptions): number {
  const maxPeriods = options.maxPeriods ?? DEFAULT_MAX_PERIODS;
  if (!Number.isInteger(maxPeriods) || maxPeriods < 1) {
    throw new ReportError(
      "INVALID_OPTIONS",
      `maxPeriods must be a positive integer, got ${String(maxPeriods)}`,
    );
  }
  return maxPeriods;
}

function buildOutline(
  kind: ReportKind,
  source: ReportSource,
  options: ReportOptions,
): { outline: OutlineRow[]; dimensionCount: number } {
  const dimensions = source.dimensions.list({ accountTypes: REPORT_ACCOUNT_TYPES[kind] });
  const subCategoryOrder = options.subCategoryOrder;
  const outline =
    kind === "profit_and_loss"
      ? buildProfitAndLossOutline(dimensions, {
          ...(subCategoryOrder !== undefined ? { subCategoryOrder } : {}),
          ...(options.grossProfitAfter !== undefined
            ? { grossProfitAfter: options.grossProfitAfter }
            : {}),
          ...(options.runningTotals !== undefined ? { runningTotals: options.runningTotals } : {}),
        })
      : buildBalanceSheetOutline(dimensions, {
          ...(subCategoryOrder !== undefined ? { subCategoryOrder } : {}),
        });
  return { outline, dimensionCount: dimensions.length };
}

/**
 * Generate a P&L or Balance Sheet pivot.
 *
 * An empty range or an over-wide range is returned as a result carrying
 * `error`; only misconfiguration throws.
 */
export function generateReport(
  kind: ReportKind,
  source: ReportSource,
  request: ReportRequest,
  options: ReportOptions,
): ReportResult {
  const maxPeriods = validateOptions(options);
  const { outline, dimensionCount } = buildOutline(kind, source, options);
  const accountCodes = outlineAccountCodes(outline);

  const resolution = resolveScope(source, {
    kind,
    request,
    accountCodes,
    dualStream: options.dualStream,
    maxPeriods,
  });
  if (resolution.kind === "empty") return resolution.result;

  const { periods, actualEntities, aggregate } = resolution.scope;
  const index = indexFacts(source.facts, {
    periods,
    entityCodes: actualEntities.map((e) => e.code),
    accountCodes,
    dataType: request.dataType,
    dualStream: options.dualStream,
    ...(aggregate !== undefined ? { aggregateCode: aggregate.code } : {}),
  });

  const entities = actualEntities.filter((e) => index.hasFacts(e.code));
  const rows = computeRollup({
    outline,
    index,
    periods,
    entityCodes: entities.map((e) => e.code),
  });

  const debugInfo: DebugInfo | undefined =
    options.includeDebugInfo === true
      ? {
          report: kind,
          data_type: request.dataType,
          dual_stream: options.dualStream,
          periods_count: periods.length,
          periods,
          entity_codes: entities.map((e) => e.code),
          aggregate_entity: options.dualStream && aggregate !== undefined ? aggregate.code : null,
          dimension_count: dimensionCount,
          fact_count: index.factCount,
          budget_fact_count: index.budgetFactCount,
        }
      : undefined;

  return serializeReport({
    periods,
    entities,
    rows,
    dataType: request.dataType,
    dualStream: options.dualStream,
    ...(debugInfo !== undefined ? { debugInfo } : {}),
  });
}

export function generateProfitAndLoss(
  source: ReportSource,
  request: ReportRequest,
  options: ReportOptions,
): ReportResult {
  return generateReport("profit_and_loss", source, request, options);
}

export function generateBalanceSheet(
  source: ReportSource,
  request: ReportRequest,
  options: ReportOptions,
): ReportResult {
  return generateReport("balance_sheet", source, request, options);
}
