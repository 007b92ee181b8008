/**
 * @consolidator/report — Period/Company Resolver.
 *
 * Decides which months and which entities a report covers.
 *
 * Rules:
 * - Invalid month/year input means "no bound", never an error
 * - Only months holding at least one matching fact are reported
 * - No months found is a value (an empty result with a hint), not an
 *   exception; the range is never widened automatically
 * - The month count is bounded so the (period × entity × account)
 *   cross product stays finite
 */

import { monthRange, periodDisplayName } from "@consolidator/amounts";
import type { MonthRange } from "@consolidator/amounts";
import type { DataType, Entity } from "@consolidator/types";
import type { FactFilter } from "@consolidator/store";
import type { ReportKind, ReportRequest, ReportResult, ReportSource } from "./types.js";

export const DEFAULT_MAX_PERIODS = 120;

const REPORT_LABELS: Record<ReportKind, { short: string; accounts: string }> = {
  profit_and_loss: { short: "P&L", accounts: "Income and Expense" },
  balance_sheet: { short: "Balance Sheet", accounts: "Asset, Liability and Equity" },
};

export interface ResolvedScope {
  readonly range: MonthRange;

  /** Ascending "YYYY-MM-01" periods */
  readonly periods: readonly string[];

  /** All non-aggregate entities, ordered by name then code */
  readonly actualEntities: readonly Entity[];

  /** First aggregate entity by name; only consulted in dual-stream mode */
  readonly aggregate: Entity | undefined;
}

export type Resolution =
  | { readonly kind: "resolved"; readonly scope: ResolvedScope }
  | { readonly kind: "empty"; readonly result: ReportResult };

export interface ResolveInput {
  readonly kind: ReportKind;
  readonly request: ReportRequest;
  readonly accountCodes: readonly string[];
  readonly dualStream: boolean;
  readonly maxPeriods: number;
}

interface Stream {
  readonly entityCodes: readonly string[];
  readonly dataType: DataType;
}

/**
 * The fact streams a report reads: one in normal mode, the actual stream
 * plus the aggregate entity's stream in dual-stream mode.
 */
function reportStreams(
  request: ReportRequest,
  actualCodes: readonly string[],
  aggregate: Entity | undefined,
  dualStream: boolean,
): Stream[] {
  if (!dualStream) {
    return [{ entityCodes: actualCodes, dataType: request.dataType }];
  }
  const streams: Stream[] = [{ entityCodes: actualCodes, dataType: "actual" }];
  if (aggregate !== undefined) {
    streams.push({ entityCodes: [aggregate.code], dataType: request.dataType });
  }
  return streams;
}

function listStreamPeriods(
  facts: ReportSource["facts"],
  streams: readonly Stream[],
  accountCodes: readonly string[],
  range?: MonthRange,
): string[] {
  const periods = new Set<string>();
  for (const stream of streams) {
    const filter: FactFilter = {
      entityCodes: stream.entityCodes,
      dataType: stream.dataType,
      accountCodes,
      ...(range?.start !== undefined ? { from: range.start } : {}),
      ...(range?.endExclusive !== undefined ? { toExclusive: range.endExclusive } : {}),
    };
    for (const period of facts.listPeriods(filter)) periods.add(period);
  }
  return [...periods].sort();
}

function emptyResult(error: string, extra: Partial<ReportResult> = {}): Resolution {
  return { kind: "empty", result: { columnDefs: [], rowData: [], error, ...extra } };
}

/**
 * Resolve the month range, the reported periods and the entity split.
 */
export function resolveScope(source: ReportSource, input: ResolveInput): Resolution {
  const { kind, request, accountCodes, dualStream, maxPeriods } = input;
  const labels = REPORT_LABELS[kind];

  const range = monthRange(request.fromMonth, request.fromYear, request.toMonth, request.toYear);

  const entities = source.entities.list();
  const actualEntities = entities.filter((e) => !e.isAggregate);
  const aggregate = entities.find((e) => e.isAggregate);

  const streams = reportStreams(
    request,
    actualEntities.map((e) => e.code),
    aggregate,
    dualStream,
  );
  const periods = listStreamPeriods(source.facts, streams, accountCodes, range);

  if (periods.length === 0) {
    const bounded = range.start !== undefined || range.endExclusive !== undefined;
    const available = bounded ? listStreamPeriods(source.facts, streams, accountCodes) : [];
    const first = available[0];
    const last = available[available.length - 1];
    if (first !== undefined && last !== undefined) {
      return emptyResult(
        `No ${labels.short} data found for selected period. ${labels.short} data is available from ${periodDisplayName(first)} to ${periodDisplayName(last)}`,
        { available_range: { start: first, end: last } },
      );
    }
    return emptyResult(
      `No ${labels.short} data found. Please check if ${labels.accounts} accounts are properly loaded.`,
    );
  }

  if (periods.length > maxPeriods) {
    return emptyResult(
      `Selected range covers ${String(periods.length)} months with ${labels.short} data; narrow it to at most ${String(maxPeriods)} months.`,
    );
  }

  return { kind: "resolved", scope: { range, periods, actualEntities, aggregate } };
}
