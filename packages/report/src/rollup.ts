/**
 * @consolidator/report — Roll-up Calculator.
 *
 * Walks the outline in order and computes, for every row, a
 * (period × entity) matrix of exact amounts plus a per-period
 * consolidated budget vector.
 *
 * Rules:
 * - Leaves read the fact index; sums, differences and running totals
 *   read earlier rows
 * - Running totals accumulate along the selected months per entity and
 *   restart where the reset rule says so
 * - Derived rows are never re-derived from facts
 * - Account rows that are zero in every cell are dropped; every other
 *   row type is always kept
 * - A formula that references a row not yet computed is a programming
 *   error (INVALID_OUTLINE)
 */

import { sumAmounts } from "@consolidator/amounts";
import type { FactIndex } from "./fact-index.js";
import type { OutlineRow, RowFormula, RunningReset } from "./types.js";
import { ReportError } from "./types.js";

// =============================================================================
// Value grid
// =============================================================================

/**
 * Dense period × entity matrix of scaled amounts.
 */
export class ValueGrid {
  private readonly _cells: bigint[];

  constructor(
    readonly periodCount: number,
    readonly entityCount: number,
    cells?: readonly bigint[],
  ) {
    const size = periodCount * entityCount;
    if (cells !== undefined && cells.length !== size) {
      throw new ReportError(
        "INVALID_OUTLINE",
        `Grid of ${String(periodCount)}×${String(entityCount)} needs ${String(size)} cells, got ${String(cells.length)}`,
      );
    }
    this._cells = cells !== undefined ? [...cells] : new Array<bigint>(size).fill(0n);
  }

  get(period: number, entity: number): bigint {
    return this._cells[period * this.entityCount + entity] ?? 0n;
  }

  set(period: number, entity: number, value: bigint): void {
    this._cells[period * this.entityCount + entity] = value;
  }

  /** Sum over entities for one period */
  periodTotal(period: number): bigint {
    return sumAmounts(Array.from({ length: this.entityCount }, (_, e) => this.get(period, e)));
  }

  /** Sum over periods for one entity */
  entityTotal(entity: number): bigint {
    return sumAmounts(Array.from({ length: this.periodCount }, (_, p) => this.get(p, entity)));
  }

  /** Sum of every entity's grand total */
  grandTotal(): bigint {
    return sumAmounts(Array.from({ length: this.entityCount }, (_, e) => this.entityTotal(e)));
  }

  /**
   * Running total down the periods of each entity. The total restarts
   * from zero at every period flagged in `restarts`.
   */
  accumulate(restarts: readonly boolean[]): ValueGrid {
    const result = new ValueGrid(this.periodCount, this.entityCount);
    for (let e = 0; e < this.entityCount; e++) {
      let running = 0n;
      for (let p = 0; p < this.periodCount; p++) {
        if (restarts[p] === true) running = 0n;
        running += this.get(p, e);
        result.set(p, e, running);
      }
    }
    return result;
  }

  isZero(): boolean {
    return this._cells.every((v) => v === 0n);
  }

  plus(other: ValueGrid): ValueGrid {
    return this._combine(other, (a, b) => a + b);
  }

  minus(other: ValueGrid): ValueGrid {
    return this._combine(other, (a, b) => a - b);
  }

  private _combine(other: ValueGrid, op: (a: bigint, b: bigint) => bigint): ValueGrid {
    if (other.periodCount !== this.periodCount || other.entityCount !== this.entityCount) {
      throw new ReportError("INVALID_OUTLINE", "Cannot combine grids of different shapes");
    }
    return new ValueGrid(
      this.periodCount,
      this.entityCount,
      this._cells.map((v, i) => op(v, other._cells[i] ?? 0n)),
    );
  }
}

// =============================================================================
// Roll-up
// =============================================================================

export interface ComputedRow {
  readonly row: OutlineRow;
  readonly values: ValueGrid;

  /** Consolidated budget per period; all zero outside dual-stream mode */
  readonly budget: readonly bigint[];
}

export interface RollupInput {
  readonly outline: readonly OutlineRow[];
  readonly index: FactIndex;
  readonly periods: readonly string[];

  /** Reporting entity codes, in column order */
  readonly entityCodes: readonly string[];
}

function addVectors(a: readonly bigint[], b: readonly bigint[]): bigint[] {
  return a.map((v, i) => v + (b[i] ?? 0n));
}

function subtractVectors(a: readonly bigint[], b: readonly bigint[]): bigint[] {
  return a.map((v, i) => v - (b[i] ?? 0n));
}

function accumulateVector(values: readonly bigint[], restarts: readonly boolean[]): bigint[] {
  let running = 0n;
  return values.map((v, i) => {
    if (restarts[i] === true) running = 0n;
    running += v;
    return running;
  });
}

/**
 * Flags the periods where a running total restarts. The first period
 * always starts from zero; yearly totals also restart at each change of
 * calendar year.
 */
export function runningRestarts(periods: readonly string[], reset: RunningReset): boolean[] {
  return periods.map(
    (period, p) =>
      p === 0 || (reset === "year" && period.slice(0, 4) !== periods[p - 1]?.slice(0, 4)),
  );
}

/**
 * Compute every outline row, then drop all-zero account rows.
 */
export function computeRollup(input: RollupInput): ComputedRow[] {
  const { outline, index, periods, entityCodes } = input;
  const computed = new Map<string, ComputedRow>();
  const zeroGrid = new ValueGrid(periods.length, entityCodes.length);
  const zeroBudget: readonly bigint[] = periods.map(() => 0n);

  const lookup = (owner: OutlineRow, id: string): ComputedRow => {
    const found = computed.get(id);
    if (found === undefined) {
      throw new ReportError(
        "INVALID_OUTLINE",
        `Row "${owner.name}" references "${id}", which does not precede it`,
      );
    }
    return found;
  };

  const evaluate = (row: OutlineRow, formula: RowFormula): ComputedRow => {
    switch (formula.kind) {
      case "none":
        return { row, values: zeroGrid, budget: zeroBudget };

      case "leaf": {
        const values = new ValueGrid(periods.length, entityCodes.length);
        periods.forEach((period, p) => {
          entityCodes.forEach((code, e) => {
            values.set(p, e, index.amount(period, code, formula.accountCode));
          });
        });
        const budget = periods.map((period) => index.budget(period, formula.accountCode));
        return { row, values, budget };
      }

      case "sum": {
        let values = zeroGrid;
        let budget = zeroBudget;
        for (const id of formula.of) {
          const member = lookup(row, id);
          values = values.plus(member.values);
          budget = addVectors(budget, member.budget);
        }
        return { row, values, budget };
      }

      case "difference": {
        const minuend = lookup(row, formula.minuend);
        let values = minuend.values;
        let budget = minuend.budget;
        for (const id of formula.subtrahends) {
          const subtrahend = lookup(row, id);
          values = values.minus(subtrahend.values);
          budget = subtractVectors(budget, subtrahend.budget);
        }
        return { row, values, budget };
      }

      case "running": {
        const source = lookup(row, formula.of);
        const restarts = runningRestarts(periods, formula.reset);
        return {
          row,
          values: source.values.accumulate(restarts),
          budget: accumulateVector(source.budget, restarts),
        };
      }
    }
  };

  const rows: ComputedRow[] = [];
  for (const row of outline) {
    if (computed.has(row.id)) {
      throw new ReportError("INVALID_OUTLINE", `Duplicate row id "${row.id}"`);
    }
    const result = evaluate(row, row.formula);
    computed.set(row.id, result);
    if (row.type === "account" && result.values.isZero()) continue;
    rows.push(result);
  }
  return rows;
}

/**
 * For each (period, entity) column: does any emitted row hold a non-zero
 * value there? Indexed [period][entity].
 */
export function activeColumns(
  rows: readonly ComputedRow[],
  periodCount: number,
  entityCount: number,
): boolean[][] {
  const active: boolean[][] = [];
  for (let p = 0; p < periodCount; p++) {
    const line: boolean[] = [];
    for (let e = 0; e < entityCount; e++) {
      line.push(rows.some((r) => r.values.get(p, e) !== 0n));
    }
    active.push(line);
  }
  return active;
}
