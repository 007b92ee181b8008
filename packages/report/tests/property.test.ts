/**
 * Property-Based Tests for @consolidator/report
 *
 * Uses fast-check to verify laws that must hold for ANY set of facts:
 *
 * 1. Idempotence (same store, same request → byte-identical output)
 * 2. Additivity (period TOTAL = sum of entity cells; grand totals agree)
 * 3. Net income identity (NET INCOME = TOTAL REVENUE − TOTAL EXPENSES)
 * 4. Balance Sheet check law (CHECK = ASSETS − LIABILITIES − EQUITY)
 * 5. Sparsity (every account row holds a non-zero entity cell)
 * 6. Column suppression (a company column is hidden iff all its cells are empty)
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { formatAmount } from "@consolidator/amounts";
import type { FactRecord } from "@consolidator/types";
import { generateBalanceSheet, generateProfitAndLoss } from "../src/engine.js";
import type { GridRow, ReportRequest, ReportResult } from "../src/types.js";
import { buildStore, fact } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ENTITY_CODES = ["F2001", "F2002"] as const;
const PERIODS = ["2024-01-01", "2024-02-01", "2024-03-01"] as const;
const PL_ACCOUNTS = ["4000", "4100", "5000", "6000"] as const;
const BS_ACCOUNTS = ["1000", "2000", "3000"] as const;

const REQUEST: ReportRequest = { dataType: "actual" };

/** Amount in cents, or absent. Includes zero, which must behave like absent. */
const arbCents = fc.option(fc.integer({ min: -5_000_000, max: 5_000_000 }), { nil: null });

/**
 * One optional fact per (entity, account, period) cell, so keys never repeat.
 */
function arbFacts(accounts: readonly string[]): fc.Arbitrary<FactRecord[]> {
  const keys: [string, string, string][] = [];
  for (const entity of ENTITY_CODES) {
    for (const accountCode of accounts) {
      for (const period of PERIODS) keys.push([entity, accountCode, period]);
    }
  }
  return fc
    .array(arbCents, { minLength: keys.length, maxLength: keys.length })
    .map((amounts) => {
      const facts: FactRecord[] = [];
      amounts.forEach((cents, i) => {
        const key = keys[i];
        if (cents === null || key === undefined) return;
        facts.push(fact(key[0], key[1], key[2], formatAmount(BigInt(cents))));
      });
      return facts;
    });
}

// =============================================================================
// Helpers
// =============================================================================

/** Cell value in cents; empty cells are zero. */
function centsAt(row: GridRow, field: string): number {
  const value = row[field];
  return typeof value === "number" ? Math.round(value * 100) : 0;
}

function named(result: ReportResult, name: string): GridRow | undefined {
  return result.rowData.find((r) => r.account_name === name);
}

function cellFields(result: ReportResult): string[] {
  return result.columnDefs.map((c) => c.field);
}

// =============================================================================
// Properties
// =============================================================================

describe("report laws", () => {
  it("is idempotent", () => {
    fc.assert(
      fc.property(arbFacts(PL_ACCOUNTS), (facts) => {
        const store = buildStore(facts);
        const first = generateProfitAndLoss(store, REQUEST, { dualStream: false });
        const second = generateProfitAndLoss(store, REQUEST, { dualStream: false });
        expect(JSON.stringify(second)).toBe(JSON.stringify(first));
      }),
      { numRuns: 50 },
    );
  });

  it("adds entity cells into period and grand totals", () => {
    fc.assert(
      fc.property(arbFacts(PL_ACCOUNTS), (facts) => {
        const result = generateProfitAndLoss(buildStore(facts), REQUEST, { dualStream: false });
        const companies = result.columnDefs.filter((c) => c.colType === "company");
        const periodKeys = [...new Set(companies.map((c) => c.periodKey))];
        const totals = result.columnDefs.filter((c) => c.colType === "total");
        const grandCompanies = result.columnDefs.filter((c) => c.colType === "grand_company");

        for (const row of result.rowData) {
          let grand = 0;
          for (const key of periodKeys) {
            const sum = companies
              .filter((c) => c.periodKey === key)
              .reduce((acc, c) => acc + centsAt(row, c.field), 0);
            const total = totals.find((c) => c.periodKey === key);
            expect(total === undefined ? 0 : centsAt(row, total.field)).toBe(sum);
            grand += sum;
          }
          const byEntity = grandCompanies.reduce((acc, c) => acc + centsAt(row, c.field), 0);
          expect(byEntity).toBe(grand);
          expect(centsAt(row, "grand_total_TOTAL")).toBe(grand);
        }
      }),
      { numRuns: 50 },
    );
  });

  it("keeps NET INCOME = TOTAL REVENUE − TOTAL EXPENSES in every column", () => {
    fc.assert(
      fc.property(arbFacts(PL_ACCOUNTS), (facts) => {
        const result = generateProfitAndLoss(buildStore(facts), REQUEST, { dualStream: false });
        if (result.error !== undefined) return;
        const revenue = named(result, "TOTAL REVENUE");
        const expenses = named(result, "TOTAL EXPENSES");
        const net = named(result, "NET INCOME");
        if (revenue === undefined || expenses === undefined || net === undefined) {
          throw new Error("P&L totals missing");
        }

        for (const field of cellFields(result)) {
          expect(centsAt(net, field)).toBe(centsAt(revenue, field) - centsAt(expenses, field));
        }
      }),
      { numRuns: 50 },
    );
  });

  it("keeps CHECK = TOTAL ASSETS − TOTAL LIABILITIES − TOTAL EQUITY in every column", () => {
    fc.assert(
      fc.property(arbFacts(BS_ACCOUNTS), (facts) => {
        const result = generateBalanceSheet(buildStore(facts), REQUEST, { dualStream: false });
        if (result.error !== undefined) return;
        const assets = named(result, "TOTAL ASSETS");
        const liabilities = named(result, "TOTAL LIABILITIES");
        const equity = named(result, "TOTAL EQUITY");
        const check = named(result, "CHECK (Assets - Liabilities - Equity)");
        if (
          assets === undefined ||
          liabilities === undefined ||
          equity === undefined ||
          check === undefined
        ) {
          throw new Error("Balance Sheet totals missing");
        }

        for (const field of cellFields(result)) {
          expect(centsAt(check, field)).toBe(
            centsAt(assets, field) - centsAt(liabilities, field) - centsAt(equity, field),
          );
        }
      }),
      { numRuns: 50 },
    );
  });

  it("emits an account row only when some entity cell is non-zero", () => {
    fc.assert(
      fc.property(arbFacts(PL_ACCOUNTS), (facts) => {
        const result = generateProfitAndLoss(buildStore(facts), REQUEST, { dualStream: false });
        const companyFields = result.columnDefs
          .filter((c) => c.colType === "company")
          .map((c) => c.field);

        for (const row of result.rowData.filter((r) => r.rowType === "account")) {
          expect(companyFields.some((field) => centsAt(row, field) !== 0)).toBe(true);
        }

        const nonZeroCodes = new Set(
          facts.filter((f) => f.amount !== "0.00").map((f) => f.accountCode),
        );
        const emittedCodes = new Set(
          result.rowData.filter((r) => r.rowType === "account").map((r) => r.account_code),
        );
        expect(emittedCodes).toEqual(nonZeroCodes);
      }),
      { numRuns: 50 },
    );
  });

  it("hides a company column iff every row is empty there", () => {
    fc.assert(
      fc.property(arbFacts(PL_ACCOUNTS), (facts) => {
        const result = generateProfitAndLoss(buildStore(facts), REQUEST, { dualStream: false });

        for (const column of result.columnDefs.filter((c) => c.colType === "company")) {
          const empty = result.rowData.every((row) => row[column.field] === null);
          expect(column.hide).toBe(empty);
        }
      }),
      { numRuns: 50 },
    );
  });
});
