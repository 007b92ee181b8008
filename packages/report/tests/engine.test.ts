/**
 * Tests for the report engine entry points.
 *
 * Verifies end to end, against an in-memory store:
 * - The single-company P&L scenario
 * - Balance Sheet totals and the check row
 * - Dual-stream budget columns
 * - Column hiding and entity selection
 * - Empty results, the period bound and option validation
 * - Debug info and deterministic output
 */

import { describe, it, expect } from "vitest";
import { generateBalanceSheet, generateProfitAndLoss, generateReport } from "../src/engine.js";
import type { ReportRequest } from "../src/types.js";
import { ReportError } from "../src/types.js";
import { buildStore, cells, fact, rowNamed } from "./helpers.js";

const Q1_2024: ReportRequest = {
  fromMonth: 1,
  fromYear: 2024,
  toMonth: 3,
  toYear: 2024,
  dataType: "actual",
};

const JAN = "2024-01-01";
const FEB = "2024-02-01";

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ReportError) return err.code;
    throw err;
  }
  return undefined;
}

// =============================================================================
// Profit and Loss
// =============================================================================

describe("generateProfitAndLoss", () => {
  const store = buildStore([
    fact("F2001", "4000", JAN, "100.00"),
    fact("F2001", "5000", JAN, "40.00"),
  ]);
  const result = generateProfitAndLoss(store, Q1_2024, { dualStream: false });

  it("builds one column per reporting entity plus totals", () => {
    expect(result.columnDefs).toEqual([
      {
        field: "Jan-24_F2001",
        headerName: "Jan-24 F2001",
        colType: "company",
        periodKey: "2024-01",
        companyCode: "F2001",
        hide: false,
      },
      {
        field: "Jan-24_TOTAL",
        headerName: "Jan-24 TOTAL",
        colType: "total",
        periodKey: "2024-01",
        hide: false,
      },
      {
        field: "grand_total_F2001",
        headerName: "Grand Total F2001",
        colType: "grand_company",
        companyCode: "F2001",
        hide: false,
      },
      {
        field: "grand_total_TOTAL",
        headerName: "Grand Total",
        colType: "grand_overall",
        hide: false,
      },
    ]);
  });

  it("computes revenue, expenses and net income", () => {
    const fields = ["Jan-24_F2001", "Jan-24_TOTAL", "grand_total_F2001", "grand_total_TOTAL"];

    expect(cells(rowNamed(result, "TOTAL REVENUE"), fields)).toEqual({
      "Jan-24_F2001": 100,
      "Jan-24_TOTAL": 100,
      grand_total_F2001: 100,
      grand_total_TOTAL: 100,
    });
    expect(rowNamed(result, "TOTAL EXPENSES")["Jan-24_TOTAL"]).toBe(40);
    expect(rowNamed(result, "Gross Profit")["Jan-24_TOTAL"]).toBe(60);
    expect(rowNamed(result, "NET INCOME")).toEqual({
      account_code: "",
      account_name: "NET INCOME",
      rowType: "net_income",
      sort_order: 0,
      section: "summary",
      level: 0,
      styleToken: "net-income",
      rowKey: "net_income__net-income__0",
      "Jan-24_F2001": 60,
      "Jan-24_TOTAL": 60,
      grand_total_F2001: 60,
      grand_total_TOTAL: 60,
    });
  });

  it("emits only accounts with values and every structural row", () => {
    expect(result.rowData.map((r) => r.account_name)).toEqual([
      "Revenue",
      "Sales",
      "Total Revenue",
      "TOTAL REVENUE",
      "EXPENSES",
      "Cost of Funds and Fees",
      "Bank Fees",
      "Total Cost of Funds and Fees",
      "Gross Profit",
      "Operating Expenses",
      "Total Operating Expenses",
      "TOTAL EXPENSES",
      "NET INCOME",
    ]);
  });

  it("serializes zero cells as null", () => {
    expect(rowNamed(result, "Operating Expenses")["Jan-24_F2001"]).toBeNull();
    expect(rowNamed(result, "Total Operating Expenses")["grand_total_TOTAL"]).toBeNull();
  });

  it("writes row metadata before the cells", () => {
    expect(Object.keys(rowNamed(result, "Sales"))).toEqual([
      "account_code",
      "account_name",
      "rowType",
      "sort_order",
      "section",
      "level",
      "styleToken",
      "rowKey",
      "Jan-24_F2001",
      "Jan-24_TOTAL",
      "grand_total_F2001",
      "grand_total_TOTAL",
    ]);
  });

  it("keys rows by code, style token or name", () => {
    expect(rowNamed(result, "Sales").rowKey).toBe("account__4000__10");
    expect(rowNamed(result, "Revenue").rowKey).toBe("sub_header__revenue__10");
    expect(rowNamed(result, "Gross Profit").rowKey).toBe("total__gross-profit__31");
  });

  it("returns identical output for identical input", () => {
    const again = generateProfitAndLoss(store, Q1_2024, { dualStream: false });

    expect(JSON.stringify(again)).toBe(JSON.stringify(result));
  });

  it("passes the sub-category order and gross-profit predicate through", () => {
    const reordered = generateProfitAndLoss(store, Q1_2024, {
      dualStream: false,
      subCategoryOrder: ["Operating Expenses"],
      grossProfitAfter: () => false,
    });
    const subHeaders = reordered.rowData
      .filter((r) => r.rowType === "sub_header")
      .map((r) => r.account_name);

    expect(subHeaders).toEqual(["Revenue", "Operating Expenses", "Cost of Funds and Fees"]);
    expect(reordered.rowData.map((r) => r.account_name)).not.toContain("Gross Profit");
  });

  it("attaches debug info on request", () => {
    const debug = generateProfitAndLoss(store, Q1_2024, {
      dualStream: false,
      includeDebugInfo: true,
    });

    expect(debug.debug_info).toEqual({
      report: "profit_and_loss",
      data_type: "actual",
      dual_stream: false,
      periods_count: 1,
      periods: [JAN],
      entity_codes: ["F2001"],
      aggregate_entity: null,
      dimension_count: 4,
      fact_count: 2,
      budget_fact_count: 0,
    });
    expect(result.debug_info).toBeUndefined();
  });
});

// =============================================================================
// Balance Sheet
// =============================================================================

describe("generateBalanceSheet", () => {
  const store = buildStore([
    fact("F2001", "1000", JAN, "500.00"),
    fact("F2001", "2000", JAN, "200.00"),
    fact("F2001", "3000", JAN, "250.00"),
    fact("F2002", "1000", JAN, "300.00"),
    fact("F2002", "2000", JAN, "100.00"),
    fact("F2002", "3000", JAN, "200.00"),
  ]);
  const result = generateBalanceSheet(store, Q1_2024, { dualStream: false });
  const fields = ["Jan-24_F2001", "Jan-24_F2002", "Jan-24_TOTAL", "grand_total_TOTAL"];

  it("totals each section per entity", () => {
    expect(cells(rowNamed(result, "TOTAL ASSETS"), fields)).toEqual({
      "Jan-24_F2001": 500,
      "Jan-24_F2002": 300,
      "Jan-24_TOTAL": 800,
      grand_total_TOTAL: 800,
    });
  });

  it("reports the imbalance on the check row", () => {
    expect(cells(rowNamed(result, "CHECK (Assets - Liabilities - Equity)"), fields)).toEqual({
      "Jan-24_F2001": 50,
      "Jan-24_F2002": null,
      "Jan-24_TOTAL": 50,
      grand_total_TOTAL: 50,
    });
  });

  it("labels rows with their section", () => {
    expect(rowNamed(result, "Payables").section).toBe("liability");
    expect(rowNamed(result, "TOTAL EQUITY").rowType).toBe("parent_total");
    expect(rowNamed(result, "CHECK (Assets - Liabilities - Equity)").section).toBe("summary");
  });

  it("ignores income and expense facts", () => {
    const mixed = buildStore([fact("F2001", "4000", JAN, "100.00")]);

    expect(generateBalanceSheet(mixed, Q1_2024, { dualStream: false }).error).toBe(
      "No Balance Sheet data found. Please check if Asset, Liability and Equity accounts are properly loaded.",
    );
  });
});

// =============================================================================
// Budget streams
// =============================================================================

describe("budget and forecast reports", () => {
  const store = buildStore([
    fact("F2001", "4000", JAN, "100.00"),
    fact("F2001", "4000", JAN, "80.00", "budget"),
    fact("F2002", "5000", JAN, "30.00"),
    fact("BUD", "4000", JAN, "150.00", "budget"),
    fact("BUD", "5000", FEB, "20.00", "budget"),
  ]);
  const budgetRequest: ReportRequest = { ...Q1_2024, dataType: "budget" };

  it("shows the consolidated budget beside actuals in dual-stream mode", () => {
    const result = generateProfitAndLoss(store, budgetRequest, { dualStream: true });

    expect(result.columnDefs.map((c) => [c.field, c.hide])).toEqual([
      ["Jan-24_F2001", false],
      ["Jan-24_F2002", false],
      ["Jan-24_TOTAL", false],
      ["Jan-24_Budget", false],
      ["Feb-24_F2001", true],
      ["Feb-24_F2002", true],
      ["Feb-24_TOTAL", false],
      ["Feb-24_Budget", false],
      ["grand_total_F2001", false],
      ["grand_total_F2002", false],
      ["grand_total_TOTAL", false],
      ["grand_total_Budget", false],
    ]);
    expect(cells(rowNamed(result, "NET INCOME"), result.columnDefs.map((c) => c.field))).toEqual({
      "Jan-24_F2001": 100,
      "Jan-24_F2002": -30,
      "Jan-24_TOTAL": 70,
      "Jan-24_Budget": 150,
      "Feb-24_F2001": null,
      "Feb-24_F2002": null,
      "Feb-24_TOTAL": null,
      "Feb-24_Budget": -20,
      grand_total_F2001: 100,
      grand_total_F2002: -30,
      grand_total_TOTAL: 70,
      grand_total_Budget: 130,
    });
  });

  it("surfaces the budget only on subtotal and total rows", () => {
    const result = generateProfitAndLoss(store, budgetRequest, { dualStream: true });

    expect(cells(rowNamed(result, "Sales"), ["Jan-24_Budget", "grand_total_Budget"])).toEqual({
      "Jan-24_Budget": null,
      grand_total_Budget: null,
    });
    expect(
      cells(rowNamed(result, "Total Revenue"), ["Jan-24_Budget", "Feb-24_Budget", "grand_total_Budget"]),
    ).toEqual({ "Jan-24_Budget": 150, "Feb-24_Budget": null, grand_total_Budget: 150 });
    expect(
      cells(rowNamed(result, "TOTAL EXPENSES"), ["Jan-24_Budget", "Feb-24_Budget", "grand_total_Budget"]),
    ).toEqual({ "Jan-24_Budget": null, "Feb-24_Budget": 20, grand_total_Budget: 20 });
  });

  it("reads budget facts per entity without dual-stream mode", () => {
    const result = generateProfitAndLoss(store, budgetRequest, { dualStream: false });

    expect(result.columnDefs.map((c) => c.field)).toEqual([
      "Jan-24_F2001",
      "Jan-24_TOTAL",
      "Jan-24_Budget",
      "grand_total_F2001",
      "grand_total_TOTAL",
      "grand_total_Budget",
    ]);
    expect(
      cells(rowNamed(result, "NET INCOME"), ["Jan-24_F2001", "Jan-24_Budget", "grand_total_Budget"]),
    ).toEqual({ "Jan-24_F2001": 80, "Jan-24_Budget": null, grand_total_Budget: null });
  });

  it("has no budget columns for actual reports in dual-stream mode", () => {
    const result = generateProfitAndLoss(store, Q1_2024, { dualStream: true });

    expect(result.columnDefs.map((c) => c.colType)).not.toContain("budget");
    expect(result.columnDefs.map((c) => c.companyCode)).not.toContain("BUD");
  });

  it("names the aggregate in debug info", () => {
    const result = generateReport("profit_and_loss", store, budgetRequest, {
      dualStream: true,
      includeDebugInfo: true,
    });

    expect(result.debug_info?.aggregate_entity).toBe("BUD");
    expect(result.debug_info?.budget_fact_count).toBe(2);
  });
});

// =============================================================================
// Columns and entities
// =============================================================================

describe("column visibility", () => {
  it("hides entity columns that are zero in every row", () => {
    const store = buildStore([
      fact("F2001", "4000", JAN, "100.00"),
      fact("F2002", "4000", FEB, "50.00"),
    ]);
    const result = generateProfitAndLoss(store, Q1_2024, { dualStream: false });
    const hidden = result.columnDefs.filter((c) => c.hide).map((c) => c.field);

    expect(hidden).toEqual(["Jan-24_F2002", "Feb-24_F2001"]);
  });

  it("hides the grand total of an entity whose facts are all zero", () => {
    const store = buildStore([
      fact("F2001", "4000", JAN, "100.00"),
      fact("F2002", "4000", JAN, "0.00"),
    ]);
    const result = generateProfitAndLoss(store, Q1_2024, { dualStream: false });

    expect(result.columnDefs.filter((c) => c.hide).map((c) => c.field)).toEqual([
      "Jan-24_F2002",
      "grand_total_F2002",
    ]);
  });

  it("leaves out entities without facts in the selected months", () => {
    const store = buildStore([
      fact("F2001", "4000", JAN, "100.00"),
      fact("F2002", "4000", "2023-12-01", "50.00"),
    ]);
    const result = generateProfitAndLoss(store, Q1_2024, { dualStream: false });

    expect(result.columnDefs.map((c) => c.companyCode).filter((c) => c !== undefined)).toEqual([
      "F2001",
      "F2001",
    ]);
  });
});

// =============================================================================
// Empty results and options
// =============================================================================

describe("empty results and options", () => {
  const store = buildStore([
    fact("F2001", "4000", JAN, "100.00"),
    fact("F2001", "4000", FEB, "100.00"),
    fact("F2001", "4000", "2024-03-01", "100.00"),
  ]);

  it("returns the available range instead of widening the selection", () => {
    const result = generateProfitAndLoss(
      store,
      { fromMonth: 6, fromYear: 2024, toMonth: 12, toYear: 2024, dataType: "actual" },
      { dualStream: false },
    );

    expect(result).toEqual({
      columnDefs: [],
      rowData: [],
      error:
        "No P&L data found for selected period. P&L data is available from January 2024 to March 2024",
      available_range: { start: JAN, end: "2024-03-01" },
    });
  });

  it("bounds the number of months", () => {
    const result = generateProfitAndLoss(store, Q1_2024, { dualStream: false, maxPeriods: 2 });

    expect(result.rowData).toEqual([]);
    expect(result.error).toBe(
      "Selected range covers 3 months with P&L data; narrow it to at most 2 months.",
    );
  });

  it.each([0, -1, 1.5])("rejects maxPeriods %s", (maxPeriods) => {
    expect(
      errorCode(() => generateProfitAndLoss(store, Q1_2024, { dualStream: false, maxPeriods })),
    ).toBe("INVALID_OPTIONS");
  });
});

// =============================================================================
// Running totals
// =============================================================================

describe("running totals", () => {
  const NOV_23 = "2023-11-01";
  const DEC_23 = "2023-12-01";
  const store = buildStore([
    fact("F2001", "4000", NOV_23, "100.00"),
    fact("F2001", "4000", DEC_23, "50.00"),
    fact("F2001", "6000", DEC_23, "20.00"),
    fact("F2001", "4000", JAN, "70.00"),
    fact("F2001", "6000", FEB, "10.00"),
    fact("BUD", "4000", NOV_23, "80.00", "budget"),
    fact("BUD", "4000", JAN, "50.00", "budget"),
  ]);
  const request: ReportRequest = {
    fromMonth: 11,
    fromYear: 2023,
    toMonth: 2,
    toYear: 2024,
    dataType: "actual",
  };
  const entityFields = ["Nov-23_F2001", "Dec-23_F2001", "Jan-24_F2001", "Feb-24_F2001"];
  const result = generateProfitAndLoss(store, request, { dualStream: false, runningTotals: true });

  it("follows NET INCOME with the YTD and cumulative rows", () => {
    expect(result.rowData.slice(-3).map((r) => [r.account_name, r.rowType, r.rowKey])).toEqual([
      ["NET INCOME", "net_income", "net_income__net-income__0"],
      ["NET INCOME YTD", "metric", "metric__net-income-ytd__0"],
      ["NET INCOME Cumulative", "metric", "metric__net-income-cumulative__0"],
    ]);
  });

  it("restarts the YTD total at the new year", () => {
    expect(cells(rowNamed(result, "NET INCOME"), entityFields)).toEqual({
      "Nov-23_F2001": 100,
      "Dec-23_F2001": 30,
      "Jan-24_F2001": 70,
      "Feb-24_F2001": -10,
    });
    expect(cells(rowNamed(result, "NET INCOME YTD"), entityFields)).toEqual({
      "Nov-23_F2001": 100,
      "Dec-23_F2001": 130,
      "Jan-24_F2001": 70,
      "Feb-24_F2001": 60,
    });
  });

  it("runs the cumulative total across every selected month", () => {
    expect(cells(rowNamed(result, "NET INCOME Cumulative"), entityFields)).toEqual({
      "Nov-23_F2001": 100,
      "Dec-23_F2001": 130,
      "Jan-24_F2001": 200,
      "Feb-24_F2001": 190,
    });
    expect(rowNamed(result, "NET INCOME Cumulative")["Feb-24_TOTAL"]).toBe(190);
  });

  it("reports the closing value as the grand total", () => {
    const fields = ["grand_total_F2001", "grand_total_TOTAL"];

    expect(cells(rowNamed(result, "NET INCOME"), fields)).toEqual({
      grand_total_F2001: 190,
      grand_total_TOTAL: 190,
    });
    expect(cells(rowNamed(result, "NET INCOME YTD"), fields)).toEqual({
      grand_total_F2001: 60,
      grand_total_TOTAL: 60,
    });
    expect(cells(rowNamed(result, "NET INCOME Cumulative"), fields)).toEqual({
      grand_total_F2001: 190,
      grand_total_TOTAL: 190,
    });
  });

  it("accumulates the consolidated budget in dual-stream mode", () => {
    const budget = generateProfitAndLoss(
      store,
      { ...request, dataType: "budget" },
      { dualStream: true, runningTotals: true },
    );
    const fields = [
      "Nov-23_Budget",
      "Dec-23_Budget",
      "Jan-24_Budget",
      "Feb-24_Budget",
      "grand_total_Budget",
    ];

    expect(cells(rowNamed(budget, "NET INCOME"), fields)).toEqual({
      "Nov-23_Budget": 80,
      "Dec-23_Budget": null,
      "Jan-24_Budget": 50,
      "Feb-24_Budget": null,
      grand_total_Budget: 130,
    });
    expect(cells(rowNamed(budget, "NET INCOME YTD"), fields)).toEqual({
      "Nov-23_Budget": 80,
      "Dec-23_Budget": 80,
      "Jan-24_Budget": 50,
      "Feb-24_Budget": 50,
      grand_total_Budget: 50,
    });
    expect(cells(rowNamed(budget, "NET INCOME Cumulative"), fields)).toEqual({
      "Nov-23_Budget": 80,
      "Dec-23_Budget": 80,
      "Jan-24_Budget": 130,
      "Feb-24_Budget": 130,
      grand_total_Budget: 130,
    });
  });

  it("leaves the rows out unless enabled", () => {
    const plain = generateProfitAndLoss(store, request, { dualStream: false });

    expect(plain.rowData.map((r) => r.rowType)).not.toContain("metric");
  });
});
