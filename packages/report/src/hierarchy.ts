/**
 * @consolidator/report — Hierarchy Builder.
 *
 * Turns flat chart-of-accounts records into an ordered report outline:
 * sub-category groups of leaf accounts, wrapped in header, subtotal and
 * total rows, plus derived rows expressed as formulas over earlier rows.
 *
 * Rules:
 * - Only leaf accounts (non-empty code, recognized type) are grouped
 * - Groups partition by (account type, label); the same label under two
 *   types yields two disjoint groups
 * - Group order: canonical labels first, then first-seen order
 * - Accounts keep sortOrder ascending within a group, stable on ties
 * - Formulas only reference rows that were emitted earlier
 */

import { isLeafAccount } from "@consolidator/types";
import type { AccountCategory, AccountDimension } from "@consolidator/types";
import type { OutlineRow, RowFormula, RowType } from "./types.js";
import { slugify } from "./slug.js";

// =============================================================================
// Groups
// =============================================================================

export const UNCATEGORIZED = "UNCATEGORIZED";

const GROSS_PROFIT_LABEL = "COST OF FUNDS AND FEES";

export interface LeafAccount {
  readonly accountCode: string;
  readonly accountName: string;
  readonly accountType: AccountCategory;
  readonly sortOrder: number;

  /** Sub-category label; blank labels become UNCATEGORIZED */
  readonly label: string;
}

export interface SubCategoryGroup {
  readonly accountType: AccountCategory;
  readonly label: string;

  /** Minimum sortOrder among member accounts */
  readonly sortOrder: number;

  readonly accounts: readonly LeafAccount[];
}

/**
 * Matches the expense group whose normalized label is
 * "COST OF FUNDS AND FEES".
 */
export function defaultGrossProfitAfter(subCategory: string): boolean {
  return subCategory.trim().toUpperCase() === GROSS_PROFIT_LABEL;
}

function groupLabel(subCategory: string): string {
  return subCategory.trim() === "" ? UNCATEGORIZED : subCategory;
}

/**
 * Order sub-category labels: canonical labels that occur come first in
 * canonical order, every other label follows in first-seen order.
 *
 * Without a canonical list, labels are ordered by their minimum
 * sortOrder (ties keep first-seen order).
 */
export function orderLabels(
  leaves: readonly LeafAccount[],
  canonicalOrder?: readonly string[],
): string[] {
  const firstSeen: string[] = [];
  const minSort = new Map<string, number>();
  for (const leaf of leaves) {
    const label = leaf.label;
    const current = minSort.get(label);
    if (current === undefined) {
      firstSeen.push(label);
      minSort.set(label, leaf.sortOrder);
    } else if (leaf.sortOrder < current) {
      minSort.set(label, leaf.sortOrder);
    }
  }

  const canonical =
    canonicalOrder ??
    [...firstSeen].sort((a, b) => (minSort.get(a) ?? 0) - (minSort.get(b) ?? 0));

  const present = new Set(firstSeen);
  const ordered: string[] = [];
  for (const label of canonical) {
    if (present.has(label) && !ordered.includes(label)) ordered.push(label);
  }
  for (const label of firstSeen) {
    if (!ordered.includes(label)) ordered.push(label);
  }
  return ordered;
}

/**
 * Select leaf accounts of the given types, ordered by sortOrder.
 */
export function selectLeaves(
  dimensions: readonly AccountDimension[],
  accountTypes: readonly AccountCategory[],
): LeafAccount[] {
  const leaves: LeafAccount[] = [];
  for (const record of dimensions) {
    if (!isLeafAccount(record) || !accountTypes.includes(record.accountType)) continue;
    leaves.push({
      accountCode: record.accountCode.trim(),
      accountName: record.accountName,
      accountType: record.accountType,
      sortOrder: record.sortOrder,
      label: groupLabel(record.subCategory),
    });
  }
  return leaves.sort((a, b) => a.sortOrder - b.sortOrder);
}

/**
 * Build the ordered sub-category groups for the given account types.
 * Groups come out type by type, in `accountTypes` order.
 */
export function groupAccounts(
  dimensions: readonly AccountDimension[],
  accountTypes: readonly AccountCategory[],
  canonicalOrder?: readonly string[],
): SubCategoryGroup[] {
  const leaves = selectLeaves(dimensions, accountTypes);
  const labels = orderLabels(leaves, canonicalOrder);

  const groups: SubCategoryGroup[] = [];
  for (const accountType of accountTypes) {
    for (const label of labels) {
      const accounts = leaves.filter(
        (leaf) => leaf.accountType === accountType && leaf.label === label,
      );
      if (accounts.length === 0) continue;
      groups.push({
        accountType,
        label,
        sortOrder: Math.min(...accounts.map((a) => a.sortOrder)),
        accounts,
      });
    }
  }
  return groups;
}

// =============================================================================
// Outline construction
// =============================================================================

interface RowSpec {
  readonly type: RowType;
  readonly name: string;
  readonly accountCode?: string;
  readonly sortOrder: number;
  readonly section: string;
  readonly level: number;
  readonly styleToken?: string;
  readonly formula: RowFormula;
}

class OutlineWriter {
  readonly rows: OutlineRow[] = [];

  push(spec: RowSpec): string {
    const id = `${spec.type}:${String(this.rows.length)}`;
    this.rows.push({
      id,
      type: spec.type,
      name: spec.name,
      accountCode: spec.accountCode ?? "",
      sortOrder: spec.sortOrder,
      section: spec.section,
      level: spec.level,
      styleToken: spec.styleToken ?? slugify(spec.name),
      formula: spec.formula,
    });
    return id;
  }

  /**
   * sub_header, one account row per member, sub_total.
   * Returns the subtotal row id.
   */
  pushGroup(group: SubCategoryGroup, section: string): string {
    const styleToken = slugify(group.label);
    this.push({
      type: "sub_header",
      name: group.label,
      sortOrder: group.sortOrder,
      section,
      level: 1,
      styleToken,
      formula: { kind: "none" },
    });

    const leafIds = group.accounts.map((account) =>
      this.push({
        type: "account",
        name: account.accountName,
        accountCode: account.accountCode,
        sortOrder: account.sortOrder,
        section,
        level: 2,
        styleToken,
        formula: { kind: "leaf", accountCode: account.accountCode },
      }),
    );

    return this.push({
      type: "sub_total",
      name: `Total ${group.label}`,
      sortOrder: group.sortOrder,
      section,
      level: 1,
      styleToken,
      formula: { kind: "sum", of: leafIds },
    });
  }
}

export interface ProfitAndLossOutlineOptions {
  readonly subCategoryOrder?: readonly string[];
  readonly grossProfitAfter?: (subCategory: string) => boolean;

  /** Follow NET INCOME with its year-to-date and cumulative running totals */
  readonly runningTotals?: boolean;
}

/**
 * P&L layout:
 *
 *   income groups … TOTAL REVENUE
 *   EXPENSES
 *   expense groups … [Gross Profit after the cost-of-funds group]
 *   TOTAL EXPENSES
 *   NET INCOME = TOTAL REVENUE − TOTAL EXPENSES
 *   [NET INCOME YTD, NET INCOME Cumulative]
 */
export function buildProfitAndLossOutline(
  dimensions: readonly AccountDimension[],
  options: ProfitAndLossOutlineOptions = {},
): OutlineRow[] {
  const grossProfitAfter = options.grossProfitAfter ?? defaultGrossProfitAfter;
  const groups = groupAccounts(dimensions, ["INCOME", "EXPENSE"], options.subCategoryOrder);
  const out = new OutlineWriter();

  const incomeSubtotals = groups
    .filter((g) => g.accountType === "INCOME")
    .map((g) => out.pushGroup(g, "income"));

  const totalRevenue = out.push({
    type: "total",
    name: "TOTAL REVENUE",
    sortOrder: 0,
    section: "income",
    level: 0,
    formula: { kind: "sum", of: incomeSubtotals },
  });

  out.push({
    type: "section_header",
    name: "EXPENSES",
    sortOrder: 0,
    section: "expense",
    level: 0,
    formula: { kind: "none" },
  });

  const expenseSubtotals: string[] = [];
  let grossProfitInserted = false;
  for (const group of groups.filter((g) => g.accountType === "EXPENSE")) {
    const subtotal = out.pushGroup(group, "expense");
    expenseSubtotals.push(subtotal);

    if (!grossProfitInserted && grossProfitAfter(group.label)) {
      out.push({
        type: "total",
        name: "Gross Profit",
        sortOrder: group.sortOrder + 1,
        section: "summary",
        level: 0,
        formula: { kind: "difference", minuend: totalRevenue, subtrahends: [subtotal] },
      });
      grossProfitInserted = true;
    }
  }

  const totalExpenses = out.push({
    type: "total",
    name: "TOTAL EXPENSES",
    sortOrder: 0,
    section: "expense",
    level: 0,
    formula: { kind: "sum", of: expenseSubtotals },
  });

  const netIncome = out.push({
    type: "net_income",
    name: "NET INCOME",
    sortOrder: 0,
    section: "summary",
    level: 0,
    formula: { kind: "difference", minuend: totalRevenue, subtrahends: [totalExpenses] },
  });

  if (options.runningTotals === true) {
    out.push({
      type: "metric",
      name: "NET INCOME YTD",
      sortOrder: 0,
      section: "summary",
      level: 0,
      formula: { kind: "running", of: netIncome, reset: "year" },
    });
    out.push({
      type: "metric",
      name: "NET INCOME Cumulative",
      sortOrder: 0,
      section: "summary",
      level: 0,
      formula: { kind: "running", of: netIncome, reset: "never" },
    });
  }

  return out.rows;
}

const BALANCE_SHEET_SECTIONS = [
  { type: "ASSET", display: "ASSETS" },
  { type: "LIABILITY", display: "LIABILITIES" },
  { type: "EQUITY", display: "EQUITY" },
] as const;

export interface BalanceSheetOutlineOptions {
  readonly subCategoryOrder?: readonly string[];
}

/**
 * Balance Sheet layout, sections always in ASSET, LIABILITY, EQUITY order:
 *
 *   ASSETS … TOTAL ASSETS
 *   LIABILITIES … TOTAL LIABILITIES
 *   EQUITY … TOTAL EQUITY
 *   CHECK (Assets - Liabilities - Equity)
 *
 * Empty sections are left out. The check row needs assets and at least
 * one of the other two sections.
 */
export function buildBalanceSheetOutline(
  dimensions: readonly AccountDimension[],
  options: BalanceSheetOutlineOptions = {},
): OutlineRow[] {
  const groups = groupAccounts(
    dimensions,
    BALANCE_SHEET_SECTIONS.map((s) => s.type),
    options.subCategoryOrder,
  );
  const out = new OutlineWriter();
  const sectionTotals = new Map<AccountCategory, string>();

  for (const { type, display } of BALANCE_SHEET_SECTIONS) {
    const sectionGroups = groups.filter((g) => g.accountType === type);
    if (sectionGroups.length === 0) continue;
    const section = type.toLowerCase();

    out.push({
      type: "parent_header",
      name: display,
      sortOrder: 0,
      section,
      level: 0,
      formula: { kind: "none" },
    });
    const subtotals = sectionGroups.map((g) => out.pushGroup(g, section));
    sectionTotals.set(
      type,
      out.push({
        type: "parent_total",
        name: `TOTAL ${display}`,
        sortOrder: 0,
        section,
        level: 0,
        formula: { kind: "sum", of: subtotals },
      }),
    );
  }

  const assets = sectionTotals.get("ASSET");
  const others = [sectionTotals.get("LIABILITY"), sectionTotals.get("EQUITY")].filter(
    (id): id is string => id !== undefined,
  );
  if (assets !== undefined && others.length > 0) {
    out.push({
      type: "check_row",
      name: "CHECK (Assets - Liabilities - Equity)",
      sortOrder: 0,
      section: "summary",
      level: 0,
      formula: { kind: "difference", minuend: assets, subtrahends: others },
    });
  }

  return out.rows;
}

/**
 * Account codes referenced by leaf rows, in outline order.
 */
export function outlineAccountCodes(outline: readonly OutlineRow[]): string[] {
  const codes: string[] = [];
  for (const row of outline) {
    if (row.formula.kind === "leaf") codes.push(row.formula.accountCode);
  }
  return codes;
}
