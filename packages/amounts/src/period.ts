/**
 * @consolidator/amounts — Month periods.
 *
 * A period is an ISO date pinned to the first day of its month
 * ("2024-01-01"). Everything here is string arithmetic over that form;
 * no time zones are involved.
 *
 * Rules:
 * - Header parsing returns null for anything it does not recognize
 * - Range construction never throws; bad bounds are simply absent
 * - Formatting helpers throw AmountError("INVALID_PERIOD") on bad input
 */

import { AmountError } from "./types.js";

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

const PERIOD_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])-01$/;

const MIN_HEADER_YEAR = 2020;
const MAX_HEADER_YEAR = 2099;

/** Inclusive-exclusive month window; absent sides are unbounded. */
export interface MonthRange {
  readonly start: string | undefined;
  readonly endExclusive: string | undefined;
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a period from a year and a 1-based month.
 */
export function toPeriod(year: number, month: number): string {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new AmountError("INVALID_PERIOD", `Invalid year: ${String(year)}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new AmountError("INVALID_PERIOD", `Invalid month: ${String(month)}`);
  }
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-01`;
}

function splitPeriod(period: string): { year: number; month: number } {
  const match = PERIOD_PATTERN.exec(period);
  if (match === null) {
    throw new AmountError("INVALID_PERIOD", `Invalid period: "${period}"`);
  }
  return { year: Number(match[1]), month: Number(match[2]) };
}

/**
 * The period immediately after `period`. "2024-12-01" → "2025-01-01".
 */
export function nextPeriod(period: string): string {
  const { year, month } = splitPeriod(period);
  return month === 12 ? toPeriod(year + 1, 1) : toPeriod(year, month + 1);
}

// =============================================================================
// Header parsing
// =============================================================================

function monthFromName(name: string): number | undefined {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex(
    (full) => full.toLowerCase() === lower || full.slice(0, 3).toLowerCase() === lower,
  );
  return index === -1 ? undefined : index + 1;
}

function headerPeriod(year: number, month: number | undefined): string | null {
  if (month === undefined || month < 1 || month > 12) {
    return null;
  }
  if (year < MIN_HEADER_YEAR || year > MAX_HEADER_YEAR) {
    return null;
  }
  return toPeriod(year, month);
}

function expandYear(digits: string): number {
  return digits.length === 2 ? 2000 + Number(digits) : Number(digits);
}

/**
 * Parse a spreadsheet column header into a period.
 *
 * Accepted: Date objects and the strings "2024-01", "2024-01-15",
 * "01/2024", "2024/01", "Jan-24", "24-Jan", "January 2024", "2024 January".
 * Two-digit years mean 20YY. Years outside 2020–2099 are rejected.
 */
export function parsePeriodHeader(header: unknown): string | null {
  if (header instanceof Date) {
    if (Number.isNaN(header.getTime())) {
      return null;
    }
    return headerPeriod(header.getUTCFullYear(), header.getUTCMonth() + 1);
  }

  if (typeof header !== "string") {
    return null;
  }

  const text = header.trim();
  if (text === "") {
    return null;
  }

  let match = /^(\d{4})-(\d{1,2})(?:-(\d{1,2}))?$/.exec(text);
  if (match !== null) {
    const day = match[3] !== undefined ? Number(match[3]) : 1;
    if (day < 1 || day > 31) {
      return null;
    }
    return headerPeriod(Number(match[1]), Number(match[2]));
  }

  match = /^(\d{1,2})\/(\d{4})$/.exec(text);
  if (match !== null) {
    return headerPeriod(Number(match[2]), Number(match[1]));
  }

  match = /^(\d{4})\/(\d{1,2})$/.exec(text);
  if (match !== null) {
    return headerPeriod(Number(match[1]), Number(match[2]));
  }

  // Mon-YY, Month YYYY
  match = /^([A-Za-z]+)(?:-(\d{2})| (\d{4}))$/.exec(text);
  if (match !== null) {
    const name = match[1] ?? "";
    const short = match[2];
    if (short !== undefined && name.length !== 3) {
      return null;
    }
    return headerPeriod(expandYear(short ?? match[3] ?? ""), monthFromName(name));
  }

  // YY-Mon, YYYY Month
  match = /^(?:(\d{2})-|(\d{4}) )([A-Za-z]+)$/.exec(text);
  if (match !== null) {
    const name = match[3] ?? "";
    const short = match[1];
    if (short !== undefined && name.length !== 3) {
      return null;
    }
    return headerPeriod(expandYear(short ?? match[2] ?? ""), monthFromName(name));
  }

  return null;
}

// =============================================================================
// Ranges
// =============================================================================

function parseIntStrict(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value !== "string" || !/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  return Number(value.trim());
}

function boundPeriod(month: unknown, year: unknown): string | undefined {
  const m = parseIntStrict(month);
  const y = parseIntStrict(year);
  if (m === undefined || y === undefined) return undefined;
  if (m < 1 || m > 12 || y < 1 || y > 9999) return undefined;
  return toPeriod(y, m);
}

/**
 * Turn user-supplied month/year bounds into `[start, endExclusive)`.
 *
 * The end bound is the first day of the month after (toMonth, toYear),
 * so the whole end month is included. Missing or invalid sides are
 * undefined (unbounded).
 */
export function monthRange(
  fromMonth: unknown,
  fromYear: unknown,
  toMonth: unknown,
  toYear: unknown,
): MonthRange {
  const start = boundPeriod(fromMonth, fromYear);
  const end = boundPeriod(toMonth, toYear);
  let endExclusive: string | undefined;
  if (end !== undefined) {
    endExclusive = end === "9999-12-01" ? undefined : nextPeriod(end);
  }
  return { start, endExclusive };
}

// =============================================================================
// Formatting
// =============================================================================

function monthName(month: number): string {
  const name = MONTH_NAMES[month - 1];
  if (name === undefined) {
    throw new AmountError("INVALID_PERIOD", `Invalid month: ${String(month)}`);
  }
  return name;
}

/** "2024-01-01" → "2024-01" */
export function periodKey(period: string): string {
  const { year, month } = splitPeriod(period);
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

/** "2024-01-01" → "Jan-24". Only years 2000–2099 have a label. */
export function periodLabel(period: string): string {
  const { year, month } = splitPeriod(period);
  if (year < 2000 || year > 2099) {
    throw new AmountError("INVALID_PERIOD", `No two-digit label for year ${String(year)}`);
  }
  return `${monthName(month).slice(0, 3)}-${String(year % 100).padStart(2, "0")}`;
}

/** "2024-01-01" → "January 2024" */
export function periodDisplayName(period: string): string {
  const { year, month } = splitPeriod(period);
  return `${monthName(month)} ${String(year)}`;
}
