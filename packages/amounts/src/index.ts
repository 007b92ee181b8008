/**
 * @consolidator/amounts — Exact decimal arithmetic and month periods.
 *
 * - bigint money math scaled to two fractional digits
 * - Cleaning of spreadsheet-style monetary strings
 * - Period header parsing, month ranges and period labels
 */

export { AmountError } from "./types.js";
export type { AmountErrorCode } from "./types.js";

export {
  AMOUNT_DECIMALS,
  parseAmount,
  formatAmount,
  roundAmount,
  toNumber,
  sumAmounts,
} from "./money-math.js";

export { cleanNumberValue, normalizeDecimal } from "./clean-number.js";

export {
  toPeriod,
  nextPeriod,
  parsePeriodHeader,
  monthRange,
  periodKey,
  periodLabel,
  periodDisplayName,
} from "./period.js";
export type { MonthRange } from "./period.js";
