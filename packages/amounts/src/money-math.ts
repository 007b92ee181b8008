/**
 * @consolidator/amounts — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations until the serialization boundary
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import { AmountError } from "./types.js";

/** Fractional digits stored for every fact amount. */
export const AMOUNT_DECIMALS = 2;

const AMOUNT_FORMAT = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number = AMOUNT_DECIMALS): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new AmountError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!AMOUNT_FORMAT.test(trimmed)) {
    throw new AmountError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new AmountError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5n with decimals=2 → "-0.05"
 */
export function formatAmount(scaled: bigint, decimals: number = AMOUNT_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Round a decimal string of any precision to `decimals` places,
 * half away from zero (the behaviour of a numeric(15,2) column).
 *
 * "12.345" → "12.35", "-12.345" → "-12.35", "7" → "7.00"
 */
export function roundAmount(amount: string, decimals: number = AMOUNT_DECIMALS): string {
  const trimmed = amount.trim();
  if (!AMOUNT_FORMAT.test(trimmed)) {
    throw new AmountError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  let scaled = BigInt(intPart + fracPart.slice(0, decimals).padEnd(decimals, "0"));
  const nextDigit = fracPart.charAt(decimals);
  if (nextDigit !== "" && nextDigit >= "5") {
    scaled += 1n;
  }

  return formatAmount(negative ? -scaled : scaled, decimals);
}

/**
 * Convert a scaled bigint to a JS number. Only for the final JSON boundary.
 */
export function toNumber(scaled: bigint, decimals: number = AMOUNT_DECIMALS): number {
  return Number(formatAmount(scaled, decimals));
}

/**
 * Sum scaled amounts.
 */
export function sumAmounts(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}
