/**
 * @consolidator/amounts — Monetary string cleaning.
 *
 * Spreadsheet exports (accounting packages, hand-edited sheets) carry
 * amounts such as "$1,234.56", "(1,234.56)", "'100" or "1.234.567.89".
 * These helpers turn them into exact decimal strings.
 *
 * Rules:
 * - Unparseable input is absent (null), never zero
 * - Output is a canonical decimal string: no exponent, no leading "+",
 *   no trailing fractional zeros
 */

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** Exponents beyond this are treated as garbage rather than expanded. */
const MAX_EXPONENT = 64;

/**
 * Normalize a plain decimal literal (optionally with an exponent) into
 * canonical form. Returns null when the text is not a decimal literal.
 *
 * "0012.50" → "12.5", "-1.5e3" → "-1500", ".5" → "0.5", "-0" → "0"
 */
export function normalizeDecimal(text: string): string | null {
  const match = DECIMAL_PATTERN.exec(text);
  if (match === null) {
    return null;
  }

  const sign = match[1] ?? "";
  const intDigits = match[2] ?? "";
  const fracDigits = match[3] ?? "";
  if (intDigits === "" && fracDigits === "") {
    return null;
  }

  const exponent = match[4] !== undefined ? Number(match[4]) : 0;
  if (Math.abs(exponent) > MAX_EXPONENT) {
    return null;
  }

  let digits = intDigits + fracDigits;
  let point = intDigits.length + exponent;
  if (point < 0) {
    digits = "0".repeat(-point) + digits;
    point = 0;
  }
  if (point > digits.length) {
    digits = digits + "0".repeat(point - digits.length);
  }

  const whole = digits.slice(0, point).replace(/^0+/, "") || "0";
  const fraction = digits.slice(point).replace(/0+$/, "");
  const body = fraction === "" ? whole : `${whole}.${fraction}`;

  if (body === "0") {
    return "0";
  }
  return sign === "-" ? `-${body}` : body;
}

/**
 * Clean a raw cell value into an exact decimal string.
 *
 * Steps:
 * 1. Strip surrounding quotes/apostrophes, currency symbols and spaces
 * 2. "(1,234.56)" → "-1234.56"
 * 3. Drop thousands separators (commas)
 * 4. With several dots, keep only the last one as the decimal point
 * 5. Parse; on failure retry once with everything but digits, "." and "-" removed
 *
 * Returns null for empty or unparseable values.
 */
export function cleanNumberValue(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? normalizeDecimal(String(value)) : null;
  }

  if (typeof value === "bigint") {
    return normalizeDecimal(value.toString());
  }

  if (typeof value !== "string") {
    return null;
  }

  let text = value.trim();
  if (text === "") {
    return null;
  }

  text = text.replace(/^['"]+|['"]+$/g, "");
  text = text.replace(/[$€£¥]/g, "");
  text = text.replace(/\s+/g, "");

  if (text.startsWith("(") && text.endsWith(")")) {
    text = `-${text.slice(1, -1)}`;
  }

  text = text.replace(/,/g, "");

  const dots = text.split(".");
  if (dots.length > 2) {
    const last = dots.pop() ?? "";
    text = `${dots.join("")}.${last}`;
  }

  const parsed = normalizeDecimal(text);
  if (parsed !== null) {
    return parsed;
  }

  const stripped = text.replace(/[^\d.-]/g, "");
  if (stripped === "") {
    return null;
  }
  return normalizeDecimal(stripped);
}
