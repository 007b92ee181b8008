/**
 * @consolidator/amounts — Error types.
 *
 * Rules:
 * - Fail-closed: invalid amounts and periods throw, never silently coerce
 * - Cleaning helpers return null for "absent" instead of throwing
 */

/** Error codes for amount and period operations. */
export type AmountErrorCode = "INVALID_AMOUNT" | "INVALID_PERIOD";

/**
 * Structured error from amount arithmetic or period handling.
 */
export class AmountError extends Error {
  public readonly code: AmountErrorCode;

  constructor(code: AmountErrorCode, message: string) {
    super(message);
    this.name = "AmountError";
    this.code = code;
  }
}
