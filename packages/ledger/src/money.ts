/**
 * @linkvault/ledger — Minor-unit money handling.
 *
 * Amounts are integers in minor currency units (cents). Parsing never
 * rounds: anything that is not already a whole number of minor units is
 * rejected.
 */

import { ValidationError } from "@linkvault/types";

const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse user input into a non-negative safe integer amount.
 *
 * "6000" → 6000
 * "100.5", "1e3", "-5", "" → ValidationError
 */
export function parseMinorUnits(input: string | number, field = "amount"): number {
  if (typeof input === "number") {
    if (!Number.isSafeInteger(input) || input < 0) {
      throw new ValidationError(
        `${field} must be a non-negative whole number of minor units, got: ${String(input)}`,
        field,
      );
    }
    return input;
  }

  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ValidationError(
      `${field} must be a non-negative whole number of minor units, got: "${input}"`,
      field,
    );
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${field} exceeds the largest supported amount: "${trimmed}"`, field);
  }
  return value;
}

/**
 * Throws ValidationError unless `amount` is a positive safe integer.
 */
export function assertPositiveAmount(amount: number, field = "amount"): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError(
      `${field} must be a positive whole number of minor units, got: ${String(amount)}`,
      field,
    );
  }
}

/**
 * Render minor units for display.
 *
 * 6000 → "$60.00"
 * 5 → "$0.05"
 */
export function formatMinorUnits(amount: number, symbol = "$"): string {
  const negative = amount < 0;
  const digits = Math.abs(amount).toString().padStart(3, "0");
  const major = digits.slice(0, digits.length - 2);
  const minor = digits.slice(digits.length - 2);
  return `${negative ? "-" : ""}${symbol}${major}.${minor}`;
}
