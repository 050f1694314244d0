/**
 * @peerpay/ledger — Amount helpers.
 *
 * Amounts are plain JavaScript numbers. Fractional values are allowed;
 * no rounding is applied beyond two-decimal display formatting.
 *
 * Rules:
 * - Stored amounts must be finite numbers
 * - Display always uses exactly two decimal places
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

/**
 * Return `value` unchanged if it is a finite number.
 * Throws LedgerError("INVALID_AMOUNT") otherwise.
 */
export function assertFiniteAmount(value: number, label: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid ${label}: "${String(value)}" is not a finite number`,
    );
  }
  return value;
}

/**
 * True for amounts a payment may carry.
 * NaN compares false against everything, so it is never positive.
 */
export function isPositiveAmount(amount: number): boolean {
  return amount > 0;
}

/** toFixed() switches to exponent notation from here up. */
const FIXED_NOTATION_LIMIT = 1e21;

/**
 * Format an amount with exactly two decimal places.
 *
 * 25 → "25.00"
 * 4.5 → "4.50"
 * 1234.5678 → "1234.57"
 * 1e21 → "1000000000000000000000.00"
 *
 * Exact binary ties round away from zero (0.125 → "0.13"), not to even.
 * Numbers at or above 1e21 have no fractional part, so they print
 * through BigInt with ".00" appended.
 */
export function formatAmount(amount: number): string {
  if (Math.abs(amount) >= FIXED_NOTATION_LIMIT) {
    return `${BigInt(amount).toString()}.00`;
  }
  return amount.toFixed(2);
}

/** Format an amount as a dollar figure: 5 → "$5.00". */
export function formatDollars(amount: number): string {
  return `$${formatAmount(amount)}`;
}
