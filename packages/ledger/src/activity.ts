/**
 * @peerpay/ledger — Activity log wording.
 *
 * The feed deduplicates by exact string, so these templates decide
 * which entries collapse. A cash payment writes the same line to both
 * sides and shows once in the feed. A credit-card payment writes a
 * different line to the payer and shows twice.
 */

import { formatDollars } from "./money-math.js";

/** "<self> and <other> are now friends", from `self`'s point of view. */
export function friendshipEntry(self: string, other: string): string {
  return `${self} and ${other} are now friends`;
}

/** Written to both logs on a cash payment, and to the recipient on a credit payment. */
export function paymentEntry(
  payer: string,
  recipient: string,
  amount: number,
  description: string,
): string {
  return `${payer} paid ${recipient} ${formatDollars(amount)} for ${description}`;
}

/** Written to the payer's log on a credit payment. Omits the payer's name. */
export function creditPaymentEntry(
  recipient: string,
  amount: number,
  description: string,
): string {
  return `Paid ${recipient} ${formatDollars(amount)} for ${description} (credit card)`;
}
