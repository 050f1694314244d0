/**
 * @peerpay/ledger — Peer-to-peer payment ledger.
 *
 * Accounts hold a cash balance and an optional credit line, befriend
 * each other, and pay each other. Every success is written to a
 * human-readable activity log; the ledger merges the logs into a feed.
 *
 * Design rules:
 * - In-memory and synchronous
 * - Failed operations change nothing and report failure as data
 * - Activity logs are append-only
 * - Zero runtime dependencies
 */

// Core engine
export { Ledger } from "./ledger.js";
export { Account } from "./account.js";
export { CreditLine } from "./credit-line.js";

// Activity wording
export {
  friendshipEntry,
  paymentEntry,
  creditPaymentEntry,
} from "./activity.js";

// Amounts
export {
  assertFiniteAmount,
  isPositiveAmount,
  formatAmount,
  formatDollars,
} from "./money-math.js";

// Types
export type {
  PaymentMethod,
  PaymentRejection,
  PaymentOutcome,
  AccountCreatedEvent,
  FriendshipEvent,
  PaymentEvent,
  PaymentRejectedEvent,
  ActivityEvent,
  ActivityListener,
  AccountOptions,
  LedgerOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
