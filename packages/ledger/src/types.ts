/**
 * @peerpay/ledger — Shared types for the payment ledger.
 *
 * Rules:
 * - Fallible domain operations report failure as data, never by throwing
 * - Construction with a malformed amount throws LedgerError
 * - Activity events are plain, readonly data
 */

// ─── Payments ────────────────────────────────────────────────────────────

/** Which funds settled a payment. */
export type PaymentMethod = "balance" | "credit";

/** Why a payment was refused. Nothing changes on either side. */
export type PaymentRejection =
  | "SELF_PAYMENT"
  | "NON_POSITIVE_AMOUNT"
  | "INSUFFICIENT_FUNDS";

/**
 * Result of a transfer attempt.
 * `pay()` collapses this to its `ok` flag.
 */
export type PaymentOutcome =
  | {
      readonly ok: true;
      readonly method: PaymentMethod;
      readonly amount: number;
      readonly description: string;
    }
  | {
      readonly ok: false;
      readonly reason: PaymentRejection;
    };

// ─── Activity Events ─────────────────────────────────────────────────────

export interface AccountCreatedEvent {
  readonly kind: "account_created";
  readonly account: string;
  readonly balance: number;
}

export interface FriendshipEvent {
  readonly kind: "friendship";
  readonly from: string;
  readonly to: string;
}

export interface PaymentEvent {
  readonly kind: "payment";
  readonly from: string;
  readonly to: string;
  readonly amount: number;
  readonly description: string;
  readonly method: PaymentMethod;
}

export interface PaymentRejectedEvent {
  readonly kind: "payment_rejected";
  readonly from: string;
  readonly to: string;
  readonly amount: number;
  readonly reason: PaymentRejection;
}

/** Everything an activity listener can observe. */
export type ActivityEvent =
  | AccountCreatedEvent
  | FriendshipEvent
  | PaymentEvent
  | PaymentRejectedEvent;

export type ActivityListener = (event: ActivityEvent) => void;

// ─── Options ─────────────────────────────────────────────────────────────

export interface AccountOptions {
  /** Called after every friendship and payment attempt on this account. */
  readonly onActivity?: ActivityListener | undefined;
}

export interface LedgerOptions {
  /**
   * Called when an account is created, and handed to every account the
   * ledger creates.
   */
  readonly onActivity?: ActivityListener | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger construction failures. */
export type LedgerErrorCode = "INVALID_AMOUNT";

/**
 * Structured error from the ledger.
 * Only thrown for malformed input at construction time.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
