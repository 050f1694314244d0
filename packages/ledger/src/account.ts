/**
 * @peerpay/ledger — Account.
 *
 * A user of the ledger: a name, a cash balance, an optional credit
 * line, a set of friends and an append-only activity log.
 *
 * Rules:
 * - Friendship is symmetric and irreflexive
 * - Identity is by reference, never by name
 * - Balance changes only through a successful payment
 * - Log entries are appended only on success, never rewritten
 * - A failed operation leaves both accounts exactly as they were
 */

import { creditPaymentEntry, friendshipEntry, paymentEntry } from "./activity.js";
import type { CreditLine } from "./credit-line.js";
import { assertFiniteAmount, isPositiveAmount } from "./money-math.js";
import type {
  AccountOptions,
  ActivityEvent,
  ActivityListener,
  PaymentMethod,
  PaymentOutcome,
  PaymentRejection,
} from "./types.js";

export class Account {
  readonly name: string;
  private _balance: number;
  private _creditLine: CreditLine | undefined = undefined;
  private readonly _friends: Set<Account> = new Set();
  private readonly _activity: string[] = [];
  private readonly _onActivity: ActivityListener | undefined;

  constructor(name: string, balance = 0, options: AccountOptions = {}) {
    this.name = name;
    this._balance = assertFiniteAmount(balance, `balance for "${name}"`);
    this._onActivity = options.onActivity;
  }

  get balance(): number {
    return this._balance;
  }

  get creditLine(): CreditLine | undefined {
    return this._creditLine;
  }

  /** Friends in the order they were added. */
  get friends(): readonly Account[] {
    return [...this._friends];
  }

  // ─── Credit Line ─────────────────────────────────────────────────────

  /** Set or replace the credit line this account falls back on. */
  assignCreditLine(creditLine: CreditLine): void {
    this._creditLine = creditLine;
  }

  removeCreditLine(): void {
    this._creditLine = undefined;
  }

  // ─── Friends ─────────────────────────────────────────────────────────

  isFriendOf(other: Account): boolean {
    return this._friends.has(other);
  }

  /**
   * Befriend `other`, updating both sides.
   * Returns false for self-friendship or an existing friendship.
   */
  addFriend(other: Account): boolean {
    if (other === this || this._friends.has(other)) {
      return false;
    }

    this._friends.add(other);
    other._friends.add(this);
    this._activity.push(friendshipEntry(this.name, other.name));
    other._activity.push(friendshipEntry(other.name, this.name));

    this.emit({ kind: "friendship", from: this.name, to: other.name });
    return true;
  }

  // ─── Payments ────────────────────────────────────────────────────────

  /**
   * Pay `recipient` from the cash balance, or from the credit line when
   * the cash balance is short.
   */
  pay(recipient: Account, amount: number, description = ""): boolean {
    return this.transfer(recipient, amount, description).ok;
  }

  /**
   * Same decision sequence as pay(), reporting how the payment settled
   * or why it was refused:
   *
   * 1. Paying yourself is refused
   * 2. Amounts that are not positive are refused
   * 3. A sufficient cash balance settles it
   * 4. Otherwise a credit line that covers it settles it
   * 5. Otherwise it is refused for insufficient funds
   */
  transfer(recipient: Account, amount: number, description = ""): PaymentOutcome {
    if (recipient === this) {
      return this.reject(recipient, amount, "SELF_PAYMENT");
    }

    if (!isPositiveAmount(amount)) {
      return this.reject(recipient, amount, "NON_POSITIVE_AMOUNT");
    }

    if (this._balance >= amount) {
      this._balance -= amount;
      recipient._balance += amount;

      const entry = paymentEntry(this.name, recipient.name, amount, description);
      this._activity.push(entry);
      recipient._activity.push(entry);

      return this.settle(recipient, amount, description, "balance");
    }

    // Single check-and-debit: the line either covers it or is untouched.
    if (this._creditLine !== undefined && this._creditLine.debit(amount)) {
      recipient._balance += amount;

      this._activity.push(creditPaymentEntry(recipient.name, amount, description));
      recipient._activity.push(
        paymentEntry(this.name, recipient.name, amount, description),
      );

      return this.settle(recipient, amount, description, "credit");
    }

    return this.reject(recipient, amount, "INSUFFICIENT_FUNDS");
  }

  // ─── Activity ────────────────────────────────────────────────────────

  /** The activity log in insertion order. The returned array is a copy. */
  retrieveActivity(): readonly string[] {
    return [...this._activity];
  }

  private settle(
    recipient: Account,
    amount: number,
    description: string,
    method: PaymentMethod,
  ): PaymentOutcome {
    this.emit({
      kind: "payment",
      from: this.name,
      to: recipient.name,
      amount,
      description,
      method,
    });
    return { ok: true, method, amount, description };
  }

  private reject(
    recipient: Account,
    amount: number,
    reason: PaymentRejection,
  ): PaymentOutcome {
    this.emit({
      kind: "payment_rejected",
      from: this.name,
      to: recipient.name,
      amount,
      reason,
    });
    return { ok: false, reason };
  }

  private emit(event: ActivityEvent): void {
    if (this._onActivity !== undefined) {
      this._onActivity(event);
    }
  }
}
