/**
 * @peerpay/ledger — Credit line.
 *
 * A balance of available credit that an account can fall back on when
 * its cash balance is short. Not owned by any account: the same line
 * may be assigned to one account, reassigned, or shared.
 */

import { assertFiniteAmount } from "./money-math.js";

export class CreditLine {
  private _balance: number;

  constructor(balance: number) {
    this._balance = assertFiniteAmount(balance, "credit line balance");
  }

  /** Credit still available. */
  get balance(): number {
    return this._balance;
  }

  canCover(amount: number): boolean {
    return this._balance >= amount;
  }

  /**
   * Take `amount` from the line if it covers it.
   * All-or-nothing: returns false and leaves the balance untouched otherwise.
   */
  debit(amount: number): boolean {
    if (!this.canCover(amount)) {
      return false;
    }
    this._balance -= amount;
    return true;
  }
}
