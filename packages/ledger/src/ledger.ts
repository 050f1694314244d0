/**
 * @peerpay/ledger — Core Ledger class.
 *
 * Registry of accounts and source of the global activity feed.
 * The ledger creates accounts but does not mediate transfers: accounts
 * pay and befriend each other directly.
 *
 * API surface:
 * - createAccount() — Register a new account
 * - getAccounts() / findByName() — Read the registry
 * - renderFeed() — Merge every activity log into one feed
 *
 * Accounts are never removed.
 */

import { Account } from "./account.js";
import type { ActivityListener, LedgerOptions } from "./types.js";

export class Ledger {
  private readonly _accounts: Account[] = [];
  private readonly _onActivity: ActivityListener | undefined;

  constructor(options: LedgerOptions = {}) {
    this._onActivity = options.onActivity;
  }

  // ─── Account Management ──────────────────────────────────────────────

  /**
   * Create and register an account. Names need not be unique.
   * Throws LedgerError if `balance` is not a finite number.
   */
  createAccount(name: string, balance = 0): Account {
    const account = new Account(name, balance, { onActivity: this._onActivity });
    this._accounts.push(account);

    if (this._onActivity !== undefined) {
      this._onActivity({ kind: "account_created", account: name, balance });
    }
    return account;
  }

  /** All accounts in creation order. */
  getAccounts(): readonly Account[] {
    return [...this._accounts];
  }

  findByName(name: string): readonly Account[] {
    return this._accounts.filter((a) => a.name === name);
  }

  get accountCount(): number {
    return this._accounts.length;
  }

  // ─── Feed ────────────────────────────────────────────────────────────

  /**
   * Every account's activity, in account creation order and then log
   * order. An entry whose exact text already appeared is skipped, so a
   * cash payment logged on both sides shows once.
   */
  renderFeed(): string[] {
    const seen = new Set<string>();
    const feed: string[] = [];

    for (const account of this._accounts) {
      for (const entry of account.retrieveActivity()) {
        if (!seen.has(entry)) {
          seen.add(entry);
          feed.push(entry);
        }
      }
    }

    return feed;
  }
}
