/**
 * The three-friend walkthrough: Alice, Bob and Charlie befriend each
 * other, settle a few debts, and Charlie falls back on a credit card.
 */

import { CreditLine } from "@peerpay/ledger";
import type { Account, Ledger } from "@peerpay/ledger";

export interface Scenario {
  readonly alice: Account;
  readonly bob: Account;
  readonly charlie: Account;
  readonly aliceCard: CreditLine;
  readonly charlieCard: CreditLine;
  /** Outcome of Alice trying to pay herself. Always false. */
  readonly selfPaymentAccepted: boolean;
}

export function buildScenario(ledger: Ledger): Scenario {
  const alice = ledger.createAccount("Alice", 100);
  const bob = ledger.createAccount("Bob", 50);
  const charlie = ledger.createAccount("Charlie", 0);

  const aliceCard = new CreditLine(200);
  alice.assignCreditLine(aliceCard);

  const charlieCard = new CreditLine(100);
  charlie.assignCreditLine(charlieCard);

  alice.addFriend(bob);
  bob.addFriend(charlie);

  alice.pay(bob, 25, "lunch");
  bob.pay(charlie, 10, "movie ticket");
  charlie.pay(alice, 5, "snack");

  const selfPaymentAccepted = alice.pay(alice, 10, "self-payment");

  // Charlie holds 5; this one goes on the card.
  charlie.pay(alice, 50, "gift");

  return { alice, bob, charlie, aliceCard, charlieCard, selfPaymentAccepted };
}
