/**
 * Terminal rendering for the walkthrough.
 *
 * Every function takes the chalk instance to paint with, so colour can
 * be switched off by configuration.
 */

import type { ChalkInstance } from "chalk";
import { formatDollars } from "@peerpay/ledger";
import type { Account } from "@peerpay/ledger";

const NAME_WIDTH = 12;

export function banner(ink: ChalkInstance): string[] {
  return [
    "",
    ink.cyan.bold("  ╔════════════════════════════════════╗"),
    ink.cyan.bold("  ║") + ink.white.bold("           PEERPAY DEMO             ") + ink.cyan.bold("║"),
    ink.cyan.bold("  ╚════════════════════════════════════╝"),
    "",
  ];
}

export function stepHeader(
  ink: ChalkInstance,
  step: number,
  total: number,
  title: string,
): string {
  const prefix = ink.cyan.bold(`  Step ${String(step)}/${String(total)}`);
  const line = ink.gray("─".repeat(Math.max(0, 40 - title.length)));
  return `${prefix}  ${ink.white.bold(title)}  ${line}`;
}

/** Numbered feed lines, right-aligned numbers. */
export function formatFeed(ink: ChalkInstance, feed: readonly string[]): string[] {
  const width = String(feed.length).length;
  return feed.map(
    (entry, i) => `  ${ink.gray(`${String(i + 1).padStart(width)}.`)} ${ink.white(entry)}`,
  );
}

/** One line per account: name, cash, and credit when a line is assigned. */
export function formatBalances(
  ink: ChalkInstance,
  accounts: readonly Account[],
): string[] {
  return accounts.map((account) => {
    const cash = `  ${ink.white(account.name.padEnd(NAME_WIDTH))}${ink.cyan(formatDollars(account.balance))}`;
    const line = account.creditLine;
    if (line === undefined) {
      return cash;
    }
    return `${cash}  ${ink.gray("credit")} ${ink.yellow(formatDollars(line.balance))}`;
  });
}
