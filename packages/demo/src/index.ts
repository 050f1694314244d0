/**
 * @peerpay/demo — CLI walkthrough.
 *
 * Runs the three-friend scenario against a real ledger and prints the
 * global feed and final balances. Activity is logged through pino.
 */

import chalk, { Chalk } from "chalk";
import { Ledger } from "@peerpay/ledger";
import { loadConfig } from "./config.js";
import { activityLogger, createLogger } from "./logger.js";
import { buildScenario } from "./scenario.js";
import { banner, formatBalances, formatFeed, stepHeader } from "./render.js";

const TOTAL_STEPS = 3;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function print(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

async function run(): Promise<void> {
  const config = loadConfig();
  const ink = config.DEMO_COLOR ? chalk : new Chalk({ level: 0 });
  const logger = createLogger(config);

  print(banner(ink));

  // ─── Step 1: Scenario ───────────────────────────────────────────────

  console.log(stepHeader(ink, 1, TOTAL_STEPS, "Scenario"));
  const ledger = new Ledger({ onActivity: activityLogger(logger) });
  const scenario = buildScenario(ledger);
  console.log(
    ink.gray("  Self-payment successful? ") + ink.white(String(scenario.selfPaymentAccepted)),
  );

  await sleep(config.DEMO_STEP_DELAY_MS);

  // ─── Step 2: Feed ───────────────────────────────────────────────────

  console.log();
  console.log(stepHeader(ink, 2, TOTAL_STEPS, "Activity Feed"));
  print(formatFeed(ink, ledger.renderFeed()));

  await sleep(config.DEMO_STEP_DELAY_MS);

  // ─── Step 3: Balances ───────────────────────────────────────────────

  console.log();
  console.log(stepHeader(ink, 3, TOTAL_STEPS, "Balances"));
  print(formatBalances(ink, ledger.getAccounts()));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
