/**
 * Structured activity logging.
 *
 * Uses pino for JSON-structured logs. The ledger stays logger-free and
 * reports through its onActivity hook; this module turns those events
 * into log lines.
 */

import { pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import type { ActivityListener } from "@peerpay/ledger";
import type { DemoConfig } from "./config.js";

/**
 * Create the demo logger.
 *
 * Pretty-prints in development unless an explicit destination is given.
 */
export function createLogger(
  config: Pick<DemoConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * Adapt a logger into a ledger activity listener.
 * Rejected payments log at warn, everything else at info.
 */
export function activityLogger(logger: Logger): ActivityListener {
  return (event) => {
    switch (event.kind) {
      case "account_created":
        logger.info(
          { account: event.account, balance: event.balance },
          "Account created",
        );
        break;
      case "friendship":
        logger.info({ from: event.from, to: event.to }, "Friendship added");
        break;
      case "payment":
        logger.info(
          {
            from: event.from,
            to: event.to,
            amount: event.amount,
            method: event.method,
          },
          "Payment settled",
        );
        break;
      case "payment_rejected":
        logger.warn(
          {
            from: event.from,
            to: event.to,
            amount: event.amount,
            reason: event.reason,
          },
          "Payment rejected",
        );
        break;
    }
  };
}
