// ═════════════════════════════════════════════════════════════
// @edgeline/core — Logger
// One pino root; components get child loggers bound to { component }.
// ═════════════════════════════════════════════════════════════

import pino from "pino";
import type { Logger } from "pino";

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

const root: Logger = pino({
  name: "edgeline",
  level: defaultLevel(),
});

/**
 * Child logger for one component, e.g. createLogger("risk-ledger").
 */
export function createLogger(component: string): Logger {
  return root.child({ component });
}

export type { Logger };
