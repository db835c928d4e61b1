import { z } from "zod";

// ─────────────────────────────────────────────────────────────
// Ledger and cycle states
// ─────────────────────────────────────────────────────────────

/**
 * Circuit-breaker state of the risk ledger.
 *
 * OPEN              — commits are evaluated normally
 * DRAWDOWN_BREACHED — daily drawdown limit hit; every commit is rejected
 *                     until the next daily reset, observe still runs
 */
export enum LedgerState {
  OPEN = "OPEN",
  DRAWDOWN_BREACHED = "DRAWDOWN_BREACHED",
}

export const LedgerStateSchema = z
  .nativeEnum(LedgerState)
  .describe("Ledger state: OPEN | DRAWDOWN_BREACHED");

/**
 * Lifecycle of one pipeline cycle as reported through the persistence store.
 */
export enum CycleStatus {
  RUNNING = "RUNNING",
  COMPLETED = "COMPLETED",
  FAILED = "FAILED",
}

export const CycleStatusSchema = z
  .nativeEnum(CycleStatus)
  .describe("Cycle status: RUNNING | COMPLETED | FAILED");

/**
 * Kinds of entries in the ledger's append-only change log.
 */
export enum LedgerEntryKind {
  COMMIT = "COMMIT",
  CLOSE = "CLOSE",
  OBSERVE = "OBSERVE",
  BREAKER_TRIPPED = "BREAKER_TRIPPED",
  DAILY_RESET = "DAILY_RESET",
}

export const LedgerEntryKindSchema = z.nativeEnum(LedgerEntryKind);

// ─── Inferred types ──────────────────────────────────────────
export type LedgerStateType = z.infer<typeof LedgerStateSchema>;
export type CycleStatusType = z.infer<typeof CycleStatusSchema>;
