// ═════════════════════════════════════════════════════════════
// @edgeline/core — Input types
// Local shapes the core receives from callers.
// No I/O here, data shapes only.
// ═════════════════════════════════════════════════════════════

import type { PortfolioState, RiskLimits } from "@edgeline/contracts";
import type { Logger } from "pino";
import type { LedgerJournal } from "../collaborators";

// ─── Evaluator ───────────────────────────────────────────────

/**
 * Everything non-deterministic the evaluator needs, injected.
 */
export interface EvaluationContext {
  readonly now: Date;
  readonly signal_id: string;
}

// ─── Ledger ──────────────────────────────────────────────────

export type Clock = () => Date;

export interface RiskLedgerOptions {
  readonly startingCash: number;
  readonly limits: RiskLimits;
  /** Last checkpoint to resume from; startingCash is then ignored */
  readonly initialState?: PortfolioState;
  /** Receives every COMMITTED result before the state swap */
  readonly journal?: LedgerJournal;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Mark-to-market input: YES price per market id.
 */
export type YesPriceMap = Readonly<Record<string, number>>;

// ─── Scheduler ───────────────────────────────────────────────

/** Id → id generator, injected so tests stay deterministic. */
export type IdFactory = () => string;
