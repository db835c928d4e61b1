import { z } from "zod";

// ─────────────────────────────────────────────────────────────
// REASON CODES — single central catalog
// No package invents a reason_code outside this file.
// Categories: Evaluation, Risk/Sizing, Ledger, Scheduler,
// Provider/Model, Persistence, Input, Cycle.
// ─────────────────────────────────────────────────────────────

/**
 * Canonical reason codes.
 * Each code is prefixed by its category to avoid collisions.
 */
export enum ReasonCode {
  // ── Evaluation ───────────────────────────────────────────
  EVAL_ACCEPTED = "EVAL_ACCEPTED",
  EVAL_STALE_MARKET = "EVAL_STALE_MARKET",
  EVAL_EDGE_TOO_SMALL = "EVAL_EDGE_TOO_SMALL",
  EVAL_CONFIDENCE_TOO_LOW = "EVAL_CONFIDENCE_TOO_LOW",
  EVAL_LIQUIDITY_TOO_LOW = "EVAL_LIQUIDITY_TOO_LOW",
  EVAL_LIQUIDITY_SKIPPED = "EVAL_LIQUIDITY_SKIPPED",

  // ── Risk / Sizing ────────────────────────────────────────
  RISK_SIZE_APPLIED = "RISK_SIZE_APPLIED",
  RISK_SIZE_SHRUNK_TO_HEADROOM = "RISK_SIZE_SHRUNK_TO_HEADROOM",
  RISK_EXPOSURE_LIMIT = "RISK_EXPOSURE_LIMIT",

  // ── Ledger ───────────────────────────────────────────────
  LEDGER_COMMITTED = "LEDGER_COMMITTED",
  LEDGER_POSITION_CLOSED = "LEDGER_POSITION_CLOSED",
  LEDGER_CIRCUIT_BREAKER_OPEN = "LEDGER_CIRCUIT_BREAKER_OPEN",
  LEDGER_BREAKER_TRIPPED = "LEDGER_BREAKER_TRIPPED",
  LEDGER_DAILY_RESET = "LEDGER_DAILY_RESET",
  LEDGER_POSITION_ALREADY_OPEN = "LEDGER_POSITION_ALREADY_OPEN",
  LEDGER_POSITION_NOT_FOUND = "LEDGER_POSITION_NOT_FOUND",
  LEDGER_MAX_POSITIONS = "LEDGER_MAX_POSITIONS",
  LEDGER_INVARIANT_VIOLATION = "LEDGER_INVARIANT_VIOLATION",

  // ── Scheduler ────────────────────────────────────────────
  SCHED_TIMED_OUT = "SCHED_TIMED_OUT",
  SCHED_TASK_FAILED = "SCHED_TASK_FAILED",

  // ── Provider / Model ─────────────────────────────────────
  PROV_DATA_ERROR = "PROV_DATA_ERROR",
  PROV_MARKET_NOT_FOUND = "PROV_MARKET_NOT_FOUND",
  PROV_HTTP_ERROR = "PROV_HTTP_ERROR",
  PROV_TIMEOUT = "PROV_TIMEOUT",
  MODEL_PREDICTION_FAILED = "MODEL_PREDICTION_FAILED",
  MODEL_INVALID_RESPONSE = "MODEL_INVALID_RESPONSE",

  // ── Persistence ──────────────────────────────────────────
  PERSIST_WRITE_FAILED = "PERSIST_WRITE_FAILED",

  // ── Input ────────────────────────────────────────────────
  INPUT_INVALID = "INPUT_INVALID",
  INPUT_MARKET_MISMATCH = "INPUT_MARKET_MISMATCH",

  // ── Cycle ────────────────────────────────────────────────
  CYCLE_STARTED = "CYCLE_STARTED",
  CYCLE_COMPLETED = "CYCLE_COMPLETED",
  CYCLE_FAILED = "CYCLE_FAILED",
}

/**
 * Zod schema for reason_code.
 */
export const ReasonCodeSchema = z
  .nativeEnum(ReasonCode)
  .describe("Canonical reason code from the central catalog");

/**
 * Human description of every reason code.
 * Immutable; only this file defines descriptions.
 */
export const REASON_CODE_CATALOG: Readonly<Record<ReasonCode, string>> = {
  // Evaluation
  [ReasonCode.EVAL_ACCEPTED]: "Estimate passed every evaluation step",
  [ReasonCode.EVAL_STALE_MARKET]: "Market end date is past the staleness grace window",
  [ReasonCode.EVAL_EDGE_TOO_SMALL]: "Model edge over the market price is below min_edge",
  [ReasonCode.EVAL_CONFIDENCE_TOO_LOW]: "Model confidence is below min_confidence",
  [ReasonCode.EVAL_LIQUIDITY_TOO_LOW]: "Reported 24h volume is below min_liquidity",
  [ReasonCode.EVAL_LIQUIDITY_SKIPPED]: "Provider did not report volume; liquidity check skipped",

  // Risk / Sizing
  [ReasonCode.RISK_SIZE_APPLIED]: "Fractional Kelly size applied",
  [ReasonCode.RISK_SIZE_SHRUNK_TO_HEADROOM]: "Size reduced to the remaining exposure headroom",
  [ReasonCode.RISK_EXPOSURE_LIMIT]: "Total exposure limit leaves no room for the position",

  // Ledger
  [ReasonCode.LEDGER_COMMITTED]: "Position committed to the ledger",
  [ReasonCode.LEDGER_POSITION_CLOSED]: "Position closed and P&L realized",
  [ReasonCode.LEDGER_CIRCUIT_BREAKER_OPEN]: "Daily drawdown breaker is tripped; commits rejected",
  [ReasonCode.LEDGER_BREAKER_TRIPPED]: "Daily drawdown limit breached; breaker tripped",
  [ReasonCode.LEDGER_DAILY_RESET]: "Trading day rolled over; breaker cleared",
  [ReasonCode.LEDGER_POSITION_ALREADY_OPEN]: "A position in this market is already open",
  [ReasonCode.LEDGER_POSITION_NOT_FOUND]: "No open position in this market",
  [ReasonCode.LEDGER_MAX_POSITIONS]: "Maximum number of open positions reached",
  [ReasonCode.LEDGER_INVARIANT_VIOLATION]: "Ledger invariant violated; state left unchanged",

  // Scheduler
  [ReasonCode.SCHED_TIMED_OUT]: "Market evaluation exceeded its deadline",
  [ReasonCode.SCHED_TASK_FAILED]: "Market evaluation failed",

  // Provider / Model
  [ReasonCode.PROV_DATA_ERROR]: "Market data provider returned unusable data",
  [ReasonCode.PROV_MARKET_NOT_FOUND]: "Requested market is unknown to the provider",
  [ReasonCode.PROV_HTTP_ERROR]: "Market data provider answered with an HTTP error",
  [ReasonCode.PROV_TIMEOUT]: "Market data request timed out",
  [ReasonCode.MODEL_PREDICTION_FAILED]: "Probability model call failed",
  [ReasonCode.MODEL_INVALID_RESPONSE]: "Probability model returned an invalid estimate",

  // Persistence
  [ReasonCode.PERSIST_WRITE_FAILED]: "Persistence store write failed",

  // Input
  [ReasonCode.INPUT_INVALID]: "Snapshot or estimate is malformed",
  [ReasonCode.INPUT_MARKET_MISMATCH]: "Snapshot and estimate refer to different markets",

  // Cycle
  [ReasonCode.CYCLE_STARTED]: "Pipeline cycle started",
  [ReasonCode.CYCLE_COMPLETED]: "Pipeline cycle completed",
  [ReasonCode.CYCLE_FAILED]: "Pipeline cycle failed",
};

// ─── Inferred type ───────────────────────────────────────────
export type ReasonCodeType = z.infer<typeof ReasonCodeSchema>;
