import { z } from "zod";
import { ReasonCode } from "./reason-codes";

// ─────────────────────────────────────────────────────────────
// Reject reasons: policy outcomes, not errors
// ─────────────────────────────────────────────────────────────

/**
 * Why a market did not turn into a committed position.
 *
 * Evaluator:  STALE_MARKET, EDGE_TOO_SMALL, CONFIDENCE_TOO_LOW, LIQUIDITY_TOO_LOW
 * Sizer:      EXPOSURE_LIMIT_REACHED
 * Ledger:     CIRCUIT_BREAKER_OPEN, POSITION_ALREADY_OPEN,
 *             MAX_POSITIONS_REACHED, EXPOSURE_LIMIT_REACHED
 */
export enum RejectReason {
  EDGE_TOO_SMALL = "EDGE_TOO_SMALL",
  CONFIDENCE_TOO_LOW = "CONFIDENCE_TOO_LOW",
  LIQUIDITY_TOO_LOW = "LIQUIDITY_TOO_LOW",
  STALE_MARKET = "STALE_MARKET",
  EXPOSURE_LIMIT_REACHED = "EXPOSURE_LIMIT_REACHED",
  CIRCUIT_BREAKER_OPEN = "CIRCUIT_BREAKER_OPEN",
  POSITION_ALREADY_OPEN = "POSITION_ALREADY_OPEN",
  MAX_POSITIONS_REACHED = "MAX_POSITIONS_REACHED",
}

export const RejectReasonSchema = z
  .nativeEnum(RejectReason)
  .describe("Policy rejection reason");

/**
 * Canonical reason code for each reject reason.
 */
export const REJECT_REASON_CODES: Readonly<Record<RejectReason, ReasonCode>> = {
  [RejectReason.EDGE_TOO_SMALL]: ReasonCode.EVAL_EDGE_TOO_SMALL,
  [RejectReason.CONFIDENCE_TOO_LOW]: ReasonCode.EVAL_CONFIDENCE_TOO_LOW,
  [RejectReason.LIQUIDITY_TOO_LOW]: ReasonCode.EVAL_LIQUIDITY_TOO_LOW,
  [RejectReason.STALE_MARKET]: ReasonCode.EVAL_STALE_MARKET,
  [RejectReason.EXPOSURE_LIMIT_REACHED]: ReasonCode.RISK_EXPOSURE_LIMIT,
  [RejectReason.CIRCUIT_BREAKER_OPEN]: ReasonCode.LEDGER_CIRCUIT_BREAKER_OPEN,
  [RejectReason.POSITION_ALREADY_OPEN]: ReasonCode.LEDGER_POSITION_ALREADY_OPEN,
  [RejectReason.MAX_POSITIONS_REACHED]: ReasonCode.LEDGER_MAX_POSITIONS,
};

/**
 * A zeroed counter per reject reason.
 */
export function emptyRejectionCounts(): Record<RejectReason, number> {
  return {
    [RejectReason.EDGE_TOO_SMALL]: 0,
    [RejectReason.CONFIDENCE_TOO_LOW]: 0,
    [RejectReason.LIQUIDITY_TOO_LOW]: 0,
    [RejectReason.STALE_MARKET]: 0,
    [RejectReason.EXPOSURE_LIMIT_REACHED]: 0,
    [RejectReason.CIRCUIT_BREAKER_OPEN]: 0,
    [RejectReason.POSITION_ALREADY_OPEN]: 0,
    [RejectReason.MAX_POSITIONS_REACHED]: 0,
  };
}

// ─── Inferred type ───────────────────────────────────────────
export type RejectReasonType = z.infer<typeof RejectReasonSchema>;
