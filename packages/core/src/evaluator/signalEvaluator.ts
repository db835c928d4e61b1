// ═════════════════════════════════════════════════════════════
// Signal Evaluator
// evaluateSignal(snapshot, estimate, limits, context) → ACCEPT | REJECT
//
// Steps, in fixed order, short-circuiting on the first failure:
// 1. Staleness
// 2. Edge
// 3. Confidence
// 4. Liquidity (applied only when volume was reported)
// 5. Strength tier
//
// Pure function: clock and signal_id come in through the context.
// ═════════════════════════════════════════════════════════════

import {
  LiquidityCheck,
  ReasonCode,
  RejectReason,
  REJECT_REASON_CODES,
  Side,
  SignalStrength,
} from "@edgeline/contracts";
import type {
  MarketSnapshot,
  ProbabilityEstimate,
  RiskLimits,
  SignalCandidate,
} from "@edgeline/contracts";
import { InputError } from "../errors";
import {
  MODERATE_SCORE_THRESHOLD,
  STRONG_SCORE_THRESHOLD,
} from "../defaults";
import type { EvaluationContext } from "../types/inputs";
import type { EvaluationResult } from "../types/outputs";

// ─── Helpers ─────────────────────────────────────────────────

/** Probabilities are quoted to a few decimals; strip float noise. */
function roundProbability(value: number): number {
  return Math.round(value * 1e10) / 1e10;
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function assertValidInputs(
  snapshot: MarketSnapshot,
  estimate: ProbabilityEstimate
): void {
  if (snapshot.market_id !== estimate.market_id) {
    throw new InputError(
      `Estimate for ${estimate.market_id} does not match snapshot ${snapshot.market_id}`,
      snapshot.market_id,
      ReasonCode.INPUT_MARKET_MISMATCH
    );
  }
  if (!isUnitInterval(snapshot.yes_price)) {
    throw new InputError(`yes_price out of range: ${snapshot.yes_price}`, snapshot.market_id);
  }
  if (!isUnitInterval(estimate.probability)) {
    throw new InputError(`probability out of range: ${estimate.probability}`, snapshot.market_id);
  }
  if (!isUnitInterval(estimate.confidence)) {
    throw new InputError(`confidence out of range: ${estimate.confidence}`, snapshot.market_id);
  }
  if (
    snapshot.volume_24h.status === "REPORTED" &&
    !(Number.isFinite(snapshot.volume_24h.value) && snapshot.volume_24h.value >= 0)
  ) {
    throw new InputError(`volume_24h invalid: ${snapshot.volume_24h.value}`, snapshot.market_id);
  }
  if (Number.isNaN(Date.parse(snapshot.end_date))) {
    throw new InputError(`end_date unparseable: ${snapshot.end_date}`, snapshot.market_id);
  }
}

function reject(
  market_id: string,
  reason: RejectReason,
  liquidity_check: LiquidityCheck,
  message: string
): EvaluationResult {
  return {
    decision: "REJECT",
    market_id,
    reason,
    liquidity_check,
    reason_code: REJECT_REASON_CODES[reason],
    message,
  };
}

/**
 * Strength tier of score = edge × confidence.
 */
export function classifyStrength(edge: number, confidence: number): SignalStrength {
  const score = edge * confidence;
  if (score >= STRONG_SCORE_THRESHOLD) return SignalStrength.STRONG;
  if (score >= MODERATE_SCORE_THRESHOLD) return SignalStrength.MODERATE;
  return SignalStrength.WEAK;
}

// ─── Main function ───────────────────────────────────────────

/**
 * Decides whether an estimate warrants a position in the market.
 *
 * @throws InputError when the snapshot and estimate disagree on the market
 *         or carry out-of-range numbers
 */
export function evaluateSignal(
  snapshot: MarketSnapshot,
  estimate: ProbabilityEstimate,
  limits: RiskLimits,
  context: EvaluationContext
): EvaluationResult {
  assertValidInputs(snapshot, estimate);
  const { market_id } = snapshot;

  // ─── 1. Staleness ─────────────────────────────────────────
  const graceMs = limits.stale_grace_minutes * 60_000;
  if (Date.parse(snapshot.end_date) < context.now.getTime() - graceMs) {
    return reject(
      market_id,
      RejectReason.STALE_MARKET,
      LiquidityCheck.NOT_REACHED,
      `Market ended at ${snapshot.end_date}, past the ${limits.stale_grace_minutes}min grace`
    );
  }

  // ─── 2. Edge ──────────────────────────────────────────────
  const price = snapshot.yes_price;
  const probability = estimate.probability;
  const edge = roundProbability(Math.abs(probability - price));
  const side = probability > price ? Side.YES : Side.NO;
  if (edge < limits.min_edge || edge === 0) {
    return reject(
      market_id,
      RejectReason.EDGE_TOO_SMALL,
      LiquidityCheck.NOT_REACHED,
      `Edge ${edge.toFixed(4)} below min_edge ${limits.min_edge}`
    );
  }
  // A held side quoted at 0 means the market has already settled against it.
  if (roundProbability(side === Side.YES ? price : 1 - price) <= 0) {
    return reject(
      market_id,
      RejectReason.STALE_MARKET,
      LiquidityCheck.NOT_REACHED,
      `${side} side of ${market_id} is quoted at 0; market already settled`
    );
  }

  // ─── 3. Confidence ────────────────────────────────────────
  if (estimate.confidence < limits.min_confidence) {
    return reject(
      market_id,
      RejectReason.CONFIDENCE_TOO_LOW,
      LiquidityCheck.NOT_REACHED,
      `Confidence ${estimate.confidence} below min_confidence ${limits.min_confidence}`
    );
  }

  // ─── 4. Liquidity ─────────────────────────────────────────
  let liquidityCheck: LiquidityCheck;
  if (snapshot.volume_24h.status === "REPORTED") {
    liquidityCheck = LiquidityCheck.APPLIED;
    if (snapshot.volume_24h.value < limits.min_liquidity) {
      return reject(
        market_id,
        RejectReason.LIQUIDITY_TOO_LOW,
        LiquidityCheck.APPLIED,
        `24h volume ${snapshot.volume_24h.value} below min_liquidity ${limits.min_liquidity}`
      );
    }
  } else {
    liquidityCheck = LiquidityCheck.SKIPPED;
  }

  // ─── 5. Strength ──────────────────────────────────────────
  const strength = classifyStrength(edge, estimate.confidence);

  const candidate: SignalCandidate = {
    signal_id: context.signal_id,
    market_id,
    side,
    market_price: price,
    model_probability: probability,
    edge,
    strength,
    confidence: estimate.confidence,
    liquidity_check: liquidityCheck,
    created_at: context.now.toISOString(),
  };

  return {
    decision: "ACCEPT",
    candidate,
    reason_code:
      liquidityCheck === LiquidityCheck.SKIPPED
        ? ReasonCode.EVAL_LIQUIDITY_SKIPPED
        : ReasonCode.EVAL_ACCEPTED,
    message: `${side} ${strength}: edge ${edge.toFixed(4)} at confidence ${estimate.confidence}`,
  };
}
