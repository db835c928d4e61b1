// ═════════════════════════════════════════════════════════════
// Stake Sizer
// sizeSignal(candidate, portfolio, limits) → SIZED | REJECTED
//
// Fractional Kelly on the held side, clamped to the single-position
// cap, then shrunk to the remaining exposure headroom and to cash.
// Pure function; the ledger re-checks everything at commit time.
// ═════════════════════════════════════════════════════════════

import { ReasonCode, RejectReason, Side } from "@edgeline/contracts";
import type { PortfolioState, RiskLimits, SignalCandidate } from "@edgeline/contracts";
import type { SizingBreakdown, SizingResult } from "../types/outputs";

// ─── Helpers ─────────────────────────────────────────────────

/** Price of the held side. */
export function sidePrice(side: Side, yesPrice: number): number {
  return side === Side.YES ? yesPrice : Math.round((1 - yesPrice) * 1e10) / 1e10;
}

/** Floors an amount to whole cents. */
export function floorToCents(amount: number): number {
  return Math.floor(amount * 100) / 100;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

// ─── Main function ───────────────────────────────────────────

/**
 * Sizes an accepted candidate against a portfolio snapshot.
 *
 * size = clamp(kelly_multiplier × edge / (1 − side_price), 0, max_single) × cash,
 * then min(size, headroom, cash), floored to cents.
 */
export function sizeSignal(
  candidate: SignalCandidate,
  portfolio: PortfolioState,
  limits: RiskLimits
): SizingResult {
  const price = sidePrice(candidate.side, candidate.market_price);
  const payoffOdds = 1 - price;
  const rawFraction = payoffOdds > 0 ? candidate.edge / payoffOdds : 0;
  const scaledFraction = rawFraction * limits.kelly_multiplier;
  const clampedFraction = clamp(scaledFraction, 0, limits.max_single_position_fraction);
  const headroom =
    limits.max_total_exposure_fraction * portfolio.total_value - portfolio.total_exposure;

  const breakdown: SizingBreakdown = {
    side_price: price,
    raw_fraction: rawFraction,
    scaled_fraction: scaledFraction,
    clamped_fraction: clampedFraction,
    headroom,
  };

  if (headroom <= 0) {
    return {
      status: "REJECTED",
      reason: RejectReason.EXPOSURE_LIMIT_REACHED,
      breakdown,
      reason_code: ReasonCode.RISK_EXPOSURE_LIMIT,
    };
  }

  const kellySize = clampedFraction * portfolio.cash;
  const size = floorToCents(Math.min(kellySize, headroom, portfolio.cash));

  if (!(size > 0)) {
    return {
      status: "REJECTED",
      reason: RejectReason.EXPOSURE_LIMIT_REACHED,
      breakdown,
      reason_code: ReasonCode.RISK_EXPOSURE_LIMIT,
    };
  }

  return {
    status: "SIZED",
    signal: { ...candidate, suggested_size: size },
    breakdown,
    reason_code:
      headroom < kellySize
        ? ReasonCode.RISK_SIZE_SHRUNK_TO_HEADROOM
        : ReasonCode.RISK_SIZE_APPLIED,
  };
}
