// ═════════════════════════════════════════════════════════════
// Portfolio math
// Derived fields of PortfolioState and the invariants over them.
// Pure functions, no state.
// ═════════════════════════════════════════════════════════════

import type { OpenPosition, PortfolioState, RiskLimits } from "@edgeline/contracts";
import { InvariantViolationError } from "../errors";

/** Tolerance for float comparisons on currency amounts. */
export const MONEY_EPSILON = 1e-6;

/**
 * Unrealized P&L of a stake bought at entry_price and marked at current_price.
 */
export function positionPnl(size: number, entryPrice: number, currentPrice: number): number {
  return size * (currentPrice / entryPrice - 1);
}

/**
 * Recomputes exposure, unrealized P&L, total value and daily P&L
 * from cash and positions.
 */
export function recompute(
  base: Omit<PortfolioState, "total_exposure" | "unrealized_pnl" | "total_value" | "daily_pnl">
): PortfolioState {
  let totalExposure = 0;
  let unrealized = 0;
  for (const position of Object.values(base.positions)) {
    totalExposure += Math.abs(position.size);
    unrealized += position.unrealized_pnl;
  }
  const totalValue = base.cash + totalExposure + unrealized;
  return {
    ...base,
    total_exposure: totalExposure,
    unrealized_pnl: unrealized,
    total_value: totalValue,
    daily_pnl: totalValue - base.day_start_value,
  };
}

/**
 * Re-marks one position to a new held-side price.
 */
export function markPosition(position: OpenPosition, currentPrice: number): OpenPosition {
  return {
    ...position,
    current_price: currentPrice,
    unrealized_pnl: positionPnl(position.size, position.entry_price, currentPrice),
  };
}

/**
 * Whether the daily loss has reached the drawdown limit.
 */
export function isDrawdownBreached(state: PortfolioState, limits: RiskLimits): boolean {
  if (state.day_start_value <= 0) return false;
  return state.daily_pnl / state.day_start_value <= -limits.max_daily_drawdown_fraction;
}

/**
 * Checks the ledger invariants after a commit.
 *
 * @throws InvariantViolationError
 */
export function assertCommitInvariants(state: PortfolioState, limits: RiskLimits): void {
  if (!Number.isFinite(state.cash) || state.cash < -MONEY_EPSILON) {
    throw new InvariantViolationError(`cash would become ${state.cash}`);
  }
  const staked = Object.values(state.positions).reduce((sum, p) => sum + p.size, 0);
  if (Math.abs(state.cash + staked - (state.total_value - state.unrealized_pnl)) > MONEY_EPSILON) {
    throw new InvariantViolationError("cash + staked no longer equals total_value − unrealized_pnl");
  }
  const cap = limits.max_total_exposure_fraction * state.total_value;
  if (state.total_exposure > cap + MONEY_EPSILON) {
    throw new InvariantViolationError(
      `total_exposure ${state.total_exposure} above cap ${cap}`
    );
  }
}
