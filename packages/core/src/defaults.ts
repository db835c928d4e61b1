// ═════════════════════════════════════════════════════════════
// @edgeline/core — Defaults
// ═════════════════════════════════════════════════════════════

import type { RiskLimits } from "@edgeline/contracts";

export const DEFAULT_RISK_LIMITS: Readonly<RiskLimits> = Object.freeze({
  max_single_position_fraction: 0.05,
  max_total_exposure_fraction: 0.5,
  max_daily_drawdown_fraction: 0.05,
  min_edge: 0.05,
  min_confidence: 0.55,
  min_liquidity: 1000,
  kelly_multiplier: 0.25,
  max_positions: 20,
  stale_grace_minutes: 15,
});

export interface SchedulerOptions {
  /** Workers per chunk */
  readonly concurrency: number;
  /** Markets per chunk; chunks run one after another */
  readonly chunkSize: number;
  /** Deadline per market task, retries included */
  readonly timeoutMs: number;
  /** Extra attempts after a collaborator error */
  readonly maxRetries: number;
}

export const DEFAULT_SCHEDULER_OPTIONS: Readonly<SchedulerOptions> = Object.freeze({
  concurrency: 3,
  chunkSize: 10,
  timeoutMs: 30_000,
  maxRetries: 1,
});

/** Fee charged on the profit of a winning close. */
export const WINNING_CLOSE_FEE_RATE = 0.02;

/** Strength thresholds on score = edge × confidence. */
export const STRONG_SCORE_THRESHOLD = 0.12;
export const MODERATE_SCORE_THRESHOLD = 0.06;
