import { z } from "zod";

// ─────────────────────────────────────────────────────────────
// Risk Limits
// Fractions are of cash (single position) or total value (exposure,
// drawdown). Thresholds are absolute.
// ─────────────────────────────────────────────────────────────

const Fraction = z.number().gt(0).max(1);

export const RiskLimitsSchema = z.object({
  max_single_position_fraction: Fraction.describe("Cap on one stake as a fraction of cash"),
  max_total_exposure_fraction: Fraction.describe("Cap on total exposure as a fraction of total value"),
  max_daily_drawdown_fraction: Fraction.describe("Daily loss that trips the circuit breaker"),
  min_edge: z.number().min(0).max(1),
  min_confidence: z.number().min(0).max(1),
  min_liquidity: z.number().nonnegative().describe("Minimum reported 24h volume"),
  kelly_multiplier: Fraction.describe("Fraction of the full Kelly stake"),
  max_positions: z.number().int().positive(),
  stale_grace_minutes: z.number().nonnegative(),
});

