import { z } from "zod";
import { MarketIdSchema, SignalIdSchema } from "../base/ids";
import { TimestampSchema } from "../base/time";
import { LiquidityCheckSchema, SideSchema, SignalStrengthSchema } from "../enums/signals";

// ─────────────────────────────────────────────────────────────
// Signal Candidate / Signal
// A candidate is an accepted evaluation; a signal is a sized candidate.
// ─────────────────────────────────────────────────────────────

export const SignalCandidateSchema = z.object({
  signal_id: SignalIdSchema,
  market_id: MarketIdSchema,
  side: SideSchema,
  market_price: z.number().min(0).max(1).describe("YES price at evaluation time"),
  model_probability: z.number().min(0).max(1),
  edge: z.number().positive().max(1).describe("Side-relative edge, always > 0"),
  strength: SignalStrengthSchema,
  confidence: z.number().min(0).max(1),
  liquidity_check: LiquidityCheckSchema,
  created_at: TimestampSchema,
});

/**
 * A zero-size signal is a rejection, so suggested_size is strictly positive.
 */
export const SignalSchema = SignalCandidateSchema.extend({
  suggested_size: z.number().positive().finite().describe("Stake in quote currency"),
});

