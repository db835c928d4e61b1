import { z } from "zod";
import { MarketIdSchema } from "../base/ids";
import { TimestampSchema } from "../base/time";

// ─────────────────────────────────────────────────────────────
// Probability Estimate
// Output of the external model. Untrusted until parsed here.
// ─────────────────────────────────────────────────────────────

export const ProbabilityEstimateSchema = z.object({
  market_id: MarketIdSchema,
  probability: z.number().min(0).max(1).describe("Model probability that YES resolves true"),
  confidence: z.number().min(0).max(1).describe("Model self-reported confidence"),
  timestamp: TimestampSchema,
  model_version: z.string().min(1).optional(),
});

