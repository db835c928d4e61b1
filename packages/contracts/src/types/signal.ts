import { z } from "zod";
import { SignalCandidateSchema, SignalSchema } from "../schemas/signal.schema";
import { RiskLimitsSchema } from "../schemas/risk-limits.schema";

// ─────────────────────────────────────────────────────────────
// Types inferred from the signal and risk-limit schemas
// ─────────────────────────────────────────────────────────────

export type SignalCandidate = z.infer<typeof SignalCandidateSchema>;
export type Signal = z.infer<typeof SignalSchema>;
export type RiskLimits = z.infer<typeof RiskLimitsSchema>;
