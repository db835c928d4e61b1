import { z } from "zod";
import {
  MarketSnapshotSchema,
  VolumeReadingSchema,
} from "../schemas/market-snapshot.schema";
import { ProbabilityEstimateSchema } from "../schemas/probability-estimate.schema";

// ─────────────────────────────────────────────────────────────
// Types inferred from the market and estimate schemas
// ─────────────────────────────────────────────────────────────

export type VolumeReading = z.infer<typeof VolumeReadingSchema>;
export type MarketSnapshot = z.infer<typeof MarketSnapshotSchema>;
export type ProbabilityEstimate = z.infer<typeof ProbabilityEstimateSchema>;
