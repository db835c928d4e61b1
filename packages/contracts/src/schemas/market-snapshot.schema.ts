import { z } from "zod";
import { MarketIdSchema } from "../base/ids";
import { TimestampSchema } from "../base/time";

// ─────────────────────────────────────────────────────────────
// Market Snapshot
// Read-only view of one binary market at observation time
// ─────────────────────────────────────────────────────────────

/**
 * 24h volume as reported by the provider.
 * A missing figure is ABSENT, never a zero.
 */
export const VolumeReadingSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("REPORTED"),
    value: z.number().nonnegative().finite().describe("Reported 24h volume in quote currency"),
  }),
  z.object({
    status: z.literal("ABSENT"),
  }),
]);

export const MarketSnapshotSchema = z.object({
  market_id: MarketIdSchema,
  question: z.string().optional().describe("Human question text, when the provider sends it"),
  yes_price: z.number().min(0).max(1).describe("Last traded / mid price of the YES contract"),
  volume_24h: VolumeReadingSchema,
  liquidity: z.number().nonnegative().nullable().describe("Order-book liquidity, null when unknown"),
  end_date: TimestampSchema.describe("Resolution time of the market"),
  observed_at: TimestampSchema.describe("When the snapshot was taken"),
});

type VolumeReading = z.infer<typeof VolumeReadingSchema>;

export type VolumeClass = "ZERO" | "NONZERO" | "ABSENT";

/**
 * Three-way classification of a volume reading.
 */
export function classifyVolume(reading: VolumeReading): VolumeClass {
  if (reading.status === "ABSENT") return "ABSENT";
  return reading.value === 0 ? "ZERO" : "NONZERO";
}
