import { z } from "zod";
import { MarketIdSchema, SignalIdSchema } from "../base/ids";
import { TimestampSchema } from "../base/time";
import { RejectReasonSchema } from "../enums/reject-reasons";
import { OpenPositionSchema, PortfolioStateSchema } from "./portfolio.schema";

// ─────────────────────────────────────────────────────────────
// Commit Result
// Outcome of RiskLedger.commit: a value, never an error
// ─────────────────────────────────────────────────────────────

export const CommitResultSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("COMMITTED"),
    signal_id: SignalIdSchema,
    market_id: MarketIdSchema,
    timestamp: TimestampSchema,
    position: OpenPositionSchema,
    portfolio: PortfolioStateSchema,
  }),
  z.object({
    status: z.literal("REJECTED"),
    signal_id: SignalIdSchema,
    market_id: MarketIdSchema,
    timestamp: TimestampSchema,
    reason: RejectReasonSchema,
  }),
]);

