import { z } from "zod";
import { CycleIdSchema, MarketIdSchema } from "../base/ids";
import { TimestampSchema } from "../base/time";
import { CycleStatusSchema } from "../enums/ledger-states";
import { RejectReasonSchema } from "../enums/reject-reasons";

// ─────────────────────────────────────────────────────────────
// Pipeline Cycle
// Request that starts a cycle and the summary it leaves behind
// ─────────────────────────────────────────────────────────────

export const CycleRequestSchema = z.object({
  market_limit: z.number().int().min(1).max(500).default(10),
  auto_signals: z.boolean().default(true),
  auto_commit: z.boolean().default(false),
});

/**
 * Kind of a per-market failure: TIMEOUT for a missed deadline, otherwise
 * the error class family that was thrown.
 */
export const FailureKindEnum = z.enum([
  "TIMEOUT",
  "INPUT",
  "MARKET_DATA",
  "MODEL",
  "PERSISTENCE",
  "UNKNOWN",
]);

export const CycleFailureSchema = z.object({
  market_id: MarketIdSchema,
  kind: FailureKindEnum,
  message: z.string(),
});

export const CycleSummarySchema = z.object({
  cycle_id: CycleIdSchema,
  status: CycleStatusSchema,
  started_at: TimestampSchema,
  finished_at: TimestampSchema.nullable(),
  auto_signals: z.boolean(),
  auto_commit: z.boolean(),
  markets_requested: z.number().int().nonnegative(),
  markets_evaluated: z.number().int().nonnegative(),
  signals_created: z.number().int().nonnegative(),
  trades_created: z.number().int().nonnegative(),
  timed_out: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  rejections: z.record(RejectReasonSchema, z.number().int().nonnegative()),
  failures: z.array(CycleFailureSchema),
  error: z.string().optional(),
});

