import { z } from "zod";
import { MarketIdSchema } from "../base/ids";
import { TimestampSchema, TradingDaySchema } from "../base/time";
import { SideSchema } from "../enums/signals";
import { LedgerEntryKindSchema, LedgerStateSchema } from "../enums/ledger-states";

// ─────────────────────────────────────────────────────────────
// Portfolio State
// Owned by the risk ledger; checkpointed after every cycle
// ─────────────────────────────────────────────────────────────

/**
 * Prices are of the held side: YES price for YES, 1 − YES price for NO.
 */
export const OpenPositionSchema = z.object({
  market_id: MarketIdSchema,
  side: SideSchema,
  size: z.number().positive().describe("Quote currency staked"),
  entry_price: z.number().gt(0).max(1),
  current_price: z.number().min(0).max(1),
  unrealized_pnl: z.number(),
  opened_at: TimestampSchema,
});

export const PortfolioStateSchema = z.object({
  cash: z.number().nonnegative(),
  positions: z.record(MarketIdSchema, OpenPositionSchema),
  total_exposure: z.number().nonnegative(),
  realized_pnl: z.number(),
  unrealized_pnl: z.number(),
  daily_pnl: z.number(),
  day_start_value: z.number().nonnegative(),
  total_value: z.number(),
  ledger_state: LedgerStateSchema,
  trading_day: TradingDaySchema,
  last_snapshot_at: TimestampSchema,
});

export const ClosedTradeSchema = z.object({
  market_id: MarketIdSchema,
  side: SideSchema,
  entry_price: z.number().gt(0).max(1),
  exit_price: z.number().min(0).max(1),
  size: z.number().positive(),
  pnl: z.number().describe("Realized P&L net of fees"),
  fees: z.number().nonnegative(),
  opened_at: TimestampSchema,
  closed_at: TimestampSchema,
});

/**
 * Append-only change-log entry of the ledger.
 */
export const LedgerEntrySchema = z.object({
  seq: z.number().int().positive(),
  kind: LedgerEntryKindSchema,
  timestamp: TimestampSchema,
  market_id: MarketIdSchema.optional(),
  amount: z.number().optional(),
});

