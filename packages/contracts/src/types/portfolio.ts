import { z } from "zod";
import {
  ClosedTradeSchema,
  LedgerEntrySchema,
  OpenPositionSchema,
  PortfolioStateSchema,
} from "../schemas/portfolio.schema";
import { CommitResultSchema } from "../schemas/commit-result.schema";

// ─────────────────────────────────────────────────────────────
// Types inferred from the portfolio and commit schemas
// ─────────────────────────────────────────────────────────────

export type OpenPosition = z.infer<typeof OpenPositionSchema>;
export type PortfolioState = z.infer<typeof PortfolioStateSchema>;
export type ClosedTrade = z.infer<typeof ClosedTradeSchema>;
export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;
export type CommitResult = z.infer<typeof CommitResultSchema>;
