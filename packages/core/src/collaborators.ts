// ═════════════════════════════════════════════════════════════
// @edgeline/core — Collaborator contracts
// Everything the pipeline needs from the outside world.
// Implementations live in @edgeline/adapters and @edgeline/db.
// ═════════════════════════════════════════════════════════════

import type {
  CommitResult,
  CycleSummary,
  MarketSnapshot,
  PortfolioState,
  ProbabilityEstimate,
  Signal,
} from "@edgeline/contracts";

/**
 * Source of market snapshots.
 * Volume may be omitted (ABSENT); failures throw MarketDataError.
 * A requested market that cannot be found is an error, not a gap.
 */
export interface MarketDataProvider {
  listActiveMarketIds(limit: number, signal?: AbortSignal): Promise<string[]>;
  fetchSnapshots(ids: readonly string[], signal?: AbortSignal): Promise<MarketSnapshot[]>;
}

/**
 * External probability model. Output is untrusted: the evaluator
 * range-checks it and raises InputError on bad numbers.
 */
export interface ProbabilityModel {
  predict(snapshot: MarketSnapshot, signal?: AbortSignal): Promise<ProbabilityEstimate>;
}

/**
 * Hand-off used inside the ledger's critical section.
 * The next state is only swapped in after this resolves.
 */
export interface LedgerJournal {
  appendCommit(result: CommitResult): Promise<void>;
}

/**
 * Append-only store. Appends are at-least-once; implementations
 * ignore duplicates by key.
 */
export interface PersistenceStore extends LedgerJournal {
  appendSignal(signal: Signal, cycleId: string): Promise<void>;
  appendPortfolioSnapshot(state: PortfolioState, cycleId: string): Promise<void>;
  recordCycle(summary: CycleSummary): Promise<void>;
  getCycle(cycleId: string): Promise<CycleSummary | null>;
}
