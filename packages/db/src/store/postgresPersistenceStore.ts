// ═══════════════════════════════════════════════════════════════
// @edgeline/db — PostgresPersistenceStore
// PersistenceStore over the repositories. Driver errors surface
// as PersistenceError so the pipeline can tell them apart.
// ═══════════════════════════════════════════════════════════════

import type { CommitResult, CycleSummary, PortfolioState, Signal } from "@edgeline/contracts";
import { PersistenceError } from "@edgeline/core";
import type { PersistenceStore } from "@edgeline/core";
import type { Queryable } from "../connection";
import { insertSignal } from "../repos/signalRepo";
import { insertCommit } from "../repos/commitRepo";
import { getLatestSnapshot, insertSnapshot } from "../repos/snapshotRepo";
import { getCycle, upsertCycle } from "../repos/cycleRepo";

export class PostgresPersistenceStore implements PersistenceStore {
  constructor(private readonly db: Queryable) {}

  async appendSignal(signal: Signal, cycleId: string): Promise<void> {
    await this.guard(`append signal ${signal.signal_id}`, () => insertSignal(signal, cycleId, this.db));
  }

  async appendCommit(result: CommitResult): Promise<void> {
    await this.guard(`append commit ${result.signal_id}`, () => insertCommit(result, this.db));
  }

  async appendPortfolioSnapshot(state: PortfolioState, cycleId: string): Promise<void> {
    await this.guard(`checkpoint portfolio for ${cycleId}`, () => insertSnapshot(state, cycleId, this.db));
  }

  async recordCycle(summary: CycleSummary): Promise<void> {
    await this.guard(`record cycle ${summary.cycle_id}`, () => upsertCycle(summary, this.db));
  }

  async getCycle(cycleId: string): Promise<CycleSummary | null> {
    return this.guard(`read cycle ${cycleId}`, () => getCycle(cycleId, this.db));
  }

  /** Last checkpoint, used to restore the ledger on boot. */
  async latestPortfolio(): Promise<PortfolioState | null> {
    return this.guard("read latest portfolio", () => getLatestSnapshot(this.db));
  }

  private async guard<T>(action: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PersistenceError(`Failed to ${action}: ${message}`, { cause: err });
    }
  }
}
