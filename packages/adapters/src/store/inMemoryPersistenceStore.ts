// ═════════════════════════════════════════════════════════════
// @edgeline/adapters — In-memory persistence
// PersistenceStore kept in process memory. Used when no
// DATABASE_URL is configured and in tests.
// Duplicate appends (same signal_id) are ignored.
// ═════════════════════════════════════════════════════════════

import type { CommitResult, CycleSummary, PortfolioState, Signal } from "@edgeline/contracts";
import type { PersistenceStore } from "@edgeline/core";

export interface StoredSignal {
  readonly cycle_id: string;
  readonly signal: Signal;
}

export interface StoredSnapshot {
  readonly cycle_id: string;
  readonly state: PortfolioState;
}

export class InMemoryPersistenceStore implements PersistenceStore {
  private readonly signals = new Map<string, StoredSignal>();
  private readonly commits = new Map<string, CommitResult>();
  private readonly snapshots: StoredSnapshot[] = [];
  private readonly cycles = new Map<string, CycleSummary>();

  async appendSignal(signal: Signal, cycleId: string): Promise<void> {
    if (this.signals.has(signal.signal_id)) return;
    this.signals.set(signal.signal_id, { cycle_id: cycleId, signal });
  }

  async appendCommit(result: CommitResult): Promise<void> {
    if (this.commits.has(result.signal_id)) return;
    this.commits.set(result.signal_id, result);
  }

  async appendPortfolioSnapshot(state: PortfolioState, cycleId: string): Promise<void> {
    this.snapshots.push({ cycle_id: cycleId, state });
  }

  /** Last write wins: a cycle is recorded RUNNING, then final. */
  async recordCycle(summary: CycleSummary): Promise<void> {
    this.cycles.set(summary.cycle_id, summary);
  }

  async getCycle(cycleId: string): Promise<CycleSummary | null> {
    return this.cycles.get(cycleId) ?? null;
  }

  // ─── Inspection ─────────────────────────────────────────────

  listSignals(): StoredSignal[] {
    return [...this.signals.values()];
  }

  listCommits(): CommitResult[] {
    return [...this.commits.values()];
  }

  listSnapshots(): StoredSnapshot[] {
    return [...this.snapshots];
  }

  latestSnapshot(): PortfolioState | null {
    return this.snapshots[this.snapshots.length - 1]?.state ?? null;
  }
}
