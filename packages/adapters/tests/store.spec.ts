// ═════════════════════════════════════════════════════════════
// @edgeline/adapters — In-memory persistence tests
// ═════════════════════════════════════════════════════════════

import { describe, it, expect } from "vitest";
import { CycleStatus, LiquidityCheck, RejectReason, Side, SignalStrength } from "@edgeline/contracts";
import type { CycleSummary, Signal } from "@edgeline/contracts";
import { InMemoryPersistenceStore } from "../src/store/inMemoryPersistenceStore";

const CYCLE_ID = "b2c3d4e5-f6a7-4b8c-9d0e-1f2a3b4c5d6e";
const SIGNAL_ID = "a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d";

function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    signal_id: SIGNAL_ID,
    market_id: "mkt-1",
    side: Side.YES,
    market_price: 0.4,
    model_probability: 0.7,
    edge: 0.3,
    strength: SignalStrength.STRONG,
    confidence: 0.88,
    liquidity_check: LiquidityCheck.APPLIED,
    created_at: "2025-06-15T12:00:00.000Z",
    suggested_size: 100,
    ...overrides,
  };
}

function makeSummary(overrides: Partial<CycleSummary> = {}): CycleSummary {
  return {
    cycle_id: CYCLE_ID,
    status: CycleStatus.RUNNING,
    started_at: "2025-06-15T12:00:00.000Z",
    finished_at: null,
    auto_signals: true,
    auto_commit: false,
    markets_requested: 0,
    markets_evaluated: 0,
    signals_created: 0,
    trades_created: 0,
    timed_out: 0,
    failed: 0,
    rejections: {},
    failures: [],
    ...overrides,
  };
}

describe("InMemoryPersistenceStore", () => {
  it("ignores a signal appended twice", async () => {
    const store = new InMemoryPersistenceStore();
    await store.appendSignal(makeSignal(), CYCLE_ID);
    await store.appendSignal(makeSignal({ suggested_size: 999 }), CYCLE_ID);

    expect(store.listSignals()).toEqual([{ cycle_id: CYCLE_ID, signal: makeSignal() }]);
  });

  it("ignores a commit result appended twice", async () => {
    const store = new InMemoryPersistenceStore();
    const rejected = {
      status: "REJECTED" as const,
      signal_id: SIGNAL_ID,
      market_id: "mkt-1",
      timestamp: "2025-06-15T12:00:00.000Z",
      reason: RejectReason.CIRCUIT_BREAKER_OPEN,
    };
    await store.appendCommit(rejected);
    await store.appendCommit(rejected);

    expect(store.listCommits()).toHaveLength(1);
  });

  it("keeps the last recorded version of a cycle", async () => {
    const store = new InMemoryPersistenceStore();
    await store.recordCycle(makeSummary());
    await store.recordCycle(
      makeSummary({ status: CycleStatus.COMPLETED, finished_at: "2025-06-15T12:00:05.000Z" })
    );

    const cycle = await store.getCycle(CYCLE_ID);
    expect(cycle?.status).toBe(CycleStatus.COMPLETED);
    expect(cycle?.finished_at).toBe("2025-06-15T12:00:05.000Z");
  });

  it("returns null for an unknown cycle", async () => {
    const store = new InMemoryPersistenceStore();
    await expect(store.getCycle(CYCLE_ID)).resolves.toBeNull();
  });
});
