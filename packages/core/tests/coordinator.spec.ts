// ═════════════════════════════════════════════════════════════
// Coordinator Tests — PipelineCoordinator
// Full cycles over in-process fakes.
// ═════════════════════════════════════════════════════════════

import { describe, it, expect } from "vitest";
import { CycleStatus, CycleSummarySchema, LedgerEntryKind, RejectReason } from "@edgeline/contracts";
import type { CommitResult, RiskLimits } from "@edgeline/contracts";
import { PipelineCoordinator } from "../src/pipeline/pipelineCoordinator";
import { RiskLedger } from "../src/ledger/riskLedger";
import { EvaluationScheduler } from "../src/scheduler/evaluationScheduler";
import { InputError, InvariantViolationError, MarketDataError } from "../src/errors";
import type { FakeMarketOptions } from "./helpers";
import {
  FakeMarketData,
  FakeModel,
  RecordingStore,
  makeClock,
  makeRiskLimits,
  makeSignal,
  makeSnapshot,
  sequentialIds,
  TEST_CYCLE_ID,
} from "./helpers";

const SNAPSHOTS = [
  makeSnapshot({ market_id: "strong" }),
  makeSnapshot({ market_id: "unsure" }),
  makeSnapshot({ market_id: "thin", volume_24h: { status: "REPORTED", value: 10 } }),
  makeSnapshot({ market_id: "broken" }),
];

const ESTIMATES: Record<string, { probability: number; confidence: number }> = {
  strong: { probability: 0.7, confidence: 0.88 },
  unsure: { probability: 0.7, confidence: 0.4 },
  thin: { probability: 0.7, confidence: 0.9 },
  broken: { probability: 0.7, confidence: 0.9 },
};

function setup(
  options: {
    marketOptions?: FakeMarketOptions;
    limits?: RiskLimits;
    snapshots?: typeof SNAPSHOTS;
    estimates?: typeof ESTIMATES;
    ledger?: RiskLedger;
  } = {}
) {
  const clock = makeClock();
  const limits = options.limits ?? makeRiskLimits();
  const store = new RecordingStore();
  const ledger =
    options.ledger ?? new RiskLedger({ startingCash: 10_000, limits, clock: clock.now, journal: store });
  const coordinator = new PipelineCoordinator({
    marketData: new FakeMarketData(options.snapshots ?? SNAPSHOTS, options.marketOptions ?? { failing: ["broken"] }),
    model: new FakeModel(options.estimates ?? ESTIMATES),
    store,
    ledger,
    newId: sequentialIds(),
    scheduler: new EvaluationScheduler({ concurrency: 2, timeoutMs: 1000 }),
    limits,
    clock: clock.now,
  });
  return { coordinator, ledger, store };
}

describe("PipelineCoordinator.runCycle", () => {
  it("evaluates, sizes, commits and summarizes a cycle", async () => {
    const { coordinator, ledger, store } = setup();

    const summary = await coordinator.runCycle(
      { market_limit: 10, auto_signals: true, auto_commit: true },
      TEST_CYCLE_ID
    );

    expect(summary).toMatchObject({
      cycle_id: TEST_CYCLE_ID,
      status: CycleStatus.COMPLETED,
      markets_requested: 4,
      markets_evaluated: 3,
      signals_created: 1,
      trades_created: 1,
      timed_out: 0,
      failed: 1,
      auto_signals: true,
      auto_commit: true,
    });
    expect(summary.rejections).toMatchObject({
      [RejectReason.CONFIDENCE_TOO_LOW]: 1,
      [RejectReason.LIQUIDITY_TOO_LOW]: 1,
      [RejectReason.EXPOSURE_LIMIT_REACHED]: 0,
    });
    expect(summary.failures).toEqual([
      { market_id: "broken", kind: "MARKET_DATA", message: "upstream unavailable for broken" },
    ]);
    expect(CycleSummarySchema.safeParse(summary).success).toBe(true);

    expect(store.signals.map((s) => [s.signal.market_id, s.signal.suggested_size, s.cycleId])).toEqual([
      ["strong", 500, TEST_CYCLE_ID],
    ]);
    expect(store.commits.map((c) => c.status)).toEqual(["COMMITTED"]);
    expect(store.snapshots).toHaveLength(1);
    expect(store.cycles.get(TEST_CYCLE_ID)?.status).toBe(CycleStatus.COMPLETED);

    expect(ledger.getState().cash).toBe(9500);
    expect(ledger.getChangeLog().map((e) => e.kind)).toEqual([LedgerEntryKind.COMMIT, LedgerEntryKind.OBSERVE]);
  });

  it("persists signals without committing when auto_commit is off", async () => {
    const { coordinator, ledger, store } = setup();

    const summary = await coordinator.runCycle({ auto_signals: true, auto_commit: false }, TEST_CYCLE_ID);

    expect(summary.signals_created).toBe(1);
    expect(summary.trades_created).toBe(0);
    expect(store.commits).toEqual([]);
    expect(ledger.getState().cash).toBe(10_000);
  });

  it("only evaluates when auto_signals is off", async () => {
    const { coordinator, store } = setup();

    const summary = await coordinator.runCycle({ auto_signals: false, auto_commit: true }, TEST_CYCLE_ID);

    expect(summary.markets_evaluated).toBe(3);
    expect(summary.signals_created).toBe(0);
    expect(store.signals).toEqual([]);
  });

  it("applies commits in market order, not completion order", async () => {
    const limits = makeRiskLimits({ max_single_position_fraction: 0.5, kelly_multiplier: 1 });
    const snapshots = [makeSnapshot({ market_id: "first" }), makeSnapshot({ market_id: "second" })];
    const { coordinator, ledger } = setup({
      limits,
      snapshots,
      estimates: {
        first: { probability: 0.7, confidence: 0.9 },
        second: { probability: 0.7, confidence: 0.9 },
      },
      marketOptions: { delays: { first: 30 } },
    });

    const summary = await coordinator.runCycle({ auto_commit: true }, TEST_CYCLE_ID);

    expect(summary.trades_created).toBe(1);
    expect(summary.rejections[RejectReason.EXPOSURE_LIMIT_REACHED]).toBe(1);
    expect(Object.keys(ledger.getState().positions)).toEqual(["first"]);
    expect(ledger.getState().total_exposure).toBe(5000);
  });

  it("records a per-market persistence failure and carries on", async () => {
    const snapshots = [makeSnapshot({ market_id: "strong" }), makeSnapshot({ market_id: "thin" })];
    const { coordinator, store } = setup({ snapshots, marketOptions: {} });
    store.failSignalsFor = ["strong"];

    const summary = await coordinator.runCycle({ auto_commit: true }, TEST_CYCLE_ID);

    expect(summary.status).toBe(CycleStatus.COMPLETED);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([
      { market_id: "strong", kind: "PERSISTENCE", message: "signals table unavailable for strong" },
    ]);
    expect(summary.markets_evaluated).toBe(2);
  });

  it("keeps a position out of the ledger when its commit cannot be persisted", async () => {
    const snapshots = [makeSnapshot({ market_id: "strong" }), makeSnapshot({ market_id: "thin" })];
    const { coordinator, ledger, store } = setup({ snapshots, marketOptions: {} });
    store.failCommits = true;

    const summary = await coordinator.runCycle({ auto_commit: true }, TEST_CYCLE_ID);

    expect(summary).toMatchObject({
      status: CycleStatus.COMPLETED,
      signals_created: 1,
      trades_created: 0,
      failed: 1,
    });
    expect(summary.failures).toEqual([
      { market_id: "strong", kind: "PERSISTENCE", message: "ledger_commits table unavailable" },
    ]);
    expect(ledger.getState().positions).toEqual({});
    expect(ledger.getState().cash).toBe(10_000);
    expect(store.commits).toEqual([]);
  });

  it("persists ledger rejections from the coordinator", async () => {
    const { coordinator, ledger, store } = setup({
      snapshots: [makeSnapshot({ market_id: "strong" })],
      marketOptions: {},
    });
    await ledger.commit(makeSignal({ market_id: "strong", signal_id: "00000000-0000-4000-8000-0000000000aa" }));

    const summary = await coordinator.runCycle({ auto_commit: true }, TEST_CYCLE_ID);

    expect(summary.rejections[RejectReason.POSITION_ALREADY_OPEN]).toBe(1);
    expect(store.commits.map((c) => [c.market_id, c.status])).toEqual([
      ["strong", "COMMITTED"],
      ["strong", "REJECTED"],
    ]);
  });

  it("refuses a ledger without a journal", () => {
    const ledger = new RiskLedger({ startingCash: 10_000, limits: makeRiskLimits() });

    expect(() =>
      new PipelineCoordinator({
        marketData: new FakeMarketData(SNAPSHOTS),
        model: new FakeModel(ESTIMATES),
        store: new RecordingStore(),
        ledger,
        newId: sequentialIds(),
      })
    ).toThrow(InputError);
  });

  it("fails the cycle when market ids cannot be listed", async () => {
    const { coordinator, store } = setup({
      marketOptions: { listError: new MarketDataError("gamma down") },
    });

    const summary = await coordinator.runCycle({}, TEST_CYCLE_ID);

    expect(summary.status).toBe(CycleStatus.FAILED);
    expect(summary.error).toBe("listing markets failed: gamma down");
    expect(summary.markets_requested).toBe(0);
    expect(store.cycles.get(TEST_CYCLE_ID)?.status).toBe(CycleStatus.FAILED);
  });

  it("records FAILED and rethrows on an invariant violation", async () => {
    class BrokenLedger extends RiskLedger {
      override commit(): Promise<CommitResult> {
        return Promise.reject(new InvariantViolationError("exposure accounting drifted"));
      }
    }
    const ledger = new BrokenLedger({
      startingCash: 10_000,
      limits: makeRiskLimits(),
      journal: new RecordingStore(),
    });
    const { coordinator, store } = setup({ ledger, marketOptions: {} });

    await expect(coordinator.runCycle({ auto_commit: true }, TEST_CYCLE_ID)).rejects.toBeInstanceOf(
      InvariantViolationError
    );
    expect(store.cycles.get(TEST_CYCLE_ID)).toMatchObject({
      status: CycleStatus.FAILED,
      error: "exposure accounting drifted",
    });
  });

  it("rejects an invalid request", async () => {
    const { coordinator } = setup();

    await expect(coordinator.runCycle({ market_limit: 0 })).rejects.toBeInstanceOf(InputError);
  });
});

describe("PipelineCoordinator.startCycle", () => {
  it("returns the cycle id at once and records RUNNING, then the final summary", async () => {
    const { coordinator, store } = setup();

    const { cycle_id } = await coordinator.startCycle({ auto_commit: true });

    expect(cycle_id).toBe("00000000-0000-4000-8000-000000000001");
    expect(store.cycleHistory[0]).toMatchObject({ cycle_id, status: CycleStatus.RUNNING, finished_at: null });

    await coordinator.drain();

    expect(coordinator.runningCycles).toBe(0);
    expect(store.cycles.get(cycle_id)?.status).toBe(CycleStatus.COMPLETED);
    expect(store.cycles.get(cycle_id)?.trades_created).toBe(1);
  });

  it("throws InputError before starting anything", async () => {
    const { coordinator, store } = setup();

    await expect(coordinator.startCycle({ market_limit: 501 })).rejects.toBeInstanceOf(InputError);
    expect(store.cycleHistory).toEqual([]);
  });
});
