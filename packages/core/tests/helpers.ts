// ═════════════════════════════════════════════════════════════
// Test Helpers — deterministic data factories and in-process fakes
// ═════════════════════════════════════════════════════════════

import {
  LedgerState,
  LiquidityCheck,
  Side,
  SignalStrength,
} from "@edgeline/contracts";
import type {
  CommitResult,
  CycleSummary,
  MarketSnapshot,
  PortfolioState,
  ProbabilityEstimate,
  RiskLimits,
  Signal,
  SignalCandidate,
} from "@edgeline/contracts";
import { DEFAULT_RISK_LIMITS } from "../src/defaults";
import type {
  MarketDataProvider,
  PersistenceStore,
  ProbabilityModel,
} from "../src/collaborators";
import { MarketDataError, PersistenceError } from "../src/errors";

// ─── Fixed values ────────────────────────────────────────────

export const TEST_SIGNAL_ID = "a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d";
export const TEST_CYCLE_ID = "b2c3d4e5-f6a7-4b8c-9d0e-1f2a3b4c5d6e";
export const TEST_TIMESTAMP = "2025-06-15T12:00:00.000Z";
export const TEST_NOW = new Date(TEST_TIMESTAMP);

/**
 * Deterministic UUID v4 generator: ...-000000000001, ...-000000000002, ...
 */
export function sequentialIds(): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `00000000-0000-4000-8000-${n.toString().padStart(12, "0")}`;
  };
}

/**
 * Clock whose time tests can move.
 */
export function makeClock(start: Date = TEST_NOW): { now: () => Date; set: (iso: string) => void } {
  let current = new Date(start.getTime());
  return {
    now: () => new Date(current.getTime()),
    set: (iso: string) => {
      current = new Date(iso);
    },
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Data factories ──────────────────────────────────────────

export function makeSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    market_id: "mkt-1",
    question: "Will it rain in Lisbon on July 1st?",
    yes_price: 0.4,
    volume_24h: { status: "REPORTED", value: 5000 },
    liquidity: 2000,
    end_date: "2025-07-01T00:00:00Z",
    observed_at: TEST_TIMESTAMP,
    ...overrides,
  };
}

export function makeEstimate(overrides: Partial<ProbabilityEstimate> = {}): ProbabilityEstimate {
  return {
    market_id: "mkt-1",
    probability: 0.7,
    confidence: 0.88,
    timestamp: TEST_TIMESTAMP,
    ...overrides,
  };
}

export function makeRiskLimits(overrides: Partial<RiskLimits> = {}): RiskLimits {
  return { ...DEFAULT_RISK_LIMITS, ...overrides };
}

export function makeCandidate(overrides: Partial<SignalCandidate> = {}): SignalCandidate {
  return {
    signal_id: TEST_SIGNAL_ID,
    market_id: "mkt-1",
    side: Side.YES,
    market_price: 0.4,
    model_probability: 0.7,
    edge: 0.3,
    strength: SignalStrength.STRONG,
    confidence: 0.88,
    liquidity_check: LiquidityCheck.APPLIED,
    created_at: TEST_TIMESTAMP,
    ...overrides,
  };
}

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    ...makeCandidate(),
    suggested_size: 100,
    ...overrides,
  };
}

/**
 * Flat portfolio: all cash, no positions.
 */
export function makePortfolio(overrides: Partial<PortfolioState> = {}): PortfolioState {
  return {
    cash: 10_000,
    positions: {},
    total_exposure: 0,
    realized_pnl: 0,
    unrealized_pnl: 0,
    daily_pnl: 0,
    day_start_value: 10_000,
    total_value: 10_000,
    ledger_state: LedgerState.OPEN,
    trading_day: "2025-06-15",
    last_snapshot_at: TEST_TIMESTAMP,
    ...overrides,
  };
}

// ─── Fakes ───────────────────────────────────────────────────

export interface FakeMarketOptions {
  /** Delay per market id before the snapshot resolves */
  readonly delays?: Readonly<Record<string, number>>;
  /** Market ids whose fetch always fails */
  readonly failing?: readonly string[];
  /** Market ids whose first fetch fails, the second succeeds */
  readonly flaky?: readonly string[];
  readonly listError?: Error;
}

export class FakeMarketData implements MarketDataProvider {
  readonly fetchCalls: string[] = [];
  private readonly flakyFailed = new Set<string>();

  constructor(
    private readonly snapshots: readonly MarketSnapshot[],
    private readonly options: FakeMarketOptions = {}
  ) {}

  async listActiveMarketIds(limit: number): Promise<string[]> {
    if (this.options.listError) throw this.options.listError;
    return this.snapshots.slice(0, limit).map((s) => s.market_id);
  }

  async fetchSnapshots(ids: readonly string[], signal?: AbortSignal): Promise<MarketSnapshot[]> {
    const out: MarketSnapshot[] = [];
    for (const id of ids) {
      this.fetchCalls.push(id);
      const delay = this.options.delays?.[id] ?? 0;
      if (delay > 0) await abortableSleep(delay, signal);
      if (this.options.failing?.includes(id)) {
        throw new MarketDataError(`upstream unavailable for ${id}`);
      }
      if (this.options.flaky?.includes(id) && !this.flakyFailed.has(id)) {
        this.flakyFailed.add(id);
        throw new MarketDataError(`transient failure for ${id}`);
      }
      const snapshot = this.snapshots.find((s) => s.market_id === id);
      if (snapshot) out.push(snapshot);
    }
    return out;
  }
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(new MarketDataError("aborted"));
    });
  });
}

/**
 * Model that answers from a fixed table keyed by market id.
 */
export class FakeModel implements ProbabilityModel {
  constructor(private readonly estimates: Readonly<Record<string, Omit<ProbabilityEstimate, "market_id" | "timestamp">>>) {}

  async predict(snapshot: MarketSnapshot): Promise<ProbabilityEstimate> {
    const entry = this.estimates[snapshot.market_id] ?? { probability: snapshot.yes_price, confidence: 0.5 };
    return { market_id: snapshot.market_id, timestamp: TEST_TIMESTAMP, ...entry };
  }
}

export class RecordingStore implements PersistenceStore {
  readonly signals: Array<{ signal: Signal; cycleId: string }> = [];
  readonly commits: CommitResult[] = [];
  readonly snapshots: Array<{ state: PortfolioState; cycleId: string }> = [];
  readonly cycles = new Map<string, CycleSummary>();
  readonly cycleHistory: CycleSummary[] = [];
  /** Market ids whose signal append fails */
  failSignalsFor: string[] = [];
  failCommits = false;

  async appendSignal(signal: Signal, cycleId: string): Promise<void> {
    if (this.failSignalsFor.includes(signal.market_id)) {
      throw new PersistenceError(`signals table unavailable for ${signal.market_id}`);
    }
    this.signals.push({ signal, cycleId });
  }

  async appendCommit(result: CommitResult): Promise<void> {
    if (this.failCommits) throw new PersistenceError("ledger_commits table unavailable");
    this.commits.push(result);
  }

  async appendPortfolioSnapshot(state: PortfolioState, cycleId: string): Promise<void> {
    this.snapshots.push({ state, cycleId });
  }

  async recordCycle(summary: CycleSummary): Promise<void> {
    this.cycles.set(summary.cycle_id, summary);
    this.cycleHistory.push(summary);
  }

  async getCycle(cycleId: string): Promise<CycleSummary | null> {
    return this.cycles.get(cycleId) ?? null;
  }
}
