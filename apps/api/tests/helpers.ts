// ═══════════════════════════════════════════════════════════════
// Test Helpers — in-process collaborators for the API
// ═══════════════════════════════════════════════════════════════

import type { MarketSnapshot, ProbabilityEstimate } from "@edgeline/contracts";
import { DEFAULT_RISK_LIMITS, PipelineCoordinator, RiskLedger } from "@edgeline/core";
import type { MarketDataProvider, PersistenceStore, ProbabilityModel } from "@edgeline/core";
import { InMemoryPersistenceStore } from "@edgeline/adapters";

export const TEST_NOW = new Date("2025-06-15T12:00:00.000Z");

export function sequentialIds(): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `00000000-0000-4000-8000-${n.toString().padStart(12, "0")}`;
  };
}

export function makeSnapshot(marketId: string, yesPrice: number): MarketSnapshot {
  return {
    market_id: marketId,
    yes_price: yesPrice,
    volume_24h: { status: "REPORTED", value: 5000 },
    liquidity: 2000,
    end_date: "2025-07-01T00:00:00.000Z",
    observed_at: TEST_NOW.toISOString(),
  };
}

export class StaticMarketData implements MarketDataProvider {
  constructor(private readonly snapshots: MarketSnapshot[]) {}

  async listActiveMarketIds(limit: number): Promise<string[]> {
    return this.snapshots.slice(0, limit).map((s) => s.market_id);
  }

  async fetchSnapshots(ids: readonly string[]): Promise<MarketSnapshot[]> {
    return this.snapshots.filter((s) => ids.includes(s.market_id));
  }
}

export class TableModel implements ProbabilityModel {
  constructor(private readonly probabilities: Readonly<Record<string, number>>) {}

  async predict(snapshot: MarketSnapshot): Promise<ProbabilityEstimate> {
    return {
      market_id: snapshot.market_id,
      probability: this.probabilities[snapshot.market_id] ?? snapshot.yes_price,
      confidence: 0.88,
      timestamp: TEST_NOW.toISOString(),
    };
  }
}

/**
 * m-strong: model 0.7 against 0.4 (accepted, YES).
 * m-flat:   model equals the price (EDGE_TOO_SMALL).
 */
export function makePipeline(store: PersistenceStore = new InMemoryPersistenceStore()) {
  const clock = () => new Date(TEST_NOW.getTime());
  const ledger = new RiskLedger({ startingCash: 10_000, limits: DEFAULT_RISK_LIMITS, clock, journal: store });
  const coordinator = new PipelineCoordinator({
    marketData: new StaticMarketData([makeSnapshot("m-strong", 0.4), makeSnapshot("m-flat", 0.5)]),
    model: new TableModel({ "m-strong": 0.7 }),
    store,
    ledger,
    newId: sequentialIds(),
    clock,
  });
  return { coordinator, ledger, store };
}
