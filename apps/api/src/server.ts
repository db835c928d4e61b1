// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Server entry point (Fastify)
// ═══════════════════════════════════════════════════════════════
// Wires the pipeline from the environment:
//   DATABASE_URL set   → PostgresPersistenceStore, ledger resumed
//                        from the last portfolio checkpoint
//   DATABASE_URL unset → InMemoryPersistenceStore
// ═══════════════════════════════════════════════════════════════

import {
  EvaluationScheduler,
  PipelineCoordinator,
  RiskLedger,
  createLogger,
} from "@edgeline/core";
import type { PersistenceStore } from "@edgeline/core";
import type { PortfolioState } from "@edgeline/contracts";
import {
  GammaMarketDataProvider,
  HttpProbabilityModel,
  InMemoryPersistenceStore,
} from "@edgeline/adapters";
import { PostgresPersistenceStore, closePool, getPool } from "@edgeline/db";
import { buildServer } from "./app";
import { getConfig } from "./config/env";
import { loadRiskLimits } from "./config/riskConfig";
import { newId } from "./utils/correlation";

const log = createLogger("api");

async function openStore(databaseUrl: string | null): Promise<{
  store: PersistenceStore;
  checkpoint: PortfolioState | null;
}> {
  if (databaseUrl === null) {
    log.warn("DATABASE_URL not set, persisting in memory only");
    return { store: new InMemoryPersistenceStore(), checkpoint: null };
  }
  const store = new PostgresPersistenceStore(getPool());
  return { store, checkpoint: await store.latestPortfolio() };
}

async function main(): Promise<void> {
  const config = getConfig();
  const limits = loadRiskLimits();
  const { store, checkpoint } = await openStore(config.DATABASE_URL);

  const ledger = new RiskLedger({
    startingCash: config.STARTING_CASH,
    limits,
    journal: store,
    ...(checkpoint ? { initialState: checkpoint } : {}),
  });
  if (checkpoint) {
    log.info({ total_value: checkpoint.total_value, trading_day: checkpoint.trading_day }, "ledger resumed from checkpoint");
  }

  const coordinator = new PipelineCoordinator({
    marketData: new GammaMarketDataProvider({ baseUrl: config.MARKET_DATA_BASE_URL }),
    model: new HttpProbabilityModel({
      baseUrl: config.MODEL_SERVICE_URL,
      ...(config.MODEL_SERVICE_API_KEY ? { apiKey: config.MODEL_SERVICE_API_KEY } : {}),
    }),
    store,
    ledger,
    newId,
    scheduler: new EvaluationScheduler({
      concurrency: config.SCHEDULER_CONCURRENCY,
      chunkSize: config.SCHEDULER_CHUNK_SIZE,
      timeoutMs: config.SCHEDULER_TIMEOUT_MS,
    }),
  });

  const app = await buildServer(
    { coordinator, ledger, store },
    {
      logger: {
        level: config.LOG_LEVEL,
        transport:
          config.NODE_ENV !== "production"
            ? { target: "pino-pretty", options: { colorize: true } }
            : undefined,
      },
    }
  );

  // ─── Graceful shutdown ──────────────────────────────────────
  const shutdown = async (): Promise<void> => {
    app.log.info({ running_cycles: coordinator.runningCycles }, "Shutting down gracefully...");
    await app.close();
    await coordinator.drain();
    if (config.DATABASE_URL !== null) {
      await closePool();
    }
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      log.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  // ─── Start ──────────────────────────────────────────────────
  await app.listen({ port: config.PORT, host: "0.0.0.0" });
  app.log.info(`@edgeline/api running on port ${config.PORT} (${config.NODE_ENV})`);
}

main().catch((err: unknown) => {
  log.fatal({ err }, "Failed to start server");
  process.exit(1);
});
