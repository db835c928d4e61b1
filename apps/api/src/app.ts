// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Fastify application
// ═══════════════════════════════════════════════════════════════
// Builds the server from already-wired collaborators so tests can
// drive it with fastify.inject and in-process fakes.
// ═══════════════════════════════════════════════════════════════

import Fastify from "fastify";
import type { FastifyInstance, FastifyServerOptions } from "fastify";
import { PipelineError } from "@edgeline/core";
import type { PersistenceStore, PipelineCoordinator, RiskLedger } from "@edgeline/core";
import { registerCycleRoutes } from "./routes/cycles.routes";
import { registerHealthRoutes } from "./routes/health.routes";
import { registerPortfolioRoutes } from "./routes/portfolio.routes";
import { registerReasonCodeRoutes } from "./routes/reasonCodes.routes";

export interface AppDeps {
  readonly coordinator: PipelineCoordinator;
  readonly ledger: RiskLedger;
  readonly store: PersistenceStore;
}

export interface AppOptions {
  readonly logger?: FastifyServerOptions["logger"];
  /** Uptime origin, defaults to build time */
  readonly startedAtMs?: number;
}

export async function buildServer(deps: AppDeps, options: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });

  // ─── Errors ───────────────────────────────────────────────
  app.setErrorHandler((error, request, reply) => {
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: "Bad Request", message: error.message });
    }
    const reasonCode = error instanceof PipelineError ? error.reason_code : undefined;
    request.log.error({ err: error, reason_code: reasonCode }, "request failed");
    return reply.code(500).send({
      error: "Internal Server Error",
      message: error.message,
      ...(reasonCode !== undefined ? { reason_code: reasonCode } : {}),
    });
  });

  // ─── Routes ───────────────────────────────────────────────
  await registerHealthRoutes(app, options.startedAtMs ?? Date.now());
  await registerCycleRoutes(app, { coordinator: deps.coordinator, store: deps.store });
  await registerPortfolioRoutes(app, deps.ledger);
  await registerReasonCodeRoutes(app);

  return app;
}
