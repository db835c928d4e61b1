// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Portfolio Routes
// ═══════════════════════════════════════════════════════════════

import type { FastifyInstance } from "fastify";
import type { RiskLedger } from "@edgeline/core";

export async function registerPortfolioRoutes(app: FastifyInstance, ledger: RiskLedger): Promise<void> {
  /**
   * GET /portfolio
   * Live ledger state plus the length of its change log.
   */
  app.get("/portfolio", async () => {
    return {
      ...ledger.getState(),
      change_log_length: ledger.getChangeLog().length,
    };
  });
}
