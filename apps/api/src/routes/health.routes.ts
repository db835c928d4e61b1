// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Health Routes
// ═══════════════════════════════════════════════════════════════

import type { FastifyInstance } from "fastify";
import { nowISO } from "../utils/correlation";

export async function registerHealthRoutes(app: FastifyInstance, startedAtMs: number): Promise<void> {
  /**
   * GET /health
   * Public. Liveness and uptime.
   */
  app.get("/health", async () => {
    return {
      status: "ok",
      uptime_s: Math.floor((Date.now() - startedAtMs) / 1000),
      timestamp: nowISO(),
    };
  });
}
