// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Reason Code Routes
// ═══════════════════════════════════════════════════════════════

import type { FastifyInstance } from "fastify";
import { REASON_CODE_CATALOG, ReasonCodeSchema } from "@edgeline/contracts";

export async function registerReasonCodeRoutes(app: FastifyInstance): Promise<void> {
  /**
   * GET /reason-codes
   * Full catalog: code → description.
   */
  app.get("/reason-codes", async () => REASON_CODE_CATALOG);

  /**
   * GET /reason-codes/:code
   */
  app.get<{ Params: { code: string } }>("/reason-codes/:code", async (request, reply) => {
    const parsed = ReasonCodeSchema.safeParse(request.params.code);
    if (!parsed.success) {
      return reply.code(404).send({
        error: "Not Found",
        message: `Unknown reason code ${request.params.code}`,
      });
    }
    return { code: parsed.data, description: REASON_CODE_CATALOG[parsed.data] };
  });
}
