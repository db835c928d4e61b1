// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Cycle Routes
// ═══════════════════════════════════════════════════════════════

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { ReasonCode } from "@edgeline/contracts";
import type { CycleRequestInput } from "@edgeline/contracts";
import { InputError } from "@edgeline/core";
import type { PersistenceStore, PipelineCoordinator } from "@edgeline/core";

/** Body accepted by POST /cycles. Range checks happen in the coordinator. */
const StartCycleBodySchema = z
  .object({
    marketLimit: z.number().optional(),
    autoSignals: z.boolean().optional(),
    autoCommit: z.boolean().optional(),
  })
  .strict();

export interface CycleRouteDeps {
  readonly coordinator: PipelineCoordinator;
  readonly store: PersistenceStore;
}

function toCycleRequest(body: z.infer<typeof StartCycleBodySchema>): CycleRequestInput {
  return {
    ...(body.marketLimit !== undefined ? { market_limit: body.marketLimit } : {}),
    ...(body.autoSignals !== undefined ? { auto_signals: body.autoSignals } : {}),
    ...(body.autoCommit !== undefined ? { auto_commit: body.autoCommit } : {}),
  };
}

export async function registerCycleRoutes(app: FastifyInstance, deps: CycleRouteDeps): Promise<void> {
  /**
   * POST /cycles
   * Starts a cycle in the background.
   * Body: { marketLimit?, autoSignals?, autoCommit? }
   */
  app.post<{ Body: unknown }>("/cycles", async (request, reply) => {
    const parsed = StartCycleBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
        .join("; ");
      return reply.code(400).send({
        error: "Bad Request",
        message,
        reason_code: ReasonCode.INPUT_INVALID,
      });
    }

    try {
      const { cycle_id } = await deps.coordinator.startCycle(toCycleRequest(parsed.data));
      return reply.code(202).send({ cycle_id, status: "STARTED" });
    } catch (err) {
      if (err instanceof InputError) {
        return reply.code(400).send({
          error: "Bad Request",
          message: err.message,
          reason_code: err.reason_code,
        });
      }
      throw err;
    }
  });

  /**
   * GET /cycles/:id
   * Stored summary of a cycle, RUNNING until it finishes.
   */
  app.get<{ Params: { id: string } }>("/cycles/:id", async (request, reply) => {
    const summary = await deps.store.getCycle(request.params.id);
    if (summary === null) {
      return reply.code(404).send({
        error: "Not Found",
        message: `Cycle ${request.params.id} not found`,
      });
    }
    return summary;
  });
}
