// ═══════════════════════════════════════════════════════════════
// @edgeline/db — Pipeline Cycle Repository
// A cycle is written RUNNING first and overwritten when it ends.
// ═══════════════════════════════════════════════════════════════

import { CycleSummarySchema } from "@edgeline/contracts";
import type { CycleSummary } from "@edgeline/contracts";
import { z } from "zod";
import { getPool } from "../connection";
import type { Queryable } from "../connection";

const CycleRowSchema = z.object({ payload: CycleSummarySchema });

/**
 * Upsert by cycle_id.
 */
export async function upsertCycle(
  summary: CycleSummary,
  db: Queryable = getPool()
): Promise<void> {
  await db.query(
    `INSERT INTO pipeline_cycles
       (cycle_id, status, started_at, finished_at, payload)
     VALUES ($1, $2, $3, $4, $5)
     ON CONFLICT (cycle_id) DO UPDATE SET
       status = EXCLUDED.status,
       finished_at = EXCLUDED.finished_at,
       payload = EXCLUDED.payload`,
    [
      summary.cycle_id,
      summary.status,
      summary.started_at,
      summary.finished_at,
      JSON.stringify(summary),
    ]
  );
}

export async function getCycle(
  cycleId: string,
  db: Queryable = getPool()
): Promise<CycleSummary | null> {
  const result = await db.query(
    `SELECT payload FROM pipeline_cycles WHERE cycle_id = $1`,
    [cycleId]
  );
  const row = result.rows[0];
  return row === undefined ? null : CycleRowSchema.parse(row).payload;
}
