// ═══════════════════════════════════════════════════════════════
// @edgeline/db — Portfolio Snapshot Repository
// ═══════════════════════════════════════════════════════════════

import { PortfolioStateSchema } from "@edgeline/contracts";
import type { PortfolioState } from "@edgeline/contracts";
import { z } from "zod";
import { getPool } from "../connection";
import type { Queryable } from "../connection";

const SnapshotRowSchema = z.object({ payload: PortfolioStateSchema });

export async function insertSnapshot(
  state: PortfolioState,
  cycleId: string,
  db: Queryable = getPool()
): Promise<void> {
  await db.query(
    `INSERT INTO portfolio_snapshots
       (cycle_id, taken_at, total_value, ledger_state, payload)
     VALUES ($1, $2, $3, $4, $5)`,
    [
      cycleId,
      state.last_snapshot_at,
      state.total_value,
      state.ledger_state,
      JSON.stringify(state),
    ]
  );
}

/**
 * Most recent checkpoint, or null on an empty table.
 */
export async function getLatestSnapshot(
  db: Queryable = getPool()
): Promise<PortfolioState | null> {
  const result = await db.query(
    `SELECT payload FROM portfolio_snapshots
     ORDER BY taken_at DESC, snapshot_id DESC
     LIMIT 1`
  );
  const row = result.rows[0];
  return row === undefined ? null : SnapshotRowSchema.parse(row).payload;
}
