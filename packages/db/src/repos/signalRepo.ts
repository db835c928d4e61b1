// ═══════════════════════════════════════════════════════════════
// @edgeline/db — Signal Repository
// Idempotent by signal_id. The full signal is kept in payload.
// ═══════════════════════════════════════════════════════════════

import type { Signal } from "@edgeline/contracts";
import { getPool } from "../connection";
import type { Queryable } from "../connection";

/**
 * Inserts a signal. Returns false when it was already stored.
 */
export async function insertSignal(
  signal: Signal,
  cycleId: string,
  db: Queryable = getPool()
): Promise<boolean> {
  const result = await db.query(
    `INSERT INTO signals
       (signal_id, cycle_id, market_id, side, strength, edge,
        suggested_size, created_at, payload)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
     ON CONFLICT (signal_id) DO NOTHING`,
    [
      signal.signal_id,
      cycleId,
      signal.market_id,
      signal.side,
      signal.strength,
      signal.edge,
      signal.suggested_size,
      signal.created_at,
      JSON.stringify(signal),
    ]
  );
  return (result.rowCount ?? 0) > 0;
}
