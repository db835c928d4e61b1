// ═══════════════════════════════════════════════════════════════
// @edgeline/db — Ledger Commit Repository
// One row per commit decision, COMMITTED or REJECTED.
// Idempotent by signal_id.
// ═══════════════════════════════════════════════════════════════

import type { CommitResult } from "@edgeline/contracts";
import { getPool } from "../connection";
import type { Queryable } from "../connection";

export async function insertCommit(
  result: CommitResult,
  db: Queryable = getPool()
): Promise<boolean> {
  const reason = result.status === "REJECTED" ? result.reason : null;
  const inserted = await db.query(
    `INSERT INTO ledger_commits
       (signal_id, market_id, status, reason, timestamp, payload)
     VALUES ($1, $2, $3, $4, $5, $6)
     ON CONFLICT (signal_id) DO NOTHING`,
    [
      result.signal_id,
      result.market_id,
      result.status,
      reason,
      result.timestamp,
      JSON.stringify(result),
    ]
  );
  return (inserted.rowCount ?? 0) > 0;
}
