// ═══════════════════════════════════════════════════════════════
// @edgeline/db — Public entry point
// ═══════════════════════════════════════════════════════════════
// PostgreSQL persistence for signals, commit decisions, portfolio
// checkpoints and cycle summaries.
// ═══════════════════════════════════════════════════════════════

// ─── Connection ─────────────────────────────────────────────────
export { getPool, closePool } from "./connection";
export type { Queryable } from "./connection";

// ─── Repositories ───────────────────────────────────────────────
export { insertSignal } from "./repos/signalRepo";
export { insertCommit } from "./repos/commitRepo";
export { insertSnapshot, getLatestSnapshot } from "./repos/snapshotRepo";
export { upsertCycle, getCycle } from "./repos/cycleRepo";

// ─── Store ──────────────────────────────────────────────────────
export { PostgresPersistenceStore } from "./store/postgresPersistenceStore";
