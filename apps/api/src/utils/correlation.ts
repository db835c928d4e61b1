// ═══════════════════════════════════════════════════════════════
// @edgeline/api — ID & time utilities
// ═══════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from "uuid";

/**
 * New UUID v4, used for cycle_id and signal_id.
 */
export function newId(): string {
  return uuidv4();
}

/**
 * Current time as ISO 8601 (UTC).
 */
export function nowISO(): string {
  return new Date().toISOString();
}
