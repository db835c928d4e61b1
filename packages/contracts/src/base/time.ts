import { z } from "zod";

// ─────────────────────────────────────────────────────────────
// Base timestamp — ISO 8601 with an explicit offset
// ─────────────────────────────────────────────────────────────

/**
 * ISO 8601 — accepts:
 *   2025-01-15T10:30:00Z           (UTC)
 *   2025-01-15T10:30:00.123Z       (UTC with milliseconds)
 *   2025-01-15T07:30:00-03:00      (explicit offset)
 */
const ISO_8601_REGEX =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{1,6})?(Z|[+-]\d{2}:\d{2})$/;

export const TimestampSchema = z
  .string()
  .regex(ISO_8601_REGEX, "timestamp must be ISO 8601 (e.g. 2025-01-15T10:30:00Z)")
  .describe("ISO 8601 timestamp with offset");

/**
 * UTC trading day, YYYY-MM-DD. The ledger's daily reset keys on it.
 */
export const TradingDaySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "trading_day must be YYYY-MM-DD")
  .describe("UTC trading day");

// ─── Inferred types ──────────────────────────────────────────
export type Timestamp = z.infer<typeof TimestampSchema>;
export type TradingDay = z.infer<typeof TradingDaySchema>;

/**
 * UTC day of an instant.
 */
export function toTradingDay(date: Date): TradingDay {
  return date.toISOString().slice(0, 10);
}
