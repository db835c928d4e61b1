import { z } from "zod";

// ─────────────────────────────────────────────────────────────
// Base IDs — canonical UUID v4
// Used by every schema that identifies a signal, a commit or a cycle
// ─────────────────────────────────────────────────────────────

/**
 * UUID v4 — canonical form: xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx
 */
const UUID_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/**
 * Identifier of one pipeline cycle. Every signal and commit produced by
 * the cycle carries it.
 */
export const CycleIdSchema = z
  .string()
  .regex(UUID_REGEX, "cycle_id must be a valid UUID v4")
  .describe("Pipeline cycle identifier (UUID v4)");

/**
 * Identifier of one signal candidate / signal.
 */
export const SignalIdSchema = z
  .string()
  .regex(UUID_REGEX, "signal_id must be a valid UUID v4")
  .describe("Signal identifier (UUID v4)");

/**
 * Market identifiers are opaque strings owned by the data provider.
 */
export const MarketIdSchema = z
  .string()
  .min(1, "market_id must not be empty")
  .describe("Provider market identifier");

// ─── Inferred types ──────────────────────────────────────────
export type CycleId = z.infer<typeof CycleIdSchema>;
export type SignalId = z.infer<typeof SignalIdSchema>;
export type MarketId = z.infer<typeof MarketIdSchema>;
