import { z } from "zod";

// ─────────────────────────────────────────────────────────────
// Signal enums — side, strength tier and liquidity-check branch
// ─────────────────────────────────────────────────────────────

/**
 * Side of a binary contract the signal buys.
 */
export enum Side {
  YES = "YES",
  NO = "NO",
}

export const SideSchema = z.nativeEnum(Side).describe("Contract side: YES | NO");

/**
 * Strength tier derived from edge × confidence.
 * Ordered: WEAK < MODERATE < STRONG.
 */
export enum SignalStrength {
  WEAK = "WEAK",
  MODERATE = "MODERATE",
  STRONG = "STRONG",
}

export const SignalStrengthSchema = z
  .nativeEnum(SignalStrength)
  .describe("Signal strength tier: WEAK | MODERATE | STRONG");

/**
 * Which branch the evaluator's liquidity step took.
 *
 * APPLIED     — volume was reported (zero or not) and compared to min_liquidity
 * SKIPPED     — provider did not report volume; the check was not run
 * NOT_REACHED — an earlier step already rejected
 */
export enum LiquidityCheck {
  APPLIED = "APPLIED",
  SKIPPED = "SKIPPED",
  NOT_REACHED = "NOT_REACHED",
}

export const LiquidityCheckSchema = z
  .nativeEnum(LiquidityCheck)
  .describe("Liquidity check branch: APPLIED | SKIPPED | NOT_REACHED");

// ─── Inferred types ──────────────────────────────────────────
export type SideType = z.infer<typeof SideSchema>;
export type SignalStrengthType = z.infer<typeof SignalStrengthSchema>;
export type LiquidityCheckType = z.infer<typeof LiquidityCheckSchema>;
