// ═══════════════════════════════════════════════════════════════
// @edgeline/api — Risk limits from the environment
// ═══════════════════════════════════════════════════════════════
// Every RiskLimits field can be overridden by RISK_<FIELD>, e.g.
//   RISK_MIN_EDGE=0.04
//   RISK_MAX_POSITIONS=10
// Unset fields keep DEFAULT_RISK_LIMITS.
// ═══════════════════════════════════════════════════════════════

import { RiskLimitsSchema } from "@edgeline/contracts";
import type { RiskLimits } from "@edgeline/contracts";
import { DEFAULT_RISK_LIMITS } from "@edgeline/core";
import { readNumber } from "./env";

type Env = Readonly<Record<string, string | undefined>>;

export function riskEnvName(field: keyof RiskLimits): string {
  return `RISK_${field.toUpperCase()}`;
}

export function loadRiskLimits(env: Env = process.env): RiskLimits {
  const read = (field: keyof RiskLimits): number =>
    readNumber(riskEnvName(field), DEFAULT_RISK_LIMITS[field], env);

  const parsed = RiskLimitsSchema.safeParse({
    max_single_position_fraction: read("max_single_position_fraction"),
    max_total_exposure_fraction: read("max_total_exposure_fraction"),
    max_daily_drawdown_fraction: read("max_daily_drawdown_fraction"),
    min_edge: read("min_edge"),
    min_confidence: read("min_confidence"),
    min_liquidity: read("min_liquidity"),
    kelly_multiplier: read("kelly_multiplier"),
    max_positions: read("max_positions"),
    stale_grace_minutes: read("stale_grace_minutes"),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `RISK_${String(i.path[0]).toUpperCase()}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid risk limits: ${detail}`);
  }
  return parsed.data;
}
