// ═════════════════════════════════════════════════════════════
// @edgeline/core — Output types
// Results of the pipeline stages. Persisted shapes come from
// @edgeline/contracts; these wrap them with the decision path.
// ═════════════════════════════════════════════════════════════

import type {
  FailureKind,
  LiquidityCheck,
  MarketSnapshot,
  ProbabilityEstimate,
  ReasonCode,
  RejectReason,
  Signal,
  SignalCandidate,
} from "@edgeline/contracts";

// ─── Evaluator ───────────────────────────────────────────────

export type EvaluationResult =
  | {
      readonly decision: "ACCEPT";
      readonly candidate: SignalCandidate;
      readonly reason_code: ReasonCode;
      readonly message: string;
    }
  | {
      readonly decision: "REJECT";
      readonly market_id: string;
      readonly reason: RejectReason;
      readonly liquidity_check: LiquidityCheck;
      readonly reason_code: ReasonCode;
      readonly message: string;
    };

// ─── Sizer ───────────────────────────────────────────────────

export interface SizingBreakdown {
  /** Held-side price: YES price, or 1 − YES price for NO */
  readonly side_price: number;
  readonly raw_fraction: number;
  readonly scaled_fraction: number;
  readonly clamped_fraction: number;
  /** max_total_exposure_fraction × total_value − total_exposure */
  readonly headroom: number;
}

export type SizingResult =
  | {
      readonly status: "SIZED";
      readonly signal: Signal;
      readonly breakdown: SizingBreakdown;
      readonly reason_code: ReasonCode;
    }
  | {
      readonly status: "REJECTED";
      readonly reason: RejectReason;
      readonly breakdown: SizingBreakdown;
      readonly reason_code: ReasonCode;
    };

// ─── Scheduler ───────────────────────────────────────────────

/**
 * What one market task produces when it completes.
 */
export interface MarketEvaluation {
  readonly snapshot: MarketSnapshot;
  readonly estimate: ProbabilityEstimate;
  readonly result: EvaluationResult;
}

export type TaskOutcome =
  | { readonly status: "DONE"; readonly market_id: string; readonly evaluation: MarketEvaluation }
  | { readonly status: "TIMED_OUT"; readonly market_id: string }
  | {
      readonly status: "FAILED";
      readonly market_id: string;
      readonly kind: FailureKind;
      readonly message: string;
    };

export interface ScheduleCounters {
  readonly total: number;
  readonly evaluated: number;
  readonly accepted: number;
  readonly rejected: number;
  readonly rejected_by_reason: Readonly<Record<RejectReason, number>>;
  readonly timed_out: number;
  readonly failed: number;
}

export interface ScheduleResult {
  /** Same order as the input market ids */
  readonly outcomes: readonly TaskOutcome[];
  readonly counters: ScheduleCounters;
}
