// ═════════════════════════════════════════════════════════════
// @edgeline/core — Errors
// Faults, as opposed to policy rejections. A rejection is a value
// (RejectReason); everything here is thrown.
// ═════════════════════════════════════════════════════════════

import { ReasonCode } from "@edgeline/contracts";
import type { FailureKind } from "@edgeline/contracts";

/**
 * Base class. Every pipeline error carries a canonical reason_code.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly reason_code: ReasonCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Malformed snapshot or estimate. The market fails; never retried.
 */
export class InputError extends PipelineError {
  constructor(
    message: string,
    public readonly market_id?: string,
    reason_code: ReasonCode = ReasonCode.INPUT_INVALID
  ) {
    super(message, reason_code);
  }
}

/**
 * A collaborator (market data, model, persistence) failed.
 * The scheduler retries these within the task deadline.
 */
export class CollaboratorError extends PipelineError {}

export class MarketDataError extends CollaboratorError {
  constructor(
    message: string,
    reason_code: ReasonCode = ReasonCode.PROV_DATA_ERROR,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, reason_code, options);
  }
}

export class ModelServiceError extends CollaboratorError {
  constructor(
    message: string,
    reason_code: ReasonCode = ReasonCode.MODEL_PREDICTION_FAILED,
    options?: { cause?: unknown }
  ) {
    super(message, reason_code, options);
  }
}

export class PersistenceError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ReasonCode.PERSIST_WRITE_FAILED, options);
  }
}

/**
 * A task ran past its deadline. The scheduler maps it to TIMED_OUT.
 */
export class DeadlineExceededError extends PipelineError {
  constructor(public readonly timeout_ms: number) {
    super(`Deadline of ${timeout_ms}ms exceeded`, ReasonCode.SCHED_TIMED_OUT);
  }
}

/**
 * The ledger was asked to apply a change that would break its invariants.
 * Fatal: nothing was applied and the cycle must stop.
 */
export class InvariantViolationError extends PipelineError {
  constructor(message: string) {
    super(message, ReasonCode.LEDGER_INVARIANT_VIOLATION);
  }
}

// ─── Normalization ───────────────────────────────────────────

export interface DescribedError {
  readonly kind: FailureKind;
  readonly message: string;
}

/**
 * Normalizes anything thrown into { kind, message }.
 */
export function describeError(err: unknown): DescribedError {
  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof DeadlineExceededError) return { kind: "TIMEOUT", message };
  if (err instanceof InputError) return { kind: "INPUT", message };
  if (err instanceof MarketDataError) return { kind: "MARKET_DATA", message };
  if (err instanceof ModelServiceError) return { kind: "MODEL", message };
  if (err instanceof PersistenceError) return { kind: "PERSISTENCE", message };
  return { kind: "UNKNOWN", message };
}

/**
 * Whether the scheduler may retry after this error.
 */
export function isRetryable(err: unknown): boolean {
  return err instanceof CollaboratorError;
}
