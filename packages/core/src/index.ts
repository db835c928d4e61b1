// ═════════════════════════════════════════════════════════════
// @edgeline/core — Evaluation & Signal Pipeline
// Single entry point of the package.
//
// - Evaluator: evaluateSignal, classifyStrength
// - Sizer: sizeSignal (fractional Kelly)
// - Ledger: RiskLedger (exposure, drawdown, circuit breaker)
// - Scheduler: EvaluationScheduler (bounded fan-out with deadlines)
// - Coordinator: PipelineCoordinator (one cycle end to end)
//
// No network, no database: collaborators are injected.
// Every persisted shape comes from @edgeline/contracts.
// ═════════════════════════════════════════════════════════════

// ─── Evaluator ───────────────────────────────────────────────
export { evaluateSignal, classifyStrength } from "./evaluator/signalEvaluator";

// ─── Sizer ───────────────────────────────────────────────────
export { sizeSignal, sidePrice, floorToCents } from "./sizer/stakeSizer";

// ─── Ledger ──────────────────────────────────────────────────
export { RiskLedger } from "./ledger/riskLedger";
export { Mutex } from "./ledger/mutex";

// ─── Scheduler ───────────────────────────────────────────────
export { EvaluationScheduler, countOutcomes } from "./scheduler/evaluationScheduler";
export type { EvaluationTask } from "./scheduler/evaluationScheduler";
export { withDeadline } from "./scheduler/deadline";
export type { LateSettlement } from "./scheduler/deadline";

// ─── Coordinator ─────────────────────────────────────────────
export { PipelineCoordinator, parseCycleRequest } from "./pipeline/pipelineCoordinator";
export type { PipelineCoordinatorDeps } from "./pipeline/pipelineCoordinator";

// ─── Errors ──────────────────────────────────────────────────
export {
  PipelineError,
  InputError,
  CollaboratorError,
  MarketDataError,
  ModelServiceError,
  PersistenceError,
  DeadlineExceededError,
  InvariantViolationError,
  describeError,
  isRetryable,
} from "./errors";
export type { DescribedError } from "./errors";

// ─── Defaults / Logging ──────────────────────────────────────
export {
  DEFAULT_RISK_LIMITS,
  DEFAULT_SCHEDULER_OPTIONS,
  WINNING_CLOSE_FEE_RATE,
} from "./defaults";
export type { SchedulerOptions } from "./defaults";
export { createLogger } from "./logger";
export type { Logger } from "./logger";

// ─── Collaborator contracts ──────────────────────────────────
export type {
  MarketDataProvider,
  ProbabilityModel,
  PersistenceStore,
  LedgerJournal,
} from "./collaborators";

// ─── Types ───────────────────────────────────────────────────
export type {
  EvaluationContext,
  Clock,
  RiskLedgerOptions,
  YesPriceMap,
  IdFactory,
} from "./types/inputs";

export type {
  EvaluationResult,
  SizingBreakdown,
  SizingResult,
  MarketEvaluation,
  TaskOutcome,
  ScheduleCounters,
  ScheduleResult,
} from "./types/outputs";
