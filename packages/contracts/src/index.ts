// ═════════════════════════════════════════════════════════════
// @edgeline/contracts — SINGLE SOURCE OF TRUTH
// ═════════════════════════════════════════════════════════════
// Only entry point of the package.
// Every other Edgeline package imports its data shapes from here.
// No shape may be defined outside this package.
// ═════════════════════════════════════════════════════════════

// ─── Base Types ──────────────────────────────────────────────
export {
  CycleIdSchema,
  SignalIdSchema,
  MarketIdSchema,
  type CycleId,
  type SignalId,
  type MarketId,
} from "./base/ids";

export {
  TimestampSchema,
  TradingDaySchema,
  toTradingDay,
  type Timestamp,
  type TradingDay,
} from "./base/time";

// ─── Canonical Enums ─────────────────────────────────────────
export {
  Side,
  SideSchema,
  SignalStrength,
  SignalStrengthSchema,
  LiquidityCheck,
  LiquidityCheckSchema,
  type SideType,
  type SignalStrengthType,
  type LiquidityCheckType,
} from "./enums/signals";

export {
  RejectReason,
  RejectReasonSchema,
  REJECT_REASON_CODES,
  emptyRejectionCounts,
  type RejectReasonType,
} from "./enums/reject-reasons";

export {
  LedgerState,
  LedgerStateSchema,
  CycleStatus,
  CycleStatusSchema,
  LedgerEntryKind,
  LedgerEntryKindSchema,
  type LedgerStateType,
  type CycleStatusType,
} from "./enums/ledger-states";

export {
  ReasonCode,
  ReasonCodeSchema,
  REASON_CODE_CATALOG,
  type ReasonCodeType,
} from "./enums/reason-codes";

// ─── Schemas (Zod) ───────────────────────────────────────────
export {
  VolumeReadingSchema,
  MarketSnapshotSchema,
  classifyVolume,
  type VolumeClass,
} from "./schemas/market-snapshot.schema";

export { ProbabilityEstimateSchema } from "./schemas/probability-estimate.schema";

export {
  SignalCandidateSchema,
  SignalSchema,
} from "./schemas/signal.schema";

export { RiskLimitsSchema } from "./schemas/risk-limits.schema";

export {
  OpenPositionSchema,
  PortfolioStateSchema,
  ClosedTradeSchema,
  LedgerEntrySchema,
} from "./schemas/portfolio.schema";

export { CommitResultSchema } from "./schemas/commit-result.schema";

export {
  CycleRequestSchema,
  CycleSummarySchema,
  CycleFailureSchema,
  FailureKindEnum,
} from "./schemas/cycle.schema";

// ─── Types (inferred from schemas) ───────────────────────────
export type {
  VolumeReading,
  MarketSnapshot,
  ProbabilityEstimate,
} from "./types/market";

export type {
  SignalCandidate,
  Signal,
  RiskLimits,
} from "./types/signal";

export type {
  OpenPosition,
  PortfolioState,
  ClosedTrade,
  LedgerEntry,
  CommitResult,
} from "./types/portfolio";

export type {
  CycleRequest,
  CycleRequestInput,
  FailureKind,
  CycleFailure,
  CycleSummary,
} from "./types/cycle";
