// ═════════════════════════════════════════════════════════════
// Pipeline Coordinator
// runCycle(request) → CycleSummary
//
// 1. Pull up to market_limit active market ids
// 2. Schedule fetch → predict → evaluate per market
// 3. In market order: size, persist the signal, commit
//    (the ledger journals COMMITTED results before applying them;
//    REJECTED results are persisted here)
// 4. Mark the ledger to this cycle's snapshots, checkpoint it,
//    record the summary
//
// Per-market failures are recorded and never abort the cycle.
// An InvariantViolationError does: the cycle is recorded FAILED
// and the error is rethrown.
// ═════════════════════════════════════════════════════════════

import {
  CycleRequestSchema,
  CycleStatus,
  ReasonCode,
  emptyRejectionCounts,
} from "@edgeline/contracts";
import type {
  CycleFailure,
  CycleRequest,
  CycleRequestInput,
  CycleSummary,
  MarketSnapshot,
  RejectReason,
  RiskLimits,
} from "@edgeline/contracts";
import type { Logger } from "pino";
import type { MarketDataProvider, PersistenceStore, ProbabilityModel } from "../collaborators";
import {
  InputError,
  InvariantViolationError,
  MarketDataError,
  describeError,
} from "../errors";
import { evaluateSignal } from "../evaluator/signalEvaluator";
import type { RiskLedger } from "../ledger/riskLedger";
import { createLogger } from "../logger";
import { withDeadline } from "../scheduler/deadline";
import { EvaluationScheduler } from "../scheduler/evaluationScheduler";
import { sizeSignal } from "../sizer/stakeSizer";
import type { Clock, IdFactory } from "../types/inputs";
import type { MarketEvaluation } from "../types/outputs";

export interface PipelineCoordinatorDeps {
  readonly marketData: MarketDataProvider;
  readonly model: ProbabilityModel;
  readonly store: PersistenceStore;
  readonly ledger: RiskLedger;
  /** Generates cycle and signal ids */
  readonly newId: IdFactory;
  readonly scheduler?: EvaluationScheduler;
  /** Defaults to the ledger's limits */
  readonly limits?: RiskLimits;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

// ─── Helpers ─────────────────────────────────────────────────

/**
 * Applies defaults and validates a cycle request.
 *
 * @throws InputError
 */
export function parseCycleRequest(input: CycleRequestInput): CycleRequest {
  const parsed = CycleRequestSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
      .join("; ");
    throw new InputError(`Invalid cycle request: ${detail}`);
  }
  return parsed.data;
}

interface CycleTally {
  markets_requested: number;
  markets_evaluated: number;
  signals_created: number;
  trades_created: number;
  timed_out: number;
  failed: number;
  rejections: Record<RejectReason, number>;
  failures: CycleFailure[];
}

function emptyTally(): CycleTally {
  return {
    markets_requested: 0,
    markets_evaluated: 0,
    signals_created: 0,
    trades_created: 0,
    timed_out: 0,
    failed: 0,
    rejections: emptyRejectionCounts(),
    failures: [],
  };
}

// ─── Coordinator ─────────────────────────────────────────────

export class PipelineCoordinator {
  private readonly scheduler: EvaluationScheduler;
  private readonly limits: RiskLimits;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  /**
   * @throws InputError when the ledger has no journal to persist commits
   */
  constructor(private readonly deps: PipelineCoordinatorDeps) {
    if (!deps.ledger.isJournaled()) {
      throw new InputError("PipelineCoordinator needs a RiskLedger constructed with a journal");
    }
    this.scheduler = deps.scheduler ?? new EvaluationScheduler();
    this.limits = deps.limits ?? deps.ledger.getLimits();
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.logger ?? createLogger("pipeline-coordinator");
  }

  /**
   * Records a RUNNING summary, starts the cycle in the background and
   * returns its id without waiting for it.
   *
   * @throws InputError when the request is invalid
   */
  async startCycle(input: CycleRequestInput): Promise<{ cycle_id: string }> {
    const request = parseCycleRequest(input);
    const cycleId = this.deps.newId();
    const startedAt = this.clock().toISOString();

    await this.deps.store.recordCycle(
      this.buildSummary(cycleId, request, CycleStatus.RUNNING, startedAt, null, emptyTally())
    );

    const run = this.runCycle(request, cycleId, startedAt).then(
      () => undefined,
      (err: unknown) => {
        this.log.error({ cycle_id: cycleId, error: describeError(err).message }, "background cycle aborted");
      }
    );
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));

    return { cycle_id: cycleId };
  }

  /**
   * Waits for every background cycle started so far.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  get runningCycles(): number {
    return this.inFlight.size;
  }

  /**
   * Runs one full cycle and returns its summary.
   *
   * @throws InvariantViolationError after recording the cycle as FAILED
   */
  async runCycle(
    input: CycleRequestInput,
    cycleId: string = this.deps.newId(),
    startedAt: string = this.clock().toISOString()
  ): Promise<CycleSummary> {
    const request = parseCycleRequest(input);
    const tally = emptyTally();
    const started = Date.now();
    const log = this.log.child({ cycle_id: cycleId });

    log.info(
      { market_limit: request.market_limit, auto_signals: request.auto_signals, auto_commit: request.auto_commit, reason_code: ReasonCode.CYCLE_STARTED },
      "cycle started"
    );

    // ─── 1. Market ids ────────────────────────────────────────
    let marketIds: string[];
    try {
      marketIds = await withDeadline(
        (signal) => this.deps.marketData.listActiveMarketIds(request.market_limit, signal),
        this.scheduler.getOptions().timeoutMs
      );
    } catch (err) {
      const { message } = describeError(err);
      log.error({ error: message, reason_code: ReasonCode.CYCLE_FAILED }, "could not list active markets");
      return this.finish(cycleId, request, CycleStatus.FAILED, startedAt, tally, `listing markets failed: ${message}`);
    }
    marketIds = marketIds.slice(0, request.market_limit);
    tally.markets_requested = marketIds.length;

    try {
      // ─── 2. Evaluate ──────────────────────────────────────────
      const { outcomes, counters } = await this.scheduler.schedule(marketIds, (marketId, signal) =>
        this.evaluateMarket(marketId, signal)
      );
      tally.markets_evaluated = counters.evaluated;
      tally.timed_out = counters.timed_out;
      tally.failed = counters.failed;

      // ─── 3. Size, persist, commit, in market order ────────────
      const snapshots: MarketSnapshot[] = [];
      for (const outcome of outcomes) {
        if (outcome.status === "TIMED_OUT") {
          tally.failures.push({ market_id: outcome.market_id, kind: "TIMEOUT", message: "evaluation deadline exceeded" });
          continue;
        }
        if (outcome.status === "FAILED") {
          tally.failures.push({ market_id: outcome.market_id, kind: outcome.kind, message: outcome.message });
          continue;
        }

        const { snapshot, result } = outcome.evaluation;
        snapshots.push(snapshot);
        if (result.decision === "REJECT") {
          tally.rejections[result.reason] += 1;
          continue;
        }
        if (request.auto_signals) {
          await this.actOnCandidate(outcome.evaluation, request, cycleId, tally, log);
        }
      }

      // ─── 4. Mark, checkpoint, record ──────────────────────────
      const state = await this.deps.ledger.observe(snapshots);
      let checkpointError: string | undefined;
      try {
        await this.deps.store.appendPortfolioSnapshot(state, cycleId);
      } catch (err) {
        checkpointError = `portfolio checkpoint failed: ${describeError(err).message}`;
        log.error({ error: checkpointError }, "portfolio checkpoint failed");
      }

      const summary = await this.finish(cycleId, request, CycleStatus.COMPLETED, startedAt, tally, checkpointError);
      log.info(
        {
          duration_ms: Date.now() - started,
          evaluated: tally.markets_evaluated,
          signals: tally.signals_created,
          trades: tally.trades_created,
          timed_out: tally.timed_out,
          failed: tally.failed,
          reason_code: ReasonCode.CYCLE_COMPLETED,
        },
        "cycle completed"
      );
      return summary;
    } catch (err) {
      const { message } = describeError(err);
      log.error({ error: message, reason_code: ReasonCode.CYCLE_FAILED }, "cycle failed");
      await this.finish(cycleId, request, CycleStatus.FAILED, startedAt, tally, message);
      throw err;
    }
  }

  // ─── Per-market work ───────────────────────────────────────

  private async evaluateMarket(marketId: string, signal: AbortSignal): Promise<MarketEvaluation> {
    const fetched = await this.deps.marketData.fetchSnapshots([marketId], signal);
    const snapshot = fetched.find((s) => s.market_id === marketId);
    if (snapshot === undefined) {
      throw new MarketDataError(`Provider returned no snapshot for ${marketId}`, ReasonCode.PROV_MARKET_NOT_FOUND);
    }
    const estimate = await this.deps.model.predict(snapshot, signal);
    const result = evaluateSignal(snapshot, estimate, this.limits, {
      now: this.clock(),
      signal_id: this.deps.newId(),
    });
    return { snapshot, estimate, result };
  }

  private async actOnCandidate(
    evaluation: MarketEvaluation,
    request: CycleRequest,
    cycleId: string,
    tally: CycleTally,
    log: Logger
  ): Promise<void> {
    const { result } = evaluation;
    if (result.decision !== "ACCEPT") return;
    const { candidate } = result;
    const marketId = candidate.market_id;

    const sized = sizeSignal(candidate, this.deps.ledger.getState(), this.limits);
    if (sized.status === "REJECTED") {
      tally.rejections[sized.reason] += 1;
      log.debug({ market_id: marketId, reason: sized.reason, headroom: sized.breakdown.headroom }, "sizing rejected");
      return;
    }

    try {
      await this.deps.store.appendSignal(sized.signal, cycleId);
      tally.signals_created += 1;

      if (!request.auto_commit) return;

      const commit = await this.deps.ledger.commit(sized.signal);
      if (commit.status === "COMMITTED") {
        tally.trades_created += 1;
        return;
      }
      tally.rejections[commit.reason] += 1;
      await this.deps.store.appendCommit(commit);
    } catch (err) {
      if (err instanceof InvariantViolationError) throw err;
      const { kind, message } = describeError(err);
      tally.failures.push({ market_id: marketId, kind, message });
      tally.failed += 1;
      log.warn({ market_id: marketId, kind, error: message }, "market failed after evaluation");
    }
  }

  // ─── Summary ───────────────────────────────────────────────

  private buildSummary(
    cycleId: string,
    request: CycleRequest,
    status: CycleStatus,
    startedAt: string,
    finishedAt: string | null,
    tally: CycleTally,
    error?: string
  ): CycleSummary {
    return {
      cycle_id: cycleId,
      status,
      started_at: startedAt,
      finished_at: finishedAt,
      auto_signals: request.auto_signals,
      auto_commit: request.auto_commit,
      markets_requested: tally.markets_requested,
      markets_evaluated: tally.markets_evaluated,
      signals_created: tally.signals_created,
      trades_created: tally.trades_created,
      timed_out: tally.timed_out,
      failed: tally.failed,
      rejections: { ...tally.rejections },
      failures: [...tally.failures],
      ...(error !== undefined ? { error } : {}),
    };
  }

  private async finish(
    cycleId: string,
    request: CycleRequest,
    status: CycleStatus,
    startedAt: string,
    tally: CycleTally,
    error?: string
  ): Promise<CycleSummary> {
    const summary = this.buildSummary(
      cycleId,
      request,
      status,
      startedAt,
      this.clock().toISOString(),
      tally,
      error
    );
    try {
      await this.deps.store.recordCycle(summary);
    } catch (err) {
      this.log.error({ cycle_id: cycleId, error: describeError(err).message }, "could not record cycle summary");
    }
    return summary;
  }
}
