// ═════════════════════════════════════════════════════════════
// Evaluation Scheduler
// schedule(marketIds, task) → outcomes in input order + counters
//
// - Chunks of chunkSize run one after another
// - Inside a chunk, up to `concurrency` workers pull the next index
// - Each task runs under a deadline with its own AbortSignal
// - Collaborator errors are retried inside the same deadline
// - Nothing a task throws escapes: it becomes FAILED or TIMED_OUT
// ═════════════════════════════════════════════════════════════

import { emptyRejectionCounts } from "@edgeline/contracts";
import type { Logger } from "pino";
import { DEFAULT_SCHEDULER_OPTIONS } from "../defaults";
import type { SchedulerOptions } from "../defaults";
import { DeadlineExceededError, InputError, describeError, isRetryable } from "../errors";
import { createLogger } from "../logger";
import type {
  MarketEvaluation,
  ScheduleCounters,
  ScheduleResult,
  TaskOutcome,
} from "../types/outputs";
import { withDeadline } from "./deadline";

export type EvaluationTask = (marketId: string, signal: AbortSignal) => Promise<MarketEvaluation>;

function assertOptions(options: SchedulerOptions): void {
  const { concurrency, chunkSize, timeoutMs, maxRetries } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InputError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new InputError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!(timeoutMs > 0)) {
    throw new InputError(`timeoutMs must be positive, got ${timeoutMs}`);
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new InputError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }
}

/**
 * Tallies outcomes into scheduler counters.
 */
export function countOutcomes(outcomes: readonly TaskOutcome[]): ScheduleCounters {
  const rejectedByReason = emptyRejectionCounts();
  let evaluated = 0;
  let accepted = 0;
  let rejected = 0;
  let timedOut = 0;
  let failed = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "DONE": {
        evaluated += 1;
        const { result } = outcome.evaluation;
        if (result.decision === "ACCEPT") {
          accepted += 1;
        } else {
          rejected += 1;
          rejectedByReason[result.reason] += 1;
        }
        break;
      }
      case "TIMED_OUT":
        timedOut += 1;
        break;
      case "FAILED":
        failed += 1;
        break;
    }
  }

  return {
    total: outcomes.length,
    evaluated,
    accepted,
    rejected,
    rejected_by_reason: rejectedByReason,
    timed_out: timedOut,
    failed,
  };
}

export class EvaluationScheduler {
  private readonly options: SchedulerOptions;
  private readonly log: Logger;

  constructor(options: Partial<SchedulerOptions> = {}, logger?: Logger) {
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
    assertOptions(this.options);
    this.log = logger ?? createLogger("evaluation-scheduler");
  }

  getOptions(): SchedulerOptions {
    return this.options;
  }

  /**
   * Evaluates every market id. outcomes[i] always belongs to marketIds[i].
   */
  async schedule(marketIds: readonly string[], task: EvaluationTask): Promise<ScheduleResult> {
    const { chunkSize, concurrency } = this.options;
    const slots = new Array<TaskOutcome | undefined>(marketIds.length).fill(undefined);

    for (let offset = 0; offset < marketIds.length; offset += chunkSize) {
      const chunk = marketIds.slice(offset, offset + chunkSize);
      let next = 0;

      const worker = async (): Promise<void> => {
        while (next < chunk.length) {
          const index = next;
          next += 1;
          slots[offset + index] = await this.runOne(chunk[index], task);
        }
      };

      const workers = Math.min(concurrency, chunk.length);
      await Promise.all(Array.from({ length: workers }, () => worker()));
    }

    const outcomes = slots.map(
      (outcome, i): TaskOutcome =>
        outcome ?? {
          status: "FAILED",
          market_id: marketIds[i],
          kind: "UNKNOWN",
          message: "task produced no outcome",
        }
    );
    return { outcomes, counters: countOutcomes(outcomes) };
  }

  // ─── One market ────────────────────────────────────────────

  private async runOne(marketId: string, task: EvaluationTask): Promise<TaskOutcome> {
    const { timeoutMs, maxRetries } = this.options;
    const startedAt = Date.now();

    try {
      const evaluation = await withDeadline(
        async (signal) => {
          for (let attempt = 0; ; attempt += 1) {
            try {
              return await task(marketId, signal);
            } catch (err) {
              if (!isRetryable(err) || attempt >= maxRetries || signal.aborted) throw err;
              this.log.debug(
                { market_id: marketId, attempt: attempt + 1, error: describeError(err).message },
                "retrying market evaluation"
              );
            }
          }
        },
        timeoutMs,
        (settlement) =>
          this.log.debug(
            { market_id: marketId, settlement: settlement.status },
            "abandoned evaluation settled after its deadline"
          )
      );
      return { status: "DONE", market_id: marketId, evaluation };
    } catch (err) {
      const duration_ms = Date.now() - startedAt;
      if (err instanceof DeadlineExceededError) {
        this.log.warn({ market_id: marketId, duration_ms }, "market evaluation timed out");
        return { status: "TIMED_OUT", market_id: marketId };
      }
      const { kind, message } = describeError(err);
      this.log.warn({ market_id: marketId, kind, duration_ms, error: message }, "market evaluation failed");
      return { status: "FAILED", market_id: marketId, kind, message };
    }
  }
}
