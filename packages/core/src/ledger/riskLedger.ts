// ═════════════════════════════════════════════════════════════
// Risk Ledger
// Single owner of PortfolioState. Every mutation runs inside one
// mutex, so racing commits see each other's exposure.
//
// State machine:
//   OPEN ──(daily drawdown breached)──▶ DRAWDOWN_BREACHED
//   DRAWDOWN_BREACHED ──(daily reset / UTC rollover)──▶ OPEN
//
// DRAWDOWN_BREACHED rejects every commit; observe and close still run.
// ═════════════════════════════════════════════════════════════

import {
  LedgerEntryKind,
  LedgerState,
  ReasonCode,
  RejectReason,
  toTradingDay,
} from "@edgeline/contracts";
import type {
  ClosedTrade,
  CommitResult,
  LedgerEntry,
  MarketSnapshot,
  OpenPosition,
  PortfolioState,
  RiskLimits,
  Signal,
} from "@edgeline/contracts";
import type { Logger } from "pino";
import { WINNING_CLOSE_FEE_RATE } from "../defaults";
import { InputError, InvariantViolationError } from "../errors";
import { createLogger } from "../logger";
import { sidePrice } from "../sizer/stakeSizer";
import type { LedgerJournal } from "../collaborators";
import type { Clock, RiskLedgerOptions, YesPriceMap } from "../types/inputs";
import { Mutex } from "./mutex";
import {
  MONEY_EPSILON,
  assertCommitInvariants,
  isDrawdownBreached,
  markPosition,
  positionPnl,
  recompute,
} from "./portfolioMath";

function isPriceList(prices: YesPriceMap | readonly MarketSnapshot[]): prices is readonly MarketSnapshot[] {
  return Array.isArray(prices);
}

export class RiskLedger {
  private state: PortfolioState;
  private readonly changeLog: LedgerEntry[] = [];
  private readonly mutex = new Mutex();
  private readonly limits: RiskLimits;
  private readonly journal: LedgerJournal | undefined;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: RiskLedgerOptions) {
    if (!Number.isFinite(options.startingCash) || options.startingCash < 0) {
      throw new InputError(`startingCash must be a non-negative amount, got ${options.startingCash}`);
    }
    this.limits = options.limits;
    this.journal = options.journal;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? createLogger("risk-ledger");

    const restored = options.initialState ? structuredClone(options.initialState) : undefined;
    if (restored) {
      this.state = recompute({
        cash: restored.cash,
        positions: { ...restored.positions },
        realized_pnl: restored.realized_pnl,
        day_start_value: restored.day_start_value,
        ledger_state: restored.ledger_state,
        trading_day: restored.trading_day,
        last_snapshot_at: restored.last_snapshot_at,
      });
      return;
    }

    const now = this.clock();
    this.state = recompute({
      cash: options.startingCash,
      positions: {},
      realized_pnl: 0,
      day_start_value: options.startingCash,
      ledger_state: LedgerState.OPEN,
      trading_day: toTradingDay(now),
      last_snapshot_at: now.toISOString(),
    });
  }

  // ─── Reads ─────────────────────────────────────────────────

  /** A copy; the ledger's own state never leaves the mutex. */
  getState(): PortfolioState {
    return structuredClone(this.state);
  }

  getLedgerState(): LedgerState {
    return this.state.ledger_state;
  }

  getChangeLog(): readonly LedgerEntry[] {
    return [...this.changeLog];
  }

  getLimits(): RiskLimits {
    return this.limits;
  }

  isJournaled(): boolean {
    return this.journal !== undefined;
  }

  // ─── Mark to market ────────────────────────────────────────

  /**
   * Marks held positions to the supplied YES prices and re-evaluates
   * the circuit breaker. Markets without a price keep their last mark.
   */
  observe(prices: YesPriceMap | readonly MarketSnapshot[]): Promise<PortfolioState> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      this.rolloverIfNewDay(now);

      const yesPrices: Record<string, number> = {};
      if (isPriceList(prices)) {
        for (const snapshot of prices) yesPrices[snapshot.market_id] = snapshot.yes_price;
      } else {
        Object.assign(yesPrices, prices);
      }

      const positions: Record<string, OpenPosition> = {};
      let marked = 0;
      for (const [marketId, position] of Object.entries(this.state.positions)) {
        const yes = yesPrices[marketId];
        if (yes === undefined) {
          positions[marketId] = position;
          continue;
        }
        if (!(Number.isFinite(yes) && yes >= 0 && yes <= 1)) {
          throw new InputError(`YES price for ${marketId} out of range: ${yes}`, marketId);
        }
        positions[marketId] = markPosition(position, sidePrice(position.side, yes));
        marked += 1;
      }

      this.state = recompute({
        ...this.state,
        positions,
        last_snapshot_at: now.toISOString(),
      });
      this.append(LedgerEntryKind.OBSERVE, now, { amount: this.state.unrealized_pnl });
      this.tripBreakerIfBreached(now);

      this.log.debug(
        { marked, total_value: this.state.total_value, daily_pnl: this.state.daily_pnl },
        "portfolio observed"
      );
      return structuredClone(this.state);
    });
  }

  // ─── Commit ────────────────────────────────────────────────

  /**
   * Applies a sized signal. Policy failures come back as REJECTED;
   * a size that is not a positive finite amount throws.
   *
   * The next state is handed to the journal first and swapped in only
   * after the journal accepts it.
   */
  commit(signal: Signal): Promise<CommitResult> {
    return this.mutex.runExclusive(async () => {
      const now = this.clock();
      const timestamp = now.toISOString();
      this.rolloverIfNewDay(now);
      this.tripBreakerIfBreached(now);

      const current = this.state;
      const rejected = (reason: RejectReason): CommitResult => {
        this.log.info({ market_id: signal.market_id, reason }, "commit rejected");
        return {
          status: "REJECTED",
          signal_id: signal.signal_id,
          market_id: signal.market_id,
          timestamp,
          reason,
        };
      };

      // ─── 1. Circuit breaker ─────────────────────────────────
      if (current.ledger_state === LedgerState.DRAWDOWN_BREACHED) {
        return rejected(RejectReason.CIRCUIT_BREAKER_OPEN);
      }

      // ─── 2. Position gates ──────────────────────────────────
      if (current.positions[signal.market_id] !== undefined) {
        return rejected(RejectReason.POSITION_ALREADY_OPEN);
      }
      if (Object.keys(current.positions).length >= this.limits.max_positions) {
        return rejected(RejectReason.MAX_POSITIONS_REACHED);
      }

      // ─── 3. Size sanity ─────────────────────────────────────
      const size = signal.suggested_size;
      if (!Number.isFinite(size) || size <= 0) {
        throw new InvariantViolationError(
          `Signal ${signal.signal_id} carries a non-positive size: ${size}`
        );
      }

      // ─── 4. Exposure against live state ─────────────────────
      const cap = this.limits.max_total_exposure_fraction * current.total_value;
      if (current.total_exposure + size > cap + MONEY_EPSILON || size > current.cash + MONEY_EPSILON) {
        return rejected(RejectReason.EXPOSURE_LIMIT_REACHED);
      }

      // ─── 5. Next state ──────────────────────────────────────
      const entryPrice = sidePrice(signal.side, signal.market_price);
      if (!(entryPrice > 0)) {
        throw new InvariantViolationError(
          `Signal ${signal.signal_id} enters ${signal.side} at price ${entryPrice}`
        );
      }
      const position: OpenPosition = {
        market_id: signal.market_id,
        side: signal.side,
        size,
        entry_price: entryPrice,
        current_price: entryPrice,
        unrealized_pnl: 0,
        opened_at: timestamp,
      };
      const next = recompute({
        ...current,
        cash: current.cash - size,
        positions: { ...current.positions, [signal.market_id]: position },
        last_snapshot_at: timestamp,
      });
      assertCommitInvariants(next, this.limits);

      const result: CommitResult = {
        status: "COMMITTED",
        signal_id: signal.signal_id,
        market_id: signal.market_id,
        timestamp,
        position: structuredClone(position),
        portfolio: structuredClone(next),
      };

      // ─── 6. Journal, then swap ──────────────────────────────
      if (this.journal) {
        await this.journal.appendCommit(result);
      }
      this.state = next;
      this.append(LedgerEntryKind.COMMIT, now, { market_id: signal.market_id, amount: size });

      this.log.info(
        {
          market_id: signal.market_id,
          side: signal.side,
          size,
          total_exposure: next.total_exposure,
          reason_code: ReasonCode.LEDGER_COMMITTED,
        },
        "position committed"
      );
      return result;
    });
  }

  // ─── Close ─────────────────────────────────────────────────

  /**
   * Closes the position in a market at the given YES price.
   * Winning trades pay a fee on their profit.
   *
   * @throws InputError when no position is open in the market
   */
  close(marketId: string, exitYesPrice: number): Promise<ClosedTrade> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      this.rolloverIfNewDay(now);

      const position = this.state.positions[marketId];
      if (position === undefined) {
        throw new InputError(
          `No open position in ${marketId}`,
          marketId,
          ReasonCode.LEDGER_POSITION_NOT_FOUND
        );
      }
      if (!(Number.isFinite(exitYesPrice) && exitYesPrice >= 0 && exitYesPrice <= 1)) {
        throw new InputError(`Exit price out of range: ${exitYesPrice}`, marketId);
      }

      const exitPrice = sidePrice(position.side, exitYesPrice);
      const gross = positionPnl(position.size, position.entry_price, exitPrice);
      const fees = gross > 0 ? gross * WINNING_CLOSE_FEE_RATE : 0;
      const pnl = gross - fees;

      const positions: Record<string, OpenPosition> = { ...this.state.positions };
      delete positions[marketId];

      this.state = recompute({
        ...this.state,
        cash: this.state.cash + position.size + pnl,
        realized_pnl: this.state.realized_pnl + pnl,
        positions,
        last_snapshot_at: now.toISOString(),
      });
      this.append(LedgerEntryKind.CLOSE, now, { market_id: marketId, amount: pnl });
      this.tripBreakerIfBreached(now);

      this.log.info(
        { market_id: marketId, pnl, fees, reason_code: ReasonCode.LEDGER_POSITION_CLOSED },
        "position closed"
      );

      return {
        market_id: marketId,
        side: position.side,
        entry_price: position.entry_price,
        exit_price: exitPrice,
        size: position.size,
        pnl,
        fees,
        opened_at: position.opened_at,
        closed_at: now.toISOString(),
      };
    });
  }

  // ─── Daily reset ───────────────────────────────────────────

  /**
   * Starts a new trading day: breaker back to OPEN and
   * day_start_value re-based to the current total value.
   */
  resetDaily(): Promise<PortfolioState> {
    return this.mutex.runExclusive(() => {
      this.startDay(this.clock());
      return structuredClone(this.state);
    });
  }

  // ─── Internals (call only inside the mutex) ────────────────

  private rolloverIfNewDay(now: Date): void {
    if (toTradingDay(now) !== this.state.trading_day) {
      this.startDay(now);
    }
  }

  private startDay(now: Date): void {
    const previous = this.state.ledger_state;
    this.state = recompute({
      ...this.state,
      ledger_state: LedgerState.OPEN,
      day_start_value: this.state.total_value,
      trading_day: toTradingDay(now),
    });
    this.append(LedgerEntryKind.DAILY_RESET, now, { amount: this.state.day_start_value });
    this.log.info(
      { trading_day: this.state.trading_day, previous_state: previous, reason_code: ReasonCode.LEDGER_DAILY_RESET },
      "trading day started"
    );
  }

  private tripBreakerIfBreached(now: Date): void {
    if (this.state.ledger_state !== LedgerState.OPEN) return;
    if (!isDrawdownBreached(this.state, this.limits)) return;

    this.state = { ...this.state, ledger_state: LedgerState.DRAWDOWN_BREACHED };
    this.append(LedgerEntryKind.BREAKER_TRIPPED, now, { amount: this.state.daily_pnl });
    this.log.warn(
      {
        daily_pnl: this.state.daily_pnl,
        day_start_value: this.state.day_start_value,
        reason_code: ReasonCode.LEDGER_BREAKER_TRIPPED,
      },
      "circuit breaker tripped"
    );
  }

  private append(
    kind: LedgerEntryKind,
    at: Date,
    fields: { market_id?: string; amount?: number } = {}
  ): void {
    this.changeLog.push({
      seq: this.changeLog.length + 1,
      kind,
      timestamp: at.toISOString(),
      ...fields,
    });
  }
}
