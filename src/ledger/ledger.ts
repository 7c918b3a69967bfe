import { utcDate } from '../core/math.js';
import type {
  DailyRiskCounters,
  LedgerError,
  LedgerState,
  Trade,
  TradeStatus
} from '../core/types.js';
import { getErrorMessage, LedgerLoadError, LedgerPersistenceError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { ledgerStateSchema } from './schema.js';

const log = logger.child('ledger');

/** Persistence port. `load` resolves to null when nothing has been written yet. */
export interface LedgerStore {
  load(): Promise<unknown>;
  save(state: LedgerState): Promise<void>;
}

export interface LedgerOptions {
  initialBalance: number;
  errorLogLimit: number;
  persistRetries: number;
  clock?: () => number;
}

export interface SettlementUpdate {
  status: 'settled' | 'incomplete';
  payout: number;
  at: number;
}

export interface LedgerSummary {
  balance: number;
  initialBalance: number;
  totalProfit: number;
  estimatedProfit: number;
  totalTrades: number;
  dailyLoss: number;
  dailyTrades: number;
  trades: Trade[];
}

const OPEN_STATUSES: ReadonlySet<TradeStatus> = new Set(['pending', 'locked']);

const freshCounters = (date: string): DailyRiskCounters => ({ date, loss: 0, trades: [] });

/**
 * Balance, trade records, daily risk counters and the recent error list for one
 * engine instance. Every mutation rewrites the whole record through the store.
 */
export class Ledger {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly clock: () => number;

  private constructor(
    private readonly state: LedgerState,
    private readonly store: LedgerStore,
    private readonly options: LedgerOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  static async open(store: LedgerStore, options: LedgerOptions): Promise<Ledger> {
    const now = options.clock?.() ?? Date.now();
    const raw = await store.load();

    if (raw === null || raw === undefined) {
      const ledger = new Ledger(
        {
          balance: options.initialBalance,
          initialBalance: options.initialBalance,
          trades: [],
          daily: freshCounters(utcDate(now)),
          errors: []
        },
        store,
        options
      );
      await ledger.persistOrThrow();
      log.info('Started new ledger', { initialBalance: options.initialBalance });
      return ledger;
    }

    const parsed = ledgerStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LedgerLoadError('Persisted ledger failed validation', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    const state: LedgerState = {
      ...parsed.data,
      daily: parsed.data.daily ?? freshCounters(utcDate(now))
    };

    log.info('Loaded ledger', {
      balance: state.balance,
      trades: state.trades.length,
      errors: state.errors.length
    });
    return new Ledger(state, store, options);
  }

  get balance(): number {
    return this.state.balance;
  }

  get initialBalance(): number {
    return this.state.initialBalance;
  }

  trades(): readonly Trade[] {
    return this.state.trades;
  }

  pendingTrades(): Trade[] {
    return this.state.trades.filter((trade) => trade.status === 'pending');
  }

  findOpenTrade(pairId: string): Trade | undefined {
    return this.state.trades.find(
      (trade) => trade.id === pairId && OPEN_STATUSES.has(trade.status)
    );
  }

  errors(): readonly LedgerError[] {
    return this.state.errors;
  }

  /**
   * Counters for the UTC day of `now`. The first read on a new day clears
   * them; there is no timer.
   */
  dailyCounters(now: number = this.clock()): Readonly<DailyRiskCounters> {
    return this.currentCounters(now);
  }

  /** Runs `task` after every previously queued task has finished. */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Records a placed trade: append, debit, count it against today, persist.
   * Once appended the trade is never rolled back, even if persistence keeps
   * failing.
   */
  async commitTrade(trade: Trade, now: number = this.clock()): Promise<{ persisted: boolean }> {
    const counters = this.currentCounters(now);

    this.state.trades.push(trade);
    this.state.balance -= trade.cost;
    counters.trades.push({
      date: counters.date,
      tradeId: trade.id,
      at: new Date(now).toISOString()
    });

    try {
      await this.persistOrThrow();
      return { persisted: true };
    } catch (error) {
      const message = `Trade recorded in memory but not persisted: ${getErrorMessage(error)}`;
      log.error('Ledger persistence escalation', {
        tradeId: trade.id,
        cost: trade.cost,
        balance: this.state.balance,
        error: getErrorMessage(error)
      });
      this.appendError(trade.id, message, now);
      return { persisted: false };
    }
  }

  /**
   * Applies a settlement payout to a pending trade. Returns false, changing
   * nothing, when the trade is missing or already terminal. The caller
   * persists.
   */
  applySettlement(tradeId: string, update: SettlementUpdate): boolean {
    const trade = this.state.trades.find(
      (candidate) => candidate.id === tradeId && candidate.status === 'pending'
    );
    if (!trade) {
      return false;
    }

    const realizedProfit = update.payout - trade.cost;
    trade.status = update.status;
    trade.settledAmount = update.payout;
    trade.realizedProfit = realizedProfit;
    trade.profit = realizedProfit;
    trade.settledAt = new Date(update.at).toISOString();

    this.state.balance += update.payout;

    if (realizedProfit < 0) {
      this.currentCounters(update.at).loss += Math.abs(realizedProfit);
    }

    return true;
  }

  /**
   * Persists settlements already applied in memory. A save that still fails
   * after retries is escalated to the error list of each trade, never thrown.
   */
  async commitSettlements(tradeIds: readonly string[], now: number = this.clock()): Promise<{ persisted: boolean }> {
    try {
      await this.persistOrThrow();
      return { persisted: true };
    } catch (error) {
      const message = `Settlement recorded in memory but not persisted: ${getErrorMessage(error)}`;
      log.error('Ledger persistence escalation', {
        tradeIds,
        balance: this.state.balance,
        error: getErrorMessage(error)
      });
      tradeIds.forEach((tradeId) => this.appendError(tradeId, message, now));
      return { persisted: false };
    }
  }

  async recordError(tradeId: string, message: string, now: number = this.clock()): Promise<void> {
    this.appendError(tradeId, message, now);
    await this.persist();
  }

  /** Saves with retries. Failures are logged, never thrown. */
  async persist(): Promise<boolean> {
    try {
      await this.persistOrThrow();
      return true;
    } catch (error) {
      log.error('Ledger persistence failed', { error: getErrorMessage(error) });
      return false;
    }
  }

  snapshot(): LedgerState {
    return structuredClone(this.state);
  }

  summary(now: number = this.clock()): LedgerSummary {
    const counters = this.dailyCounters(now);
    const trades = [...this.state.trades].sort((a, b) => b.placedAt.localeCompare(a.placedAt));

    return {
      balance: this.state.balance,
      initialBalance: this.state.initialBalance,
      totalProfit: this.state.trades
        .filter((trade) => trade.status === 'settled' || trade.status === 'incomplete')
        .reduce((sum, trade) => sum + trade.realizedProfit, 0),
      estimatedProfit: this.state.trades
        .filter((trade) => trade.status === 'pending')
        .reduce((sum, trade) => sum + trade.profit, 0),
      totalTrades: this.state.trades.length,
      dailyLoss: counters.loss,
      dailyTrades: counters.trades.length,
      trades
    };
  }

  private currentCounters(now: number): DailyRiskCounters {
    const today = utcDate(now);
    if (this.state.daily.date !== today) {
      log.info('Daily risk counters reset', {
        previousDate: this.state.daily.date,
        date: today
      });
      this.state.daily = freshCounters(today);
    }
    return this.state.daily;
  }

  private appendError(tradeId: string, message: string, now: number): void {
    this.state.errors.push({ tradeId, message, at: new Date(now).toISOString() });
    if (this.state.errors.length > this.options.errorLogLimit) {
      this.state.errors.splice(0, this.state.errors.length - this.options.errorLogLimit);
    }
  }

  private async persistOrThrow(): Promise<void> {
    const attempts = this.options.persistRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        await this.store.save(this.state);
        return;
      } catch (error) {
        lastError = error;
        log.warn('Ledger save attempt failed', {
          attempt,
          attempts,
          error: getErrorMessage(error)
        });
      }
    }

    throw new LedgerPersistenceError(
      `Ledger save failed after ${attempts} attempts: ${getErrorMessage(lastError)}`,
      attempts
    );
  }
}
