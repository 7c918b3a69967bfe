import type { Leg, SettlementReport, Trade, VenueClientMap } from '../core/types.js';
import { Ledger } from '../ledger/ledger.js';
import { getErrorMessage } from '../lib/errors.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';

const log = logger.child('settlement');

const HOUR_MS = 60 * 60 * 1000;

export interface ReconcilerOptions {
  timeoutHours: number;
  clock?: () => number;
}

type LegResolution = { resolved: false } | { resolved: true; won: boolean };

interface TradeAssessment {
  trade: Trade;
  resolvedLegs: number;
  payout: number;
}

const matchesLeg = (winner: string, leg: Leg): boolean =>
  winner === leg.code || winner === leg.name;

/**
 * Settles pending trades from venue resolution data. Status queries run
 * concurrently; balance and status writes go through the ledger lock.
 */
export class SettlementReconciler {
  private readonly clock: () => number;

  constructor(
    private readonly clients: VenueClientMap,
    private readonly ledger: Ledger,
    private readonly options: ReconcilerOptions,
    private readonly bus: EventBus = eventBus
  ) {
    this.clock = options.clock ?? Date.now;
  }

  async runOnce(now: number = this.clock()): Promise<SettlementReport[]> {
    const pending = this.ledger.pendingTrades();
    if (!pending.length) {
      return [];
    }

    const assessments = await Promise.all(pending.map((trade) => this.assess(trade, now)));

    return this.ledger.runExclusive(async () => {
      const applied: Omit<SettlementReport, 'persisted'>[] = [];

      for (const assessment of assessments) {
        const report = this.apply(assessment, now);
        if (report) {
          applied.push(report);
        }
      }

      if (!applied.length) {
        return [];
      }

      const { persisted } = await this.ledger.commitSettlements(
        applied.map((report) => report.tradeId),
        now
      );
      const reports = applied.map((report) => ({ ...report, persisted }));
      reports.forEach((report) => this.bus.emit('settlement', report));
      return reports;
    });
  }

  private apply(
    { trade, resolvedLegs, payout }: TradeAssessment,
    now: number
  ): Omit<SettlementReport, 'persisted'> | null {
    const legCount = trade.legs.length;
    let status: 'settled' | 'incomplete';

    if (resolvedLegs === legCount) {
      status = 'settled';
    } else if (resolvedLegs > 0 && now - Date.parse(trade.placedAt) >= this.options.timeoutHours * HOUR_MS) {
      status = 'incomplete';
    } else {
      return null;
    }

    if (!this.ledger.applySettlement(trade.id, { status, payout, at: now })) {
      return null;
    }

    const realizedProfit = payout - trade.cost;
    const logMeta = {
      tradeId: trade.id,
      payout: payout.toFixed(2),
      realizedProfit: realizedProfit.toFixed(2),
      balance: this.ledger.balance.toFixed(2)
    };
    if (status === 'settled') {
      log.info('Trade settled', logMeta);
    } else {
      log.warn('Trade marked incomplete after timeout', { ...logMeta, resolvedLegs, legCount });
    }

    return { tradeId: trade.id, status, payout, realizedProfit, timestamp: now };
  }

  private async assess(trade: Trade, now: number): Promise<TradeAssessment> {
    const resolutions = await Promise.all(
      trade.legs.map((leg) => this.resolveLeg(trade, leg, now))
    );

    let resolvedLegs = 0;
    let payout = 0;
    for (const resolution of resolutions) {
      if (!resolution.resolved) {
        continue;
      }
      resolvedLegs += 1;
      if (resolution.won) {
        payout += trade.quantity;
      }
    }

    return { trade, resolvedLegs, payout };
  }

  private async resolveLeg(trade: Trade, leg: Leg, now: number): Promise<LegResolution> {
    try {
      const status = await this.clients[leg.venue].getSettlementStatus(leg.marketId);
      if (!status.resolved) {
        return { resolved: false };
      }

      const { winner } = status;
      // No winner on a resolved market means this leg's own contract lost.
      if (winner === null) {
        return { resolved: true, won: false };
      }

      if (matchesLeg(winner, leg)) {
        return { resolved: true, won: true };
      }
      if (trade.legs.some((other) => other !== leg && matchesLeg(winner, other))) {
        return { resolved: true, won: false };
      }

      log.warn('Settlement winner matches no leg', {
        tradeId: trade.id,
        venue: leg.venue,
        marketId: leg.marketId,
        winner
      });
      return { resolved: false };
    } catch (error) {
      const message = getErrorMessage(error);
      log.error('Settlement status query failed', {
        tradeId: trade.id,
        venue: leg.venue,
        marketId: leg.marketId,
        error: message
      });
      await this.ledger.runExclusive(() =>
        this.ledger.recordError(trade.id, `${leg.venue} settlement query failed: ${message}`, now)
      );
      return { resolved: false };
    }
  }
}
