import { centsToUsd, toNativePrice } from '../core/math.js';
import type {
  ExecutionMode,
  Leg,
  Opportunity,
  OpportunityLeg,
  Sizing,
  Trade,
  VenueClientMap
} from '../core/types.js';
import { Ledger } from '../ledger/ledger.js';
import { getErrorMessage, withTimeout } from '../lib/errors.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';

const log = logger.child('coordinator');

export interface CoordinatorOptions {
  mode: ExecutionMode;
  orderTimeoutMs: number;
  slippageEstimate: number;
  clock?: () => number;
}

export type ExecutionOutcome =
  | { ok: true; trade: Trade; persisted: boolean }
  | { ok: false; reason: 'invalid_order'; message: string }
  | {
      ok: false;
      reason: 'leg_placement_failed';
      message: string;
      failedLeg: 1 | 2;
      /** Whether leg 1 was cancelled; null when leg 1 itself failed. */
      compensated: boolean | null;
    };

type PlacedLeg = { ok: true; leg: Leg; orderId: string } | { ok: false; error: string };

const isNativePrice = (price: number): boolean => price > 0 && price < 1;

/**
 * Places both legs of an arbitrage and books the trade. A leg 2 failure gets
 * one cancel attempt on leg 1; cross-venue atomicity is otherwise not
 * available, so an uncancelled leg 1 is reported as an orphan.
 */
export class ExecutionCoordinator {
  private readonly clock: () => number;

  constructor(
    private readonly clients: VenueClientMap,
    private readonly ledger: Ledger,
    private readonly options: CoordinatorOptions,
    private readonly bus: EventBus = eventBus
  ) {
    this.clock = options.clock ?? Date.now;
  }

  execute(opportunity: Opportunity, sizing: Sizing): Promise<ExecutionOutcome> {
    return this.ledger.runExclusive(() => this.executeExclusive(opportunity, sizing));
  }

  private async executeExclusive(
    opportunity: Opportunity,
    sizing: Sizing
  ): Promise<ExecutionOutcome> {
    const { quantity } = sizing;
    const [first, second] = opportunity.legs;

    if (!(quantity > 0) || !Number.isInteger(quantity)) {
      return {
        ok: false,
        reason: 'invalid_order',
        message: `Invalid quantity: ${quantity} (must be a whole number > 0)`
      };
    }
    for (const leg of opportunity.legs) {
      const price = toNativePrice(leg.rawPrice);
      if (!isNativePrice(price)) {
        return {
          ok: false,
          reason: 'invalid_order',
          message: `Invalid ${leg.outcome} price: ${price} (must be between 0 and 1)`
        };
      }
    }

    const placedFirst = await this.placeLeg(opportunity.pairId, first, quantity);
    if (!placedFirst.ok) {
      return {
        ok: false,
        reason: 'leg_placement_failed',
        message: `Failed to place ${first.outcome} leg on ${first.venue}: ${placedFirst.error}`,
        failedLeg: 1,
        compensated: null
      };
    }

    const placedSecond = await this.placeLeg(opportunity.pairId, second, quantity);
    if (!placedSecond.ok) {
      const compensated = await this.compensate(opportunity.pairId, placedFirst.leg, placedFirst.orderId);
      return {
        ok: false,
        reason: 'leg_placement_failed',
        message: `Failed to place ${second.outcome} leg on ${second.venue}: ${placedSecond.error} (${first.outcome} leg ${compensated ? 'cancelled' : 'NOT cancelled'})`,
        failedLeg: 2,
        compensated
      };
    }

    const now = this.clock();
    const trade = this.buildTrade(opportunity, sizing, [placedFirst.leg, placedSecond.leg], now);
    const { persisted } = await this.ledger.commitTrade(trade, now);

    log.info('Trade placed', {
      tradeId: trade.id,
      mode: trade.mode,
      quantity,
      cost: trade.cost.toFixed(2),
      expectedProfit: trade.profit.toFixed(2),
      balance: this.ledger.balance.toFixed(2),
      persisted
    });

    return { ok: true, trade, persisted };
  }

  private async placeLeg(pairId: string, leg: OpportunityLeg, quantity: number): Promise<PlacedLeg> {
    const client = this.clients[leg.venue];
    const price = toNativePrice(leg.rawPrice);

    log.info('Placing leg order', {
      pairId,
      venue: leg.venue,
      outcome: leg.outcome,
      marketId: leg.marketId,
      quantity,
      price
    });

    let error: string;
    try {
      const result = await withTimeout(
        `${leg.venue} placeOrder`,
        client.placeOrder({ marketId: leg.marketId, side: 'yes', quantity, price }),
        this.options.orderTimeoutMs
      );

      if (result.success) {
        return {
          ok: true,
          leg: this.toLeg(leg, quantity, result.orderId, result.status),
          orderId: result.orderId
        };
      }
      error = result.error;
    } catch (thrown) {
      error = getErrorMessage(thrown);
    }

    log.error('Leg order failed', { pairId, venue: leg.venue, outcome: leg.outcome, error });
    await this.ledger.recordError(pairId, `${leg.venue} order failed: ${error}`, this.clock());
    return { ok: false, error };
  }

  private async compensate(pairId: string, leg: Leg, orderId: string): Promise<boolean> {
    let error: string;

    try {
      const result = await this.clients[leg.venue].cancelOrder(orderId);
      if (result.success) {
        log.warn('Compensated leg cancelled', { pairId, venue: leg.venue, orderId });
        return true;
      }
      error = result.error;
    } catch (thrown) {
      error = getErrorMessage(thrown);
    }

    const now = this.clock();
    log.error('Orphaned position requires manual reconciliation', {
      pairId,
      venue: leg.venue,
      orderId,
      error
    });
    await this.ledger.recordError(
      pairId,
      `Cancel failed, orphaned ${leg.venue} order ${orderId}: ${error}`,
      now
    );
    this.bus.emit('orphan', { pairId, venue: leg.venue, orderId, error, timestamp: now });
    return false;
  }

  private toLeg(leg: OpportunityLeg, quantity: number, orderId: string, orderStatus: string): Leg {
    const costUsd = centsToUsd(leg.effectivePrice * quantity);
    const priceUsd = centsToUsd(leg.rawPrice * quantity);

    return {
      venue: leg.venue,
      outcome: leg.outcome,
      code: leg.code,
      name: leg.name,
      price: leg.rawPrice,
      effectivePrice: leg.effectivePrice,
      marketId: leg.marketId,
      url: leg.url,
      costUsd,
      feeUsd: costUsd - priceUsd,
      slippageUsd: priceUsd * this.options.slippageEstimate,
      orderId,
      orderStatus
    };
  }

  private buildTrade(
    opportunity: Opportunity,
    sizing: Sizing,
    legs: [Leg, Leg],
    now: number
  ): Trade {
    return {
      id: opportunity.pairId,
      description: opportunity.description,
      sport: opportunity.sport,
      mode: this.options.mode,
      legs,
      quantity: sizing.quantity,
      cost: sizing.costUsd,
      payout: sizing.quantity,
      profit: sizing.profitUsd,
      roiPercent: sizing.roiPercent,
      quality: opportunity.quality,
      totalCostPerUnit: opportunity.totalEffectiveCost,
      feesTotalUsd: legs[0].feeUsd + legs[1].feeUsd,
      slippageTotalUsd: legs[0].slippageUsd + legs[1].slippageUsd,
      status: 'pending',
      placedAt: new Date(now).toISOString(),
      settledAmount: 0,
      realizedProfit: 0
    };
  }
}
