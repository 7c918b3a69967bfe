import { describe, expect, it } from 'vitest';
import { ExecutionCoordinator } from '../execution/coordinator.js';
import { ArbitrageEngine } from '../execution/engine.js';
import { OutcomePairRouter } from '../feeds/outcomePairRouter.js';
import { EventBus } from '../lib/eventBus.js';
import { PositionSizer } from '../risk/positionSizer.js';
import { SettlementReconciler } from '../settlement/reconciler.js';
import { PaperTrader, replayFileSchema } from '../sim/paperTrader.js';
import { SimulatedVenueClient } from '../venues/simulatedVenue.js';
import { COST_MODEL, feedPair, HOUR, NOW, openLedger } from './helpers/test-factories.js';

describe('PaperTrader', () => {
  it('should trade replayed pairs and settle them from replayed outcomes', async () => {
    const { ledger } = await openLedger();
    const venues = {
      polymarket: new SimulatedVenueClient('polymarket'),
      kalshi: new SimulatedVenueClient('kalshi')
    };
    const bus = new EventBus();
    const router = new OutcomePairRouter(() => NOW);
    const sizer = new PositionSizer(
      ledger,
      {
        targetUnits: 100,
        qualityMultipliers: { perfect: 1, near: 0.5, partial: 0.3 },
        liquidityThresholdUnits: 200,
        liquidityDiscount: 0.01,
        minRoiPercent: 0
      },
      { dailyLossLimit: 500, maxPositionSize: 1_000, maxDailyTrades: 10 }
    );
    const coordinator = new ExecutionCoordinator(
      venues,
      ledger,
      { mode: 'simulated', orderTimeoutMs: 1_000, slippageEstimate: 0.005, clock: () => NOW },
      bus
    );
    const engine = new ArbitrageEngine(
      ledger,
      sizer,
      coordinator,
      { costModel: COST_MODEL, maxConsecutiveFailures: 3, pauseMs: 5_000, clock: () => NOW },
      bus
    );
    const reconciler = new SettlementReconciler(venues, ledger, { timeoutHours: 24, clock: () => NOW + HOUR }, bus);
    engine.start(router);

    const frames = replayFileSchema.parse([
      {
        type: 'pair',
        delayMs: 0,
        pair: feedPair({
          quotes: {
            polymarket: { awayPrice: 40, homePrice: 70, awayMarketId: 'pm-lal', homeMarketId: 'pm-gsw' },
            kalshi: { awayPrice: 60, homePrice: 50, awayMarketId: 'kx-lal', homeMarketId: 'kx-gsw' }
          }
        })
      },
      { type: 'pair', delayMs: 0, pair: { sport: 'broken' } },
      { type: 'settlement', delayMs: 0, venue: 'polymarket', marketId: 'pm-lal', winner: 'LAL' },
      { type: 'settlement', delayMs: 0, venue: 'kalshi', marketId: 'kx-gsw', winner: 'LAL' }
    ]);

    await new PaperTrader(router, venues, { engine, reconciler, minDelayMs: 0 }).replay(frames);

    const [trade] = ledger.trades();
    expect(ledger.trades()).toHaveLength(1);
    expect(trade.status).toBe('settled');
    expect(trade.settledAmount).toBe(100);
    // cost 94.75, payout 100
    expect(ledger.balance).toBeCloseTo(10_005.25, 10);
  });

  it('should reject frames of an unknown type', () => {
    expect(replayFileSchema.safeParse([{ type: 'orderbook', delayMs: 0 }]).success).toBe(false);
  });
});
