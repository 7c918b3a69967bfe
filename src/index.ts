import { config } from './config.js';
import type { Venue, VenueClientMap } from './core/types.js';
import { ExecutionCoordinator } from './execution/coordinator.js';
import { ArbitrageEngine } from './execution/engine.js';
import { OutcomePairRouter } from './feeds/outcomePairRouter.js';
import { createLedgerStore } from './ledger/createStore.js';
import { Ledger } from './ledger/ledger.js';
import { getErrorMessage } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { MetricsTracker } from './monitoring/metrics.js';
import { PositionSizer } from './risk/positionSizer.js';
import { SettlementReconciler } from './settlement/reconciler.js';
import { PaperTrader } from './sim/paperTrader.js';
import { KalshiClient } from './venues/kalshiClient.js';
import { PolymarketClient } from './venues/polymarketClient.js';
import { SimulatedVenueClient } from './venues/simulatedVenue.js';

const store = createLedgerStore(config.ledger);
const router = new OutcomePairRouter();
const metrics = new MetricsTracker();

const simulatedVenues: Record<Venue, SimulatedVenueClient> = {
  polymarket: new SimulatedVenueClient('polymarket'),
  kalshi: new SimulatedVenueClient('kalshi')
};

const clients: VenueClientMap = config.dryRun
  ? simulatedVenues
  : {
      polymarket: new PolymarketClient(config.venues.polymarket, config.execution.orderTimeoutMs),
      kalshi: new KalshiClient(config.venues.kalshi, config.execution.orderTimeoutMs)
    };

let settlementTimer: NodeJS.Timeout | undefined;

async function main(): Promise<void> {
  const ledger = await Ledger.open(store, {
    initialBalance: config.ledger.initialBalance,
    errorLogLimit: config.ledger.errorLogLimit,
    persistRetries: config.ledger.persistRetries
  });

  await Promise.all(Object.values(clients).map((client) => client.ensureReady()));

  const sizer = new PositionSizer(
    ledger,
    {
      targetUnits: config.sizing.targetUnits,
      qualityMultipliers: {
        perfect: 1,
        near: config.sizing.nearMultiplier,
        partial: config.sizing.partialMultiplier
      },
      liquidityThresholdUnits: config.sizing.liquidityThresholdUnits,
      liquidityDiscount: config.sizing.liquidityDiscount,
      minRoiPercent: config.sizing.minRoiPercent
    },
    config.risk
  );

  const coordinator = new ExecutionCoordinator(clients, ledger, {
    mode: config.dryRun ? 'simulated' : 'live',
    orderTimeoutMs: config.execution.orderTimeoutMs,
    slippageEstimate: config.detection.slippageEstimate
  });

  const engine = new ArbitrageEngine(ledger, sizer, coordinator, {
    costModel: {
      feeRates: {
        polymarket: config.venues.polymarket.feeRate,
        kalshi: config.venues.kalshi.feeRate
      },
      slippageEstimate: config.detection.slippageEstimate,
      nearCostCeiling: config.detection.nearCostCeiling,
      partialDivergence: config.detection.partialDivergence
    },
    maxConsecutiveFailures: config.execution.maxConsecutiveFailures,
    pauseMs: config.execution.pauseMs
  });

  const reconciler = new SettlementReconciler(clients, ledger, {
    timeoutHours: config.settlement.timeoutHours
  });

  engine.start(router);
  metrics.start();

  settlementTimer = setInterval(() => {
    reconciler.runOnce().catch((error: unknown) => {
      logger.error('Settlement pass failed', { error: getErrorMessage(error) });
    });
  }, config.settlement.intervalMs);

  logger.info('Arbitrage engine running', {
    mode: config.dryRun ? 'simulated' : 'live',
    ledger: config.ledger.driver,
    balance: ledger.balance.toFixed(2),
    pendingTrades: ledger.pendingTrades().length
  });

  if (config.replayFile) {
    if (!config.dryRun) {
      logger.warn('Replay ignored outside dry run', { replayFile: config.replayFile });
      return;
    }
    const trader = new PaperTrader(router, simulatedVenues, { engine, reconciler });
    await trader.replayFromFile(config.replayFile);
  }
}

async function shutdown(): Promise<void> {
  logger.info('Shutting down...');
  metrics.stop();
  if (settlementTimer) {
    clearInterval(settlementTimer);
  }
  store.close?.();
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown();
});
process.on('SIGTERM', () => {
  void shutdown();
});

main().catch((error: unknown) => {
  logger.error('Fatal error', { error: getErrorMessage(error) });
  process.exit(1);
});
