import { describe, expect, it } from 'vitest';
import type { SettlementReport } from '../core/types.js';
import { EventBus } from '../lib/eventBus.js';
import { SettlementReconciler } from '../settlement/reconciler.js';
import { fakeClients, HOUR, makeTrade, NOW, openLedger } from './helpers/test-factories.js';

async function setup() {
  const { ledger, store } = await openLedger();
  await ledger.commitTrade(makeTrade(), NOW);
  const clients = fakeClients();
  const bus = new EventBus();
  const reports: SettlementReport[] = [];
  bus.on('settlement', (report) => reports.push(report));
  const reconciler = new SettlementReconciler(clients, ledger, { timeoutHours: 24, clock: () => NOW }, bus);
  return { ledger, store, clients, reports, reconciler };
}

describe('SettlementReconciler', () => {
  it('should settle a trade once every leg has resolved', async () => {
    const { ledger, store, clients, reports, reconciler } = await setup();
    clients.polymarket.resolve('pm-away', 'GSW');
    clients.kalshi.resolve('kx-home', 'GSW');
    const savesBefore = store.saves.length;

    const settled = await reconciler.runOnce(NOW + HOUR);

    expect(settled).toHaveLength(1);
    expect(settled[0]).toMatchObject({ tradeId: 'LAL@GSW', status: 'settled', payout: 100, persisted: true });
    expect(settled[0].realizedProfit).toBeCloseTo(2.5, 10);
    expect(ledger.balance).toBeCloseTo(10_002.5, 10);
    expect(ledger.trades()[0].status).toBe('settled');
    expect(store.saves.length - savesBefore).toBe(1);
    expect(reports).toEqual(settled);
  });

  it('should match winners by display name as well as code', async () => {
    const { ledger, clients, reconciler } = await setup();
    clients.polymarket.resolve('pm-away', 'Lakers');
    clients.kalshi.resolve('kx-home', null);

    const [report] = await reconciler.runOnce(NOW + HOUR);

    expect(report.payout).toBe(100);
    expect(ledger.trades()[0].settledAmount).toBe(100);
  });

  it('should leave a partly resolved trade pending before the timeout', async () => {
    const { ledger, clients, reconciler } = await setup();
    clients.kalshi.resolve('kx-home', 'GSW');

    await expect(reconciler.runOnce(NOW + 23 * HOUR)).resolves.toEqual([]);
    expect(ledger.trades()[0].status).toBe('pending');
    expect(ledger.balance).toBeCloseTo(9_902.5, 10);
  });

  it('should close a partly resolved trade as incomplete after the timeout', async () => {
    const { ledger, clients, reconciler } = await setup();
    clients.kalshi.resolve('kx-home', 'GSW');

    const [report] = await reconciler.runOnce(NOW + 24 * HOUR);

    expect(report).toMatchObject({ status: 'incomplete', payout: 100 });
    expect(ledger.trades()[0].status).toBe('incomplete');
    expect(ledger.balance).toBeCloseTo(10_002.5, 10);
  });

  it('should count an incomplete loss against the daily loss limit', async () => {
    const { ledger, clients, reconciler } = await setup();
    clients.polymarket.resolve('pm-away', 'GSW');
    const later = NOW + 24 * HOUR;

    const [report] = await reconciler.runOnce(later);

    expect(report.payout).toBe(0);
    expect(report.realizedProfit).toBeCloseTo(-97.5, 10);
    expect(ledger.dailyCounters(later).loss).toBeCloseTo(97.5, 10);
  });

  it('should not resolve a leg whose winner matches neither outcome', async () => {
    const { ledger, clients, reconciler } = await setup();
    clients.polymarket.resolve('pm-away', 'BOS');
    clients.kalshi.resolve('kx-home', 'GSW');

    await expect(reconciler.runOnce(NOW + HOUR)).resolves.toEqual([]);
    expect(ledger.trades()[0].status).toBe('pending');
  });

  it('should record a failed status query and keep the trade pending', async () => {
    const { ledger, clients, reconciler } = await setup();
    clients.polymarket.getSettlementStatus.mockRejectedValueOnce(new Error('502 bad gateway'));
    clients.kalshi.resolve('kx-home', 'GSW');

    await expect(reconciler.runOnce(NOW + HOUR)).resolves.toEqual([]);
    expect(ledger.errors().map((entry) => entry.message)).toEqual([
      'polymarket settlement query failed: 502 bad gateway'
    ]);
    expect(ledger.trades()[0].status).toBe('pending');
  });

  it('should escalate a settlement that cannot be persisted', async () => {
    const { ledger, store, clients, reports, reconciler } = await setup();
    clients.polymarket.resolve('pm-away', 'GSW');
    clients.kalshi.resolve('kx-home', 'GSW');
    store.failuresRemaining = 3;

    const [report] = await reconciler.runOnce(NOW + HOUR);

    expect(report).toMatchObject({ tradeId: 'LAL@GSW', status: 'settled', persisted: false });
    expect(reports).toEqual([report]);
    expect(ledger.trades()[0].status).toBe('settled');
    expect(ledger.balance).toBeCloseTo(10_002.5, 10);
    expect(ledger.errors()).toEqual([
      {
        tradeId: 'LAL@GSW',
        message: 'Settlement recorded in memory but not persisted: Ledger save failed after 3 attempts: disk full',
        at: new Date(NOW + HOUR).toISOString()
      }
    ]);
  });

  it('should never apply a payout twice', async () => {
    const { ledger, clients, reports, reconciler } = await setup();
    clients.polymarket.resolve('pm-away', 'GSW');
    clients.kalshi.resolve('kx-home', 'GSW');

    const [first, second] = await Promise.all([
      reconciler.runOnce(NOW + HOUR),
      reconciler.runOnce(NOW + HOUR)
    ]);
    const third = await reconciler.runOnce(NOW + 2 * HOUR);

    expect(first.length + second.length).toBe(1);
    expect(third).toEqual([]);
    expect(reports).toHaveLength(1);
    expect(ledger.balance).toBeCloseTo(10_002.5, 10);
  });
});
