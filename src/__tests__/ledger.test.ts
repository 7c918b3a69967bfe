import { describe, expect, it } from 'vitest';
import { Ledger } from '../ledger/ledger.js';
import { LedgerLoadError, LedgerPersistenceError } from '../lib/errors.js';
import {
  HOUR,
  ledgerOptions,
  ledgerRecord,
  makeTrade,
  MemoryLedgerStore,
  NOW,
  openLedger
} from './helpers/test-factories.js';

describe('Ledger', () => {
  describe('open', () => {
    it('should start and persist a fresh ledger when nothing is stored', async () => {
      const { ledger, store } = await openLedger();

      expect(ledger.balance).toBe(10_000);
      expect(ledger.initialBalance).toBe(10_000);
      expect(store.saves).toHaveLength(1);
      expect(store.saves[0]).toEqual(ledgerRecord());
    });

    it('should migrate a record written before daily counters and errors existed', async () => {
      const store = new MemoryLedgerStore({ balance: 9_000, initialBalance: 10_000, trades: [] });

      const { ledger } = await openLedger({}, store);

      expect(ledger.balance).toBe(9_000);
      expect(ledger.errors()).toEqual([]);
      expect(ledger.dailyCounters(NOW)).toEqual({ date: '2025-01-15', loss: 0, trades: [] });
      expect(store.saves).toHaveLength(0);
    });

    it('should refuse to start from a record that fails validation', async () => {
      const store = new MemoryLedgerStore({ balance: 'lots', trades: [] });

      await expect(Ledger.open(store, ledgerOptions())).rejects.toBeInstanceOf(LedgerLoadError);
    });

    it('should fail to open when the fresh record cannot be saved', async () => {
      const store = new MemoryLedgerStore();
      store.failuresRemaining = 10;

      await expect(Ledger.open(store, ledgerOptions())).rejects.toBeInstanceOf(LedgerPersistenceError);
    });
  });

  describe('commitTrade', () => {
    it('should append the trade, debit its cost and count it against today', async () => {
      const { ledger, store } = await openLedger();

      const result = await ledger.commitTrade(makeTrade(), NOW);

      expect(result).toEqual({ persisted: true });
      expect(ledger.balance).toBeCloseTo(9_902.5, 10);
      expect(ledger.trades()).toHaveLength(1);
      expect(ledger.dailyCounters(NOW).trades).toEqual([
        { date: '2025-01-15', tradeId: 'LAL@GSW', at: '2025-01-15T12:00:00.000Z' }
      ]);
      expect(store.saves.at(-1)?.trades[0].id).toBe('LAL@GSW');
    });

    it('should retry a failing save before giving up', async () => {
      const { ledger, store } = await openLedger({ persistRetries: 2 });
      store.failuresRemaining = 2;

      const result = await ledger.commitTrade(makeTrade(), NOW);

      expect(result).toEqual({ persisted: true });
      expect(store.saves).toHaveLength(2);
    });

    it('should keep the trade and escalate when every save attempt fails', async () => {
      const { ledger, store } = await openLedger({ persistRetries: 2 });
      store.failuresRemaining = 3;

      const result = await ledger.commitTrade(makeTrade(), NOW);

      expect(result).toEqual({ persisted: false });
      expect(ledger.trades()).toHaveLength(1);
      expect(ledger.balance).toBeCloseTo(9_902.5, 10);
      expect(ledger.errors()).toEqual([
        {
          tradeId: 'LAL@GSW',
          message:
            'Trade recorded in memory but not persisted: Ledger save failed after 3 attempts: disk full',
          at: '2025-01-15T12:00:00.000Z'
        }
      ]);
    });
  });

  describe('applySettlement', () => {
    it('should credit the payout and record realized profit', async () => {
      const { ledger } = await openLedger();
      await ledger.commitTrade(makeTrade(), NOW);

      const applied = ledger.applySettlement('LAL@GSW', { status: 'settled', payout: 100, at: NOW + HOUR });

      expect(applied).toBe(true);
      expect(ledger.balance).toBeCloseTo(10_002.5, 10);
      const [trade] = ledger.trades();
      expect(trade.status).toBe('settled');
      expect(trade.settledAmount).toBe(100);
      expect(trade.realizedProfit).toBeCloseTo(2.5, 10);
      expect(trade.settledAt).toBe('2025-01-15T13:00:00.000Z');
    });

    it('should add a realized loss to the daily loss counter', async () => {
      const { ledger } = await openLedger();
      await ledger.commitTrade(makeTrade(), NOW);

      ledger.applySettlement('LAL@GSW', { status: 'incomplete', payout: 0, at: NOW });

      expect(ledger.dailyCounters(NOW).loss).toBeCloseTo(97.5, 10);
    });

    it('should ignore trades that are no longer pending', async () => {
      const { ledger } = await openLedger();
      await ledger.commitTrade(makeTrade(), NOW);
      ledger.applySettlement('LAL@GSW', { status: 'settled', payout: 100, at: NOW });

      const again = ledger.applySettlement('LAL@GSW', { status: 'settled', payout: 100, at: NOW });

      expect(again).toBe(false);
      expect(ledger.balance).toBeCloseTo(10_002.5, 10);
    });
  });

  describe('recordError', () => {
    it('should keep only the most recent entries', async () => {
      const { ledger, store } = await openLedger({ errorLogLimit: 3 });

      for (let i = 1; i <= 5; i += 1) {
        await ledger.recordError(`T${i}`, `failure ${i}`, NOW);
      }

      expect(ledger.errors().map((entry) => entry.tradeId)).toEqual(['T3', 'T4', 'T5']);
      expect(store.saves.at(-1)?.errors).toHaveLength(3);
    });
  });

  describe('runExclusive', () => {
    it('should run queued tasks one at a time in order', async () => {
      const { ledger } = await openLedger();
      const events: string[] = [];
      const task = (name: string, delayMs: number) => async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        events.push(`${name}:end`);
      };

      await Promise.all([ledger.runExclusive(task('a', 20)), ledger.runExclusive(task('b', 0))]);

      expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('should keep the queue usable after a task rejects', async () => {
      const { ledger } = await openLedger();

      await expect(ledger.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
      await expect(ledger.runExclusive(async () => 'next')).resolves.toBe('next');
    });
  });

  describe('summary', () => {
    it('should split realized and estimated profit and list newest trades first', async () => {
      const store = new MemoryLedgerStore(
        ledgerRecord({
          balance: 9_905,
          trades: [
            makeTrade({
              id: 'BOS@NYK',
              status: 'settled',
              placedAt: '2025-01-14T10:00:00.000Z',
              realizedProfit: 5,
              settledAmount: 100
            }),
            makeTrade({ id: 'LAL@GSW', placedAt: '2025-01-15T11:00:00.000Z', profit: 2.5 })
          ]
        })
      );
      const { ledger } = await openLedger({}, store);

      const summary = ledger.summary(NOW);

      expect(summary.balance).toBe(9_905);
      expect(summary.totalProfit).toBe(5);
      expect(summary.estimatedProfit).toBe(2.5);
      expect(summary.totalTrades).toBe(2);
      expect(summary.trades.map((trade) => trade.id)).toEqual(['LAL@GSW', 'BOS@NYK']);
    });
  });
});
