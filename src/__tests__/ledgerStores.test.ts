import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonFileLedgerStore } from '../ledger/jsonFileStore.js';
import { Ledger } from '../ledger/ledger.js';
import { SqliteLedgerStore } from '../ledger/sqliteStore.js';
import { LedgerLoadError } from '../lib/errors.js';
import { ledgerOptions, ledgerRecord, makeTrade, NOW } from './helpers/test-factories.js';

describe('JsonFileLedgerStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should report a missing file as an empty store', async () => {
    const store = new JsonFileLedgerStore(path.join(dir, 'ledger.json'));

    await expect(store.load()).resolves.toBeNull();
  });

  it('should write the record and read it back', async () => {
    const file = path.join(dir, 'nested', 'ledger.json');
    const store = new JsonFileLedgerStore(file);
    const record = ledgerRecord({ trades: [makeTrade()] });

    await store.save(record);

    await expect(store.load()).resolves.toEqual(record);
    await expect(fs.readdir(path.dirname(file))).resolves.toEqual(['ledger.json']);
  });

  it('should raise a load error for a file that is not JSON', async () => {
    const file = path.join(dir, 'ledger.json');
    await fs.writeFile(file, '{ not json', 'utf8');

    await expect(new JsonFileLedgerStore(file).load()).rejects.toBeInstanceOf(LedgerLoadError);
  });

  it('should reopen a ledger with the balance it was left at', async () => {
    const file = path.join(dir, 'ledger.json');
    const first = await Ledger.open(new JsonFileLedgerStore(file), ledgerOptions());
    await first.commitTrade(makeTrade(), NOW);

    const reopened = await Ledger.open(new JsonFileLedgerStore(file), ledgerOptions());

    expect(reopened.balance).toBeCloseTo(9_902.5, 10);
    expect(reopened.pendingTrades().map((trade) => trade.id)).toEqual(['LAL@GSW']);
  });
});

describe('SqliteLedgerStore', () => {
  it('should start empty and keep a single row across saves', async () => {
    const store = new SqliteLedgerStore(':memory:');

    await expect(store.load()).resolves.toBeNull();

    await store.save(ledgerRecord({ balance: 9_000 }));
    await store.save(ledgerRecord({ balance: 8_000 }));

    await expect(store.load()).resolves.toEqual(ledgerRecord({ balance: 8_000 }));
    store.close();
  });

  it('should back a ledger end to end', async () => {
    const store = new SqliteLedgerStore(':memory:');
    const ledger = await Ledger.open(store, ledgerOptions());
    await ledger.commitTrade(makeTrade(), NOW);

    const reopened = await Ledger.open(store, ledgerOptions());

    expect(reopened.balance).toBeCloseTo(9_902.5, 10);
    expect(reopened.trades()).toHaveLength(1);
    store.close();
  });
});
