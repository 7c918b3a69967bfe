import type { AppConfig } from '../config.js';
import { JsonFileLedgerStore } from './jsonFileStore.js';
import type { LedgerStore } from './ledger.js';
import { SqliteLedgerStore } from './sqliteStore.js';

export type ManagedLedgerStore = LedgerStore & { close?: () => void };

export function createLedgerStore(cfg: AppConfig['ledger']): ManagedLedgerStore {
  return cfg.driver === 'sqlite' ? new SqliteLedgerStore(cfg.path) : new JsonFileLedgerStore(cfg.path);
}
