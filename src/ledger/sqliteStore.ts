import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { LedgerState } from '../core/types.js';
import { getErrorMessage, LedgerLoadError } from '../lib/errors.js';
import type { LedgerStore } from './ledger.js';

type LedgerRow = {
  state: string;
};

/**
 * Keeps the ledger record as a single JSON document row. Each save replaces
 * the row, so the table never holds more than one version.
 */
export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[], LedgerRow>;
  private readonly upsertStmt: Database.Statement<{ state: string; updatedAt: number }>;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        state TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);

    this.selectStmt = this.db.prepare<[], LedgerRow>('SELECT state FROM ledger WHERE id = 1');
    this.upsertStmt = this.db.prepare<{ state: string; updatedAt: number }>(`
      INSERT INTO ledger (id, state, updated_at) VALUES (1, @state, @updatedAt)
      ON CONFLICT(id) DO UPDATE SET state = excluded.state, updated_at = excluded.updated_at
    `);
  }

  async load(): Promise<unknown> {
    const row = this.selectStmt.get();
    if (!row) {
      return null;
    }

    try {
      return JSON.parse(row.state);
    } catch (error) {
      throw new LedgerLoadError('Ledger row is not valid JSON', {
        error: getErrorMessage(error)
      });
    }
  }

  async save(state: LedgerState): Promise<void> {
    this.upsertStmt.run({ state: JSON.stringify(state), updatedAt: Date.now() });
  }

  close(): void {
    this.db.close();
  }
}
