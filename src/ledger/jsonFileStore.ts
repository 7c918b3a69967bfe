import fs from 'node:fs/promises';
import path from 'node:path';
import type { LedgerState } from '../core/types.js';
import { getErrorMessage, LedgerLoadError } from '../lib/errors.js';
import type { LedgerStore } from './ledger.js';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Whole-record JSON file, replaced atomically on every save. */
export class JsonFileLedgerStore implements LedgerStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new LedgerLoadError('Ledger file is not valid JSON', {
        file: this.filePath,
        error: getErrorMessage(error)
      });
    }
  }

  async save(state: LedgerState): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf8');
    await fs.rename(tmpPath, this.filePath);
  }
}
