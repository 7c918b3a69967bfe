import { config } from '../config.js';
import { createLedgerStore } from '../ledger/createStore.js';
import { Ledger } from '../ledger/ledger.js';
import { getErrorMessage } from '../lib/errors.js';
import { formatSummary } from '../monitoring/ledgerSummary.js';

async function main(): Promise<void> {
  const store = createLedgerStore(config.ledger);
  try {
    const ledger = await Ledger.open(store, {
      initialBalance: config.ledger.initialBalance,
      errorLogLimit: config.ledger.errorLogLimit,
      persistRetries: config.ledger.persistRetries
    });
    formatSummary(ledger.summary()).forEach((line) => console.log(line));
  } finally {
    store.close?.();
  }
}

main().catch((error: unknown) => {
  console.error('Report failed:', getErrorMessage(error));
  process.exit(1);
});
