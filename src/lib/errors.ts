/**
 * Typed errors. Each carries a stable `code` and optional context so log lines
 * and the ledger error list stay distinguishable by cause.
 */

import type { Venue } from '../core/types.js';

export class ArbitrageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ArbitrageError';
  }
}

export class ConfigurationError extends ArbitrageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/** The persisted ledger exists but cannot be trusted. */
export class LedgerLoadError extends ArbitrageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LEDGER_LOAD_ERROR', context);
    this.name = 'LedgerLoadError';
  }
}

export class LedgerPersistenceError extends ArbitrageError {
  constructor(
    message: string,
    public readonly attempts: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'LEDGER_PERSISTENCE_ERROR', { attempts, ...context });
    this.name = 'LedgerPersistenceError';
  }
}

export class VenueRequestError extends ArbitrageError {
  constructor(
    message: string,
    public readonly venue: Venue,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'VENUE_REQUEST_ERROR', { venue, statusCode, ...context });
    this.name = 'VenueRequestError';
  }
}

export class VenueNotReadyError extends ArbitrageError {
  constructor(message: string, public readonly venue: Venue) {
    super(message, 'VENUE_NOT_READY', { venue });
    this.name = 'VenueNotReadyError';
  }
}

export class TimeoutError extends ArbitrageError {
  constructor(operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', { timeoutMs });
    this.name = 'TimeoutError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

export async function withTimeout<T>(
  operation: string,
  promise: Promise<T>,
  timeoutMs: number
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
