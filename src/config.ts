import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './lib/errors.js';

dotenv.config();

const polymarketSchema = z.object({
  feeRate: z.number().nonnegative(),
  clobUrl: z.string().url(),
  chainId: z.number().int().positive(),
  privateKey: z.string().optional().default('')
});

const kalshiSchema = z.object({
  feeRate: z.number().nonnegative(),
  apiUrl: z.string().url(),
  apiKeyId: z.string().optional().default(''),
  privateKey: z.string().optional().default(''),
  privateKeyPath: z.string().optional().default('')
});

const configSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  dryRun: z.boolean().default(true),
  replayFile: z.string().optional(),
  ledger: z.object({
    driver: z.enum(['json', 'sqlite']).default('json'),
    path: z.string().min(1),
    initialBalance: z.number().nonnegative(),
    errorLogLimit: z.number().int().positive(),
    persistRetries: z.number().int().nonnegative()
  }),
  detection: z.object({
    slippageEstimate: z.number().nonnegative(),
    nearCostCeiling: z.number().positive(),
    partialDivergence: z.number().nonnegative()
  }),
  sizing: z.object({
    targetUnits: z.number().positive(),
    nearMultiplier: z.number().positive().max(1),
    partialMultiplier: z.number().positive().max(1),
    liquidityThresholdUnits: z.number().nonnegative(),
    liquidityDiscount: z.number().min(0).max(1),
    minRoiPercent: z.number()
  }),
  risk: z.object({
    dailyLossLimit: z.number().nonnegative(),
    maxPositionSize: z.number().positive(),
    maxDailyTrades: z.number().int().nonnegative()
  }),
  execution: z.object({
    orderTimeoutMs: z.number().int().positive(),
    maxConsecutiveFailures: z.number().int().positive(),
    pauseMs: z.number().int().nonnegative()
  }),
  settlement: z.object({
    intervalMs: z.number().int().positive(),
    timeoutHours: z.number().positive()
  }),
  venues: z.object({
    polymarket: polymarketSchema,
    kalshi: kalshiSchema
  })
});

const num = (value: string | undefined, fallback: number): number =>
  value === undefined || value === '' ? fallback : Number(value);

const nodeEnv = (): 'development' | 'production' | 'test' | undefined => {
  const value = process.env.NODE_ENV;
  return value === 'development' || value === 'production' || value === 'test'
    ? value
    : undefined;
};

const rawConfig = {
  env: nodeEnv(),
  dryRun: String(process.env.DRY_RUN ?? 'true').toLowerCase() === 'true',
  replayFile: process.env.REPLAY_FILE || undefined,
  ledger: {
    driver: process.env.LEDGER_DRIVER || undefined,
    path: process.env.LEDGER_PATH ?? 'data/ledger.json',
    initialBalance: num(process.env.LEDGER_INITIAL_BALANCE, 10_000),
    errorLogLimit: num(process.env.LEDGER_ERROR_LOG_LIMIT, 100),
    persistRetries: num(process.env.LEDGER_PERSIST_RETRIES, 3)
  },
  detection: {
    slippageEstimate: num(process.env.SLIPPAGE_ESTIMATE, 0.005),
    nearCostCeiling: num(process.env.NEAR_COST_CEILING, 105),
    partialDivergence: num(process.env.PARTIAL_DIVERGENCE, 3)
  },
  sizing: {
    targetUnits: num(process.env.TARGET_UNITS, 100),
    nearMultiplier: num(process.env.NEAR_SIZE_MULTIPLIER, 0.5),
    partialMultiplier: num(process.env.PARTIAL_SIZE_MULTIPLIER, 0.3),
    liquidityThresholdUnits: num(process.env.LIQUIDITY_THRESHOLD_UNITS, 200),
    liquidityDiscount: num(process.env.LIQUIDITY_DISCOUNT, 0.01),
    minRoiPercent: num(process.env.MIN_ROI_PCT, 0)
  },
  risk: {
    dailyLossLimit: num(process.env.DAILY_LOSS_LIMIT, 500),
    maxPositionSize: num(process.env.MAX_POSITION_SIZE, 1_000),
    maxDailyTrades: num(process.env.MAX_DAILY_TRADES, 10)
  },
  execution: {
    orderTimeoutMs: num(process.env.ORDER_TIMEOUT_MS, 10_000),
    maxConsecutiveFailures: num(process.env.MAX_CONSECUTIVE_FAILURES, 3),
    pauseMs: num(process.env.FAILURE_PAUSE_MS, 5_000)
  },
  settlement: {
    intervalMs: num(process.env.SETTLEMENT_INTERVAL_MS, 60_000),
    timeoutHours: num(process.env.SETTLEMENT_TIMEOUT_HOURS, 24)
  },
  venues: {
    polymarket: {
      feeRate: num(process.env.POLYMARKET_FEE_RATE, 0.02),
      clobUrl: process.env.POLYMARKET_CLOB_URL ?? 'https://clob.polymarket.com',
      chainId: num(process.env.POLYMARKET_CHAIN_ID, 137),
      privateKey: process.env.POLYMARKET_PRIVATE_KEY
    },
    kalshi: {
      feeRate: num(process.env.KALSHI_FEE_RATE, 0.07),
      apiUrl:
        process.env.KALSHI_API_URL ?? 'https://api.elections.kalshi.com/trade-api/v2',
      apiKeyId: process.env.KALSHI_API_KEY_ID,
      privateKey: process.env.KALSHI_PRIVATE_KEY,
      privateKeyPath: process.env.KALSHI_PRIVATE_KEY_PATH
    }
  }
};

const parsed = configSchema.safeParse(rawConfig);

if (!parsed.success) {
  throw new ConfigurationError('Configuration validation failed', {
    fieldErrors: parsed.error.flatten().fieldErrors
  });
}

export type AppConfig = z.infer<typeof configSchema>;
export type PolymarketConfig = AppConfig['venues']['polymarket'];
export type KalshiConfig = AppConfig['venues']['kalshi'];
export const config: AppConfig = parsed.data;
