import { z } from 'zod';
import { VENUES } from '../core/types.js';

const legSchema = z.object({
  venue: z.enum(VENUES),
  outcome: z.enum(['away', 'home']),
  code: z.string(),
  name: z.string(),
  price: z.number(),
  effectivePrice: z.number(),
  marketId: z.string(),
  url: z.string().default(''),
  costUsd: z.number(),
  feeUsd: z.number(),
  slippageUsd: z.number(),
  orderId: z.string().optional(),
  orderStatus: z.string().optional()
});

const tradeSchema = z.object({
  id: z.string(),
  description: z.string(),
  sport: z.string().default('unknown'),
  mode: z.enum(['simulated', 'live']),
  legs: z.tuple([legSchema, legSchema]),
  quantity: z.number(),
  cost: z.number(),
  payout: z.number(),
  profit: z.number(),
  roiPercent: z.number(),
  quality: z.enum(['perfect', 'near', 'partial']),
  totalCostPerUnit: z.number(),
  feesTotalUsd: z.number().default(0),
  slippageTotalUsd: z.number().default(0),
  status: z.enum(['pending', 'locked', 'settled', 'incomplete']),
  placedAt: z.string(),
  settledAt: z.string().optional(),
  settledAmount: z.number().default(0),
  realizedProfit: z.number().default(0)
});

/**
 * Shape of the persisted ledger record. Daily counters and the error list
 * were added after the first ledgers were written, so they default.
 */
export const ledgerStateSchema = z.object({
  balance: z.number().finite(),
  initialBalance: z.number().finite(),
  trades: z.array(tradeSchema).default([]),
  daily: z
    .object({
      date: z.string(),
      loss: z.number().nonnegative(),
      trades: z
        .array(z.object({ date: z.string(), tradeId: z.string(), at: z.string() }))
        .default([])
    })
    .optional(),
  errors: z
    .array(z.object({ tradeId: z.string(), message: z.string(), at: z.string() }))
    .default([])
});
