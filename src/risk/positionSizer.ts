import { centsToUsd, PAYOUT_PER_UNIT_CENTS } from '../core/math.js';
import type { Opportunity, OpportunityQuality, RiskRejection, Sizing } from '../core/types.js';
import { Ledger } from '../ledger/ledger.js';

export interface SizingConfig {
  targetUnits: number;
  qualityMultipliers: Record<OpportunityQuality, number>;
  /** Units (one dollar of payout each) above which the liquidity discount applies. */
  liquidityThresholdUnits: number;
  liquidityDiscount: number;
  minRoiPercent: number;
}

export interface RiskLimits {
  dailyLossLimit: number;
  maxPositionSize: number;
  maxDailyTrades: number;
}

export type SizingResult =
  | { ok: true; sizing: Sizing }
  | { ok: false; reason: RiskRejection; message: string };

// Absorbs float noise such as 0.29 * 100 = 28.999999999999996.
const WHOLE_CONTRACT_EPSILON = 1e-9;

/** The quantity is floored to whole contracts before it is costed. */
export function sizeOpportunity(opportunity: Opportunity, cfg: SizingConfig): Sizing {
  let units = cfg.targetUnits * cfg.qualityMultipliers[opportunity.quality];

  if (units > cfg.liquidityThresholdUnits) {
    units *= 1 - cfg.liquidityDiscount;
  }

  const quantity = Math.max(0, Math.floor(units + WHOLE_CONTRACT_EPSILON));

  const costUsd = centsToUsd(opportunity.totalEffectiveCost) * quantity;
  const profitUsd = centsToUsd(PAYOUT_PER_UNIT_CENTS - opportunity.totalEffectiveCost) * quantity;
  const roiPercent = costUsd > 0 ? (profitUsd / costUsd) * 100 : 0;

  return { quantity, costUsd, profitUsd, roiPercent };
}

/**
 * Turns an opportunity into an approved size, or the first limit it breaks.
 * All limits are checked against the exact cost that would be committed.
 */
export class PositionSizer {
  constructor(
    private readonly ledger: Ledger,
    private readonly cfg: SizingConfig,
    private readonly limits: RiskLimits
  ) {}

  size(opportunity: Opportunity, now: number = Date.now()): SizingResult {
    const sizing = sizeOpportunity(opportunity, this.cfg);
    const { quantity, costUsd, roiPercent } = sizing;

    if (quantity < 1) {
      return {
        ok: false,
        reason: 'below_minimum_size',
        message: `Sized quantity rounds down to ${quantity} whole contracts`
      };
    }

    if (roiPercent <= this.cfg.minRoiPercent) {
      return {
        ok: false,
        reason: 'roi_below_minimum',
        message: `ROI (${roiPercent.toFixed(2)}%) below threshold (${this.cfg.minRoiPercent}%)`
      };
    }

    const balance = this.ledger.balance;
    if (costUsd > balance) {
      return {
        ok: false,
        reason: 'insufficient_balance',
        message: `Insufficient balance: $${balance.toFixed(2)} < $${costUsd.toFixed(2)}`
      };
    }

    if (costUsd > this.limits.maxPositionSize) {
      return {
        ok: false,
        reason: 'position_limit',
        message: `Position size ($${costUsd.toFixed(2)}) exceeds limit ($${this.limits.maxPositionSize.toFixed(2)})`
      };
    }

    const counters = this.ledger.dailyCounters(now);
    if (counters.trades.length >= this.limits.maxDailyTrades) {
      return {
        ok: false,
        reason: 'daily_trade_limit',
        message: `Daily trade limit reached (${this.limits.maxDailyTrades})`
      };
    }

    if (counters.loss >= this.limits.dailyLossLimit) {
      return {
        ok: false,
        reason: 'daily_loss_limit',
        message: `Daily loss limit reached ($${this.limits.dailyLossLimit.toFixed(2)}), current: $${counters.loss.toFixed(2)}`
      };
    }

    if (this.ledger.findOpenTrade(opportunity.pairId)) {
      return {
        ok: false,
        reason: 'duplicate_trade',
        message: `Market already traded: ${opportunity.pairId}`
      };
    }

    return { ok: true, sizing };
  }
}
