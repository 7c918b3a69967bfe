import { effectivePrice } from '../core/math.js';
import type {
  DetectionRejection,
  Opportunity,
  OpportunityLeg,
  OpportunityQuality,
  OutcomeKey,
  OutcomePair,
  Venue
} from '../core/types.js';

export interface CostModel {
  feeRates: Record<Venue, number>;
  slippageEstimate: number;
  /** Highest total effective cost still classed as a near arbitrage. */
  nearCostCeiling: number;
  /** Raw price gap between venues, in points, that marks a partial arbitrage. */
  partialDivergence: number;
}

export type DetectionResult =
  | { ok: true; opportunity: Opportunity }
  | { ok: false; reason: DetectionRejection; message: string };

const reject = (reason: DetectionRejection, message: string): DetectionResult => ({
  ok: false,
  reason,
  message
});

const priceOf = (pair: OutcomePair, venue: Venue, outcome: OutcomeKey): number =>
  outcome === 'away' ? pair.quotes[venue].awayPrice : pair.quotes[venue].homePrice;

const marketOf = (pair: OutcomePair, venue: Venue, outcome: OutcomeKey): string =>
  outcome === 'away' ? pair.quotes[venue].awayMarketId : pair.quotes[venue].homeMarketId;

const buildLeg = (
  pair: OutcomePair,
  venue: Venue,
  outcome: OutcomeKey,
  model: CostModel
): OpportunityLeg => {
  const rawPrice = priceOf(pair, venue, outcome);
  const feeRate = model.feeRates[venue];
  const side = pair[outcome];

  return {
    outcome,
    code: side.code,
    name: side.name,
    venue,
    rawPrice,
    effectivePrice: effectivePrice(rawPrice, feeRate, model.slippageEstimate),
    feeRate,
    marketId: marketOf(pair, venue, outcome),
    url: pair.quotes[venue].url
  };
};

/** Cheaper effective price wins; an exact tie goes to Kalshi. */
const bestLeg = (pair: OutcomePair, outcome: OutcomeKey, model: CostModel): OpportunityLeg => {
  const polymarket = buildLeg(pair, 'polymarket', outcome, model);
  const kalshi = buildLeg(pair, 'kalshi', outcome, model);
  return polymarket.effectivePrice < kalshi.effectivePrice ? polymarket : kalshi;
};

const classify = (
  pair: OutcomePair,
  totalEffectiveCost: number,
  model: CostModel
): OpportunityQuality | null => {
  if (totalEffectiveCost < 100) {
    return 'perfect';
  }
  if (totalEffectiveCost <= model.nearCostCeiling) {
    return 'near';
  }

  const { polymarket, kalshi } = pair.quotes;
  const awayGap = Math.abs(polymarket.awayPrice - kalshi.awayPrice);
  const homeGap = Math.abs(polymarket.homePrice - kalshi.homePrice);
  if (awayGap > model.partialDivergence || homeGap > model.partialDivergence) {
    return 'partial';
  }

  return null;
};

/**
 * Picks the cheapest venue for each outcome independently and prices the
 * resulting hedge. A hedge only exists when the two outcomes land on
 * different venues.
 */
export function detectOpportunity(
  pair: OutcomePair,
  model: CostModel,
  now: number = Date.now()
): DetectionResult {
  const away = bestLeg(pair, 'away', model);
  const home = bestLeg(pair, 'home', model);

  if (away.rawPrice <= 0 || home.rawPrice <= 0) {
    return reject(
      'invalid_price',
      `Invalid odds (zero price): ${away.venue} ${away.code}=${away.rawPrice}, ${home.venue} ${home.code}=${home.rawPrice}`
    );
  }

  if (away.venue === home.venue) {
    return reject('same_venue', `Both legs price best on ${away.venue}; no cross-venue hedge`);
  }

  const totalEffectiveCost = away.effectivePrice + home.effectivePrice;
  const quality = classify(pair, totalEffectiveCost, model);

  if (!quality) {
    return reject(
      'no_edge',
      `No profitable arb opportunity (total cost ${totalEffectiveCost.toFixed(3)})`
    );
  }

  return {
    ok: true,
    opportunity: {
      pairId: pair.id,
      description: `${pair.away.name} vs ${pair.home.name}`,
      sport: pair.sport,
      legs: [away, home],
      totalEffectiveCost,
      edge: 100 - totalEffectiveCost,
      quality,
      detectedAt: now
    }
  };
}
