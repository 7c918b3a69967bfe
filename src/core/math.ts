import type { NormalizedProbabilities } from './types.js';

export const PAYOUT_PER_UNIT_CENTS = 100;

export const centsToUsd = (cents: number): number => cents / 100;

export const toNativePrice = (rawPrice: number): number => rawPrice / 100;

export const effectivePrice = (
  rawPrice: number,
  feeRate: number,
  slippageEstimate: number
): number => rawPrice * (1 + feeRate + slippageEstimate);

/**
 * Scales two raw values so they sum to exactly 100.
 *
 * Both shares are floored and the leftover points go to the side with the
 * smaller raw value (away on a tie). Returns null when there is nothing to
 * scale.
 */
export const normalizeProbabilities = (
  away: number,
  home: number
): NormalizedProbabilities | null => {
  const total = away + home;
  if (!(total > 0) || away < 0 || home < 0) {
    return null;
  }

  const awayFloor = Math.floor((away / total) * 100);
  const homeFloor = Math.floor((home / total) * 100);
  const remainder = 100 - (awayFloor + homeFloor);

  if (away <= home) {
    return { away: awayFloor + remainder, home: homeFloor };
  }
  return { away: awayFloor, home: homeFloor + remainder };
};

export const outcomePairId = (awayCode: string, homeCode: string): string =>
  `${awayCode}@${homeCode}`;

export const utcDate = (timestamp: number): string =>
  new Date(timestamp).toISOString().slice(0, 10);
