import { describe, expect, it } from 'vitest';
import {
  centsToUsd,
  effectivePrice,
  normalizeProbabilities,
  outcomePairId,
  toNativePrice,
  utcDate
} from '../core/math.js';

describe('normalizeProbabilities', () => {
  it('should return raw values that already sum to 100 unchanged', () => {
    expect(normalizeProbabilities(25, 75)).toEqual({ away: 25, home: 75 });
  });

  it('should give leftover points to the smaller raw side', () => {
    // 45/95 = 47.36 -> 47, 50/95 = 52.63 -> 52, one point left over
    expect(normalizeProbabilities(45, 50)).toEqual({ away: 48, home: 52 });
    expect(normalizeProbabilities(50, 45)).toEqual({ away: 52, home: 48 });
  });

  it('should break exact ties toward the away side', () => {
    expect(normalizeProbabilities(1, 1)).toEqual({ away: 50, home: 50 });
    expect(normalizeProbabilities(1, 2)).toEqual({ away: 34, home: 66 });
  });

  it('should return null when there is nothing to scale', () => {
    expect(normalizeProbabilities(0, 0)).toBeNull();
    expect(normalizeProbabilities(-5, 3)).toBeNull();
  });

  it('should always sum to 100 without ranking the larger side below the smaller', () => {
    for (let away = 1; away <= 99; away += 7) {
      for (let home = 1; home <= 99; home += 11) {
        const result = normalizeProbabilities(away, home);
        expect(result).not.toBeNull();
        if (!result) continue;

        expect(result.away + result.home).toBe(100);
        expect(Number.isInteger(result.away)).toBe(true);
        expect(result.away).toBeGreaterThanOrEqual(0);
        expect(result.home).toBeGreaterThanOrEqual(0);
        if (away > home) expect(result.away).toBeGreaterThanOrEqual(result.home);
        if (home > away) expect(result.home).toBeGreaterThanOrEqual(result.away);
      }
    }
  });
});

describe('price helpers', () => {
  it('should apply fee and slippage multiplicatively to the raw price', () => {
    expect(effectivePrice(45, 0.02, 0.005)).toBeCloseTo(46.125, 10);
    expect(effectivePrice(55, 0.07, 0.005)).toBeCloseTo(59.125, 10);
  });

  it('should convert raw points to native prices and dollars', () => {
    expect(toNativePrice(47)).toBeCloseTo(0.47, 10);
    expect(centsToUsd(9750)).toBe(97.5);
  });

  it('should key pairs by away and home codes', () => {
    expect(outcomePairId('LAL', 'GSW')).toBe('LAL@GSW');
  });

  it('should format timestamps as UTC calendar dates', () => {
    expect(utcDate(Date.UTC(2025, 0, 15, 23, 59, 59))).toBe('2025-01-15');
    expect(utcDate(Date.UTC(2025, 0, 16, 0, 0, 0))).toBe('2025-01-16');
  });
});
