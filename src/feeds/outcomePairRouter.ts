import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';
import { normalizeProbabilities, outcomePairId } from '../core/math.js';
import type { OutcomePair, Venue, VenueQuote } from '../core/types.js';
import { logger } from '../lib/logger.js';

const log = logger.child('feed');

const quoteSchema = z.object({
  awayPrice: z.number().finite(),
  homePrice: z.number().finite(),
  awayMarketId: z.string().min(1),
  homeMarketId: z.string().min(1),
  url: z.string().default('')
});

export const feedPairSchema = z.object({
  sport: z.string().min(1),
  awayCode: z.string().min(1),
  awayName: z.string().min(1),
  homeCode: z.string().min(1),
  homeName: z.string().min(1),
  threeWay: z.boolean().default(false),
  startsAt: z.string().optional(),
  observedAt: z.number().int().nonnegative().optional(),
  quotes: z.object({
    polymarket: quoteSchema,
    kalshi: quoteSchema
  })
});

export type FeedPair = z.input<typeof feedPairSchema>;

type RouterEvents = {
  pair: (pair: OutcomePair) => void;
};

const toQuote = (
  venue: Venue,
  raw: z.infer<typeof quoteSchema>,
  threeWay: boolean
): VenueQuote => ({
  venue,
  ...raw,
  // A two-way sum of 100 would hide the draw's probability mass.
  normalized: threeWay ? null : normalizeProbabilities(raw.awayPrice, raw.homePrice)
});

export const toOutcomePair = (
  input: z.infer<typeof feedPairSchema>,
  now: number
): OutcomePair => ({
  id: outcomePairId(input.awayCode, input.homeCode),
  sport: input.sport,
  away: { code: input.awayCode, name: input.awayName },
  home: { code: input.homeCode, name: input.homeName },
  threeWay: input.threeWay,
  startsAt: input.startsAt,
  quotes: {
    polymarket: toQuote('polymarket', input.quotes.polymarket, input.threeWay),
    kalshi: toQuote('kalshi', input.quotes.kalshi, input.threeWay)
  },
  observedAt: input.observedAt ?? now
});

/**
 * Entry point for matched pairs coming off the venue feeds. Everything past
 * this router works with validated `OutcomePair` values only.
 */
export class OutcomePairRouter extends EventEmitter<RouterEvents> {
  private readonly cache = new Map<string, OutcomePair>();

  constructor(private readonly clock: () => number = Date.now) {
    super();
  }

  publish(raw: unknown): OutcomePair | null {
    const parsed = feedPairSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Dropping malformed outcome pair', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
      return null;
    }

    const pair = toOutcomePair(parsed.data, this.clock());
    this.cache.set(pair.id, pair);
    this.emit('pair', pair);
    return pair;
  }

  getPair(pairId: string): OutcomePair | undefined {
    return this.cache.get(pairId);
  }
}
