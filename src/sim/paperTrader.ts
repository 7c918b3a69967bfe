import fs from 'node:fs';
import { z } from 'zod';
import { VENUES, type Venue } from '../core/types.js';
import { ArbitrageEngine } from '../execution/engine.js';
import { OutcomePairRouter } from '../feeds/outcomePairRouter.js';
import { logger } from '../lib/logger.js';
import { SettlementReconciler } from '../settlement/reconciler.js';
import { SimulatedVenueClient } from '../venues/simulatedVenue.js';

const log = logger.child('paper');

const frameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('pair'),
    delayMs: z.number().nonnegative().optional(),
    pair: z.unknown()
  }),
  z.object({
    type: z.literal('settlement'),
    delayMs: z.number().nonnegative().optional(),
    venue: z.enum(VENUES),
    marketId: z.string().min(1),
    winner: z.string().nullable()
  })
]);

export const replayFileSchema = z.array(frameSchema);

export type ReplayFrame = z.infer<typeof frameSchema>;

export interface PaperTraderOptions {
  engine?: ArbitrageEngine;
  reconciler?: SettlementReconciler;
  /** Floor on the wait between frames. */
  minDelayMs?: number;
}

/**
 * Replays recorded outcome pairs and settlement results against the simulated
 * venues. Settlement frames wait for queued evaluations, then run a
 * reconciliation pass.
 */
export class PaperTrader {
  private readonly minDelayMs: number;

  constructor(
    private readonly router: OutcomePairRouter,
    private readonly venues: Record<Venue, SimulatedVenueClient>,
    private readonly options: PaperTraderOptions = {}
  ) {
    this.minDelayMs = options.minDelayMs ?? 50;
  }

  async replayFromFile(filePath: string, speed = 1): Promise<void> {
    const raw = fs.readFileSync(filePath, 'utf-8');
    const frames = replayFileSchema.parse(JSON.parse(raw));

    await this.replay(frames, speed);

    log.info('Paper replay finished', {
      frames: frames.length,
      source: filePath
    });
  }

  async replay(frames: ReplayFrame[], speed = 1): Promise<void> {
    for (const frame of frames) {
      const waitMs = Math.max(this.minDelayMs, (frame.delayMs ?? 200) / speed);
      if (waitMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, waitMs));
      }

      if (frame.type === 'pair') {
        this.router.publish(frame.pair);
        continue;
      }

      await this.options.engine?.drain();
      this.venues[frame.venue].resolveMarket(frame.marketId, frame.winner);
      await this.options.reconciler?.runOnce();
    }

    await this.options.engine?.drain();
  }
}
