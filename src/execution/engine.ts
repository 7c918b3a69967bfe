import type { OutcomePair, RejectionReason, Trade } from '../core/types.js';
import { OutcomePairRouter } from '../feeds/outcomePairRouter.js';
import { Ledger } from '../ledger/ledger.js';
import { getErrorMessage } from '../lib/errors.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';
import { PositionSizer } from '../risk/positionSizer.js';
import { type CostModel, detectOpportunity } from '../strategy/opportunityDetector.js';
import { ExecutionCoordinator } from './coordinator.js';

const log = logger.child('engine');

export interface EngineOptions {
  costModel: CostModel;
  maxConsecutiveFailures: number;
  pauseMs: number;
  clock?: () => number;
}

export type EvaluationResult =
  | { status: 'executed'; trade: Trade; persisted: boolean }
  | { status: 'rejected'; reason: RejectionReason; message: string }
  | { status: 'failed'; reason: RejectionReason; message: string }
  | { status: 'paused'; resumesAt: number }
  | { status: 'error'; message: string };

/**
 * Runs each incoming pair through detection, sizing and execution. Pairs are
 * evaluated strictly one after another; a pair is fully executed or rolled
 * back before the next one starts.
 */
export class ArbitrageEngine {
  private consecutiveFailures = 0;
  private pausedUntil = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly clock: () => number;

  constructor(
    private readonly ledger: Ledger,
    private readonly sizer: PositionSizer,
    private readonly coordinator: ExecutionCoordinator,
    private readonly options: EngineOptions,
    private readonly bus: EventBus = eventBus
  ) {
    this.clock = options.clock ?? Date.now;
  }

  start(router: OutcomePairRouter): void {
    router.on('pair', (pair) => {
      this.bus.emit('pair', pair);
      this.enqueue(pair).catch((error: unknown) => {
        log.error('Evaluation queue failure', { pairId: pair.id, error: getErrorMessage(error) });
      });
    });
  }

  /** Schedules a pair behind every evaluation already queued. */
  enqueue(pair: OutcomePair): Promise<EvaluationResult> {
    const next = this.queue.then(() => this.evaluate(pair));
    this.queue = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every queued evaluation has finished. */
  async drain(): Promise<void> {
    await this.queue;
  }

  async evaluate(pair: OutcomePair): Promise<EvaluationResult> {
    const now = this.clock();

    if (this.isPaused(now)) {
      log.warn('Execution paused, skipping pair', {
        pairId: pair.id,
        pausedUntil: new Date(this.pausedUntil).toISOString()
      });
      return { status: 'paused', resumesAt: this.pausedUntil };
    }

    try {
      return await this.process(pair, now);
    } catch (error) {
      const message = getErrorMessage(error);
      log.error('Pair evaluation failed', { pairId: pair.id, error: message });
      this.registerFailure(now);
      await this.recordErrorSafely(pair.id, `Evaluation failed: ${message}`, now);
      this.bus.emit('execution', { pairId: pair.id, success: false, message, timestamp: now });
      return { status: 'error', message };
    }
  }

  private async process(pair: OutcomePair, now: number): Promise<EvaluationResult> {
    const detection = detectOpportunity(pair, this.options.costModel, now);
    if (!detection.ok) {
      log.debug('No opportunity', { pairId: pair.id, reason: detection.reason, message: detection.message });
      return this.reject(pair.id, detection.reason, detection.message, now);
    }

    const { opportunity } = detection;
    this.bus.emit('opportunity', opportunity);
    log.info('Opportunity detected', {
      pairId: opportunity.pairId,
      quality: opportunity.quality,
      totalEffectiveCost: opportunity.totalEffectiveCost.toFixed(3),
      edge: opportunity.edge.toFixed(3),
      legs: opportunity.legs.map((leg) => `${leg.venue}:${leg.code}@${leg.rawPrice}`)
    });

    const sized = this.sizer.size(opportunity, now);
    if (!sized.ok) {
      log.info('Opportunity rejected by risk controls', {
        pairId: opportunity.pairId,
        reason: sized.reason,
        message: sized.message
      });
      return this.reject(opportunity.pairId, sized.reason, sized.message, now);
    }

    const outcome = await this.coordinator.execute(opportunity, sized.sizing);

    if (!outcome.ok) {
      if (outcome.reason === 'leg_placement_failed') {
        this.registerFailure(now);
      }
      this.bus.emit('execution', {
        pairId: opportunity.pairId,
        success: false,
        reason: outcome.reason,
        message: outcome.message,
        timestamp: now
      });
      return { status: 'failed', reason: outcome.reason, message: outcome.message };
    }

    this.consecutiveFailures = 0;
    const { trade, persisted } = outcome;
    this.bus.emit('execution', {
      pairId: trade.id,
      success: true,
      quantity: trade.quantity,
      costUsd: trade.cost,
      profitUsd: trade.profit,
      persisted,
      timestamp: now
    });
    return { status: 'executed', trade, persisted };
  }

  private reject(
    pairId: string,
    reason: RejectionReason,
    message: string,
    now: number
  ): EvaluationResult {
    this.bus.emit('rejection', { pairId, reason, message, timestamp: now });
    return { status: 'rejected', reason, message };
  }

  private isPaused(now: number): boolean {
    return now < this.pausedUntil;
  }

  private registerFailure(now: number): void {
    this.consecutiveFailures += 1;

    if (this.consecutiveFailures >= this.options.maxConsecutiveFailures) {
      this.pausedUntil = now + this.options.pauseMs;
      log.warn('Circuit breaker triggered', {
        failures: this.consecutiveFailures,
        pausedUntil: new Date(this.pausedUntil).toISOString()
      });
      this.consecutiveFailures = 0;
    }
  }

  private async recordErrorSafely(pairId: string, message: string, now: number): Promise<void> {
    try {
      await this.ledger.recordError(pairId, message, now);
    } catch (error) {
      log.error('Could not record evaluation error', { pairId, error: getErrorMessage(error) });
    }
  }
}
