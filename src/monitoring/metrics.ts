import type { RejectionReason } from '../core/types.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';

interface Counters {
  pairs: number;
  opportunities: number;
  executions: number;
  failures: number;
  orphans: number;
  settlements: number;
  expectedProfit: number;
  realizedPnl: number;
}

export type MetricsSnapshot = Counters & {
  rejections: Partial<Record<RejectionReason, number>>;
};

export class MetricsTracker {
  private readonly counters: Counters = {
    pairs: 0,
    opportunities: 0,
    executions: 0,
    failures: 0,
    orphans: 0,
    settlements: 0,
    expectedProfit: 0,
    realizedPnl: 0
  };

  private readonly rejections: Partial<Record<RejectionReason, number>> = {};
  private timer?: NodeJS.Timeout;
  private listening = false;

  constructor(
    private readonly bus: EventBus = eventBus,
    private readonly flushIntervalMs = 10_000
  ) {}

  start(): void {
    if (!this.listening) {
      this.listen();
      this.listening = true;
    }
    this.timer = setInterval(() => this.flush(), this.flushIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  snapshot(): MetricsSnapshot {
    return { ...this.counters, rejections: { ...this.rejections } };
  }

  private listen(): void {
    this.bus.on('pair', () => {
      this.counters.pairs += 1;
    });

    this.bus.on('opportunity', () => {
      this.counters.opportunities += 1;
    });

    this.bus.on('rejection', (notice) => {
      this.countRejection(notice.reason);
    });

    this.bus.on('execution', (report) => {
      if (report.success) {
        this.counters.executions += 1;
        this.counters.expectedProfit += report.profitUsd ?? 0;
        return;
      }
      this.counters.failures += 1;
      if (report.reason) {
        this.countRejection(report.reason);
      }
    });

    this.bus.on('orphan', () => {
      this.counters.orphans += 1;
    });

    this.bus.on('settlement', (report) => {
      this.counters.settlements += 1;
      this.counters.realizedPnl += report.realizedProfit;
    });
  }

  private countRejection(reason: RejectionReason): void {
    this.rejections[reason] = (this.rejections[reason] ?? 0) + 1;
  }

  private flush(): void {
    logger.info('Metrics snapshot', {
      ...this.counters,
      expectedProfit: this.counters.expectedProfit.toFixed(2),
      realizedPnl: this.counters.realizedPnl.toFixed(2),
      rejections: this.rejections
    });
  }
}
