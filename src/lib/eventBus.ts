import { EventEmitter } from 'eventemitter3';
import type {
  ExecutionReport,
  Opportunity,
  OrphanNotice,
  OutcomePair,
  RejectionNotice,
  SettlementReport
} from '../core/types.js';

export type EventBusEvents = {
  pair: (pair: OutcomePair) => void;
  opportunity: (opportunity: Opportunity) => void;
  rejection: (notice: RejectionNotice) => void;
  execution: (report: ExecutionReport) => void;
  orphan: (notice: OrphanNotice) => void;
  settlement: (report: SettlementReport) => void;
};

export class EventBus extends EventEmitter<EventBusEvents> {}

export const eventBus = new EventBus();
