import { v4 as uuid } from 'uuid';
import type {
  CancelOrderResult,
  OrderRequest,
  OrderStatusResult,
  PlaceOrderResult,
  SettlementStatus,
  Venue,
  VenueClient
} from '../core/types.js';
import { type Logger, logger } from '../lib/logger.js';

export interface SimulatedVenueOptions {
  /** Percentage of placements rejected at random, 0 disables. */
  failureChancePct?: number;
  random?: () => number;
}

interface SimulatedOrder {
  request: OrderRequest;
  status: 'filled' | 'cancelled';
}

/**
 * In-process venue: orders fill immediately at the requested price and
 * markets resolve only when `resolveMarket` is called.
 */
export class SimulatedVenueClient implements VenueClient {
  private readonly orders = new Map<string, SimulatedOrder>();
  private readonly outcomes = new Map<string, string | null>();
  private readonly failureChancePct: number;
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(
    readonly venue: Venue,
    options: SimulatedVenueOptions = {}
  ) {
    this.failureChancePct = options.failureChancePct ?? 0;
    this.random = options.random ?? Math.random;
    this.log = logger.child(`sim-${venue}`);
  }

  async ensureReady(): Promise<void> {}

  async placeOrder(request: OrderRequest): Promise<PlaceOrderResult> {
    if (this.failureChancePct > 0 && this.random() * 100 < this.failureChancePct) {
      this.log.warn('Simulated order rejection', { marketId: request.marketId });
      return { success: false, error: 'Simulated venue rejection' };
    }

    const orderId = uuid();
    this.orders.set(orderId, { request, status: 'filled' });
    this.log.debug('Simulated order placement', { orderId, request });

    return { success: true, orderId, status: 'filled', filled: request.quantity };
  }

  async cancelOrder(orderId: string): Promise<CancelOrderResult> {
    const order = this.orders.get(orderId);
    if (order) {
      order.status = 'cancelled';
    }
    return { success: true, cancelledAt: new Date().toISOString() };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusResult> {
    const order = this.orders.get(orderId);
    if (!order) {
      return { success: false, error: `Unknown order ${orderId}` };
    }
    const filled = order.status === 'filled' ? order.request.quantity : 0;
    return {
      success: true,
      status: order.status,
      filled,
      remaining: order.request.quantity - filled
    };
  }

  async getSettlementStatus(marketId: string): Promise<SettlementStatus> {
    const winner = this.outcomes.get(marketId);
    return winner === undefined ? { resolved: false } : { resolved: true, winner };
  }

  /** `winner` null resolves the market against the outcome it quotes. */
  resolveMarket(marketId: string, winner: string | null): void {
    this.outcomes.set(marketId, winner);
    this.log.info('Simulated market resolved', { marketId, winner });
  }
}
