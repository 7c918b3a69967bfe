import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { KalshiConfig } from '../config.js';
import type { OrderRequest, SettlementStatus } from '../core/types.js';
import { VenueNotReadyError, VenueRequestError } from '../lib/errors.js';
import { kalshiAuthHeaders, loadPrivateKey } from './kalshiAuth.js';
import { type HttpMethod, HttpVenueClient, type OrderSnapshot, type PlacedOrder } from './httpVenueClient.js';

const orderSchema = z.object({
  order_id: z.string(),
  status: z.string(),
  count: z.number().default(0),
  filled_count: z.number().default(0)
});

const orderEnvelopeSchema = z.object({ order: orderSchema });

const marketSchema = z.object({
  market: z.object({
    ticker: z.string(),
    status: z.string(),
    result: z.string().default('')
  })
});

const emptySchema = z.unknown();

const PRICE_TICK_TOLERANCE = 1e-6;

/** Game tickers end in the outcome's team code, e.g. KXNBAGAME-25OCT18LALGSW-LAL. */
export const tickerOutcomeCode = (ticker: string): string => {
  const dash = ticker.lastIndexOf('-');
  return dash === -1 ? ticker : ticker.slice(dash + 1);
};

export class KalshiClient extends HttpVenueClient {
  readonly venue = 'kalshi' as const;
  private readonly signingPrefix: string;
  private key?: crypto.KeyObject;

  constructor(
    private readonly cfg: KalshiConfig,
    timeoutMs: number
  ) {
    super(cfg.apiUrl.replace(/\/$/, ''), timeoutMs, 'kalshi');
    this.signingPrefix = new URL(cfg.apiUrl).pathname.replace(/\/$/, '');
  }

  async ensureReady(): Promise<void> {
    if (this.key) {
      return;
    }
    if (!this.cfg.apiKeyId) {
      throw new VenueNotReadyError('KALSHI_API_KEY_ID is not configured', this.venue);
    }

    let pem = this.cfg.privateKey;
    if (!pem && this.cfg.privateKeyPath) {
      pem = await fs.readFile(this.cfg.privateKeyPath, 'utf8');
    }
    if (!pem) {
      throw new VenueNotReadyError('Kalshi private key is not configured', this.venue);
    }

    this.key = loadPrivateKey(pem);
    this.log.info('Kalshi RSA authentication ready', { apiKeyId: this.cfg.apiKeyId });
  }

  async getSettlementStatus(marketId: string): Promise<SettlementStatus> {
    const { market } = await this.request('GET', `/markets/${encodeURIComponent(marketId)}`, marketSchema);

    if (market.result === 'yes') {
      return { resolved: true, winner: tickerOutcomeCode(market.ticker) };
    }
    if (market.result === 'no') {
      return { resolved: true, winner: null };
    }
    return { resolved: false };
  }

  protected async authHeaders(method: HttpMethod, path: string): Promise<Record<string, string>> {
    await this.ensureReady();
    if (!this.key) {
      throw new VenueNotReadyError('Kalshi credentials unavailable', this.venue);
    }
    return kalshiAuthHeaders(this.cfg.apiKeyId, this.key, method, `${this.signingPrefix}${path}`);
  }

  protected async submitOrder(request: OrderRequest): Promise<PlacedOrder> {
    if (!Number.isInteger(request.quantity)) {
      throw new VenueRequestError(`Kalshi orders take whole contracts, got ${request.quantity}`, this.venue);
    }
    const cents = request.price * 100;
    const yesPrice = Math.round(cents);
    if (Math.abs(cents - yesPrice) > PRICE_TICK_TOLERANCE) {
      throw new VenueRequestError(`Kalshi price ${request.price} is not on a 1c tick`, this.venue);
    }

    const { order } = await this.request('POST', '/portfolio/orders', orderEnvelopeSchema, {
      ticker: request.marketId,
      action: 'buy',
      side: request.side,
      type: 'limit',
      count: request.quantity,
      yes_price: yesPrice,
      client_order_id: uuid()
    });

    return { orderId: order.order_id, status: order.status, filled: order.filled_count };
  }

  protected async removeOrder(orderId: string): Promise<void> {
    await this.request('DELETE', `/portfolio/orders/${encodeURIComponent(orderId)}`, emptySchema);
  }

  protected async fetchOrder(orderId: string): Promise<OrderSnapshot> {
    const { order } = await this.request(
      'GET',
      `/portfolio/orders/${encodeURIComponent(orderId)}`,
      orderEnvelopeSchema
    );

    return {
      status: order.status,
      filled: order.filled_count,
      remaining: order.count - order.filled_count
    };
  }
}
