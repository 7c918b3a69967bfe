import { z } from 'zod';
import type { PolymarketConfig } from '../config.js';
import type { OrderRequest, SettlementStatus } from '../core/types.js';
import { VenueNotReadyError, VenueRequestError } from '../lib/errors.js';
import { PolymarketClobAuth } from './polymarketAuth.js';
import { type HttpMethod, HttpVenueClient, type OrderSnapshot, type PlacedOrder } from './httpVenueClient.js';

/**
 * Polymarket leg market ids carry both halves the CLOB needs:
 * `<conditionId>:<tokenId>`. Orders trade the outcome token; settlement is
 * looked up by condition.
 */
export interface PolymarketMarketRef {
  conditionId: string;
  tokenId: string;
}

export const parseMarketRef = (marketId: string): PolymarketMarketRef => {
  const separator = marketId.indexOf(':');
  if (separator <= 0 || separator === marketId.length - 1) {
    throw new VenueRequestError(`Malformed Polymarket market id "${marketId}"`, 'polymarket');
  }
  return {
    conditionId: marketId.slice(0, separator),
    tokenId: marketId.slice(separator + 1)
  };
};

const postOrderSchema = z.object({
  success: z.boolean().default(true),
  errorMsg: z.string().default(''),
  orderID: z.string().default(''),
  status: z.string().default('unknown')
});

const numericString = z.union([z.string(), z.number()]).transform((value) => Number(value));

const openOrderSchema = z.object({
  id: z.string(),
  status: z.string(),
  original_size: numericString,
  size_matched: numericString
});

const cancelSchema = z.object({
  canceled: z.array(z.string()).default([]),
  not_canceled: z.record(z.string()).default({})
});

const marketSchema = z.object({
  condition_id: z.string(),
  closed: z.boolean().default(false),
  tokens: z
    .array(
      z.object({
        token_id: z.string(),
        outcome: z.string(),
        winner: z.boolean().default(false)
      })
    )
    .default([])
});

export class PolymarketClient extends HttpVenueClient {
  readonly venue = 'polymarket' as const;
  private auth?: PolymarketClobAuth;
  private nextSalt = Date.now();

  constructor(
    private readonly cfg: PolymarketConfig,
    timeoutMs: number
  ) {
    super(cfg.clobUrl.replace(/\/$/, ''), timeoutMs, 'polymarket');
  }

  async ensureReady(): Promise<void> {
    if (!this.auth) {
      if (!this.cfg.privateKey) {
        throw new VenueNotReadyError('POLYMARKET_PRIVATE_KEY is not configured', this.venue);
      }
      this.auth = new PolymarketClobAuth(this.cfg.privateKey, this.cfg.chainId, this.baseUrl, this.timeoutMs);
    }
    await this.auth.ensureCredentials();
  }

  async getSettlementStatus(marketId: string): Promise<SettlementStatus> {
    const { conditionId } = parseMarketRef(marketId);
    const market = await this.request('GET', `/markets/${encodeURIComponent(conditionId)}`, marketSchema);

    if (!market.closed) {
      return { resolved: false };
    }
    const winner = market.tokens.find((token) => token.winner);
    return winner ? { resolved: true, winner: winner.outcome } : { resolved: false };
  }

  protected async authHeaders(
    method: HttpMethod,
    path: string,
    body: string | undefined
  ): Promise<Record<string, string>> {
    const auth = await this.readyAuth();
    return auth.l2Headers(method, path, body);
  }

  protected async submitOrder(request: OrderRequest): Promise<PlacedOrder> {
    if (request.side !== 'yes') {
      throw new VenueRequestError('Polymarket orders buy the outcome token directly', this.venue);
    }

    const auth = await this.readyAuth();
    const { tokenId } = parseMarketRef(request.marketId);
    const creds = await auth.ensureCredentials();
    const order = await auth.signBuyOrder({
      tokenId,
      price: request.price,
      size: request.quantity,
      salt: this.nextSalt++
    });

    const placed = await this.request('POST', '/order', postOrderSchema, {
      order,
      owner: creds.key,
      orderType: 'GTC'
    });

    if (!placed.success || !placed.orderID) {
      throw new VenueRequestError(placed.errorMsg || 'Polymarket rejected the order', this.venue);
    }

    return {
      orderId: placed.orderID,
      status: placed.status,
      filled: placed.status === 'matched' ? request.quantity : 0
    };
  }

  protected async removeOrder(orderId: string): Promise<void> {
    const result = await this.request('DELETE', '/order', cancelSchema, { orderID: orderId });
    const reason = result.not_canceled[orderId];
    if (reason !== undefined) {
      throw new VenueRequestError(`Polymarket did not cancel ${orderId}: ${reason}`, this.venue);
    }
  }

  protected async fetchOrder(orderId: string): Promise<OrderSnapshot> {
    const order = await this.request('GET', `/data/order/${encodeURIComponent(orderId)}`, openOrderSchema);
    return {
      status: order.status,
      filled: order.size_matched,
      remaining: order.original_size - order.size_matched
    };
  }

  private async readyAuth(): Promise<PolymarketClobAuth> {
    await this.ensureReady();
    if (!this.auth) {
      throw new VenueNotReadyError('Polymarket credentials unavailable', this.venue);
    }
    return this.auth;
  }
}
