import { z } from 'zod';
import type {
  CancelOrderResult,
  OrderRequest,
  OrderStatusResult,
  PlaceOrderResult,
  SettlementStatus,
  Venue,
  VenueClient
} from '../core/types.js';
import { getErrorMessage, VenueRequestError } from '../lib/errors.js';
import { type Logger, logger } from '../lib/logger.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface PlacedOrder {
  orderId: string;
  status: string;
  filled: number;
}

export interface OrderSnapshot {
  status: string;
  filled: number;
  remaining: number;
}

/**
 * Shared plumbing for live venues: signed JSON requests with a per-request
 * timeout and schema-checked responses. Order operations never throw; they
 * report failures as `{ success: false }` results.
 */
export abstract class HttpVenueClient implements VenueClient {
  abstract readonly venue: Venue;
  protected readonly log: Logger;

  protected constructor(
    protected readonly baseUrl: string,
    protected readonly timeoutMs: number,
    scope: string
  ) {
    this.log = logger.child(scope);
  }

  abstract ensureReady(): Promise<void>;

  abstract getSettlementStatus(marketId: string): Promise<SettlementStatus>;

  protected abstract authHeaders(
    method: HttpMethod,
    path: string,
    body: string | undefined
  ): Promise<Record<string, string>>;

  protected abstract submitOrder(request: OrderRequest): Promise<PlacedOrder>;

  protected abstract removeOrder(orderId: string): Promise<void>;

  protected abstract fetchOrder(orderId: string): Promise<OrderSnapshot>;

  async placeOrder(request: OrderRequest): Promise<PlaceOrderResult> {
    try {
      const placed = await this.submitOrder(request);
      this.log.info('Order accepted', { marketId: request.marketId, ...placed });
      return { success: true, ...placed };
    } catch (error) {
      return { success: false, error: getErrorMessage(error) };
    }
  }

  async cancelOrder(orderId: string): Promise<CancelOrderResult> {
    try {
      await this.removeOrder(orderId);
      return { success: true, cancelledAt: new Date().toISOString() };
    } catch (error) {
      return { success: false, error: getErrorMessage(error) };
    }
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusResult> {
    try {
      return { success: true, ...(await this.fetchOrder(orderId)) };
    } catch (error) {
      return { success: false, error: getErrorMessage(error) };
    }
  }

  protected async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload?: unknown
  ): Promise<T> {
    const body = payload === undefined ? undefined : JSON.stringify(payload);
    const headers = {
      'Content-Type': 'application/json',
      ...(await this.authHeaders(method, path, body))
    };

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    const text = await response.text();

    if (!response.ok) {
      throw new VenueRequestError(
        `${this.venue} ${method} ${path} failed: ${text || response.statusText}`,
        this.venue,
        response.status
      );
    }

    let json: unknown = {};
    if (text) {
      try {
        json = JSON.parse(text);
      } catch {
        throw new VenueRequestError(`${this.venue} ${method} ${path} returned non-JSON body`, this.venue, response.status);
      }
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new VenueRequestError(
        `${this.venue} ${method} ${path} returned an unexpected payload`,
        this.venue,
        response.status,
        { issues: parsed.error.issues.map((issue) => issue.message) }
      );
    }
    return parsed.data;
  }
}
