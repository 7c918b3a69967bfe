export const VENUES = ['polymarket', 'kalshi'] as const;

export type Venue = (typeof VENUES)[number];

export type OutcomeKey = 'away' | 'home';

export type OrderSide = 'yes' | 'no';

export type ExecutionMode = 'simulated' | 'live';

export interface OutcomeSide {
  code: string;
  name: string;
}

export interface NormalizedProbabilities {
  away: number;
  home: number;
}

export interface VenueQuote {
  venue: Venue;
  /** Raw prices on the 0-100 scale. */
  awayPrice: number;
  homePrice: number;
  awayMarketId: string;
  homeMarketId: string;
  url: string;
  normalized: NormalizedProbabilities | null;
}

export interface OutcomePair {
  id: string;
  sport: string;
  away: OutcomeSide;
  home: OutcomeSide;
  threeWay: boolean;
  startsAt?: string;
  quotes: Record<Venue, VenueQuote>;
  observedAt: number;
}

export type OpportunityQuality = 'perfect' | 'near' | 'partial';

export interface OpportunityLeg {
  outcome: OutcomeKey;
  code: string;
  name: string;
  venue: Venue;
  rawPrice: number;
  effectivePrice: number;
  feeRate: number;
  marketId: string;
  url: string;
}

export interface Opportunity {
  pairId: string;
  description: string;
  sport: string;
  legs: [OpportunityLeg, OpportunityLeg];
  totalEffectiveCost: number;
  edge: number;
  quality: OpportunityQuality;
  detectedAt: number;
}

export interface Sizing {
  quantity: number;
  costUsd: number;
  profitUsd: number;
  roiPercent: number;
}

export type TradeStatus = 'pending' | 'locked' | 'settled' | 'incomplete';

export interface Leg {
  venue: Venue;
  outcome: OutcomeKey;
  code: string;
  name: string;
  price: number;
  effectivePrice: number;
  marketId: string;
  url: string;
  costUsd: number;
  feeUsd: number;
  slippageUsd: number;
  orderId?: string;
  orderStatus?: string;
}

export interface Trade {
  id: string;
  description: string;
  sport: string;
  mode: ExecutionMode;
  legs: [Leg, Leg];
  quantity: number;
  cost: number;
  payout: number;
  profit: number;
  roiPercent: number;
  quality: OpportunityQuality;
  totalCostPerUnit: number;
  feesTotalUsd: number;
  slippageTotalUsd: number;
  status: TradeStatus;
  placedAt: string;
  settledAt?: string;
  settledAmount: number;
  realizedProfit: number;
}

export interface DailyTradeEntry {
  date: string;
  tradeId: string;
  at: string;
}

export interface DailyRiskCounters {
  date: string;
  loss: number;
  trades: DailyTradeEntry[];
}

export interface LedgerError {
  tradeId: string;
  message: string;
  at: string;
}

export interface LedgerState {
  balance: number;
  initialBalance: number;
  trades: Trade[];
  daily: DailyRiskCounters;
  errors: LedgerError[];
}

export interface OrderRequest {
  marketId: string;
  side: OrderSide;
  quantity: number;
  /** Native venue scale, strictly between 0 and 1. */
  price: number;
}

export type PlaceOrderResult =
  | { success: true; orderId: string; status: string; filled: number }
  | { success: false; error: string };

export type CancelOrderResult =
  | { success: true; cancelledAt: string }
  | { success: false; error: string };

export type OrderStatusResult =
  | { success: true; status: string; filled: number; remaining: number }
  | { success: false; error: string };

export type SettlementStatus =
  | { resolved: false }
  | { resolved: true; winner: string | null };

export interface VenueClient {
  readonly venue: Venue;
  ensureReady(): Promise<void>;
  placeOrder(request: OrderRequest): Promise<PlaceOrderResult>;
  cancelOrder(orderId: string): Promise<CancelOrderResult>;
  getOrderStatus(orderId: string): Promise<OrderStatusResult>;
  getSettlementStatus(marketId: string): Promise<SettlementStatus>;
}

export type VenueClientMap = Record<Venue, VenueClient>;

export type DetectionRejection = 'invalid_price' | 'same_venue' | 'no_edge';

export type RiskRejection =
  | 'below_minimum_size'
  | 'roi_below_minimum'
  | 'insufficient_balance'
  | 'position_limit'
  | 'daily_trade_limit'
  | 'daily_loss_limit'
  | 'duplicate_trade';

export type ExecutionRejection = 'invalid_order' | 'leg_placement_failed';

export type RejectionReason = DetectionRejection | RiskRejection | ExecutionRejection;

export interface ExecutionReport {
  pairId: string;
  success: boolean;
  reason?: RejectionReason;
  message?: string;
  quantity?: number;
  costUsd?: number;
  profitUsd?: number;
  persisted?: boolean;
  timestamp: number;
}

export interface RejectionNotice {
  pairId: string;
  reason: RejectionReason;
  message: string;
  timestamp: number;
}

export interface OrphanNotice {
  pairId: string;
  venue: Venue;
  orderId: string;
  error: string;
  timestamp: number;
}

export interface SettlementReport {
  tradeId: string;
  status: 'settled' | 'incomplete';
  payout: number;
  realizedProfit: number;
  persisted: boolean;
  timestamp: number;
}
