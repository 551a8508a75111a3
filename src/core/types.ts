export type TradeSide = 'BUY' | 'SELL';
export type OrderType = 'MARKET' | 'LIMIT';
export type PlannerMode = 'total-value' | 'threshold';
export type PricePreference = 'auto' | 'broker' | 'market-data' | 'public';

/** Fund first, equity second is the default lookup order. */
export type InstrumentCategory = 'US_ETF' | 'US_STOCK';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface Balance {
  currency: string;
  cashBalance: number;
  buyingPower: number;
  unrealizedProfitLoss: number;
}

export interface Position {
  symbol: string;
  quantity: number;
  costBasis: number;
  marketValue: number;
  instrumentId?: string;
}

export interface AccountSnapshot {
  balances: Record<string, Balance>;
  positions: Position[];
  readAt: string;
}

/** Insertion order is the allocation order used by the buy pass. */
export type TargetAllocation = Map<string, number>;

export interface PriceQuote {
  symbol: string;
  price: number;
  source: string;
  timestamp: number;
}

export interface InstrumentId {
  symbol: string;
  instrumentId: string;
  category: InstrumentCategory;
}

export interface Trade {
  symbol: string;
  side: TradeSide;
  quantity: number;
  estimatedPrice: number;
  estimatedValue: number;
  clientOrderId: string;
}

export type SkipReason =
  | 'UNRESOLVED_PRICE'
  | 'INSUFFICIENT_FUNDS'
  | 'BELOW_THRESHOLD'
  | 'BELOW_MIN_TRADE_VALUE'
  | 'STALE_IDENTITY'
  | 'PHASE_SKIPPED';

export interface SkippedSymbol {
  symbol: string;
  reason: SkipReason;
  detail?: string;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  jitter: number;
  maxDelayMs: number;
  retryableStatuses: number[];
}

export interface BrokerResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
  text: string;
}

export type OrderStatus =
  | 'DRY_RUN'
  | 'SUBMITTED'
  | 'FILLED'
  | 'PARTIALLY_FILLED'
  | 'CANCELLED'
  | 'REJECTED'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'FAILED'
  | 'SKIPPED_INSUFFICIENT_FUNDS';

export type RunPhase = 'PLANNING' | 'SELLING' | 'BUYING' | 'DONE' | 'FAILED';

export interface TradeResult {
  trade: Trade;
  phase: 'SELLING' | 'BUYING';
  status: OrderStatus;
  success: boolean;
  orderId?: string;
  reason?: string;
}

export interface OpenOrder {
  clientOrderId: string;
  orderId?: string;
  symbol?: string;
  status: string;
}

/** Account state re-read after a live run finishes. */
export interface PostRunCheck {
  positions: Position[];
  availableCash: number;
  openOrders: OpenOrder[];
  error?: string;
}

export type RunKind = 'rebalance' | 'liquidate';

export interface RunReport {
  runId: string;
  kind: RunKind;
  dryRun: boolean;
  status: 'DONE' | 'FAILED';
  phases: RunPhase[];
  results: TradeResult[];
  skipped: SkippedSymbol[];
  attempted: number;
  succeeded: number;
  summary: string;
  error?: string;
  postRun?: PostRunCheck;
}

export type LedgerEventType =
  | 'RUN_STARTED'
  | 'PHASE_CHANGED'
  | 'SYMBOL_SKIPPED'
  | 'ORDERS_CANCELLED'
  | 'RUN_COMPLETED'
  | 'RUN_FAILED';

export interface LedgerEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: LedgerEventType;
  details?: Record<string, unknown>;
}

/** One row of the trade ledger CSV. */
export interface TradeRecord {
  timestamp: string;
  runId: string;
  phase: string;
  symbol: string;
  side: TradeSide;
  quantity: number;
  estimatedPrice: number;
  estimatedValue: number;
  status: OrderStatus;
  clientOrderId: string;
  orderId: string;
  reason: string;
}
