import { BrokerResponse, InstrumentCategory, TradeSide } from '../core/types';
import { hashString, mulberry32 } from '../core/utils';
import { BrokerApi, OrderRequest } from './broker.types';

export const jsonResponse = (status: number, body: unknown, headers: Record<string, string> = {}): BrokerResponse => ({
  status,
  headers,
  body,
  text: body === undefined ? '' : JSON.stringify(body)
});

// Deterministic price in [50, 200) for symbols without an explicit price.
export const stubPriceForSymbol = (symbol: string): number => {
  const rng = mulberry32(hashString(symbol));
  return Math.round((50 + rng() * 150) * 100) / 100;
};

export const stubInstrumentId = (symbol: string) => `9${String(hashString(symbol)).padStart(10, '0')}`;

export type StubFillMode = 'immediate' | 'pending';

export interface StubBrokerOptions {
  accountId?: string;
  currency?: string;
  cash?: number;
  positions?: Record<string, { quantity: number; costPrice?: number }>;
  prices?: Record<string, number>;
  funds?: string[];
  fillMode?: StubFillMode;
}

interface StubOrder {
  clientOrderId: string;
  orderId: string;
  symbol: string;
  side: TradeSide;
  quantity: number;
  price: number;
  status: 'PENDING' | 'FILLED' | 'CANCELLED';
}

/** In-memory account used for dry runs without credentials and for tests. */
export class StubBroker implements BrokerApi {
  readonly accountId: string;
  private currency: string;
  private cash: number;
  private holdings = new Map<string, { quantity: number; costPrice: number }>();
  private prices: Record<string, number>;
  private funds: Set<string>;
  private fillMode: StubFillMode;
  private orders = new Map<string, StubOrder>();
  private nextOrderSeq = 1;

  constructor(options: StubBrokerOptions = {}) {
    this.accountId = options.accountId ?? 'stub-account';
    this.currency = options.currency ?? 'USD';
    this.cash = options.cash ?? 10_000;
    this.prices = { ...options.prices };
    this.funds = new Set(options.funds ?? []);
    this.fillMode = options.fillMode ?? 'immediate';
    for (const [symbol, pos] of Object.entries(options.positions ?? {})) {
      this.holdings.set(symbol, { quantity: pos.quantity, costPrice: pos.costPrice ?? this.priceOf(symbol) });
    }
  }

  priceOf(symbol: string): number {
    return this.prices[symbol] ?? stubPriceForSymbol(symbol);
  }

  setPrice(symbol: string, price: number) {
    this.prices[symbol] = price;
  }

  getCash() {
    return this.cash;
  }

  getHolding(symbol: string): number {
    return this.holdings.get(symbol)?.quantity ?? 0;
  }

  /** Fills a pending order at the current stub price. */
  fill(clientOrderId: string) {
    const order = this.orders.get(clientOrderId);
    if (!order || order.status !== 'PENDING') return;
    this.apply(order);
  }

  private apply(order: StubOrder) {
    const notional = order.quantity * order.price;
    const current = this.holdings.get(order.symbol) ?? { quantity: 0, costPrice: order.price };
    if (order.side === 'BUY') {
      const qty = current.quantity + order.quantity;
      const costPrice = (current.quantity * current.costPrice + notional) / qty;
      this.holdings.set(order.symbol, { quantity: qty, costPrice });
      this.cash -= notional;
    } else {
      const qty = current.quantity - order.quantity;
      if (qty > 0) this.holdings.set(order.symbol, { quantity: qty, costPrice: current.costPrice });
      else this.holdings.delete(order.symbol);
      this.cash += notional;
    }
    order.status = 'FILLED';
  }

  private pendingBuyNotional(): number {
    return Array.from(this.orders.values())
      .filter((o) => o.status === 'PENDING' && o.side === 'BUY')
      .reduce((acc, o) => acc + o.quantity * o.price, 0);
  }

  async listAccounts(): Promise<BrokerResponse> {
    return jsonResponse(200, [
      { account_id: 'stub-margin', account_number: 'M-0001', account_type: 'MARGIN' },
      { account_id: this.accountId, account_number: 'C-0001', account_type: 'CASH' }
    ]);
  }

  async getBalance(accountId: string): Promise<BrokerResponse> {
    if (accountId !== this.accountId) return jsonResponse(404, { error_code: 'ACCOUNT_NOT_FOUND' });
    const unrealized = Array.from(this.holdings.entries()).reduce(
      (acc, [symbol, h]) => acc + h.quantity * (this.priceOf(symbol) - h.costPrice),
      0
    );
    return jsonResponse(200, {
      account_id: accountId,
      account_currency_assets: [
        {
          currency: this.currency,
          cash_balance: this.cash.toFixed(2),
          buying_power: Math.max(0, this.cash - this.pendingBuyNotional()).toFixed(2),
          unrealized_profit_loss: unrealized.toFixed(2)
        }
      ]
    });
  }

  async getPositions(accountId: string): Promise<BrokerResponse> {
    if (accountId !== this.accountId) return jsonResponse(404, { error_code: 'ACCOUNT_NOT_FOUND' });
    const items = Array.from(this.holdings.entries()).map(([symbol, h]) => ({
      symbol,
      instrument_id: stubInstrumentId(symbol),
      quantity: String(h.quantity),
      cost_price: h.costPrice.toFixed(4),
      unrealized_profit_loss: (h.quantity * (this.priceOf(symbol) - h.costPrice)).toFixed(2)
    }));
    return jsonResponse(200, { data: items.length ? [{ items }] : [] });
  }

  async lookupInstrument(symbol: string, category: InstrumentCategory): Promise<BrokerResponse> {
    const isFund = this.funds.has(symbol);
    if ((category === 'US_ETF') !== isFund) return jsonResponse(200, []);
    return jsonResponse(200, [{ symbol, instrument_id: stubInstrumentId(symbol), category }]);
  }

  async getLastPrice(symbol: string): Promise<BrokerResponse> {
    return jsonResponse(200, { data: [{ symbol, last_price: this.priceOf(symbol).toFixed(2) }] });
  }

  async getSnapshot(symbol: string): Promise<BrokerResponse> {
    return jsonResponse(200, [{ symbol, quote: { last: this.priceOf(symbol) } }]);
  }

  private symbolForInstrument(instrumentId: string): string | undefined {
    const known = [...Object.keys(this.prices), ...this.holdings.keys(), ...this.funds];
    return known.find((s) => stubInstrumentId(s) === instrumentId);
  }

  async getLastPriceByInstrument(instrumentId: string): Promise<BrokerResponse> {
    const symbol = this.symbolForInstrument(instrumentId);
    if (!symbol) return jsonResponse(404, { error_code: 'INVALID_INSTRUMENT_ID' });
    return this.getLastPrice(symbol);
  }

  async getSnapshotByInstrument(instrumentId: string): Promise<BrokerResponse> {
    const symbol = this.symbolForInstrument(instrumentId);
    if (!symbol) return jsonResponse(404, { error_code: 'INVALID_INSTRUMENT_ID' });
    return this.getSnapshot(symbol);
  }

  async getEodBars(instrumentId: string): Promise<BrokerResponse> {
    const symbol = this.symbolForInstrument(instrumentId);
    if (!symbol) return jsonResponse(404, { error_code: 'INVALID_INSTRUMENT_ID' });
    return jsonResponse(200, [{ instrument_id: instrumentId, bars: [{ close: this.priceOf(symbol).toFixed(2) }] }]);
  }

  async placeOrder(accountId: string, order: OrderRequest): Promise<BrokerResponse> {
    if (accountId !== this.accountId) return jsonResponse(404, { error_code: 'ACCOUNT_NOT_FOUND' });
    if (this.orders.has(order.clientOrderId)) {
      const existing = this.orders.get(order.clientOrderId);
      return jsonResponse(200, { data: { client_order_id: order.clientOrderId, order_id: existing?.orderId } });
    }
    if (!Number.isInteger(order.quantity) || order.quantity <= 0) {
      return jsonResponse(400, { error_code: 'INVALID_QUANTITY', message: `qty ${order.quantity}` });
    }
    const price = this.priceOf(order.symbol);
    if (order.side === 'BUY' && order.quantity * price > this.cash - this.pendingBuyNotional()) {
      return jsonResponse(417, {
        error_code: 'ORDER_BUYING_POWER_NOT_ENOUGH',
        message: `Buying power ${this.cash.toFixed(2)} below ${(order.quantity * price).toFixed(2)}`
      });
    }
    if (order.side === 'SELL' && order.quantity > this.getHolding(order.symbol)) {
      return jsonResponse(417, { error_code: 'POSITION_NOT_ENOUGH', message: `Holding ${this.getHolding(order.symbol)}` });
    }
    const stubOrder: StubOrder = {
      clientOrderId: order.clientOrderId,
      orderId: `stub-ord-${this.nextOrderSeq++}`,
      symbol: order.symbol,
      side: order.side,
      quantity: order.quantity,
      price,
      status: 'PENDING'
    };
    this.orders.set(order.clientOrderId, stubOrder);
    if (this.fillMode === 'immediate') this.apply(stubOrder);
    return jsonResponse(200, { data: { client_order_id: stubOrder.clientOrderId, order_id: stubOrder.orderId } });
  }

  async getOrderDetail(accountId: string, clientOrderId: string): Promise<BrokerResponse> {
    const order = this.orders.get(clientOrderId);
    if (accountId !== this.accountId || !order) return jsonResponse(404, { error_code: 'ORDER_NOT_FOUND' });
    return jsonResponse(200, {
      client_order_id: order.clientOrderId,
      order_id: order.orderId,
      status: order.status,
      items: [{ symbol: order.symbol, side: order.side, qty: String(order.quantity) }]
    });
  }

  async getOpenOrders(accountId: string): Promise<BrokerResponse> {
    if (accountId !== this.accountId) return jsonResponse(404, { error_code: 'ACCOUNT_NOT_FOUND' });
    const open = Array.from(this.orders.values())
      .filter((o) => o.status === 'PENDING')
      .map((o) => ({ client_order_id: o.clientOrderId, order_id: o.orderId, symbol: o.symbol, status: o.status }));
    return jsonResponse(200, { data: open });
  }

  async cancelOrder(accountId: string, clientOrderId: string): Promise<BrokerResponse> {
    const order = this.orders.get(clientOrderId);
    if (accountId !== this.accountId || !order) return jsonResponse(404, { error_code: 'ORDER_NOT_FOUND' });
    if (order.status !== 'PENDING') return jsonResponse(417, { error_code: 'ORDER_NOT_CANCELABLE' });
    order.status = 'CANCELLED';
    return jsonResponse(200, { data: { client_order_id: clientOrderId } });
  }
}
