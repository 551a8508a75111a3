import { BrokerResponse, InstrumentCategory } from '../../core/types';
import { BrokerClient } from '../../integrations/brokerClient';
import { BrokerApi, OrderRequest } from '../broker.types';

export const ENDPOINTS = {
  accounts: '/app/subscriptions/list',
  balance: '/account/balance',
  positions: '/account/positions',
  instrument: '/instrument/list',
  lastPrice: '/market-data/last-price',
  snapshot: '/market-data/snapshot',
  eodBars: '/market-data/eod-bars',
  placeOrder: '/trade/order/place',
  orderDetail: '/trade/order/detail',
  openOrders: '/trade/orders/list-open',
  cancelOrder: '/trade/order/cancel'
} as const;

export const buildOrderBody = (accountId: string, order: OrderRequest) => {
  const newOrder: Record<string, string> = {
    client_order_id: order.clientOrderId,
    symbol: order.symbol,
    instrument_type: 'EQUITY',
    market: 'US',
    side: order.side,
    order_type: order.orderType,
    qty: String(Math.trunc(order.quantity)),
    support_trading_session: 'N',
    time_in_force: 'DAY',
    entrust_type: 'QTY',
    account_tax_type: 'SPECIFIC'
  };
  if (order.orderType === 'LIMIT' && order.limitPrice !== undefined) {
    newOrder.limit_price = order.limitPrice.toFixed(2);
  }
  if (order.instrumentId) {
    newOrder.instrument_id = order.instrumentId;
  }
  return { account_id: accountId, new_orders: [newOrder] };
};

export class OpenApiBroker implements BrokerApi {
  private client: BrokerClient;

  constructor(client: BrokerClient) {
    this.client = client;
  }

  listAccounts(): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.accounts, 'GET');
  }

  getBalance(accountId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.balance, 'GET', { params: { account_id: accountId } });
  }

  getPositions(accountId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.positions, 'GET', {
      params: { account_id: accountId, page_size: '100' }
    });
  }

  lookupInstrument(symbol: string, category: InstrumentCategory): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.instrument, 'GET', { params: { symbols: symbol, category } });
  }

  getLastPrice(symbol: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.lastPrice, 'GET', { params: { symbols: symbol } });
  }

  getSnapshot(symbol: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.snapshot, 'GET', { params: { symbols: symbol, category: 'US_STOCK' } });
  }

  getLastPriceByInstrument(instrumentId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.lastPrice, 'GET', { params: { instrument_ids: instrumentId } });
  }

  getSnapshotByInstrument(instrumentId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.snapshot, 'GET', { params: { instrument_ids: instrumentId } });
  }

  getEodBars(instrumentId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.eodBars, 'GET', { params: { instrument_ids: instrumentId, count: '1' } });
  }

  placeOrder(accountId: string, order: OrderRequest): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.placeOrder, 'POST', { body: buildOrderBody(accountId, order) });
  }

  getOrderDetail(accountId: string, clientOrderId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.orderDetail, 'GET', {
      params: { account_id: accountId, client_order_id: clientOrderId }
    });
  }

  getOpenOrders(accountId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.openOrders, 'GET', { params: { account_id: accountId, page_size: '100' } });
  }

  cancelOrder(accountId: string, clientOrderId: string): Promise<BrokerResponse> {
    return this.client.signedFetch(ENDPOINTS.cancelOrder, 'POST', {
      body: { account_id: accountId, client_order_id: clientOrderId }
    });
  }
}
