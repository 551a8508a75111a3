import { BrokerResponse, InstrumentCategory, OrderType, TradeSide } from '../core/types';

export interface OrderRequest {
  clientOrderId: string;
  symbol: string;
  side: TradeSide;
  quantity: number;
  orderType: OrderType;
  limitPrice?: number;
  instrumentId?: string;
}

/**
 * One method per broker endpoint. Each call performs exactly one HTTP request and
 * resolves with the raw response whatever its status; network failures reject with
 * a TransportError.
 */
export interface BrokerApi {
  listAccounts(): Promise<BrokerResponse>;
  getBalance(accountId: string): Promise<BrokerResponse>;
  getPositions(accountId: string): Promise<BrokerResponse>;
  lookupInstrument(symbol: string, category: InstrumentCategory): Promise<BrokerResponse>;
  getLastPrice(symbol: string): Promise<BrokerResponse>;
  getSnapshot(symbol: string): Promise<BrokerResponse>;
  getLastPriceByInstrument(instrumentId: string): Promise<BrokerResponse>;
  getSnapshotByInstrument(instrumentId: string): Promise<BrokerResponse>;
  getEodBars(instrumentId: string): Promise<BrokerResponse>;
  placeOrder(accountId: string, order: OrderRequest): Promise<BrokerResponse>;
  getOrderDetail(accountId: string, clientOrderId: string): Promise<BrokerResponse>;
  getOpenOrders(accountId: string): Promise<BrokerResponse>;
  cancelOrder(accountId: string, clientOrderId: string): Promise<BrokerResponse>;
}
