import { BrokerApi } from '../broker/broker.types';
import { describeFailure, ResilientInvoker } from '../broker/resilientInvoker';
import { InstrumentCategory, InstrumentId, Logger } from '../core/types';
import { isRecord } from '../core/utils';

const OPERATION: Record<InstrumentCategory, string> = {
  US_ETF: 'get_instrument_us_etf',
  US_STOCK: 'get_instrument_us_stock'
};

export const extractInstrumentId = (body: unknown, symbol: string): string | undefined => {
  const entries: unknown[] = Array.isArray(body)
    ? body
    : isRecord(body) && Array.isArray(body.data)
      ? body.data
      : isRecord(body)
        ? [body]
        : [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const id = entry.instrument_id;
    if (String(entry.symbol).toUpperCase() !== symbol.toUpperCase()) continue;
    if (typeof id === 'string' && id) return id;
    if (typeof id === 'number') return String(id);
  }
  return undefined;
};

export interface InstrumentResolverOptions {
  broker: BrokerApi;
  invoker: ResilientInvoker;
  categoryOrder?: InstrumentCategory[];
  logger?: Logger;
}

export class InstrumentIdentityResolver {
  private broker: BrokerApi;
  private invoker: ResilientInvoker;
  private categoryOrder: InstrumentCategory[];
  private logger: Logger;
  // Keyed by symbol only; the category a lookup succeeded under is not retained.
  private cache = new Map<string, string>();

  constructor(options: InstrumentResolverOptions) {
    this.broker = options.broker;
    this.invoker = options.invoker;
    this.categoryOrder = options.categoryOrder?.length ? options.categoryOrder : ['US_ETF', 'US_STOCK'];
    this.logger = options.logger ?? console;
  }

  /** Queries categories in order, moving on only when a category finds nothing. */
  async lookup(symbol: string, signal?: AbortSignal): Promise<InstrumentId | undefined> {
    for (const category of this.categoryOrder) {
      const result = await this.invoker.invoke(OPERATION[category], () => this.broker.lookupInstrument(symbol, category), {
        signal
      });
      if (!result.ok) {
        this.logger.warn(`Instrument lookup ${symbol} (${category}) failed: ${describeFailure(result)}`);
        continue;
      }
      const instrumentId = extractInstrumentId(result.response.body, symbol);
      if (instrumentId) return { symbol, instrumentId, category };
    }
    return undefined;
  }

  async resolve(symbol: string, signal?: AbortSignal): Promise<string | undefined> {
    const cached = this.cache.get(symbol);
    if (cached) return cached;
    const found = await this.lookup(symbol, signal);
    if (!found) {
      this.logger.warn(`No instrument id for ${symbol}`);
      return undefined;
    }
    this.cache.set(symbol, found.instrumentId);
    return found.instrumentId;
  }

  /** Seeds the cache from ids the positions endpoint already reported. */
  remember(symbol: string, instrumentId: string) {
    if (!this.cache.has(symbol)) this.cache.set(symbol, instrumentId);
  }

  invalidate(symbol: string): boolean {
    return this.cache.delete(symbol);
  }

  has(symbol: string): boolean {
    return this.cache.has(symbol);
  }
}
