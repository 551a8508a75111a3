import { brokerErrorCode, describeFailure, ResilientInvoker, STALE_IDENTITY_CODES } from '../broker/resilientInvoker';
import { Logger, Position, PricePreference, PriceQuote } from '../core/types';
import { errorMessage } from '../core/errors';
import { InstrumentIdentityResolver } from './instrumentResolver';
import { extractWith, orderProviders, PriceProvider } from './priceProviders';

export interface PriceResolverOptions {
  providers: PriceProvider[];
  invoker: ResilientInvoker;
  instruments?: InstrumentIdentityResolver;
  prefer?: PricePreference;
  ttlMs?: number;
  /** Last resort: price a held symbol at its reported market value per share. */
  positionFallback?: boolean;
  now?: () => number;
  logger?: Logger;
}

export const POSITIONS_SOURCE = 'positions.market_value';

export class PriceResolver {
  private providers: PriceProvider[];
  private invoker: ResilientInvoker;
  private instruments?: InstrumentIdentityResolver;
  private ttlMs: number;
  private now: () => number;
  private logger: Logger;
  private positionFallback: boolean;
  private cache = new Map<string, PriceQuote>();
  private positionPrices = new Map<string, number>();

  constructor(options: PriceResolverOptions) {
    this.providers = orderProviders(options.providers, options.prefer ?? 'auto');
    this.invoker = options.invoker;
    this.instruments = options.instruments;
    this.ttlMs = options.ttlMs ?? 60_000;
    this.positionFallback = options.positionFallback ?? true;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? console;
  }

  get providerOrder(): string[] {
    return this.providers.map((p) => p.source);
  }

  /** Replaces the per-share values the positions fallback draws from. */
  seedFromPositions(positions: Position[]) {
    this.positionPrices.clear();
    for (const p of positions) {
      if (p.quantity > 0 && p.marketValue > 0) this.positionPrices.set(p.symbol, p.marketValue / p.quantity);
    }
  }

  /** A quote at or past its TTL counts as absent. */
  cached(symbol: string): PriceQuote | undefined {
    const quote = this.cache.get(symbol);
    if (!quote) return undefined;
    if (this.now() - quote.timestamp < this.ttlMs) return quote;
    this.cache.delete(symbol);
    return undefined;
  }

  private async fetchFrom(
    provider: PriceProvider,
    symbol: string,
    instrumentId: string | undefined,
    signal?: AbortSignal
  ): Promise<{ price?: number; staleIdentity: boolean }> {
    try {
      const result = await this.invoker.invoke(provider.source, () => provider.fetch(symbol, instrumentId), { signal });
      if (!result.ok) {
        this.logger.warn(`Price ${symbol} via ${provider.source}: ${describeFailure(result)}`);
        const code = brokerErrorCode(result);
        return { staleIdentity: !!provider.needsInstrumentId && code !== undefined && STALE_IDENTITY_CODES.includes(code) };
      }
      return { price: extractWith(provider, result.response.body), staleIdentity: false };
    } catch (err) {
      if (signal?.aborted) throw err;
      this.logger.warn(`Price ${symbol} via ${provider.source} errored: ${errorMessage(err)}`);
      return { staleIdentity: false };
    }
  }

  /**
   * Walks the providers in order. A rejected instrument id is invalidated and
   * re-resolved once per call; the provider that rejected it is then retried.
   */
  async resolve(symbol: string, signal?: AbortSignal): Promise<PriceQuote | undefined> {
    const hit = this.cached(symbol);
    if (hit) return hit;

    let instrumentId: string | undefined;
    let instrumentLooked = false;
    let reResolved = false;
    for (const provider of this.providers) {
      if (provider.needsInstrumentId) {
        if (!this.instruments) continue;
        if (!instrumentLooked) {
          instrumentId = await this.instruments.resolve(symbol, signal);
          instrumentLooked = true;
        }
        if (!instrumentId) continue;
      }
      let outcome = await this.fetchFrom(provider, symbol, instrumentId, signal);
      if (outcome.staleIdentity && this.instruments && !reResolved) {
        reResolved = true;
        this.instruments.invalidate(symbol);
        this.logger.warn(`Instrument id for ${symbol} rejected by ${provider.source}; re-resolving`);
        instrumentId = await this.instruments.resolve(symbol, signal);
        if (instrumentId) outcome = await this.fetchFrom(provider, symbol, instrumentId, signal);
      }
      const { price } = outcome;
      if (price !== undefined && price > 0) {
        const quote: PriceQuote = { symbol, price, source: provider.source, timestamp: this.now() };
        this.cache.set(symbol, quote);
        return quote;
      }
    }
    const fromPosition = this.positionFallback ? this.positionPrices.get(symbol) : undefined;
    if (fromPosition !== undefined) {
      this.logger.warn(`Price ${symbol} taken from position market value: ${fromPosition.toFixed(2)}`);
      const quote: PriceQuote = { symbol, price: fromPosition, source: POSITIONS_SOURCE, timestamp: this.now() };
      this.cache.set(symbol, quote);
      return quote;
    }
    this.logger.warn(`Price unresolved for ${symbol}`);
    return undefined;
  }

  async resolveMany(symbols: string[], signal?: AbortSignal): Promise<Record<string, number>> {
    const prices: Record<string, number> = {};
    for (const symbol of symbols) {
      const quote = await this.resolve(symbol, signal);
      if (quote) prices[symbol] = quote.price;
    }
    return prices;
  }

  clear() {
    this.cache.clear();
    this.positionPrices.clear();
  }
}
