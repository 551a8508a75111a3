import { BrokerApi } from '../broker/broker.types';
import { BrokerResponse, PricePreference } from '../core/types';
import { extractEodClose, extractPrice } from './priceExtract';
import { extractFinnhubPrice, FinnhubClient } from './finnhubClient';

export type ProviderKind = 'broker' | 'market-data' | 'public';

export interface PriceProvider {
  /** Source tag on cached quotes; also the invoker operation name. */
  source: string;
  kind: ProviderKind;
  needsInstrumentId?: boolean;
  fetch(symbol: string, instrumentId?: string): Promise<BrokerResponse>;
  extract?(body: unknown): number | undefined;
}

const requireId = (instrumentId: string | undefined): string => {
  if (!instrumentId) throw new Error('instrument id required');
  return instrumentId;
};

export const buildPriceProviders = (opts: {
  broker: BrokerApi;
  useInstrumentId: boolean;
  publicClient?: FinnhubClient | null;
}): PriceProvider[] => {
  const { broker } = opts;
  const providers: PriceProvider[] = [
    { source: 'broker.last_price', kind: 'broker', fetch: (s) => broker.getLastPrice(s) },
    { source: 'broker.snapshot', kind: 'broker', fetch: (s) => broker.getSnapshot(s) }
  ];
  if (opts.useInstrumentId) {
    providers.push(
      {
        source: 'broker.last_price_by_instrument',
        kind: 'broker',
        needsInstrumentId: true,
        fetch: (_s, id) => broker.getLastPriceByInstrument(requireId(id))
      },
      {
        source: 'broker.snapshot_by_instrument',
        kind: 'broker',
        needsInstrumentId: true,
        fetch: (_s, id) => broker.getSnapshotByInstrument(requireId(id))
      }
    );
  }
  providers.push({
    source: 'market_data.eod_bars',
    kind: 'market-data',
    needsInstrumentId: true,
    fetch: (_s, id) => broker.getEodBars(requireId(id)),
    extract: extractEodClose
  });
  const publicClient = opts.publicClient;
  if (publicClient) {
    providers.push({
      source: 'public.finnhub',
      kind: 'public',
      fetch: (s) => publicClient.getQuote(s),
      extract: extractFinnhubPrice
    });
  }
  return providers;
};

/** Stable reorder: preferred kind first, everything else kept in place behind it. */
export const orderProviders = (providers: PriceProvider[], prefer: PricePreference): PriceProvider[] => {
  if (prefer === 'auto') return [...providers];
  return [...providers.filter((p) => p.kind === prefer), ...providers.filter((p) => p.kind !== prefer)];
};

export const extractWith = (provider: PriceProvider, body: unknown): number | undefined =>
  (provider.extract ?? extractPrice)(body);
