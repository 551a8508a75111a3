import { jsonResponse, StubBroker, stubInstrumentId } from '../src/broker/broker.stub';
import { ResilientInvoker } from '../src/broker/resilientInvoker';
import { FinnhubClient } from '../src/data/finnhubClient';
import { InstrumentIdentityResolver } from '../src/data/instrumentResolver';
import { buildPriceProviders, PriceProvider } from '../src/data/priceProviders';
import { POSITIONS_SOURCE, PriceResolver } from '../src/data/priceResolver';
import { fakeClock, silentLogger } from './helpers';

const makeInvoker = (clock: ReturnType<typeof fakeClock>, maxRetries = 3) =>
  new ResilientInvoker({ clock, defaultMinIntervalMs: 0, policy: { maxRetries }, logger: silentLogger });

const provider = (source: string, fetch: PriceProvider['fetch']): PriceProvider => ({ source, kind: 'broker', fetch });

describe('PriceResolver', () => {
  it('moves to the next provider once the first exhausts its retries', async () => {
    const clock = fakeClock();
    const failing = jest.fn().mockResolvedValue(jsonResponse(429, {}));
    const working = jest.fn().mockResolvedValue(jsonResponse(200, { last_price: '123.45' }));
    const resolver = new PriceResolver({
      providers: [provider('first', failing), provider('second', working)],
      invoker: makeInvoker(clock, 2),
      now: clock.now,
      logger: silentLogger
    });
    const quote = await resolver.resolve('XYZ');
    expect(quote).toEqual({ symbol: 'XYZ', price: 123.45, source: 'second', timestamp: clock.now() });
    expect(failing).toHaveBeenCalledTimes(3);
    expect(working).toHaveBeenCalledTimes(1);
  });

  it('serves cached quotes only while younger than the TTL', async () => {
    const clock = fakeClock();
    const fetch = jest.fn().mockResolvedValue(jsonResponse(200, { price: 10 }));
    const resolver = new PriceResolver({
      providers: [provider('only', fetch)],
      invoker: makeInvoker(clock),
      ttlMs: 60_000,
      now: clock.now,
      logger: silentLogger
    });
    await resolver.resolve('ABC');
    clock.advance(59_999);
    expect(resolver.cached('ABC')?.price).toBe(10);
    await resolver.resolve('ABC');
    expect(fetch).toHaveBeenCalledTimes(1);
    clock.advance(1);
    expect(resolver.cached('ABC')).toBeUndefined();
    await resolver.resolve('ABC');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('returns undefined when every provider fails or yields no price', async () => {
    const clock = fakeClock();
    const resolver = new PriceResolver({
      providers: [
        provider('a', async () => jsonResponse(404, {})),
        provider('b', async () => jsonResponse(200, { last_price: 0 }))
      ],
      invoker: makeInvoker(clock),
      now: clock.now,
      logger: silentLogger
    });
    expect(await resolver.resolve('NOPE')).toBeUndefined();
    expect(resolver.cached('NOPE')).toBeUndefined();
  });

  it('resolves through the stub broker and skips unpriced symbols in resolveMany', async () => {
    const clock = fakeClock();
    const broker = new StubBroker({ prices: { AAPL: 100, MSFT: 50 } });
    jest.spyOn(broker, 'getLastPrice').mockImplementation(async (symbol) =>
      symbol === 'GONE' ? jsonResponse(404, {}) : jsonResponse(200, { data: [{ symbol, last_price: broker.priceOf(symbol) }] })
    );
    jest.spyOn(broker, 'getSnapshot').mockImplementation(async (symbol) =>
      symbol === 'GONE' ? jsonResponse(404, {}) : jsonResponse(200, [{ symbol, quote: { last: broker.priceOf(symbol) } }])
    );
    const resolver = new PriceResolver({
      providers: buildPriceProviders({ broker, useInstrumentId: false }).filter((p) => p.kind === 'broker'),
      invoker: makeInvoker(clock),
      now: clock.now,
      logger: silentLogger
    });
    expect(await resolver.resolveMany(['AAPL', 'GONE', 'MSFT'])).toEqual({ AAPL: 100, MSFT: 50 });
  });

  it('looks up the instrument id for providers that need it', async () => {
    const clock = fakeClock();
    const broker = new StubBroker({ funds: ['VTI'], prices: { VTI: 250.5 } });
    const invoker = makeInvoker(clock);
    const instruments = new InstrumentIdentityResolver({ broker, invoker, logger: silentLogger });
    const resolver = new PriceResolver({
      providers: buildPriceProviders({ broker, useInstrumentId: true }),
      invoker,
      instruments,
      prefer: 'market-data',
      now: clock.now,
      logger: silentLogger
    });
    const quote = await resolver.resolve('VTI');
    expect(quote?.source).toBe('market_data.eod_bars');
    expect(quote?.price).toBe(250.5);
    expect(instruments.has('VTI')).toBe(true);
  });
});

describe('provider ordering', () => {
  const broker = new StubBroker();
  const publicClient = new FinnhubClient('test-key', { fetchImpl: jest.fn() });
  const providers = buildPriceProviders({ broker, useInstrumentId: true, publicClient });
  const orderFor = (prefer: 'auto' | 'broker' | 'market-data' | 'public') =>
    new PriceResolver({ providers, invoker: new ResilientInvoker({ logger: silentLogger }), prefer }).providerOrder;

  it('keeps the default order under auto', () => {
    expect(orderFor('auto')).toEqual([
      'broker.last_price',
      'broker.snapshot',
      'broker.last_price_by_instrument',
      'broker.snapshot_by_instrument',
      'market_data.eod_bars',
      'public.finnhub'
    ]);
  });

  it('moves the preferred kind to the front', () => {
    expect(orderFor('public')[0]).toBe('public.finnhub');
    expect(orderFor('market-data')).toEqual([
      'market_data.eod_bars',
      'broker.last_price',
      'broker.snapshot',
      'broker.last_price_by_instrument',
      'broker.snapshot_by_instrument',
      'public.finnhub'
    ]);
  });

  it('omits instrument-keyed broker lookups when disabled', () => {
    const sources = buildPriceProviders({ broker, useInstrumentId: false }).map((p) => p.source);
    expect(sources).toEqual(['broker.last_price', 'broker.snapshot', 'market_data.eod_bars']);
  });
});

describe('stale instrument ids', () => {
  const instrumentOnly = (broker: StubBroker) =>
    buildPriceProviders({ broker, useInstrumentId: true }).filter((p) => p.needsInstrumentId);

  it('re-resolves an id the broker rejects and retries the same provider', async () => {
    const clock = fakeClock();
    const broker = new StubBroker({ funds: ['VTI'], prices: { VTI: 250.5 } });
    const invoker = makeInvoker(clock);
    const instruments = new InstrumentIdentityResolver({ broker, invoker, logger: silentLogger });
    instruments.remember('VTI', 'stale-id');
    const byInstrument = jest.spyOn(broker, 'getLastPriceByInstrument');
    const resolver = new PriceResolver({
      providers: instrumentOnly(broker),
      invoker,
      instruments,
      now: clock.now,
      logger: silentLogger
    });

    const quote = await resolver.resolve('VTI');
    expect(quote?.price).toBe(250.5);
    expect(quote?.source).toBe('broker.last_price_by_instrument');
    expect(byInstrument.mock.calls.map((c) => c[0])).toEqual(['stale-id', stubInstrumentId('VTI')]);
    expect(await instruments.resolve('VTI')).toBe(stubInstrumentId('VTI'));
  });

  it('gives up when the id cannot be re-resolved', async () => {
    const clock = fakeClock();
    const broker = new StubBroker({ funds: ['VTI'], prices: { VTI: 250.5 } });
    const invoker = makeInvoker(clock);
    const instruments = new InstrumentIdentityResolver({ broker, invoker, logger: silentLogger });
    instruments.remember('VTI', 'stale-id');
    jest.spyOn(broker, 'lookupInstrument').mockResolvedValue(jsonResponse(200, []));
    const byInstrument = jest.spyOn(broker, 'getLastPriceByInstrument');
    const eod = jest.spyOn(broker, 'getEodBars');
    const resolver = new PriceResolver({
      providers: instrumentOnly(broker),
      invoker,
      instruments,
      now: clock.now,
      logger: silentLogger
    });

    expect(await resolver.resolve('VTI')).toBeUndefined();
    expect(byInstrument).toHaveBeenCalledTimes(1);
    expect(eod).not.toHaveBeenCalled();
    expect(instruments.has('VTI')).toBe(false);
  });
});

describe('preferred provider fallback', () => {
  it('falls back to the broker when the preferred public source keeps failing', async () => {
    const clock = fakeClock();
    const fetchImpl = jest.fn(async () => new Response('{"error":"busy"}', { status: 500 }));
    const publicClient = new FinnhubClient('test-key', { fetchImpl });
    const broker = new StubBroker({ prices: { AAPL: 101.25 } });
    const resolver = new PriceResolver({
      providers: buildPriceProviders({ broker, useInstrumentId: false, publicClient }),
      invoker: makeInvoker(clock, 2),
      prefer: 'public',
      now: clock.now,
      logger: silentLogger
    });

    const quote = await resolver.resolve('AAPL');
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(quote).toEqual({ symbol: 'AAPL', price: 101.25, source: 'broker.last_price', timestamp: clock.now() });
  });
});

describe('position market value fallback', () => {
  const held = [{ symbol: 'OLD', quantity: 4, costBasis: 80, marketValue: 110 }];

  it('prices a held symbol from its market value once every provider fails', async () => {
    const clock = fakeClock();
    const resolver = new PriceResolver({
      providers: [provider('down', async () => jsonResponse(404, {}))],
      invoker: makeInvoker(clock),
      now: clock.now,
      logger: silentLogger
    });
    resolver.seedFromPositions(held);
    expect(await resolver.resolve('OLD')).toEqual({
      symbol: 'OLD',
      price: 27.5,
      source: POSITIONS_SOURCE,
      timestamp: clock.now()
    });
    expect(await resolver.resolve('NEW')).toBeUndefined();
  });

  it('is skipped when disabled', async () => {
    const clock = fakeClock();
    const resolver = new PriceResolver({
      providers: [provider('down', async () => jsonResponse(404, {}))],
      invoker: makeInvoker(clock),
      positionFallback: false,
      now: clock.now,
      logger: silentLogger
    });
    resolver.seedFromPositions(held);
    expect(await resolver.resolve('OLD')).toBeUndefined();
  });
});
