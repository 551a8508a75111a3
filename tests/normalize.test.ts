import {
  classifyBalancePayload,
  classifyPositionsPayload,
  normalizeBalances,
  normalizePositions
} from '../src/broker/normalize';

describe('balance normalization', () => {
  it('reads account_currency_assets with string amounts', () => {
    const payload = classifyBalancePayload({
      account_currency_assets: [
        { currency: 'usd', cash_balance: '1500.50', buying_power: '1200', unrealized_profit_loss: '-3.25' }
      ]
    });
    expect(payload.shape).toBe('currency-assets');
    expect(normalizeBalances(payload)).toEqual({
      USD: { currency: 'USD', cashBalance: 1500.5, buyingPower: 1200, unrealizedProfitLoss: -3.25 }
    });
  });

  it('keys a data map by currency', () => {
    const payload = classifyBalancePayload({ data: { JPY: { cash: 1000, buying_power: 900 } } });
    expect(payload.shape).toBe('data-map');
    expect(normalizeBalances(payload).JPY).toEqual({
      currency: 'JPY',
      cashBalance: 1000,
      buyingPower: 900,
      unrealizedProfitLoss: 0
    });
  });

  it('keeps a currency whose entry is null, at zero', () => {
    const balances = normalizeBalances(classifyBalancePayload({ data: { USD: null, HKD: { cash: 5 } } }));
    expect(balances).toEqual({
      USD: { currency: 'USD', cashBalance: 0, buyingPower: 0, unrealizedProfitLoss: 0 },
      HKD: { currency: 'HKD', cashBalance: 5, buyingPower: 0, unrealizedProfitLoss: 0 }
    });
  });

  it('clamps negative buying power to zero', () => {
    const balances = normalizeBalances(classifyBalancePayload([{ currency: 'USD', buying_power: -50 }]));
    expect(balances.USD.buyingPower).toBe(0);
  });

  it('drops entries without a currency and unknown shapes', () => {
    expect(normalizeBalances(classifyBalancePayload({ data: [{ cash_balance: 10 }] }))).toEqual({});
    expect(classifyBalancePayload('oops').shape).toBe('unrecognized');
    expect(normalizeBalances(classifyBalancePayload({ balance: 1 }))).toEqual({});
  });
});

describe('position normalization', () => {
  it('flattens grouped items', () => {
    const payload = classifyPositionsPayload({
      data: [{ items: [{ symbol: 'aapl', quantity: '10', cost_price: '90', unrealized_profit_loss: '100' }] }]
    });
    expect(payload.shape).toBe('data-list');
    expect(normalizePositions(payload)).toEqual([{ symbol: 'AAPL', quantity: 10, costBasis: 900, marketValue: 1000 }]);
  });

  it('reads legacy holdings with a nested ticker', () => {
    const payload = classifyPositionsPayload({
      holdings: [{ ticker: { symbol: 'VTI', instrument_id: 913 }, qty: 4.7, market_value: 1000 }]
    });
    expect(payload.shape).toBe('holdings');
    expect(normalizePositions(payload)).toEqual([
      { symbol: 'VTI', quantity: 4, costBasis: 0, marketValue: 1000, instrumentId: '913' }
    ]);
  });

  it('reads a data object with items', () => {
    const payload = classifyPositionsPayload({ data: { items: [{ symbol: 'MSFT', qty: 2, cost_basis: 500 }] } });
    expect(payload.shape).toBe('data-object');
    expect(normalizePositions(payload)).toEqual([{ symbol: 'MSFT', quantity: 2, costBasis: 500, marketValue: 500 }]);
  });

  it('drops zero quantities and entries without a symbol', () => {
    const payload = classifyPositionsPayload([{ symbol: 'BND', quantity: 0 }, { quantity: 5 }]);
    expect(normalizePositions(payload)).toEqual([]);
  });

  it('returns nothing for an unrecognized payload', () => {
    expect(normalizePositions(classifyPositionsPayload({ unexpected: true }))).toEqual([]);
  });
});
