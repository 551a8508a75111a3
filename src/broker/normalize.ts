import { z } from 'zod';
import { Balance, Position } from '../core/types';
import { isRecord, toNumber } from '../core/utils';

// Broker endpoints have answered in several layouts over time. Each payload is first
// classified into a tagged union, then normalized per shape.

export type BalancePayload =
  | { shape: 'list'; entries: unknown[] }
  | { shape: 'data-list'; entries: unknown[] }
  | { shape: 'data-map'; byCurrency: Array<[string, unknown]> }
  | { shape: 'currency-assets'; entries: unknown[] }
  | { shape: 'unrecognized' };

export type PositionsPayload =
  | { shape: 'list'; entries: unknown[] }
  | { shape: 'data-list'; entries: unknown[] }
  | { shape: 'data-object'; entries: unknown[] }
  | { shape: 'holdings'; entries: unknown[] }
  | { shape: 'unrecognized' };

const numeric = z.unknown().transform((v) => toNumber(v));

const balanceEntrySchema = z.object({
  currency: z.string().optional(),
  cash_balance: numeric,
  cash: numeric,
  buying_power: numeric,
  unrealized_profit_loss: numeric
});

const tickerSchema = z.object({ symbol: z.string().optional(), instrument_id: z.unknown().optional() }).optional();

const positionEntrySchema = z.object({
  symbol: z.string().optional(),
  ticker: tickerSchema,
  instrument_id: z.unknown().optional(),
  quantity: numeric,
  qty: numeric,
  cost_price: numeric,
  cost_basis: numeric,
  market_value: numeric,
  unrealized_profit_loss: numeric
});

export const classifyBalancePayload = (body: unknown): BalancePayload => {
  if (Array.isArray(body)) return { shape: 'list', entries: body };
  if (!isRecord(body)) return { shape: 'unrecognized' };
  if ('data' in body) {
    const data = body.data;
    if (Array.isArray(data)) return { shape: 'data-list', entries: data };
    if (isRecord(data)) return { shape: 'data-map', byCurrency: Object.entries(data) };
    return { shape: 'unrecognized' };
  }
  if (Array.isArray(body.account_currency_assets)) {
    return { shape: 'currency-assets', entries: body.account_currency_assets };
  }
  return { shape: 'unrecognized' };
};

const toBalance = (entry: unknown, currencyHint: string | undefined): Balance | undefined => {
  // Under a currency key, a missing or null entry still reports that currency, at zero.
  const parsed = balanceEntrySchema.safeParse(currencyHint !== undefined && !isRecord(entry) ? {} : entry);
  if (!parsed.success) return undefined;
  const e = parsed.data;
  const currency = (currencyHint ?? e.currency)?.toUpperCase();
  if (!currency) return undefined;
  return {
    currency,
    cashBalance: e.cash_balance ?? e.cash ?? 0,
    // A cash account has no short buying power.
    buyingPower: Math.max(0, e.buying_power ?? 0),
    unrealizedProfitLoss: e.unrealized_profit_loss ?? 0
  };
};

export const normalizeBalances = (payload: BalancePayload): Record<string, Balance> => {
  const balances: Record<string, Balance> = {};
  const add = (b: Balance | undefined) => {
    if (b) balances[b.currency] = b;
  };
  switch (payload.shape) {
    case 'list':
    case 'data-list':
    case 'currency-assets':
      payload.entries.forEach((entry) => add(toBalance(entry, undefined)));
      break;
    case 'data-map':
      payload.byCurrency.forEach(([currency, entry]) => add(toBalance(entry, currency)));
      break;
    case 'unrecognized':
      break;
  }
  return balances;
};

// Position lists sometimes group rows as `{ items: [...] }`.
const flattenGroups = (entries: unknown[]): unknown[] =>
  entries.flatMap((entry) => (isRecord(entry) && Array.isArray(entry.items) ? entry.items : [entry]));

export const classifyPositionsPayload = (body: unknown): PositionsPayload => {
  if (Array.isArray(body)) return { shape: 'list', entries: flattenGroups(body) };
  if (!isRecord(body)) return { shape: 'unrecognized' };
  if ('data' in body) {
    const data = body.data;
    if (Array.isArray(data)) return { shape: 'data-list', entries: flattenGroups(data) };
    if (isRecord(data)) {
      const items = Array.isArray(data.items) ? data.items : Array.isArray(data.positions) ? data.positions : [];
      return { shape: 'data-object', entries: flattenGroups(items) };
    }
    return { shape: 'unrecognized' };
  }
  if (Array.isArray(body.holdings)) return { shape: 'holdings', entries: body.holdings };
  if (Array.isArray(body.positions)) return { shape: 'list', entries: flattenGroups(body.positions) };
  return { shape: 'unrecognized' };
};

const toInstrumentId = (value: unknown): string | undefined =>
  typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;

const toPosition = (entry: unknown): Position | undefined => {
  const parsed = positionEntrySchema.safeParse(entry);
  if (!parsed.success) return undefined;
  const e = parsed.data;
  const symbol = e.symbol ?? e.ticker?.symbol;
  const quantity = Math.trunc(e.quantity ?? e.qty ?? 0);
  if (!symbol || quantity <= 0) return undefined;
  const costBasis = e.cost_basis ?? (e.cost_price !== undefined ? e.cost_price * quantity : 0);
  const marketValue = e.market_value ?? costBasis + (e.unrealized_profit_loss ?? 0);
  const position: Position = { symbol: symbol.toUpperCase(), quantity, costBasis, marketValue };
  const instrumentId = toInstrumentId(e.instrument_id) ?? toInstrumentId(e.ticker?.instrument_id);
  if (instrumentId) position.instrumentId = instrumentId;
  return position;
};

export const normalizePositions = (payload: PositionsPayload): Position[] => {
  if (payload.shape === 'unrecognized') return [];
  return payload.entries.map(toPosition).filter((p): p is Position => Boolean(p));
};
