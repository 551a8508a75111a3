import { isRecord, toNumber } from '../core/utils';

export const PRICE_FIELDS = [
  'last_price',
  'last',
  'price',
  'p',
  'regular_price',
  'regularMarketPrice',
  'latestPrice',
  'close',
  'trade_price'
] as const;

export const NESTED_PRICE_KEYS = ['quote', 'snapshot', 'last_trade'] as const;

const pick = (obj: Record<string, unknown>, depth: number): number | undefined => {
  for (const field of PRICE_FIELDS) {
    const v = toNumber(obj[field]);
    if (v !== undefined && v > 0) return v;
  }
  if (depth > 0) return undefined;
  for (const key of NESTED_PRICE_KEYS) {
    const nested = obj[key];
    if (isRecord(nested)) {
      const v = pick(nested, depth + 1);
      if (v !== undefined) return v;
    }
  }
  return undefined;
};

/**
 * Strictly positive price from a flat object, the first element of a list, or a
 * `{ data }` wrapper of either; one level of `quote` / `snapshot` / `last_trade`
 * nesting is searched. Anything else yields undefined, never zero.
 */
export const extractPrice = (body: unknown): number | undefined => {
  if (Array.isArray(body)) {
    const first = body[0];
    return isRecord(first) ? pick(first, 0) : undefined;
  }
  if (!isRecord(body)) return undefined;
  const direct = pick(body, 0);
  if (direct !== undefined) return direct;
  if ('data' in body && (Array.isArray(body.data) || isRecord(body.data))) {
    return extractPrice(body.data);
  }
  return undefined;
};

const BAR_TIME_FIELDS = ['time', 'timestamp', 'date', 'trade_date'] as const;

const barTime = (bar: Record<string, unknown>): number | undefined => {
  for (const field of BAR_TIME_FIELDS) {
    const raw = bar[field];
    const n = toNumber(raw);
    if (n !== undefined) return n;
    if (typeof raw === 'string') {
      const parsed = Date.parse(raw);
      if (!Number.isNaN(parsed)) return parsed;
    }
  }
  return undefined;
};

/** Bars arrive newest first; when every bar carries a time, the latest time wins instead. */
const latestBar = (bars: unknown[]): Record<string, unknown> | undefined => {
  const records = bars.filter(isRecord);
  if (!records.length) return undefined;
  const timed = records.map((bar) => ({ bar, time: barTime(bar) }));
  if (timed.every((t) => t.time !== undefined)) {
    return timed.reduce((best, t) => ((t.time ?? 0) > (best.time ?? 0) ? t : best)).bar;
  }
  return records[0];
};

/** Close of the most recent bar in an end-of-day bars response. */
export const extractEodClose = (body: unknown): number | undefined => {
  const root = Array.isArray(body) ? body[0] : isRecord(body) && Array.isArray(body.data) ? body.data[0] : body;
  if (isRecord(root) && Array.isArray(root.bars) && root.bars.length) {
    const latest = latestBar(root.bars);
    if (latest) {
      const close = toNumber(latest.close);
      if (close !== undefined && close > 0) return close;
    }
  }
  return extractPrice(body);
};
