import { PlannerMode, Position, SkippedSymbol, TargetAllocation, Trade, TradeSide } from '../core/types';
import { newClientOrderId } from '../core/utils';

export interface PlannerInput {
  positions: Position[];
  targets: TargetAllocation;
  availableCash: number;
  prices: Record<string, number>;
  mode?: PlannerMode;
  /** Threshold mode: trade only when |target - current| > threshold * target. */
  threshold?: number;
  /** Threshold mode: smallest trade value worth sending. */
  minTradeValue?: number;
  newKey?: () => string;
}

export interface RebalancePlan {
  mode: PlannerMode | 'liquidate';
  trades: Trade[];
  sells: Trade[];
  buys: Trade[];
  skipped: SkippedSymbol[];
  totalValue: number;
  remainingCash: number;
}

// Guards exact multiples (e.g. 0.3 / 0.1) against landing one share short.
const EPSILON = 1e-9;

export const wholeShares = (value: number, price: number): number =>
  value > 0 && price > 0 ? Math.floor(value / price + EPSILON) : 0;

const usablePrice = (prices: Record<string, number>, symbol: string): number | undefined => {
  const p = prices[symbol];
  return p !== undefined && Number.isFinite(p) && p > 0 ? p : undefined;
};

const heldQuantities = (positions: Position[]): Map<string, number> => {
  const held = new Map<string, number>();
  for (const p of positions) {
    if (p.quantity > 0) held.set(p.symbol, (held.get(p.symbol) ?? 0) + Math.trunc(p.quantity));
  }
  return held;
};

class PlanBuilder {
  readonly sells: Trade[] = [];
  readonly buys: Trade[] = [];
  readonly skipped: SkippedSymbol[] = [];
  private skippedPrice = new Set<string>();

  constructor(private newKey: () => string) {}

  trade(symbol: string, side: TradeSide, quantity: number, price: number) {
    if (!Number.isInteger(quantity) || quantity <= 0) return;
    const trade: Trade = {
      symbol,
      side,
      quantity,
      estimatedPrice: price,
      estimatedValue: quantity * price,
      clientOrderId: this.newKey()
    };
    (side === 'SELL' ? this.sells : this.buys).push(trade);
  }

  skip(entry: SkippedSymbol) {
    if (entry.reason === 'UNRESOLVED_PRICE') {
      if (this.skippedPrice.has(entry.symbol)) return;
      this.skippedPrice.add(entry.symbol);
    }
    this.skipped.push(entry);
  }
}

// A target worth less than one share can never be bought.
const unaffordable = (symbol: string, targetValue: number, price: number): SkippedSymbol => ({
  symbol,
  reason: 'INSUFFICIENT_FUNDS',
  detail: `target ${targetValue.toFixed(2)} below one share @ ${price.toFixed(2)}`
});

const totalPortfolioValue = (
  held: Map<string, number>,
  prices: Record<string, number>,
  availableCash: number,
  builder: PlanBuilder
): number => {
  let total = Math.max(0, availableCash);
  for (const [symbol, qty] of held) {
    const price = usablePrice(prices, symbol);
    if (price === undefined) {
      builder.skip({ symbol, reason: 'UNRESOLVED_PRICE', detail: 'held position has no usable price' });
      continue;
    }
    total += qty * price;
  }
  return total;
};

const planTotalValue = (input: PlannerInput, builder: PlanBuilder): RebalancePlan => {
  const { targets, prices } = input;
  const held = heldQuantities(input.positions);
  const totalValue = totalPortfolioValue(held, prices, input.availableCash, builder);

  // Sell pass: unconstrained by cash.
  for (const [symbol, qty] of held) {
    const price = usablePrice(prices, symbol);
    if (price === undefined) continue;
    const pct = targets.get(symbol);
    if (pct === undefined) {
      builder.trade(symbol, 'SELL', qty, price);
      continue;
    }
    const targetValue = (totalValue * pct) / 100;
    if (qty * price > targetValue) {
      builder.trade(symbol, 'SELL', qty - wholeShares(targetValue, price), price);
    }
  }

  // Buy pass: first-fit in allocation order against the cash on hand.
  let remainingCash = Math.max(0, input.availableCash);
  for (const [symbol, pct] of targets) {
    const price = usablePrice(prices, symbol);
    if (price === undefined) {
      builder.skip({ symbol, reason: 'UNRESOLVED_PRICE', detail: 'target has no usable price' });
      continue;
    }
    const targetValue = (totalValue * pct) / 100;
    const currentQty = held.get(symbol) ?? 0;
    const needed = wholeShares(targetValue, price) - currentQty;
    if (needed <= 0) {
      if (currentQty === 0 && targetValue > 0) builder.skip(unaffordable(symbol, targetValue, price));
      continue;
    }
    const affordable = wholeShares(remainingCash, price);
    const quantity = Math.min(needed, affordable);
    if (quantity <= 0) {
      builder.skip({
        symbol,
        reason: 'INSUFFICIENT_FUNDS',
        detail: `needs ${needed} @ ${price.toFixed(2)}, cash ${remainingCash.toFixed(2)}`
      });
      continue;
    }
    builder.trade(symbol, 'BUY', quantity, price);
    remainingCash -= quantity * price;
  }

  return {
    mode: 'total-value',
    trades: [...builder.sells, ...builder.buys],
    sells: builder.sells,
    buys: builder.buys,
    skipped: builder.skipped,
    totalValue,
    remainingCash
  };
};

const planThreshold = (input: PlannerInput, builder: PlanBuilder): RebalancePlan => {
  const { targets, prices } = input;
  const threshold = input.threshold ?? 0.05;
  const minTradeValue = input.minTradeValue ?? 0;
  const held = heldQuantities(input.positions);
  const totalValue = totalPortfolioValue(held, prices, input.availableCash, builder);
  const symbols = [...targets.keys(), ...[...held.keys()].filter((s) => !targets.has(s))];

  let remainingCash = Math.max(0, input.availableCash);
  for (const symbol of symbols) {
    const price = usablePrice(prices, symbol);
    if (price === undefined) {
      builder.skip({ symbol, reason: 'UNRESOLVED_PRICE' });
      continue;
    }
    const currentQty = held.get(symbol) ?? 0;
    const targetValue = (totalValue * (targets.get(symbol) ?? 0)) / 100;
    const currentValue = currentQty * price;
    if (targetValue <= 0 && currentQty === 0) continue;
    const deviation = targetValue > 0 ? Math.abs(currentValue - targetValue) / targetValue : 1;
    if (deviation <= threshold) {
      builder.skip({ symbol, reason: 'BELOW_THRESHOLD', detail: `deviation ${(deviation * 100).toFixed(2)}%` });
      continue;
    }
    const diff = wholeShares(targetValue, price) - currentQty;
    if (diff === 0) {
      if (currentQty === 0) builder.skip(unaffordable(symbol, targetValue, price));
      continue;
    }
    if (Math.abs(diff) * price < minTradeValue) {
      builder.skip({
        symbol,
        reason: 'BELOW_MIN_TRADE_VALUE',
        detail: `${(Math.abs(diff) * price).toFixed(2)} < ${minTradeValue.toFixed(2)}`
      });
      continue;
    }
    if (diff < 0) {
      builder.trade(symbol, 'SELL', -diff, price);
      continue;
    }
    const quantity = Math.min(diff, wholeShares(remainingCash, price));
    if (quantity <= 0) {
      builder.skip({
        symbol,
        reason: 'INSUFFICIENT_FUNDS',
        detail: `needs ${diff} @ ${price.toFixed(2)}, cash ${remainingCash.toFixed(2)}`
      });
      continue;
    }
    builder.trade(symbol, 'BUY', quantity, price);
    remainingCash -= quantity * price;
  }

  return {
    mode: 'threshold',
    trades: [...builder.sells, ...builder.buys],
    sells: builder.sells,
    buys: builder.buys,
    skipped: builder.skipped,
    totalValue,
    remainingCash
  };
};

/** Sells every held position in full; nothing is bought. */
export const planLiquidation = (
  input: Pick<PlannerInput, 'positions' | 'prices' | 'availableCash' | 'newKey'>
): RebalancePlan => {
  const builder = new PlanBuilder(input.newKey ?? newClientOrderId);
  const held = heldQuantities(input.positions);
  const totalValue = totalPortfolioValue(held, input.prices, input.availableCash, builder);
  for (const [symbol, qty] of held) {
    const price = usablePrice(input.prices, symbol);
    if (price !== undefined) builder.trade(symbol, 'SELL', qty, price);
  }
  return {
    mode: 'liquidate',
    trades: [...builder.sells],
    sells: builder.sells,
    buys: [],
    skipped: builder.skipped,
    totalValue,
    remainingCash: Math.max(0, input.availableCash)
  };
};

export const planRebalance = (input: PlannerInput): RebalancePlan => {
  const builder = new PlanBuilder(input.newKey ?? newClientOrderId);
  return (input.mode ?? 'total-value') === 'threshold'
    ? planThreshold(input, builder)
    : planTotalValue(input, builder);
};
