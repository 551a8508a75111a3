import { availableCash, AccountStateReader } from '../broker/accountState';
import { BrokerApi, OrderRequest } from '../broker/broker.types';
import {
  brokerErrorCode,
  describeFailure,
  INSUFFICIENT_FUNDS_CODES,
  ResilientInvoker,
  STALE_IDENTITY_CODES
} from '../broker/resilientInvoker';
import { errorMessage, InsufficientFundsError, MarketClosedError, StaleIdentityError } from '../core/errors';
import { makeRunId } from '../core/time';
import {
  AccountSnapshot,
  LedgerEventType,
  Logger,
  OpenOrder,
  OrderType,
  PlannerMode,
  PostRunCheck,
  RunKind,
  RunPhase,
  RunReport,
  SkippedSymbol,
  TargetAllocation,
  Trade,
  TradeResult
} from '../core/types';
import { newClientOrderId, sleep as defaultSleep } from '../core/utils';
import { InstrumentIdentityResolver } from '../data/instrumentResolver';
import { PriceResolver } from '../data/priceResolver';
import { Ledger, makeEvent } from '../ledger/ledger';
import { extractOpenOrders, OrderMonitor, readOrderId } from './orderMonitor';
import { planLiquidation, planRebalance, RebalancePlan } from './rebalancePlanner';

export interface ExecutionSettings {
  dryRun: boolean;
  currency: string;
  plannerMode: PlannerMode;
  threshold: number;
  minTradeValue: number;
  pollIntervalMs: number;
  orderTimeoutMs: number;
  orderType: OrderType;
  limitOffsetPct: number;
  cancelOpenOrdersBeforeRun: boolean;
  cancelOnTimeout: boolean;
  /** Live runs refuse to start on a weekend in `marketTimeZone`. */
  tradingDaysOnly: boolean;
  marketTimeZone: string;
  postRunCheck: boolean;
}

export const DEFAULT_EXECUTION_SETTINGS: ExecutionSettings = {
  dryRun: true,
  currency: 'USD',
  plannerMode: 'total-value',
  threshold: 0.05,
  minTradeValue: 100,
  pollIntervalMs: 5000,
  orderTimeoutMs: 300_000,
  orderType: 'MARKET',
  limitOffsetPct: 0.01,
  cancelOpenOrdersBeforeRun: false,
  cancelOnTimeout: false,
  tradingDaysOnly: true,
  marketTimeZone: 'America/New_York',
  postRunCheck: true
};

export interface ExecutionOrchestratorOptions {
  broker: BrokerApi;
  invoker: ResilientInvoker;
  accountState: AccountStateReader;
  prices: PriceResolver;
  instruments: InstrumentIdentityResolver;
  ledger?: Ledger;
  settings?: Partial<ExecutionSettings>;
  clock?: {
    now?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  };
  newKey?: () => string;
  newRunId?: () => string;
  logger?: Logger;
}

const WEEKEND = ['Sat', 'Sun'];

export const weekdayIn = (at: Date, timeZone: string): string =>
  new Intl.DateTimeFormat('en-US', { timeZone, weekday: 'short' }).format(at);

/** Weekday check in the exchange's time zone; exchange holidays are not known here. */
export const isTradingDay = (at: Date, timeZone: string): boolean => !WEEKEND.includes(weekdayIn(at, timeZone));

export const limitPriceFor = (trade: Trade, offsetPct: number): number => {
  const factor = trade.side === 'BUY' ? 1 + offsetPct : 1 - offsetPct;
  return Math.round(trade.estimatedPrice * factor * 100) / 100;
};

type ExecutionPhase = 'SELLING' | 'BUYING';

interface RunContext {
  runId: string;
  kind: RunKind;
  accountId: string;
  phases: RunPhase[];
  results: TradeResult[];
  skipped: SkippedSymbol[];
  signal?: AbortSignal;
}

/**
 * Sequences one rebalance: plan, sell, re-read account state, re-plan buys, buy.
 * Orders are submitted one at a time; every outcome lands in the report and the ledger.
 */
export class ExecutionOrchestrator {
  private broker: BrokerApi;
  private invoker: ResilientInvoker;
  private accountState: AccountStateReader;
  private prices: PriceResolver;
  private instruments: InstrumentIdentityResolver;
  private ledger?: Ledger;
  private settings: ExecutionSettings;
  private monitor: OrderMonitor;
  private now: () => number;
  private newKey: () => string;
  private newRunId: () => string;
  private logger: Logger;

  constructor(options: ExecutionOrchestratorOptions) {
    this.broker = options.broker;
    this.invoker = options.invoker;
    this.accountState = options.accountState;
    this.prices = options.prices;
    this.instruments = options.instruments;
    this.ledger = options.ledger;
    this.settings = { ...DEFAULT_EXECUTION_SETTINGS, ...options.settings };
    this.now = options.clock?.now ?? (() => Date.now());
    this.newKey = options.newKey ?? newClientOrderId;
    this.newRunId = options.newRunId ?? (() => makeRunId(new Date(this.now())));
    this.logger = options.logger ?? console;
    this.monitor = new OrderMonitor({
      broker: this.broker,
      invoker: this.invoker,
      pollIntervalMs: this.settings.pollIntervalMs,
      timeoutMs: this.settings.orderTimeoutMs,
      now: this.now,
      sleep: options.clock?.sleep ?? defaultSleep,
      logger: this.logger
    });
  }

  get dryRun(): boolean {
    return this.settings.dryRun;
  }

  private event(runId: string, type: LedgerEventType, details?: Record<string, unknown>) {
    this.ledger?.appendEvent(makeEvent(runId, type, details, new Date(this.now())));
  }

  private enter(ctx: RunContext, phase: RunPhase) {
    ctx.phases.push(phase);
    this.logger.log(`[${ctx.runId}] phase ${phase}`);
    this.event(ctx.runId, 'PHASE_CHANGED', { phase });
  }

  private skip(ctx: RunContext, entries: SkippedSymbol[]) {
    for (const entry of entries) {
      if (ctx.skipped.some((s) => s.symbol === entry.symbol && s.reason === entry.reason)) continue;
      ctx.skipped.push(entry);
      this.logger.warn(`Skipped ${entry.symbol}: ${entry.reason}${entry.detail ? ` (${entry.detail})` : ''}`);
      this.event(ctx.runId, 'SYMBOL_SKIPPED', { ...entry });
    }
  }

  /** Prices every target and every held symbol, then runs the planner against the snapshot. */
  async plan(snapshot: AccountSnapshot, targets: TargetAllocation, signal?: AbortSignal): Promise<RebalancePlan> {
    for (const p of snapshot.positions) {
      if (p.instrumentId) this.instruments.remember(p.symbol, p.instrumentId);
    }
    this.prices.seedFromPositions(snapshot.positions);
    const symbols = Array.from(new Set([...targets.keys(), ...snapshot.positions.map((p) => p.symbol)]));
    const prices = await this.prices.resolveMany(symbols, signal);
    return planRebalance({
      positions: snapshot.positions,
      targets,
      availableCash: availableCash(snapshot, this.settings.currency),
      prices,
      mode: this.settings.plannerMode,
      threshold: this.settings.threshold,
      minTradeValue: this.settings.minTradeValue,
      newKey: this.newKey
    });
  }

  async listOpenOrders(accountId: string, signal?: AbortSignal): Promise<OpenOrder[] | undefined> {
    const listed = await this.invoker.invoke('get_open_orders', () => this.broker.getOpenOrders(accountId), { signal });
    if (!listed.ok) {
      this.logger.warn(`Open orders unavailable: ${describeFailure(listed)}`);
      return undefined;
    }
    return extractOpenOrders(listed.response.body);
  }

  async cancelOpenOrders(accountId: string, signal?: AbortSignal): Promise<string[]> {
    const cancelled: string[] = [];
    for (const order of (await this.listOpenOrders(accountId, signal)) ?? []) {
      const result = await this.invoker.invoke(
        'cancel_order',
        () => this.broker.cancelOrder(accountId, order.clientOrderId),
        { signal }
      );
      if (result.ok) {
        cancelled.push(order.clientOrderId);
        this.logger.log(`Cancelled open order ${order.clientOrderId}${order.symbol ? ` (${order.symbol})` : ''}`);
      } else {
        this.logger.warn(`Cancel ${order.clientOrderId} failed: ${describeFailure(result)}`);
      }
    }
    return cancelled;
  }

  /** Re-reads positions, cash and open orders once a live run has finished. */
  async postRunCheck(accountId: string, signal?: AbortSignal): Promise<PostRunCheck> {
    try {
      const snapshot = await this.accountState.snapshot(signal);
      const openOrders = (await this.listOpenOrders(accountId, signal)) ?? [];
      if (openOrders.length) {
        this.logger.warn(
          `${openOrders.length} order(s) still open after the run: ${openOrders.map((o) => o.symbol ?? o.clientOrderId).join(', ')}`
        );
      }
      return {
        positions: snapshot.positions,
        availableCash: availableCash(snapshot, this.settings.currency),
        openOrders
      };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Post-run check incomplete: ${message}`);
      return { positions: [], availableCash: 0, openOrders: [], error: message };
    }
  }

  /** Guard and open-order handling that precede any planning on a live run. */
  private async preTrade(ctx: RunContext) {
    if (this.settings.dryRun) return;
    const at = new Date(this.now());
    const { marketTimeZone } = this.settings;
    if (this.settings.tradingDaysOnly && !isTradingDay(at, marketTimeZone)) {
      throw new MarketClosedError(marketTimeZone, weekdayIn(at, marketTimeZone));
    }
    if (this.settings.cancelOpenOrdersBeforeRun) {
      const cancelled = await this.cancelOpenOrders(ctx.accountId, ctx.signal);
      if (cancelled.length) this.event(ctx.runId, 'ORDERS_CANCELLED', { clientOrderIds: cancelled });
      return;
    }
    const open = await this.listOpenOrders(ctx.accountId, ctx.signal);
    if (open?.length) {
      this.logger.warn(`${open.length} open order(s) found before the run; they may consume buying power`);
    }
  }

  private async execute(
    kind: RunKind,
    details: Record<string, unknown>,
    signal: AbortSignal | undefined,
    body: (ctx: RunContext) => Promise<void>
  ): Promise<RunReport> {
    const ctx: RunContext = {
      runId: this.newRunId(),
      kind,
      accountId: '',
      phases: [],
      results: [],
      skipped: [],
      signal
    };
    const { dryRun } = this.settings;
    this.logger.log(`[${ctx.runId}] ${kind} start (${dryRun ? 'dry run' : 'live'})`);
    this.event(ctx.runId, 'RUN_STARTED', { kind, dryRun, ...details });

    try {
      this.enter(ctx, 'PLANNING');
      ctx.accountId = await this.accountState.resolveAccountId(signal);
      await this.preTrade(ctx);
      await body(ctx);

      this.enter(ctx, 'DONE');
      const report = this.report(ctx, 'DONE');
      if (!dryRun && this.settings.postRunCheck && !signal?.aborted) {
        report.postRun = await this.postRunCheck(ctx.accountId, signal);
      }
      this.logger.log(`[${ctx.runId}] ${report.summary}`);
      this.event(ctx.runId, 'RUN_COMPLETED', { attempted: report.attempted, succeeded: report.succeeded });
      return report;
    } catch (err) {
      const message = errorMessage(err);
      this.enter(ctx, 'FAILED');
      this.logger.error(`[${ctx.runId}] run failed: ${message}`);
      this.event(ctx.runId, 'RUN_FAILED', { error: message });
      return this.report(ctx, 'FAILED', message);
    }
  }

  async run(targets: TargetAllocation, opts: { signal?: AbortSignal } = {}): Promise<RunReport> {
    const details = { mode: this.settings.plannerMode, targets: Object.fromEntries(targets) };
    return this.execute('rebalance', details, opts.signal, async (ctx) => {
      const snapshot = await this.accountState.snapshot(ctx.signal);
      const plan = await this.plan(snapshot, targets, ctx.signal);
      this.skip(ctx, plan.skipped);
      this.logPlan(plan);

      let buys = plan.buys;
      if (plan.sells.length) {
        this.enter(ctx, 'SELLING');
        const sold = await this.executePhase(ctx, 'SELLING', plan.sells);
        if (!sold.some((r) => r.success)) {
          this.logger.warn(`No sell succeeded; skipping ${buys.length} buy(s)`);
          this.skip(
            ctx,
            buys.map((t) => ({ symbol: t.symbol, reason: 'PHASE_SKIPPED' as const, detail: 'no successful sells' }))
          );
          buys = [];
        } else {
          const refreshed = await this.accountState.snapshot(ctx.signal);
          const replan = await this.plan(refreshed, targets, ctx.signal);
          this.skip(ctx, replan.skipped);
          buys = replan.buys;
        }
      }

      if (buys.length) {
        this.enter(ctx, 'BUYING');
        await this.executePhase(ctx, 'BUYING', buys);
      }
    });
  }

  /** Sells every held position. Runs the same guards, ledger and post-run check as a rebalance. */
  async liquidate(opts: { signal?: AbortSignal } = {}): Promise<RunReport> {
    return this.execute('liquidate', {}, opts.signal, async (ctx) => {
      const snapshot = await this.accountState.snapshot(ctx.signal);
      this.prices.seedFromPositions(snapshot.positions);
      const prices = await this.prices.resolveMany(
        snapshot.positions.map((p) => p.symbol),
        ctx.signal
      );
      const plan = planLiquidation({
        positions: snapshot.positions,
        prices,
        availableCash: availableCash(snapshot, this.settings.currency),
        newKey: this.newKey
      });
      this.skip(ctx, plan.skipped);
      this.logPlan(plan);
      if (plan.sells.length) {
        this.enter(ctx, 'SELLING');
        await this.executePhase(ctx, 'SELLING', plan.sells);
      }
    });
  }

  private logPlan(plan: RebalancePlan) {
    this.logger.log(`Portfolio value ${plan.totalValue.toFixed(2)}, cash after buys ${plan.remainingCash.toFixed(2)}`);
    for (const t of plan.trades) {
      this.logger.log(`  ${t.side} ${t.quantity} ${t.symbol} @ ${t.estimatedPrice.toFixed(2)} = ${t.estimatedValue.toFixed(2)}`);
    }
  }

  private report(ctx: RunContext, status: 'DONE' | 'FAILED', error?: string): RunReport {
    const attempted = ctx.results.length;
    const succeeded = ctx.results.filter((r) => r.success).length;
    return {
      runId: ctx.runId,
      kind: ctx.kind,
      dryRun: this.settings.dryRun,
      status,
      phases: [...ctx.phases],
      results: [...ctx.results],
      skipped: [...ctx.skipped],
      attempted,
      succeeded,
      summary: `${succeeded} of ${attempted} trades succeeded`,
      error
    };
  }

  private async executePhase(ctx: RunContext, phase: ExecutionPhase, trades: Trade[]): Promise<TradeResult[]> {
    const phaseResults: TradeResult[] = [];
    for (const trade of trades) {
      let result: TradeResult;
      if (ctx.signal?.aborted) {
        result = { trade, phase, status: 'ABORTED', success: false, reason: 'run aborted before submission' };
      } else if (this.settings.dryRun) {
        this.logger.log(`[dry-run] ${trade.side} ${trade.quantity} ${trade.symbol}`);
        result = { trade, phase, status: 'DRY_RUN', success: true };
      } else {
        result = await this.submit(ctx, phase, trade, false);
      }
      phaseResults.push(result);
      ctx.results.push(result);
      this.record(ctx, result);
    }
    return phaseResults;
  }

  private record(ctx: RunContext, result: TradeResult) {
    const { trade } = result;
    this.ledger?.recordTrade({
      timestamp: new Date(this.now()).toISOString(),
      runId: ctx.runId,
      phase: result.phase,
      symbol: trade.symbol,
      side: trade.side,
      quantity: trade.quantity,
      estimatedPrice: trade.estimatedPrice,
      estimatedValue: trade.estimatedValue,
      status: result.status,
      clientOrderId: trade.clientOrderId,
      orderId: result.orderId ?? '',
      reason: result.reason ?? ''
    });
  }

  private async buildOrder(trade: Trade, signal?: AbortSignal): Promise<OrderRequest> {
    const order: OrderRequest = {
      clientOrderId: trade.clientOrderId,
      symbol: trade.symbol,
      side: trade.side,
      quantity: trade.quantity,
      orderType: this.settings.orderType,
      instrumentId: await this.instruments.resolve(trade.symbol, signal)
    };
    if (order.orderType === 'LIMIT') {
      order.limitPrice = limitPriceFor(trade, this.settings.limitOffsetPct);
    }
    return order;
  }

  private async submit(ctx: RunContext, phase: ExecutionPhase, trade: Trade, resubmitted: boolean): Promise<TradeResult> {
    const order = await this.buildOrder(trade, ctx.signal);
    const placed = await this.invoker.invoke('place_order', () => this.broker.placeOrder(ctx.accountId, order), {
      signal: ctx.signal
    });

    if (!placed.ok) {
      const code = brokerErrorCode(placed);
      if (code && INSUFFICIENT_FUNDS_CODES.includes(code)) {
        const err = new InsufficientFundsError(trade.symbol, describeFailure(placed));
        this.skip(ctx, [{ symbol: trade.symbol, reason: 'INSUFFICIENT_FUNDS', detail: code }]);
        return { trade, phase, status: 'SKIPPED_INSUFFICIENT_FUNDS', success: false, reason: err.message };
      }
      if (code && STALE_IDENTITY_CODES.includes(code)) {
        if (!resubmitted) {
          // The rejected attempt keeps its own ledger row; the report counts the trade once.
          this.record(ctx, { trade, phase, status: 'REJECTED', success: false, reason: code });
          this.instruments.invalidate(trade.symbol);
          const fresh: Trade = { ...trade, clientOrderId: this.newKey() };
          this.logger.warn(`${code} for ${trade.symbol}; re-resolving and resubmitting as ${fresh.clientOrderId}`);
          return this.submit(ctx, phase, fresh, true);
        }
        const err = new StaleIdentityError(trade.symbol, code);
        this.skip(ctx, [{ symbol: trade.symbol, reason: 'STALE_IDENTITY', detail: code }]);
        return { trade, phase, status: 'REJECTED', success: false, reason: err.message };
      }
      this.logger.error(`Order ${trade.side} ${trade.quantity} ${trade.symbol} failed: ${describeFailure(placed)}`);
      return { trade, phase, status: 'FAILED', success: false, reason: describeFailure(placed) };
    }

    const orderId = readOrderId(placed.response.body);
    this.logger.log(`Submitted ${trade.side} ${trade.quantity} ${trade.symbol} (${orderId ?? trade.clientOrderId})`);
    const outcome = await this.monitor.waitForTerminal(ctx.accountId, trade.clientOrderId, ctx.signal);

    if (outcome.status === 'TIMEOUT') {
      let reason = `no terminal status within ${Math.round(this.settings.orderTimeoutMs / 1000)}s`;
      if (outcome.lastStatus) reason += ` (last ${outcome.lastStatus})`;
      if (this.settings.cancelOnTimeout) {
        const cancelled = await this.invoker.invoke(
          'cancel_order',
          () => this.broker.cancelOrder(ctx.accountId, trade.clientOrderId),
          { signal: ctx.signal }
        );
        reason += cancelled.ok ? '; cancelled' : `; cancel failed: ${describeFailure(cancelled)}`;
      }
      this.logger.warn(`Order ${trade.clientOrderId} ${trade.symbol} timed out: ${reason}`);
      return { trade, phase, status: 'TIMEOUT', success: false, orderId, reason };
    }
    if (outcome.status === 'ABORTED') {
      return { trade, phase, status: 'ABORTED', success: false, orderId, reason: 'polling aborted' };
    }
    if (outcome.status !== 'FILLED') {
      this.logger.warn(`Order ${trade.clientOrderId} ${trade.symbol} ended ${outcome.status}`);
    }
    return { trade, phase, status: outcome.status, success: outcome.status === 'FILLED', orderId };
  }
}
