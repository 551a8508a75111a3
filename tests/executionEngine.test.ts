import fs from 'fs';
import os from 'os';
import path from 'path';
import { AccountStateReader } from '../src/broker/accountState';
import { jsonResponse, StubBroker, StubBrokerOptions } from '../src/broker/broker.stub';
import { ResilientInvoker } from '../src/broker/resilientInvoker';
import { TargetAllocation } from '../src/core/types';
import { InstrumentIdentityResolver } from '../src/data/instrumentResolver';
import { buildPriceProviders } from '../src/data/priceProviders';
import { PriceResolver } from '../src/data/priceResolver';
import { ExecutionOrchestrator, ExecutionSettings, limitPriceFor } from '../src/execution/executionEngine';
import { Ledger } from '../src/ledger/ledger';
import { fakeClock, silentLogger } from './helpers';

const targets = (entries: Record<string, number>): TargetAllocation => new Map(Object.entries(entries));

// Tuesday 2023-11-14T22:13:20Z unless a start is given.
const setup = (brokerOptions: StubBrokerOptions, settings: Partial<ExecutionSettings> = {}, start?: number) => {
  const clock = fakeClock(start);
  const broker = new StubBroker({ accountId: 'acct-1', ...brokerOptions });
  const invoker = new ResilientInvoker({
    clock,
    defaultMinIntervalMs: 0,
    operations: { place_order: { minIntervalMs: 0 } },
    policy: { maxRetries: 1 },
    logger: silentLogger
  });
  const accountState = new AccountStateReader({ broker, invoker, now: clock.now, logger: silentLogger });
  const instruments = new InstrumentIdentityResolver({ broker, invoker, logger: silentLogger });
  const prices = new PriceResolver({
    providers: buildPriceProviders({ broker, useInstrumentId: false }),
    invoker,
    instruments,
    now: clock.now,
    logger: silentLogger
  });
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rebalance-run-'));
  const ledger = new Ledger({ eventsFile: path.join(dir, 'events.jsonl'), tradesFile: path.join(dir, 'trades.csv') });
  let n = 0;
  const orchestrator = new ExecutionOrchestrator({
    broker,
    invoker,
    accountState,
    prices,
    instruments,
    ledger,
    settings: { dryRun: false, pollIntervalMs: 1000, orderTimeoutMs: 5000, ...settings },
    clock,
    newKey: () => `key-${++n}`,
    newRunId: () => 'run-1',
    logger: silentLogger
  });
  return { broker, ledger, orchestrator, dir };
};

const scenarioA: StubBrokerOptions = {
  cash: 500,
  positions: { AAPL: { quantity: 10, costPrice: 100 } },
  prices: { AAPL: 100, MSFT: 50 }
};

describe('ExecutionOrchestrator', () => {
  it('logs and ledgers a dry run without touching the order endpoint', async () => {
    const { broker, ledger, orchestrator } = setup(scenarioA, { dryRun: true });
    const place = jest.spyOn(broker, 'placeOrder');
    const balance = jest.spyOn(broker, 'getBalance');
    const report = await orchestrator.run(targets({ AAPL: 50, MSFT: 50 }));

    expect(place).not.toHaveBeenCalled();
    expect(balance).toHaveBeenCalledTimes(2);
    expect(report.status).toBe('DONE');
    expect(report.phases).toEqual(['PLANNING', 'SELLING', 'BUYING', 'DONE']);
    expect(report.results.map((r) => [r.trade.side, r.trade.symbol, r.trade.quantity, r.status])).toEqual([
      ['SELL', 'AAPL', 3, 'DRY_RUN'],
      ['BUY', 'MSFT', 10, 'DRY_RUN']
    ]);
    expect(report.summary).toBe('2 of 2 trades succeeded');
    expect(ledger.getTrades('run-1').map((t) => t.status)).toEqual(['DRY_RUN', 'DRY_RUN']);
    expect(ledger.getRunStatus('run-1')).toBe('COMPLETED');
  });

  it('re-reads the account after selling and sizes buys with the proceeds', async () => {
    const { broker, orchestrator } = setup(scenarioA);
    const report = await orchestrator.run(targets({ AAPL: 50, MSFT: 50 }));

    expect(report.results.map((r) => [r.trade.side, r.trade.symbol, r.trade.quantity, r.status])).toEqual([
      ['SELL', 'AAPL', 3, 'FILLED'],
      ['BUY', 'MSFT', 15, 'FILLED']
    ]);
    expect(report.results[0].orderId).toBe('stub-ord-1');
    expect(broker.getHolding('AAPL')).toBe(7);
    expect(broker.getHolding('MSFT')).toBe(15);
    expect(broker.getCash()).toBe(50);
    expect(report.succeeded).toBe(2);
  });

  it('skips the buy phase when no sell succeeds', async () => {
    const { broker, ledger, orchestrator } = setup(scenarioA);
    jest.spyOn(broker, 'placeOrder').mockResolvedValue(jsonResponse(400, { error_code: 'INVALID_QUANTITY' }));
    const report = await orchestrator.run(targets({ AAPL: 50, MSFT: 50 }));

    expect(report.phases).toEqual(['PLANNING', 'SELLING', 'DONE']);
    expect(report.results.map((r) => r.status)).toEqual(['FAILED']);
    expect(report.skipped).toEqual([{ symbol: 'MSFT', reason: 'PHASE_SKIPPED', detail: 'no successful sells' }]);
    expect(report.summary).toBe('0 of 1 trades succeeded');
    expect(ledger.getEventsForRun('run-1').filter((e) => e.type === 'SYMBOL_SKIPPED')).toHaveLength(1);
  });

  it('buys against the original snapshot when nothing needs selling', async () => {
    const { broker, orchestrator } = setup({ cash: 1000, prices: { MSFT: 50 } }, { postRunCheck: false });
    const balance = jest.spyOn(broker, 'getBalance');
    const report = await orchestrator.run(targets({ MSFT: 100 }));

    expect(report.phases).toEqual(['PLANNING', 'BUYING', 'DONE']);
    expect(balance).toHaveBeenCalledTimes(1);
    expect(report.results[0]).toMatchObject({ status: 'FILLED', success: true });
    expect(report.results[0].trade.quantity).toBe(20);
  });

  it('fails the run when account state cannot be read', async () => {
    const { broker, ledger, orchestrator } = setup(scenarioA);
    jest.spyOn(broker, 'getPositions').mockResolvedValue(jsonResponse(503, {}));
    const report = await orchestrator.run(targets({ AAPL: 100 }));

    expect(report.status).toBe('FAILED');
    expect(report.phases).toEqual(['PLANNING', 'FAILED']);
    expect(report.error).toBe('get_account_position unreadable: HTTP 503 {}');
    expect(ledger.getRunStatus('run-1')).toBe('FAILED');
  });

  it('times out an order that never reaches a terminal status and cancels it', async () => {
    const { broker, orchestrator } = setup(
      { cash: 1000, prices: { MSFT: 50 }, fillMode: 'pending' },
      { cancelOnTimeout: true }
    );
    const detail = jest.spyOn(broker, 'getOrderDetail');
    const report = await orchestrator.run(targets({ MSFT: 100 }));

    expect(report.results[0]).toMatchObject({
      status: 'TIMEOUT',
      success: false,
      reason: 'no terminal status within 5s (last PENDING); cancelled'
    });
    expect(detail).toHaveBeenCalledTimes(6);
    const after = await broker.getOrderDetail('acct-1', 'key-1');
    expect(after.body).toMatchObject({ status: 'CANCELLED' });
  });

  it('ends polling with ABORTED when the signal fires', async () => {
    const { broker, orchestrator } = setup({ cash: 1000, prices: { MSFT: 50 }, fillMode: 'pending' });
    const controller = new AbortController();
    jest.spyOn(broker, 'getOrderDetail').mockImplementation(async () => {
      controller.abort();
      return jsonResponse(200, { status: 'PENDING' });
    });
    const report = await orchestrator.run(targets({ MSFT: 100 }), { signal: controller.signal });

    expect(report.results.map((r) => r.status)).toEqual(['ABORTED']);
    expect(report.status).toBe('DONE');
  });

  it('skips a buy the broker rejects for buying power and keeps going', async () => {
    const { broker, orchestrator } = setup({ cash: 1000, prices: { MSFT: 50, VTI: 100 } });
    jest
      .spyOn(broker, 'placeOrder')
      .mockResolvedValueOnce(jsonResponse(417, { error_code: 'ORDER_BUYING_POWER_NOT_ENOUGH', message: 'short' }));
    const report = await orchestrator.run(targets({ MSFT: 50, VTI: 50 }));

    expect(report.results.map((r) => [r.trade.symbol, r.status])).toEqual([
      ['MSFT', 'SKIPPED_INSUFFICIENT_FUNDS'],
      ['VTI', 'FILLED']
    ]);
    expect(report.skipped).toEqual([
      { symbol: 'MSFT', reason: 'INSUFFICIENT_FUNDS', detail: 'ORDER_BUYING_POWER_NOT_ENOUGH' }
    ]);
    expect(report.summary).toBe('1 of 2 trades succeeded');
  });

  it('re-resolves a stale identity and resubmits once under a fresh key', async () => {
    const { broker, ledger, orchestrator } = setup({ cash: 1000, prices: { MSFT: 50 } });
    const place = jest
      .spyOn(broker, 'placeOrder')
      .mockResolvedValueOnce(jsonResponse(417, { error_code: 'INVALID_INSTRUMENT_ID' }));
    const lookup = jest.spyOn(broker, 'lookupInstrument');
    const report = await orchestrator.run(targets({ MSFT: 100 }));

    expect(place.mock.calls.map((c) => c[1].clientOrderId)).toEqual(['key-1', 'key-2']);
    expect(lookup).toHaveBeenCalledTimes(4);
    expect(report.results).toHaveLength(1);
    expect(report.results[0]).toMatchObject({ status: 'FILLED', success: true });
    expect(report.results[0].trade.clientOrderId).toBe('key-2');
    expect(report.summary).toBe('1 of 1 trades succeeded');
    expect(ledger.getTrades('run-1').map((t) => [t.clientOrderId, t.status, t.reason])).toEqual([
      ['key-1', 'REJECTED', 'INVALID_INSTRUMENT_ID'],
      ['key-2', 'FILLED', '']
    ]);
  });

  it('gives up after one resubmission of a stale identity', async () => {
    const { broker, ledger, orchestrator } = setup({ cash: 1000, prices: { MSFT: 50 } });
    const place = jest.spyOn(broker, 'placeOrder').mockResolvedValue(jsonResponse(417, { error_code: 'INVALID_SYMBOL' }));
    const report = await orchestrator.run(targets({ MSFT: 100 }));

    expect(place).toHaveBeenCalledTimes(2);
    expect(report.results).toHaveLength(1);
    expect(ledger.getTrades('run-1').map((t) => [t.clientOrderId, t.status])).toEqual([
      ['key-1', 'REJECTED'],
      ['key-2', 'REJECTED']
    ]);
    expect(report.results[0].status).toBe('REJECTED');
    expect(report.skipped).toEqual([{ symbol: 'MSFT', reason: 'STALE_IDENTITY', detail: 'INVALID_SYMBOL' }]);
  });

  it('cancels open orders before planning when configured', async () => {
    const { broker, ledger, orchestrator } = setup(
      { cash: 40, prices: { CHEAP: 10, MSFT: 50 }, fillMode: 'pending' },
      { cancelOpenOrdersBeforeRun: true }
    );
    await broker.placeOrder('acct-1', {
      clientOrderId: 'old-1',
      symbol: 'CHEAP',
      side: 'BUY',
      quantity: 1,
      orderType: 'MARKET'
    });
    const report = await orchestrator.run(targets({ MSFT: 100 }));

    expect(report.phases).toEqual(['PLANNING', 'DONE']);
    expect(report.skipped).toEqual([
      { symbol: 'MSFT', reason: 'INSUFFICIENT_FUNDS', detail: 'target 40.00 below one share @ 50.00' }
    ]);
    expect((await broker.getOpenOrders('acct-1')).body).toEqual({ data: [] });
    const cancelled = ledger.getEventsForRun('run-1').find((e) => e.type === 'ORDERS_CANCELLED');
    expect(cancelled?.details).toEqual({ clientOrderIds: ['old-1'] });
  });

  it('runs threshold mode end to end', async () => {
    const { broker, orchestrator } = setup(scenarioA, { plannerMode: 'threshold', threshold: 0.05, minTradeValue: 100 });
    const report = await orchestrator.run(targets({ AAPL: 50, MSFT: 50 }));

    expect(report.results.map((r) => [r.trade.side, r.trade.symbol, r.trade.quantity, r.status])).toEqual([
      ['SELL', 'AAPL', 3, 'FILLED'],
      ['BUY', 'MSFT', 15, 'FILLED']
    ]);
    expect(report.skipped).toEqual([]);
    expect(broker.getCash()).toBe(50);
  });

  it('refuses a live run on a weekend and leaves the account alone', async () => {
    const saturday = Date.parse('2026-01-03T15:00:00Z');
    const { broker, ledger, orchestrator } = setup(scenarioA, {}, saturday);
    const place = jest.spyOn(broker, 'placeOrder');
    const report = await orchestrator.run(targets({ AAPL: 50, MSFT: 50 }));

    expect(place).not.toHaveBeenCalled();
    expect(report.status).toBe('FAILED');
    expect(report.phases).toEqual(['PLANNING', 'FAILED']);
    expect(report.error).toBe('Not a trading day in America/New_York (Sat); live orders refused');
    expect(ledger.getRunStatus('run-1')).toBe('FAILED');
  });

  it('still dry-runs on a weekend', async () => {
    const saturday = Date.parse('2026-01-03T15:00:00Z');
    const { orchestrator } = setup(scenarioA, { dryRun: true }, saturday);
    const report = await orchestrator.run(targets({ AAPL: 50, MSFT: 50 }));
    expect(report.status).toBe('DONE');
    expect(report.postRun).toBeUndefined();
  });

  it('reports orders still open after a live run', async () => {
    const { orchestrator } = setup({ cash: 1000, prices: { MSFT: 50 }, fillMode: 'pending' });
    const report = await orchestrator.run(targets({ MSFT: 100 }));

    expect(report.results.map((r) => r.status)).toEqual(['TIMEOUT']);
    expect(report.postRun).toEqual({
      positions: [],
      availableCash: 0,
      openOrders: [{ clientOrderId: 'key-1', orderId: 'stub-ord-1', symbol: 'MSFT', status: 'PENDING' }]
    });
  });

  it('sells every position on liquidate and buys nothing', async () => {
    const { broker, ledger, orchestrator } = setup(scenarioA);
    const report = await orchestrator.liquidate();

    expect(report.kind).toBe('liquidate');
    expect(report.phases).toEqual(['PLANNING', 'SELLING', 'DONE']);
    expect(report.results.map((r) => [r.trade.side, r.trade.symbol, r.trade.quantity, r.status])).toEqual([
      ['SELL', 'AAPL', 10, 'FILLED']
    ]);
    expect(broker.getHolding('AAPL')).toBe(0);
    expect(report.postRun?.positions).toEqual([]);
    expect(report.postRun?.availableCash).toBe(1500);
    expect(ledger.getEventsForRun('run-1')[0].details).toEqual({ kind: 'liquidate', dryRun: false });
  });

  it('prices limit orders off the estimate', async () => {
    const { broker, orchestrator } = setup({ cash: 1000, prices: { MSFT: 50 } }, { orderType: 'LIMIT' });
    const place = jest.spyOn(broker, 'placeOrder');
    await orchestrator.run(targets({ MSFT: 100 }));
    expect(place.mock.calls[0][1]).toMatchObject({ orderType: 'LIMIT', limitPrice: 50.5, quantity: 20 });
  });
});

describe('limitPriceFor', () => {
  it('pads buys up and sells down by the offset', () => {
    const trade = { symbol: 'X', quantity: 1, estimatedPrice: 100, estimatedValue: 100, clientOrderId: 'k' };
    expect(limitPriceFor({ ...trade, side: 'BUY' }, 0.02)).toBe(102);
    expect(limitPriceFor({ ...trade, side: 'SELL' }, 0.02)).toBe(98);
  });
});
