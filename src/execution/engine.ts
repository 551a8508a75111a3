import path from 'path';
import { AccountStateReader } from '../broker/accountState';
import { BrokerProvider, getBroker } from '../broker/broker';
import { BrokerApi } from '../broker/broker.types';
import { InvokerClock, ResilientInvoker } from '../broker/resilientInvoker';
import { RebalancerConfig } from '../core/schema';
import { Logger } from '../core/types';
import { getFinnhubClient } from '../data/finnhubClient';
import { InstrumentIdentityResolver } from '../data/instrumentResolver';
import { buildPriceProviders } from '../data/priceProviders';
import { PriceResolver } from '../data/priceResolver';
import { Ledger } from '../ledger/ledger';
import { ExecutionOrchestrator } from './executionEngine';

export interface RebalancerEngine {
  provider: BrokerProvider | 'custom';
  broker: BrokerApi;
  invoker: ResilientInvoker;
  accountState: AccountStateReader;
  instruments: InstrumentIdentityResolver;
  prices: PriceResolver;
  ledger: Ledger;
  orchestrator: ExecutionOrchestrator;
}

export interface BuildEngineOptions {
  dryRun?: boolean;
  /** Overrides broker selection from the environment. */
  broker?: BrokerApi;
  accountId?: string;
  env?: Record<string, string | undefined>;
  clock?: Partial<InvokerClock>;
  newKey?: () => string;
  newRunId?: () => string;
  baseDir?: string;
  logger?: Logger;
}

export const buildEngine = (config: RebalancerConfig, options: BuildEngineOptions = {}): RebalancerEngine => {
  const logger = options.logger ?? console;
  const env = options.env ?? process.env;
  const dryRun = options.dryRun ?? config.dryRun;
  const selection = options.broker
    ? { broker: options.broker, provider: 'custom' as const, accountId: options.accountId }
    : getBroker(config, dryRun, env, logger);
  const { broker } = selection;

  const invoker = new ResilientInvoker({
    policy: config.api.retry,
    defaultMinIntervalMs: config.api.defaultMinIntervalMs,
    operations: config.api.operations,
    clock: options.clock,
    logger
  });
  const now = options.clock?.now ?? (() => Date.now());
  const accountState = new AccountStateReader({
    broker,
    invoker,
    accountId: options.accountId ?? selection.accountId,
    now,
    logger
  });
  const instruments = new InstrumentIdentityResolver({
    broker,
    invoker,
    categoryOrder: config.instruments.categoryOrder,
    logger
  });
  const publicClient = config.marketData.publicFallback ? getFinnhubClient(env.FINNHUB_API_KEY) : null;
  const prices = new PriceResolver({
    providers: buildPriceProviders({ broker, useInstrumentId: config.marketData.useInstrumentId, publicClient }),
    invoker,
    instruments,
    prefer: config.marketData.prefer,
    ttlMs: config.marketData.cacheTtlSeconds * 1000,
    positionFallback: config.marketData.positionFallback,
    now,
    logger
  });
  const baseDir = options.baseDir ?? process.cwd();
  const ledger = new Ledger({
    eventsFile: path.resolve(baseDir, config.ledger.eventsFile),
    tradesFile: path.resolve(baseDir, config.ledger.tradesFile)
  });
  const orchestrator = new ExecutionOrchestrator({
    broker,
    invoker,
    accountState,
    prices,
    instruments,
    ledger,
    settings: {
      dryRun,
      currency: config.currency,
      plannerMode: config.planner.mode,
      threshold: config.planner.threshold,
      minTradeValue: config.planner.minTradeValue,
      ...config.execution
    },
    clock: { now, sleep: options.clock?.sleep },
    newKey: options.newKey,
    newRunId: options.newRunId,
    logger
  });
  return { provider: selection.provider, broker, invoker, accountState, instruments, prices, ledger, orchestrator };
};
