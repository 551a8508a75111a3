export * from './core/types';
export * from './core/errors';
export { configSchema, parseConfig, RebalancerConfig, RebalancerConfigInput } from './core/schema';
export { loadConfig } from './core/utils';
export { loadTargets, buildTargetAllocation } from './core/targets';
export { ResilientInvoker, InvokeResult, DEFAULT_RETRY_POLICY } from './broker/resilientInvoker';
export { BrokerApi, OrderRequest } from './broker/broker.types';
export { StubBroker } from './broker/broker.stub';
export { OpenApiBroker } from './broker/openapi/openApiBroker';
export { BrokerClient } from './integrations/brokerClient';
export { AccountStateReader, availableCash } from './broker/accountState';
export { InstrumentIdentityResolver } from './data/instrumentResolver';
export { PriceResolver, POSITIONS_SOURCE } from './data/priceResolver';
export { buildPriceProviders, PriceProvider } from './data/priceProviders';
export { planRebalance, planLiquidation, PlannerInput, RebalancePlan } from './execution/rebalancePlanner';
export { ExecutionOrchestrator, ExecutionSettings, isTradingDay } from './execution/executionEngine';
export { buildEngine, RebalancerEngine } from './execution/engine';
export { Ledger } from './ledger/ledger';
