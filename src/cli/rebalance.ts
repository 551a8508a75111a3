import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { BrokerApi } from '../broker/broker.types';
import { InvokerClock } from '../broker/resilientInvoker';
import { ConfigError, errorMessage } from '../core/errors';
import { RebalancerConfig } from '../core/schema';
import { loadTargets } from '../core/targets';
import { Logger, RunReport } from '../core/types';
import { loadConfig } from '../core/utils';
import { buildEngine } from '../execution/engine';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

export interface RebalanceCliOptions {
  config?: string;
  targets?: string;
  dryRun?: boolean;
  live?: boolean;
  timeout?: string;
  sellAll?: boolean;
  yes?: boolean;
}

export interface RebalanceDeps {
  signal?: AbortSignal;
  broker?: BrokerApi;
  accountId?: string;
  env?: Record<string, string | undefined>;
  clock?: Partial<InvokerClock>;
  cwd?: string;
  logger?: Logger;
}

/** A live run that attempted orders and filled none counts as a failure. */
export const exitCodeFor = (report: RunReport): number => {
  if (report.status === 'FAILED') return EXIT_FAILURE;
  if (!report.dryRun && report.attempted > 0 && report.succeeded === 0) return EXIT_FAILURE;
  return EXIT_OK;
};

export const resolveRunConfig = (config: RebalancerConfig, opts: RebalanceCliOptions): RebalancerConfig => {
  if (opts.dryRun && opts.live) {
    throw new ConfigError('--dry-run and --live are mutually exclusive');
  }
  const dryRun = opts.live ? false : opts.dryRun ? true : config.dryRun;
  let orderTimeoutMs = config.execution.orderTimeoutMs;
  if (opts.timeout !== undefined) {
    const seconds = Number(opts.timeout);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new ConfigError(`--timeout must be a positive number of seconds, got ${opts.timeout}`);
    }
    orderTimeoutMs = Math.round(seconds * 1000);
  }
  return { ...config, dryRun, execution: { ...config.execution, orderTimeoutMs } };
};

export const runRebalance = async (
  opts: RebalanceCliOptions,
  deps: RebalanceDeps = {}
): Promise<{ report: RunReport; exitCode: number }> => {
  const cwd = deps.cwd ?? process.cwd();
  const configPath = path.resolve(cwd, opts.config ?? 'src/config/default.json');
  const config = resolveRunConfig(loadConfig(configPath), opts);
  if (opts.sellAll && !config.dryRun && !opts.yes) {
    throw new ConfigError('--sell-all on a live run requires --yes');
  }
  const targets = opts.sellAll
    ? undefined
    : loadTargets(path.resolve(cwd, opts.targets ?? config.targetsFile), config.allocationTolerancePct);

  const engine = buildEngine(config, {
    dryRun: config.dryRun,
    broker: deps.broker,
    accountId: deps.accountId,
    env: deps.env,
    clock: deps.clock,
    baseDir: cwd,
    logger: deps.logger
  });
  const report = targets
    ? await engine.orchestrator.run(targets, { signal: deps.signal })
    : await engine.orchestrator.liquidate({ signal: deps.signal });
  return { report, exitCode: exitCodeFor(report) };
};

const program = new Command();

program
  .name('rebalance')
  .description('Rebalance the account toward a target allocation')
  .option('--config <path>', 'config JSON', 'src/config/default.json')
  .option('--targets <path>', 'target allocation CSV or JSON (defaults to config targetsFile)')
  .option('--dry-run', 'plan and log trades without placing orders')
  .option('--live', 'place orders with the broker')
  .option('--timeout <seconds>', 'per-order fill timeout')
  .option('--sell-all', 'sell every held position instead of rebalancing')
  .option('--yes', 'confirm --sell-all on a live run');

const main = async () => {
  const opts = program.parse(process.argv).opts<RebalanceCliOptions>();
  const controller = new AbortController();
  const onSigint = () => {
    console.warn('Interrupted; aborting order polling.');
    controller.abort(new Error('Interrupted'));
  };
  process.once('SIGINT', onSigint);
  try {
    const { report, exitCode } = await runRebalance(opts, { signal: controller.signal });
    for (const s of report.skipped) {
      console.log(`  skipped ${s.symbol}: ${s.reason}${s.detail ? ` (${s.detail})` : ''}`);
    }
    for (const o of report.postRun?.openOrders ?? []) {
      console.warn(`  still open: ${o.symbol ?? '?'} ${o.clientOrderId} ${o.status}`);
    }
    console.log(`Run ${report.runId} ${report.kind} ${report.status}: ${report.summary}`);
    process.exitCode = exitCode;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
};

if (require.main === module) {
  main().catch((err) => {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${errorMessage(err)}`);
      process.exitCode = EXIT_CONFIG;
      return;
    }
    console.error('rebalance failed', err);
    process.exitCode = EXIT_FAILURE;
  });
}
