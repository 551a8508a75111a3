import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { availableCash } from '../broker/accountState';
import { ConfigError, errorMessage } from '../core/errors';
import { loadTargets } from '../core/targets';
import { runIdToTimestamp } from '../core/time';
import { formatUSD, loadConfig } from '../core/utils';
import { buildEngine } from '../execution/engine';

const program = new Command();

program
  .name('rebalance-account')
  .description('Show balances, positions and the rebalance plan preview')
  .option('--config <path>', 'config JSON', 'src/config/default.json')
  .option('--targets <path>', 'target allocation to preview a plan against')
  .option('--runs <n>', 'recent runs to list from the ledger', '5');

const showAccount = async () => {
  const opts = program.parse(process.argv).opts<{ config: string; targets?: string; runs: string }>();
  const config = loadConfig(path.resolve(process.cwd(), opts.config));
  const engine = buildEngine(config, { dryRun: true });

  const accountId = await engine.accountState.resolveAccountId();
  const snapshot = await engine.accountState.snapshot();
  console.log(`Account ${accountId} (${engine.provider})`);
  for (const b of Object.values(snapshot.balances)) {
    console.log(
      `  ${b.currency}: cash ${formatUSD(b.cashBalance)}, buying power ${formatUSD(b.buyingPower)}, unrealized ${formatUSD(
        b.unrealizedProfitLoss
      )}`
    );
  }

  const prices = await engine.prices.resolveMany(snapshot.positions.map((p) => p.symbol));
  let invested = 0;
  console.log('Positions:');
  for (const p of snapshot.positions) {
    const price = prices[p.symbol];
    const value = price === undefined ? p.marketValue : p.quantity * price;
    invested += value;
    console.log(
      `  ${p.symbol.padEnd(6)} ${String(p.quantity).padStart(6)} @ ${price === undefined ? 'n/a' : formatUSD(price)} = ${formatUSD(value)}`
    );
  }
  if (!snapshot.positions.length) console.log('  (none)');
  const cash = availableCash(snapshot, config.currency);
  console.log(`Total ${formatUSD(invested + cash)} (invested ${formatUSD(invested)}, spendable ${formatUSD(cash)})`);

  const targetsFile = opts.targets ?? config.targetsFile;
  const targets = loadTargets(path.resolve(process.cwd(), targetsFile), config.allocationTolerancePct);
  const plan = await engine.orchestrator.plan(snapshot, targets);
  console.log(`Plan preview (${plan.mode}) against ${targetsFile}:`);
  for (const t of plan.trades) {
    console.log(`  ${t.side.padEnd(4)} ${String(t.quantity).padStart(6)} ${t.symbol} ≈ ${formatUSD(t.estimatedValue)}`);
  }
  for (const s of plan.skipped) console.log(`  skip ${s.symbol}: ${s.reason}`);

  const runs = engine.ledger.getRecentRuns(Number(opts.runs) || 5);
  if (runs.length) {
    console.log('Recent runs:');
    for (const r of runs) console.log(`  ${runIdToTimestamp(r.runId) ?? r.runId} ${r.runId} ${r.status}`);
  }
};

if (require.main === module) {
  showAccount().catch((err) => {
    console.error(err instanceof ConfigError ? `Configuration error: ${errorMessage(err)}` : err);
    process.exitCode = err instanceof ConfigError ? 2 : 1;
  });
}
