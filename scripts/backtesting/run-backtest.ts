/**
 * Backtesting Runner
 *
 * Replays the configured date range from the market database with the
 * consensus top-N policy and writes the run report under
 * data/backtesting/runs/.
 *
 * Usage: npx tsx scripts/backtesting/run-backtest.ts
 *   BACKTEST_START / BACKTEST_END   date range (required here or in config/backtest.json)
 *   INITIAL_CAPITAL                 starting cash
 *   TOP_N                           names held at once (default: maxPositions)
 *   DERIVE_TECHNICAL=true           fill missing technical signals from price history
 */

import dotenv from 'dotenv';
import { getConfig } from '../../src/core/config';
import { getUniverseInfo } from '../../src/core/universe';
import { closeDatabase, getDatabase } from '../../src/data/db';
import { loadMarketData } from '../../src/data/market_data';
import { BacktestEngine, settingsFromConfig } from '../../src/backtest/engine';
import { BacktestAbortedError } from '../../src/backtest/errors';
import { ConsensusTopNPolicy } from '../../src/backtest/policies/consensus_top_n';
import { writeBacktestReport } from '../../src/backtest/report';
import type { BacktestResult } from '../../src/backtest/types';

dotenv.config();

function formatPct(value: number | null): string {
  return value === null ? 'n/a' : `${(value * 100).toFixed(2)}%`;
}

function printSummary(result: BacktestResult): void {
  const { metrics, summary } = result;
  console.log('='.repeat(60));
  console.log(`Run:            ${summary.runId}${result.valid ? '' : ' (INVALID)'}`);
  console.log(`Period:         ${summary.period.start} -> ${summary.period.end} (${metrics.tradingDays} days)`);
  console.log(`Final value:    ${metrics.finalValue.toFixed(2)}`);
  console.log(`Total return:   ${formatPct(metrics.totalReturn)}`);
  console.log(`Annualized:     ${formatPct(metrics.annualizedReturn)}`);
  console.log(`Max drawdown:   ${formatPct(metrics.maxDrawdown)}`);
  console.log(`Sharpe:         ${metrics.sharpeRatio === null ? 'n/a' : metrics.sharpeRatio.toFixed(2)}`);
  console.log(`Trades:         ${metrics.totalTrades} (win rate ${formatPct(metrics.winRate)})`);
  console.log(`Costs:          ${summary.costs.total.toFixed(2)}`);
  console.log(`Content hash:   ${summary.contentHash}`);
  console.log('='.repeat(60));
}

async function main(): Promise<void> {
  const config = getConfig();
  const { startDate, endDate } = config.backtest;
  if (!startDate || !endDate) {
    console.error('Set BACKTEST_START and BACKTEST_END (or startDate/endDate in config/backtest.json)');
    process.exit(2);
  }

  const universe = getUniverseInfo(config);
  console.log(
    `Universe: ${universe.name} (${universe.symbolCount} symbols, benchmark ${universe.benchmark ?? 'none'})`
  );

  const topN = Number(process.env.TOP_N || config.backtest.maxPositions || 10);
  const settings = settingsFromConfig(config, {
    startDate,
    endDate,
    deriveTechnical: process.env.DERIVE_TECHNICAL === 'true',
  });

  const data = loadMarketData(
    {
      symbols: [...settings.universe],
      endDate,
      priceDecimals: config.marketRules.priceDecimals,
    },
    getDatabase()
  );
  const engine = new BacktestEngine(data, settings);
  const policy = new ConsensusTopNPolicy({
    topN,
    entryScore: config.backtest.entryScore,
    exitScore: config.backtest.exitScore,
    minCompleteness: config.backtest.minCompleteness,
    lotSize: config.marketRules.lotSize,
    priceOf: (symbol, date) => engine.market.effectiveBar(symbol, date)?.close ?? null,
  });

  let result: BacktestResult;
  try {
    result = await engine.run(policy);
  } catch (error) {
    if (!(error instanceof BacktestAbortedError)) throw error;
    result = error.partial;
  }

  const files = writeBacktestReport(result);
  printSummary(result);
  console.log(`Report: ${files.summaryPath}`);

  closeDatabase();
  if (!result.valid) process.exit(3);
}

main().catch((err) => {
  console.error('Backtest failed:', err);
  closeDatabase();
  process.exit(1);
});
