/**
 * Backtest report
 * Builds the run summary and writes it, with the equity series and trade
 * log, to data/backtesting/runs/.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { contentHash, shortHash } from '@/core/seed';
import type {
  EquityPoint,
  ExecutionFailureReason,
  OrderOutcome,
  RejectionReason,
  Trade,
} from '@/types/trading';
import { createChildLogger } from '@/utils/logger';
import { sumCosts } from './metrics';
import type { BacktestMetrics, BacktestResult, BacktestSettings, BacktestSummary } from './types';

const logger = createChildLogger('backtest_report');

export interface SummaryInput {
  policy: string;
  settings: BacktestSettings;
  valid: boolean;
  equity: readonly EquityPoint[];
  trades: readonly Trade[];
  outcomes: readonly OrderOutcome[];
  metrics: BacktestMetrics;
  abortReason?: string | null;
}

export function runContentHash(equity: readonly EquityPoint[], trades: readonly Trade[]): string {
  return contentHash({ equity, trades });
}

function countOutcomes(outcomes: readonly OrderOutcome[]): {
  rejections: Partial<Record<RejectionReason, number>>;
  failures: Partial<Record<ExecutionFailureReason, number>>;
} {
  const rejections: Partial<Record<RejectionReason, number>> = {};
  const failures: Partial<Record<ExecutionFailureReason, number>> = {};
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') {
      rejections[outcome.reason] = (rejections[outcome.reason] ?? 0) + 1;
    } else if (outcome.status === 'failed') {
      failures[outcome.reason] = (failures[outcome.reason] ?? 0) + 1;
    }
  }
  return { rejections, failures };
}

export function buildSummary(input: SummaryInput): BacktestSummary {
  const { settings } = input;
  const hash = runContentHash(input.equity, input.trades);
  const { rejections, failures } = countOutcomes(input.outcomes);

  return {
    runId: `${settings.startDate}_${settings.endDate}_${input.policy}_${shortHash(hash)}`,
    policy: input.policy,
    period: { start: settings.startDate, end: settings.endDate },
    valid: input.valid,
    universeSize: settings.universe.length,
    metrics: input.metrics,
    costs: sumCosts(input.trades),
    rejections,
    failures,
    contentHash: hash,
    abortReason: input.abortReason ?? null,
  };
}

export interface ReportFiles {
  summaryPath: string;
  equityPath: string;
  tradesPath: string;
}

export function writeBacktestReport(
  result: BacktestResult,
  outputDir: string = join(process.cwd(), 'data', 'backtesting', 'runs')
): ReportFiles {
  const runDir = join(outputDir, result.summary.runId);
  if (!existsSync(runDir)) {
    mkdirSync(runDir, { recursive: true });
  }

  const files: ReportFiles = {
    summaryPath: join(runDir, 'summary.json'),
    equityPath: join(runDir, 'equity.json'),
    tradesPath: join(runDir, 'trades.json'),
  };

  writeFileSync(files.summaryPath, JSON.stringify(result.summary, null, 2), 'utf-8');
  writeFileSync(files.equityPath, JSON.stringify(result.equity, null, 2), 'utf-8');
  writeFileSync(files.tradesPath, JSON.stringify(result.trades, null, 2), 'utf-8');

  logger.info({ runId: result.summary.runId, runDir }, 'Backtest report written');
  return files;
}
