/**
 * Backtest contracts: the decision policy seam, run settings and results.
 */

import type { FillPriceField } from '@/core/config';
import type { MarketRuleSet } from '@/market/rules';
import type { ConsensusThresholds } from '@/scoring/consensus_config';
import type { TechnicalWindows } from '@/scoring/technical';
import type { CostConfig } from '@/trading/costs';
import type { ConsensusScore } from '@/types/consensus';
import type {
  EquityPoint,
  ExecutionFailureReason,
  Order,
  OrderOutcome,
  PortfolioSnapshot,
  RejectionReason,
  Trade,
} from '@/types/trading';

/**
 * External decision maker, called once per simulated day with a read-only
 * snapshot and the day's ranked consensus scores.
 */
export interface DecisionPolicy {
  readonly name: string;
  proposeOrders(
    currentDate: string,
    portfolio: PortfolioSnapshot,
    scores: readonly ConsensusScore[]
  ): Order[] | Promise<Order[]>;
}

export interface BacktestSettings {
  startDate: string;
  endDate: string;
  universe: readonly string[];
  initialCapital: number;
  /** 0 disables the cap. */
  maxPositions: number;
  fillPriceField: FillPriceField;
  riskFreeRate: number;
  rules: MarketRuleSet;
  costs: CostConfig;
  thresholds: ConsensusThresholds;
  deriveTechnical: boolean;
  technicalWindows: TechnicalWindows;
}

export interface BacktestMetrics {
  initialCapital: number;
  finalValue: number;
  tradingDays: number;
  totalReturn: number;
  annualizedReturn: number | null;
  maxDrawdown: number;
  volatility: number | null;
  sharpeRatio: number | null;
  totalTrades: number;
  buyCount: number;
  sellCount: number;
  winRate: number | null;
  realizedPnl: number;
  totalCosts: number;
}

export interface CostTotals {
  commission: number;
  stampDuty: number;
  transferFee: number;
  slippage: number;
  total: number;
}

export interface BacktestSummary {
  runId: string;
  policy: string;
  period: { start: string; end: string };
  valid: boolean;
  universeSize: number;
  metrics: BacktestMetrics;
  costs: CostTotals;
  rejections: Partial<Record<RejectionReason, number>>;
  failures: Partial<Record<ExecutionFailureReason, number>>;
  /** Hash over the equity series and trade log. */
  contentHash: string;
  abortReason: string | null;
}

export interface BacktestResult {
  /** False when the run was aborted; the series then stop at the last completed day. */
  valid: boolean;
  settings: BacktestSettings;
  equity: EquityPoint[];
  trades: Trade[];
  outcomes: OrderOutcome[];
  scoreHistory: ConsensusScore[];
  metrics: BacktestMetrics;
  summary: BacktestSummary;
}
