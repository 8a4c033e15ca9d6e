/**
 * Performance Metrics Calculator
 *
 * Computes from the equity series and trade log:
 * - Total and annualized return
 * - Max drawdown (running peak seeded with the initial capital)
 * - Annualized volatility and Sharpe-like ratio
 * - Trade counts and win rate
 *
 * Ratios that would divide by zero are reported as null.
 */

import { roundToTick } from '@/market/rounding';
import type { EquityPoint, Trade } from '@/types/trading';
import type { BacktestMetrics, CostTotals } from './types';

export const TRADING_DAYS_PER_YEAR = 252;

const ZERO_VARIANCE_EPSILON = 1e-12;

const round2 = (value: number) => roundToTick(value, 2);

export interface MetricsOptions {
  initialCapital: number;
  riskFreeRate: number;
  tradingDaysPerYear?: number;
}

export function calcTotalReturn(initialValue: number, finalValue: number): number {
  if (initialValue <= 0) return 0;
  return finalValue / initialValue - 1;
}

/**
 * Compounds the total return over `tradingDays` to a yearly rate.
 */
export function calcAnnualizedReturn(
  totalReturn: number,
  tradingDays: number,
  daysPerYear: number = TRADING_DAYS_PER_YEAR
): number | null {
  if (tradingDays <= 0) return null;
  const growth = 1 + totalReturn;
  if (growth <= 0) return -1;
  return Math.pow(growth, daysPerYear / tradingDays) - 1;
}

export function calcMaxDrawdown(values: readonly number[], initialValue: number): number {
  let peak = initialValue;
  let maxDrawdown = 0;
  for (const value of values) {
    if (value > peak) peak = value;
    if (peak <= 0) continue;
    const drawdown = value / peak - 1;
    if (drawdown < maxDrawdown) maxDrawdown = drawdown;
  }
  return maxDrawdown;
}

/** Population standard deviation; null for an empty series. */
export function standardDeviation(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function calcVolatility(
  dailyReturns: readonly number[],
  daysPerYear: number = TRADING_DAYS_PER_YEAR
): number | null {
  const std = standardDeviation(dailyReturns);
  if (std === null || std < ZERO_VARIANCE_EPSILON) return null;
  return std * Math.sqrt(daysPerYear);
}

export function calcSharpeRatio(
  annualizedReturn: number | null,
  volatility: number | null,
  riskFreeRate: number
): number | null {
  if (annualizedReturn === null || volatility === null) return null;
  return (annualizedReturn - riskFreeRate) / volatility;
}

export function calcWinRate(trades: readonly Trade[]): number | null {
  const sells = trades.filter((t) => t.side === 'sell');
  if (sells.length === 0) return null;
  const wins = sells.filter((t) => (t.realizedPnl ?? 0) > 0).length;
  return wins / sells.length;
}

export function sumCosts(trades: readonly Trade[]): CostTotals {
  const totals = trades.reduce(
    (acc, t) => ({
      commission: acc.commission + t.costs.commission,
      stampDuty: acc.stampDuty + t.costs.stampDuty,
      transferFee: acc.transferFee + t.costs.transferFee,
      slippage: acc.slippage + t.costs.slippage,
      total: acc.total + t.costs.totalCost,
    }),
    { commission: 0, stampDuty: 0, transferFee: 0, slippage: 0, total: 0 }
  );
  return {
    commission: round2(totals.commission),
    stampDuty: round2(totals.stampDuty),
    transferFee: round2(totals.transferFee),
    slippage: round2(totals.slippage),
    total: round2(totals.total),
  };
}

export function calculateMetrics(
  equity: readonly EquityPoint[],
  trades: readonly Trade[],
  options: MetricsOptions
): BacktestMetrics {
  const daysPerYear = options.tradingDaysPerYear ?? TRADING_DAYS_PER_YEAR;
  const last = equity.at(-1);
  const finalValue = last ? last.totalValue : options.initialCapital;

  const totalReturn = calcTotalReturn(options.initialCapital, finalValue);
  const annualizedReturn = calcAnnualizedReturn(totalReturn, equity.length, daysPerYear);
  const volatility = calcVolatility(
    equity.map((p) => p.dailyReturn),
    daysPerYear
  );

  return {
    initialCapital: options.initialCapital,
    finalValue,
    tradingDays: equity.length,
    totalReturn,
    annualizedReturn,
    maxDrawdown: calcMaxDrawdown(
      equity.map((p) => p.totalValue),
      options.initialCapital
    ),
    volatility,
    sharpeRatio: calcSharpeRatio(annualizedReturn, volatility, options.riskFreeRate),
    totalTrades: trades.length,
    buyCount: trades.filter((t) => t.side === 'buy').length,
    sellCount: trades.filter((t) => t.side === 'sell').length,
    winRate: calcWinRate(trades),
    realizedPnl: round2(trades.reduce((sum, t) => sum + (t.realizedPnl ?? 0), 0)),
    totalCosts: sumCosts(trades).total,
  };
}
