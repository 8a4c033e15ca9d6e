import { describe, expect, it } from 'vitest';
import { ConsensusTopNPolicy } from '@/backtest/policies/consensus_top_n';
import type { ConsensusScore } from '@/types/consensus';
import type { PortfolioSnapshot, PositionView } from '@/types/trading';

const DATE = '2024-02-01';
const PRICES: Record<string, number> = { '600000.SH': 10, '000001.SZ': 20, '600519.SH': 1500 };

function score(symbol: string, total: number, completeness = 1): ConsensusScore {
  return {
    symbol,
    date: DATE,
    subScores: { technical: 0, capitalFlow: 0, logic: 0, sentiment: 0 },
    total,
    missingFamilies: [],
    completeness,
  };
}

function position(symbol: string, quantity: number, sellableQuantity: number): PositionView {
  return {
    symbol,
    quantity,
    sellableQuantity,
    averageCost: 10,
    lastPrice: 10,
    marketValue: quantity * 10,
    unrealizedPnl: 0,
  };
}

function snapshot(cash: number, positions: PositionView[] = []): PortfolioSnapshot {
  const positionsValue = positions.reduce((sum, p) => sum + p.marketValue, 0);
  return { date: DATE, cash, positionsValue, totalValue: cash + positionsValue, positions };
}

function policy(topN = 2) {
  return new ConsensusTopNPolicy({
    topN,
    entryScore: 60,
    exitScore: 30,
    minCompleteness: 0.5,
    lotSize: 100,
    priceOf: (symbol) => PRICES[symbol] ?? null,
  });
}

describe('ConsensusTopNPolicy', () => {
  it('buys the best-ranked names in whole lots with equal cash slices', () => {
    const orders = policy().proposeOrders(DATE, snapshot(100_000), [
      score('000001.SZ', 80),
      score('600000.SH', 70),
      score('600519.SH', 65),
    ]);
    expect(orders).toEqual([
      { symbol: '000001.SZ', side: 'buy', quantity: 2400, date: DATE },
      { symbol: '600000.SH', side: 'buy', quantity: 4900, date: DATE },
    ]);
  });

  it('skips names below the entry score or completeness', () => {
    const orders = policy().proposeOrders(DATE, snapshot(100_000), [
      score('000001.SZ', 59),
      score('600000.SH', 90, 0.25),
    ]);
    expect(orders).toEqual([]);
  });

  it('skips a slice too small for one lot', () => {
    const orders = policy(1).proposeOrders(DATE, snapshot(100_000), [score('600519.SH', 90)]);
    expect(orders).toEqual([]);
  });

  it('sells settled shares of holdings that drop below the exit score', () => {
    const orders = policy().proposeOrders(
      DATE,
      snapshot(0, [position('600000.SH', 300, 200), position('000001.SZ', 100, 100)]),
      [score('000001.SZ', 50), score('600000.SH', 10)]
    );
    expect(orders).toEqual([{ symbol: '600000.SH', side: 'sell', quantity: 200, date: DATE }]);
  });

  it('does not re-buy names already held', () => {
    const orders = policy(3).proposeOrders(DATE, snapshot(50_000, [position('000001.SZ', 100, 100)]), [
      score('000001.SZ', 90),
      score('600000.SH', 80),
    ]);
    expect(orders).toEqual([{ symbol: '600000.SH', side: 'buy', quantity: 2400, date: DATE }]);
  });
});
