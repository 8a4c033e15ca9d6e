/**
 * Reference decision policy
 * Holds up to `topN` names. Sells settled shares of holdings whose score
 * drops below the exit level, then buys the best-ranked unheld names that
 * clear the entry level with equal cash slices, rounded down to whole lots.
 */

import type { ConsensusScore } from '@/types/consensus';
import type { Order, PortfolioSnapshot } from '@/types/trading';
import type { DecisionPolicy } from '../types';

export interface ConsensusTopNOptions {
  topN: number;
  entryScore: number;
  exitScore: number;
  minCompleteness: number;
  lotSize: number;
  /** Headroom kept per slice for fees and slippage. */
  costBuffer?: number;
  /** Reference price for sizing buys; null skips the symbol. */
  priceOf: (symbol: string, date: string) => number | null;
}

export class ConsensusTopNPolicy implements DecisionPolicy {
  readonly name: string;
  private readonly costBuffer: number;

  constructor(private readonly options: ConsensusTopNOptions) {
    this.name = `consensus-top-${options.topN}`;
    this.costBuffer = options.costBuffer ?? 0.002;
  }

  proposeOrders(
    currentDate: string,
    portfolio: PortfolioSnapshot,
    scores: readonly ConsensusScore[]
  ): Order[] {
    const { topN, entryScore, exitScore, minCompleteness, lotSize } = this.options;
    const bySymbol = new Map(scores.map((s) => [s.symbol, s]));
    const orders: Order[] = [];

    let exiting = 0;
    for (const position of portfolio.positions) {
      const total = bySymbol.get(position.symbol)?.total ?? 0;
      if (total < exitScore && position.sellableQuantity > 0) {
        orders.push({
          symbol: position.symbol,
          side: 'sell',
          quantity: position.sellableQuantity,
          date: currentDate,
        });
        if (position.sellableQuantity === position.quantity) exiting++;
      }
    }

    const held = new Set(portfolio.positions.map((p) => p.symbol));
    const slots = topN - (held.size - exiting);
    if (slots <= 0) return orders;

    const candidates = scores
      .filter((s) => !held.has(s.symbol) && s.total >= entryScore && s.completeness >= minCompleteness)
      .slice(0, slots);
    if (candidates.length === 0) return orders;

    const slice = portfolio.cash / slots;
    for (const candidate of candidates) {
      const price = this.options.priceOf(candidate.symbol, currentDate);
      if (price === null || price <= 0) continue;
      const lots = Math.floor(slice / (price * (1 + this.costBuffer)) / lotSize);
      if (lots <= 0) continue;
      orders.push({
        symbol: candidate.symbol,
        side: 'buy',
        quantity: lots * lotSize,
        date: currentDate,
      });
    }
    return orders;
  }
}
