/**
 * Portfolio ledger: cash, lots by acquisition date, and the trade log.
 * Only the simulation engine mutates it; everyone else reads snapshots.
 */

import { compareDates } from '@/core/time';
import { roundToTick } from '@/market/rounding';
import type {
  ExecutionFailureReason,
  Lot,
  PortfolioSnapshot,
  PositionView,
  Trade,
} from '@/types/trading';
import { netCashDelta, toCostBreakdown, type PricedOrder } from './costs';

export type LedgerResult =
  | { ok: true; trade: Trade }
  | { ok: false; reason: ExecutionFailureReason; message: string };

export interface FillRequest {
  symbol: string;
  date: string;
  quantity: number;
  fillPrice: number;
  priced: PricedOrder;
}

const round2 = (value: number) => roundToTick(value, 2);

export class PortfolioLedger {
  private cashBalance: number;
  private readonly lotsBySymbol = new Map<string, Lot[]>();
  private readonly tradeLog: Trade[] = [];

  constructor(readonly initialCash: number) {
    this.cashBalance = round2(initialCash);
  }

  get cash(): number {
    return this.cashBalance;
  }

  get trades(): readonly Trade[] {
    return this.tradeLog;
  }

  heldSymbols(): string[] {
    return [...this.lotsBySymbol.keys()].sort();
  }

  isHeld(symbol: string): boolean {
    return this.lotsBySymbol.has(symbol);
  }

  lotsFor(symbol: string): Lot[] {
    return (this.lotsBySymbol.get(symbol) ?? []).map((lot) => ({ ...lot }));
  }

  quantityOf(symbol: string): number {
    return (this.lotsBySymbol.get(symbol) ?? []).reduce((sum, lot) => sum + lot.quantity, 0);
  }

  applyBuy(fill: FillRequest): LedgerResult {
    const delta = netCashDelta('buy', fill.priced);
    if (this.cashBalance + delta < 0) {
      return {
        ok: false,
        reason: 'insufficient-funds',
        message: `Buying ${fill.quantity} ${fill.symbol} needs ${-delta}, cash is ${this.cashBalance}`,
      };
    }

    const lots = this.lotsBySymbol.get(fill.symbol) ?? [];
    lots.push({
      symbol: fill.symbol,
      quantity: fill.quantity,
      acquisitionDate: fill.date,
      costPerShare: -delta / fill.quantity,
    });
    this.lotsBySymbol.set(fill.symbol, lots);
    this.cashBalance = round2(this.cashBalance + delta);

    return { ok: true, trade: this.record(fill, 'buy', delta, null) };
  }

  /**
   * Consumes eligible lots oldest first. `isEligible` decides settlement, so
   * same-day lots stay put even when older lots of the symbol exist.
   */
  applySell(fill: FillRequest, isEligible: (lot: Lot) => boolean): LedgerResult {
    const lots = this.lotsBySymbol.get(fill.symbol) ?? [];
    const eligible = lots
      .filter(isEligible)
      .sort((a, b) => compareDates(a.acquisitionDate, b.acquisitionDate));
    const available = eligible.reduce((sum, lot) => sum + lot.quantity, 0);
    if (available < fill.quantity) {
      return {
        ok: false,
        reason: 'insufficient-lots',
        message: `Selling ${fill.quantity} ${fill.symbol} but only ${available} settled shares are held`,
      };
    }

    let remaining = fill.quantity;
    let costBasis = 0;
    for (const lot of eligible) {
      if (remaining === 0) break;
      const take = Math.min(lot.quantity, remaining);
      costBasis += lot.costPerShare * take;
      lot.quantity -= take;
      remaining -= take;
    }

    const remainingLots = lots.filter((lot) => lot.quantity > 0);
    if (remainingLots.length === 0) {
      this.lotsBySymbol.delete(fill.symbol);
    } else {
      this.lotsBySymbol.set(fill.symbol, remainingLots);
    }

    const delta = netCashDelta('sell', fill.priced);
    this.cashBalance = round2(this.cashBalance + delta);

    return { ok: true, trade: this.record(fill, 'sell', delta, round2(delta - costBasis)) };
  }

  snapshot(
    date: string,
    priceOf: (symbol: string) => number,
    isEligible: (lot: Lot) => boolean
  ): PortfolioSnapshot {
    const positions: PositionView[] = this.heldSymbols().map((symbol) => {
      const lots = this.lotsBySymbol.get(symbol) ?? [];
      const quantity = lots.reduce((sum, lot) => sum + lot.quantity, 0);
      const cost = lots.reduce((sum, lot) => sum + lot.costPerShare * lot.quantity, 0);
      const lastPrice = priceOf(symbol);
      const marketValue = round2(quantity * lastPrice);
      return {
        symbol,
        quantity,
        sellableQuantity: lots.filter(isEligible).reduce((sum, lot) => sum + lot.quantity, 0),
        averageCost: quantity > 0 ? roundToTick(cost / quantity, 4) : 0,
        lastPrice,
        marketValue,
        unrealizedPnl: round2(marketValue - cost),
      };
    });

    const positionsValue = round2(positions.reduce((sum, p) => sum + p.marketValue, 0));
    return {
      date,
      cash: this.cashBalance,
      positionsValue,
      totalValue: round2(this.cashBalance + positionsValue),
      positions,
    };
  }

  private record(
    fill: FillRequest,
    side: Trade['side'],
    delta: number,
    realizedPnl: number | null
  ): Trade {
    const trade: Trade = {
      symbol: fill.symbol,
      side,
      date: fill.date,
      quantity: fill.quantity,
      fillPrice: fill.fillPrice,
      notional: fill.priced.notional,
      costs: toCostBreakdown(fill.priced),
      netCashDelta: delta,
      realizedPnl,
    };
    this.tradeLog.push(trade);
    return trade;
  }
}
