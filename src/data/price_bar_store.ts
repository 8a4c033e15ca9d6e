/**
 * Price-Bar Store
 * Read-only after loading: one bar per (symbol, date), halted-bar invariant
 * enforced on insert. Raw accessors here are not time-guarded; simulation code
 * reads through CausalMarketView.
 */

import { compareDates } from '@/core/time';
import { normalizeSymbol } from '@/core/symbol';
import { normalizeBar } from '@/market/price_limits';
import type { PriceBar, PriceFeed } from '@/types/market';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('price_bar_store');

export class PriceBarStore implements PriceFeed {
  private readonly bySymbol = new Map<string, PriceBar[]>();
  private readonly index = new Map<string, PriceBar>();

  constructor(private readonly priceDecimals: number = 2) {}

  /** Returns false when a bar for (symbol, date) already exists; bars are immutable. */
  add(bar: PriceBar): boolean {
    const normalized = normalizeBar({ ...bar, symbol: normalizeSymbol(bar.symbol) }, this.priceDecimals);
    const key = `${normalized.symbol}|${normalized.date}`;
    if (this.index.has(key)) {
      logger.warn({ symbol: normalized.symbol, date: normalized.date }, 'Duplicate price bar ignored');
      return false;
    }

    this.index.set(key, normalized);
    const series = this.bySymbol.get(normalized.symbol) ?? [];
    series.push(normalized);
    if (series.length > 1 && compareDates(series[series.length - 2].date, normalized.date) > 0) {
      series.sort((a, b) => compareDates(a.date, b.date));
    }
    this.bySymbol.set(normalized.symbol, series);
    return true;
  }

  addMany(bars: Iterable<PriceBar>): number {
    let added = 0;
    for (const bar of bars) {
      if (this.add(bar)) added++;
    }
    return added;
  }

  getPriceBar(symbol: string, date: string): PriceBar | null {
    return this.index.get(`${normalizeSymbol(symbol)}|${date}`) ?? null;
  }

  /** Most recent bar dated on or before `date`. */
  latestOnOrBefore(symbol: string, date: string): PriceBar | null {
    const series = this.bySymbol.get(normalizeSymbol(symbol)) ?? [];
    let match: PriceBar | null = null;
    for (const bar of series) {
      if (compareDates(bar.date, date) > 0) break;
      match = bar;
    }
    return match;
  }

  /** Up to `lookback` bars ending on or before `endDate`, ascending. */
  history(symbol: string, endDate: string, lookback: number): PriceBar[] {
    const series = this.bySymbol.get(normalizeSymbol(symbol)) ?? [];
    const upTo = series.filter((bar) => compareDates(bar.date, endDate) <= 0);
    return upTo.slice(Math.max(0, upTo.length - lookback));
  }

  symbols(): string[] {
    return [...this.bySymbol.keys()].sort();
  }

  dates(): string[] {
    const all = new Set<string>();
    for (const series of this.bySymbol.values()) {
      for (const bar of series) all.add(bar.date);
    }
    return [...all].sort(compareDates);
  }
}
