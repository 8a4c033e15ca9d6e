/**
 * Causal market view
 * The only path from simulation code to market data. Any read for a date
 * after the simulated date throws CausalityViolationError, on every call.
 */

import { CausalityViolationError } from '@/core/errors';
import { normalizeSymbol } from '@/core/symbol';
import type { MarketData } from '@/data/market_data';
import { carryForwardBar, resolveDayStatus } from '@/market/price_limits';
import { A_SHARE_RULES, type MarketRuleSet } from '@/market/rules';
import { deriveTechnicalInputs, DEFAULT_TECHNICAL_WINDOWS, type TechnicalWindows } from '@/scoring/technical';
import type { ConsensusSignal, SignalFeed } from '@/types/consensus';
import type { Instrument, InstrumentFeed, PriceBar, PriceFeed } from '@/types/market';
import { createChildLogger } from '@/utils/logger';
import type { SimulationClock } from './clock';

const logger = createChildLogger('causal_view');

export interface CausalViewOptions {
  rules?: MarketRuleSet;
  /** Fill an absent technical family from price history. */
  deriveTechnical?: boolean;
  technicalWindows?: TechnicalWindows;
}

export class CausalMarketView implements InstrumentFeed, PriceFeed, SignalFeed {
  private readonly rules: MarketRuleSet;
  private readonly deriveTechnical: boolean;
  private readonly windows: TechnicalWindows;

  constructor(
    private readonly clock: SimulationClock,
    private readonly data: MarketData,
    options: CausalViewOptions = {}
  ) {
    this.rules = options.rules ?? A_SHARE_RULES;
    this.deriveTechnical = options.deriveTechnical ?? false;
    this.windows = options.technicalWindows ?? DEFAULT_TECHNICAL_WINDOWS;
  }

  getInstrument(symbol: string, asOfDate: string): Instrument | null {
    this.guard('instrument', asOfDate);
    return this.data.instruments.getInstrument(normalizeSymbol(symbol), asOfDate);
  }

  /** Stored bar for the date with its status resolved, or null. */
  getPriceBar(symbol: string, date: string): PriceBar | null {
    this.guard('price', date);
    const bar = this.data.prices.getPriceBar(symbol, date);
    return bar ? this.resolve(bar) : null;
  }

  /**
   * Stored bar, or a data-missing bar carried forward from the last earlier
   * bar. Null only when the symbol has no bar up to `date`.
   */
  effectiveBar(symbol: string, date: string): PriceBar | null {
    this.guard('price', date);
    const bar = this.data.prices.getPriceBar(symbol, date);
    if (bar) return this.resolve(bar);

    const last = this.data.prices.latestOnOrBefore(symbol, date);
    return last ? carryForwardBar(last, date) : null;
  }

  history(symbol: string, endDate: string, lookback: number): PriceBar[] {
    this.guard('price-history', endDate);
    return this.data.prices.history(symbol, endDate, lookback);
  }

  getSignals(symbol: string, date: string): ConsensusSignal {
    this.guard('signal', date);
    const signal = this.data.signals.getSignals(symbol, date);
    if (!this.deriveTechnical || signal.technical.status === 'present') {
      return signal;
    }
    const history = this.data.prices.history(symbol, date, this.windows.highLookback);
    return { ...signal, technical: deriveTechnicalInputs(history, this.windows) };
  }

  private resolve(bar: PriceBar): PriceBar {
    const instrument = this.data.instruments.getInstrument(bar.symbol, bar.date);
    return instrument ? resolveDayStatus(bar, instrument, this.rules) : bar;
  }

  private guard(source: string, requestedDate: string): void {
    try {
      this.clock.assertVisible(source, requestedDate);
    } catch (error) {
      if (error instanceof CausalityViolationError) {
        logger.error(
          { source, requestedDate, currentDate: error.currentDate },
          'Look-ahead data access blocked'
        );
      }
      throw error;
    }
  }
}
