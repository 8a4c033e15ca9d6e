/**
 * Market data bundle: registry, price bars and signals loaded into memory
 * for a replay.
 */

import type Database from 'better-sqlite3';
import { getDatabase } from './db';
import { InstrumentRegistry } from './instrument_registry';
import { PriceBarStore } from './price_bar_store';
import { SignalStore } from './signal_store';
import { loadInstruments } from './repositories/instrument_repo';
import { loadPriceBars } from './repositories/price_bar_repo';
import { loadSignals } from './repositories/signal_repo';
import type { SignalFeed } from '@/types/consensus';
import type { InstrumentFeed } from '@/types/market';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('market_data');

export interface MarketData {
  instruments: InstrumentFeed;
  prices: PriceBarStore;
  signals: SignalFeed;
}

export interface LoadOptions {
  symbols?: string[];
  /** Bars before the run start are kept for history lookups. */
  endDate?: string | null;
  priceDecimals?: number;
}

export function loadMarketData(
  options: LoadOptions = {},
  db: Database.Database = getDatabase()
): MarketData {
  const registry = new InstrumentRegistry();
  for (const { instrument, effectiveDate } of loadInstruments(db)) {
    registry.register(instrument, effectiveDate);
  }

  const prices = new PriceBarStore(options.priceDecimals ?? 2);
  const barCount = prices.addMany(
    loadPriceBars({ symbols: options.symbols, endDate: options.endDate ?? null }, db)
  );

  const signals = new SignalStore();
  const signalCount = signals.addMany(loadSignals(null, options.endDate ?? null, db));

  logger.info(
    { instruments: registry.symbols().length, bars: barCount, signals: signalCount },
    'Market data loaded'
  );
  return { instruments: registry, prices, signals };
}
