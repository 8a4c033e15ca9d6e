export type Board = 'main' | 'science-innovation' | 'growth-enterprise';
export type ListingStatus = 'active' | 'suspended-unknown-duration' | 'delisted';
export type Venue = 'SH' | 'SZ' | 'BJ';

export interface Instrument {
  symbol: string;
  name: string;
  board: Board;
  specialTreatment: boolean;
  listingStatus: ListingStatus;
}

export type DayStatus = 'normal' | 'limit-up' | 'limit-down' | 'suspended' | 'data-missing';

export interface PriceBar {
  symbol: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  amount: number;
  prevClose: number;
  status: DayStatus;
  suspensionReason: string | null;
}

export interface PriceLimits {
  limitUp: number;
  limitDown: number;
  ratio: number;
}

/** Instrument Feed: classification must not change retroactively within a run. */
export interface InstrumentFeed {
  getInstrument(symbol: string, asOfDate: string): Instrument | null;
}

export interface PriceFeed {
  getPriceBar(symbol: string, date: string): PriceBar | null;
}
