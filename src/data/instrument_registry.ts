/**
 * Instrument Registry
 * Classification snapshots keyed by the date they take effect. A lookup for a
 * given date always resolves to the same snapshot.
 */

import { compareDates } from '@/core/time';
import { inferBoard, isSpecialTreatmentName, normalizeSymbol } from '@/core/symbol';
import type { Instrument, InstrumentFeed, ListingStatus } from '@/types/market';

interface Snapshot {
  effectiveDate: string;
  instrument: Instrument;
}

export class InstrumentRegistry implements InstrumentFeed {
  private readonly snapshots = new Map<string, Snapshot[]>();

  register(instrument: Instrument, effectiveDate: string): void {
    const symbol = normalizeSymbol(instrument.symbol);
    const list = this.snapshots.get(symbol) ?? [];
    const frozen: Instrument = Object.freeze({ ...instrument, symbol });
    const existing = list.findIndex((s) => s.effectiveDate === effectiveDate);
    if (existing >= 0) {
      list[existing] = { effectiveDate, instrument: frozen };
    } else {
      list.push({ effectiveDate, instrument: frozen });
      list.sort((a, b) => compareDates(a.effectiveDate, b.effectiveDate));
    }
    this.snapshots.set(symbol, list);
  }

  getInstrument(symbol: string, asOfDate: string): Instrument | null {
    const list = this.snapshots.get(normalizeSymbol(symbol));
    if (!list) return null;
    let match: Instrument | null = null;
    for (const snapshot of list) {
      if (compareDates(snapshot.effectiveDate, asOfDate) > 0) break;
      match = snapshot.instrument;
    }
    return match;
  }

  symbols(): string[] {
    return [...this.snapshots.keys()].sort();
  }
}

/**
 * Builds an instrument from symbol and display name alone, inferring board
 * from the code prefix and special treatment from the name.
 */
export function instrumentFromName(
  symbol: string,
  name: string,
  listingStatus: ListingStatus = 'active'
): Instrument {
  return {
    symbol: normalizeSymbol(symbol),
    name,
    board: inferBoard(symbol),
    specialTreatment: isSpecialTreatmentName(name),
    listingStatus,
  };
}
